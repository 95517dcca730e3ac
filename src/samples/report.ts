/**
 * Built-in sample report used by `quire sample`
 */

import { fileURLToPath } from 'node:url';
import { DocumentBuilder } from '../document/builder.js';
import { parseMarkup, parseParagraph } from '../markup/parse-markup.js';
import {
  Cover,
  ImageBlock,
  RichParagraph,
  Section,
  imageBlock,
  imageFromPath,
  paragraphBlock,
  span,
} from '../model/content.js';
import type { PageProfile } from '../types.js';

const HERO_IMAGE_WIDTH_MM = 120;
const METRICS_IMAGE_WIDTH_MM = 100;
const ROADMAP_IMAGE_WIDTH_MM = 90;

const LINK_COLOR = { r: 36, g: 92, b: 160 };

function assetPath(name: string): string {
  return fileURLToPath(new URL(`../../assets/images/${name}`, import.meta.url));
}

function figure(
  file: string,
  caption: string,
  alignment: 'left' | 'center' | 'right',
  widthMm: number,
): ImageBlock {
  return new ImageBlock(imageFromPath(assetPath(file)), {
    caption: parseParagraph(caption, alignment),
    alignment,
    widthMm,
  });
}

function sampleCover(): Cover {
  return new Cover('Engineering Highlights', { subtitle: 'Spring Edition' }).withBlocks([
    paragraphBlock(
      parseParagraph(
        '*Prepared for the* **Architecture Guild** to summarise quarterly progress across shared platforms.',
      ),
    ),
    paragraphBlock(
      parseParagraph(
        'This briefing blends narrative summaries, quantitative dashboards and roadmap context so stakeholders can absorb the full story before diving into team-level detail.',
        'justified',
      ),
    ),
    paragraphBlock(parseParagraph('**Report Date:** April 2024    **Author:** Automation & Insights Team')),
    paragraphBlock([
      ...parseMarkup('**Contact:** reports@example.com • '),
      span('https://intranet.example.com/reports').colored(LINK_COLOR).underlined(),
    ]),
  ]);
}

function sampleSections(): Section[] {
  const highlights = new Section('Executive Highlights', [], 'executive-highlights').withBlocks([
    paragraphBlock(
      parseParagraph(
        'Over the last quarter, the **Platform Engineering** guild accelerated delivery on migration initiatives, reducing mean rollout time by [color=#28785A]{**38%**}, while maintaining a [color=#206694]{**99.95%**} service uptime across customer-facing surfaces.',
        'justified',
      ),
    ),
    paragraphBlock(
      parseParagraph(
        'Stakeholder sentiment improved as weekly demos showcased iterative value; *design partners* praised the *"no surprises"* communication model that paired annotated prototypes with support runbooks.',
      ),
    ),
    paragraphBlock(
      parseParagraph(
        '**•** Launch readiness: [color=#2CA02C]{**green**} after resilience tests validated *automated failover drills*. **•** Talent: [color=#B47828]{hiring freeze lifted for core reliability roles} with onboarding cohorts scheduled bi-weekly.',
      ),
    ),
    imageBlock(
      figure(
        'hero.png',
        '**Figure 1:** Narrative montage of delivery milestones across the quarter.',
        'center',
        HERO_IMAGE_WIDTH_MM,
      ),
    ),
    paragraphBlock(
      parseParagraph(
        'The hero montage above collates flagship achievements, from zero-downtime cutovers to the new developer portal launch, showing value delivery balanced between reliability and velocity.',
      ),
    ),
  ]);

  const metrics = Section.builder('Key Metrics and Trends')
    .identifier('key-metrics')
    .startOnNewPage(true)
    .extendBlocks([
      paragraphBlock(
        parseParagraph(
          'Operational dashboards continue to trend positively: change failure rate dropped to [color=#DC503C]{**7%**}, and mean time to restore averaged **18 minutes** after instrumentation upgrades.',
        ),
      ),
      paragraphBlock(
        parseParagraph(
          'Analysts noted that the **incident response guild** now closes postmortem actions within *48 hours*, reflecting cross-team peer reviews and standardised templates.',
        ),
      ),
      imageBlock(
        figure(
          'metrics.png',
          '**Figure 2:** Rolling 8-week stability and throughput trendline with annotations.',
          'right',
          METRICS_IMAGE_WIDTH_MM,
        ),
      ),
      paragraphBlock(
        parseParagraph(
          'The trendline shows how seasonal demand spikes intersect with feature releases, helping squads sequence risky deployments outside of traffic peaks.',
        ),
      ),
    ])
    .build();

  const updates = new Section('Project Updates', [], 'project-updates').withBlocks([
    paragraphBlock(
      parseParagraph(
        'Service Mesh Rollout: **phase two** completed with sidecar adoption hitting [color=#3C8CD2]{**82% of workloads**}, unlocking richer telemetry and retry policies.',
      ),
    ),
    paragraphBlock(
      parseParagraph(
        'Data Platform Modernisation: *foundation models* were onboarded to the analytics hub with **governance guardrails** documented as reusable playbooks.',
      ),
    ),
    paragraphBlock(
      parseParagraph(
        'Mobile Reliability: weekly crash-free sessions climbed to 99.3%, and the *beta cohort* rolled out feature flags that made experimentation safer for the revenue funnel.',
      ),
    ),
  ]);

  const roadmap = new Section('Upcoming Roadmap', [], 'roadmap').withBlocks([
    paragraphBlock(
      parseParagraph(
        'The next quarter emphasises **platform resilience** and *developer ergonomics*, prioritising backlog items that trim context switching and accelerate safe deploys.',
      ),
    ),
    imageBlock(
      figure(
        'roadmap.png',
        '**Figure 3:** Roadmap swimlane sketch pairing discovery themes with delivery bets.',
        'left',
        ROADMAP_IMAGE_WIDTH_MM,
      ),
    ),
    paragraphBlock(
      parseParagraph(
        'Discovery tracks include partner interviews, API lifecycle audits and investment in **continuous verification** so the rollout checklist evolves alongside observability improvements.',
      ),
    ),
    paragraphBlock(
      parseParagraph(
        'Risks remain around vendor lead times; procurement has sourced alternates while the *SRE council* drafts contingency drills.',
      ),
    ),
  ]);

  const appendix = new Section('Appendix', [], 'appendix').withBlocks([
    paragraphBlock(
      parseParagraph(
        'Glossary: **• MTTR** (Mean Time to Restore), **• CFR** (Change Failure Rate) and **• DORA** (DevOps Research and Assessment) benchmarks referenced throughout.',
      ),
    ),
    paragraphBlock(
      parseParagraph(
        'Reference links include the analytics dashboard, source-controlled runbooks and incident retrospectives, so every data point can be reproduced.',
      ),
    ),
  ]);

  return [highlights, metrics, updates, roadmap, appendix];
}

/**
 * Sample report with cover, printed table of contents, header and footer
 */
export function buildSampleReport(profile?: PageProfile): DocumentBuilder {
  return new DocumentBuilder(profile)
    .withMetadata({
      title: 'Engineering Highlights',
      author: 'Automation & Insights Team',
      subject: 'Quarterly engineering report',
    })
    .withHeader(
      () =>
        new RichParagraph(
          [span('Engineering Highlights').bolded(), span(' • Spring Edition • April 2024')],
          'center',
        ),
    )
    .withFooter(
      12,
      (pageNumber) =>
        new RichParagraph(
          [span(`Page ${pageNumber} • Automation & Insights • Reach out for dataset refreshes`)],
          'right',
        ),
    )
    .includePrintedToc(true)
    .withTocTitle('Contents')
    .withCover(sampleCover())
    .addSections(sampleSections());
}
