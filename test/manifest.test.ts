import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { ManifestError } from '../src/errors.js';
import {
  builderFromManifest,
  loadDocumentManifest,
  parseDocumentManifest,
} from '../src/manifest/load-document.js';
import { a4Profile, getPageProfile } from '../src/page-profiles/profiles.js';

const fixturesDir = fileURLToPath(new URL('./fixtures', import.meta.url));

function issuesOf(json: unknown): string[] {
  try {
    parseDocumentManifest(json, fixturesDir);
  } catch (error) {
    if (error instanceof ManifestError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('Expected the manifest to be rejected');
}

describe('loadDocumentManifest', () => {
  it('reads metadata, cover and sections', async () => {
    const manifest = await loadDocumentManifest(join(fixturesDir, 'manifest.json'));

    expect(manifest.metadata).toEqual({
      title: 'Field Report',
      author: 'Docs Team',
      creationDate: new Date('2024-04-01T09:30:00Z'),
    });
    expect(manifest.profile).toBe('a5');
    expect(manifest.includeToc).toBe(true);
    expect(manifest.tocTitle).toBe('In this report');
    expect(manifest.footer).toEqual({ heightMm: 10, text: 'Page **{page}**', alignment: 'right' });
    expect(manifest.cover?.subtitle).toBe('Spring survey');
    expect(manifest.sections.map((section) => section.title)).toEqual(['Introduction', 'Figures']);
    expect(manifest.sections[0]?.identifier).toBe('intro');
  });

  it('resolves image paths against the manifest directory', async () => {
    const manifest = await loadDocumentManifest(join(fixturesDir, 'manifest.json'));
    const blocks = manifest.sections[1]?.blocks ?? [];

    expect(blocks.map((block) => block.kind)).toEqual(['pageBreak', 'image']);
    const image = blocks[1];
    expect(image?.kind === 'image' ? image.image.source : null).toEqual({
      kind: 'path',
      path: join(fixturesDir, 'swatch.png'),
    });
    expect(image?.kind === 'image' ? image.image.caption?.text : null).toBe('Figure 1: swatch');
  });

  it('reports invalid JSON', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'quire-manifest-'));
    try {
      const path = join(dir, 'broken.json');
      await writeFile(path, '{ "title": ');

      await expect(loadDocumentManifest(path)).rejects.toBeInstanceOf(ManifestError);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('parseDocumentManifest', () => {
  it('accepts a minimal manifest', () => {
    const manifest = parseDocumentManifest({ sections: [{ title: 'Only' }] });

    expect(manifest.includeToc).toBe(false);
    expect(manifest.cover).toBeNull();
    expect(manifest.sections).toHaveLength(1);
    expect(manifest.sections[0]?.blocks).toEqual([]);
  });

  it('rejects a value that is not an object', () => {
    expect(issuesOf([])).toEqual(['(root): expected an object']);
  });

  it('lists every problem with its location', () => {
    const issues = issuesOf({
      title: 5,
      toc: 'yes',
      footer: { text: 'x' },
      sections: [
        {
          blocks: [
            { type: 'quote' },
            { type: 'paragraph', text: '**open' },
          ],
        },
        'x',
      ],
    });

    expect(issues).toEqual([
      'title: expected a string',
      'toc: expected true, false or an object with a title',
      'footer.heightMm: is required',
      'sections[0].title: is required',
      'sections[0].blocks[0].type: expected "paragraph", "image" or "pageBreak"',
      'sections[0].blocks[1].text: unterminated bold span (at byte 6)',
      'sections[1]: expected an object',
    ]);
  });

  it('checks markup in footers with the page token in place', () => {
    expect(issuesOf({ footer: { heightMm: 10, text: 'Page {page} *of' } })).toEqual([
      'footer.text: unterminated italic span (at byte 15)',
    ]);
  });

  it('rejects unknown alignments and bad dates', () => {
    expect(
      issuesOf({
        creationDate: 'soon',
        sections: [{ title: 'A', blocks: [{ type: 'paragraph', text: 'x', alignment: 'middle' }] }],
      }),
    ).toEqual([
      'creationDate: expected an ISO 8601 date',
      'sections[0].blocks[0].alignment: expected one of left, center, right, justified',
    ]);
  });

  it('reads the caption spacing of image blocks', () => {
    const manifest = parseDocumentManifest(
      {
        sections: [
          {
            title: 'A',
            blocks: [{ type: 'image', path: 'swatch.png', caption: 'c', captionSpacingMm: 6 }],
          },
        ],
      },
      fixturesDir,
    );
    const block = manifest.sections[0]?.blocks[0];

    expect(block?.kind === 'image' ? block.image.captionSpacingMm : null).toBe(6);
    expect(
      issuesOf({
        sections: [{ title: 'A', blocks: [{ type: 'image', path: 'x.png', captionSpacingMm: -1 }] }],
      }),
    ).toEqual(['sections[0].blocks[0].captionSpacingMm: expected a non-negative number']);
  });

  it('rejects blocks that are not objects and images without a positive width', () => {
    expect(
      issuesOf({
        sections: [{ title: 'A', blocks: ['x', { type: 'image', path: 'x.png', widthMm: 0 }] }],
      }),
    ).toEqual([
      'sections[0].blocks[0]: expected an object',
      'sections[0].blocks[1].widthMm: expected a positive number',
    ]);
  });

  it('puts every issue in the error message', () => {
    try {
      parseDocumentManifest({ sections: {} });
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestError);
      expect(error instanceof Error ? error.message : '').toBe(
        'Invalid document manifest:\n  sections: expected an array',
      );
      return;
    }
    throw new Error('Expected the manifest to be rejected');
  });
});

describe('builderFromManifest', () => {
  it('renders the manifest with its profile, cover and table of contents', async () => {
    const manifest = await loadDocumentManifest(join(fixturesDir, 'manifest.json'));
    const rendered = await builderFromManifest(manifest, getPageProfile(manifest.profile ?? undefined))
      .trackSectionPages(true)
      .render();

    expect(rendered.tocPageNumber).toBe(2);
    expect(rendered.sectionPages).toEqual([3, 4]);
    expect(rendered.pageCount).toBe(4);
  });

  it('lets overrides switch the table of contents on and change the font', async () => {
    const manifest = parseDocumentManifest({ font: 'helvetica', sections: [{ title: 'A' }] });
    const rendered = await builderFromManifest(manifest, a4Profile, {
      includeToc: true,
      font: 'courier',
    }).render();

    expect(rendered.tocPageNumber).toBe(1);
    expect(rendered.discoveredSectionPages).toEqual([2]);
  });
});
