/**
 * Document builder and the two-pass render that resolves table of contents
 * page numbers
 */

import { DEFAULT_FONT_FAMILY, assertFontFamilyAvailable } from '../fonts/font-family.js';
import type { Cover, RichParagraph, Section } from '../model/content.js';
import { applySectionBookmarks } from '../outline/bookmarks.js';
import { defaultProfile } from '../page-profiles/profiles.js';
import type {
  DocumentMetadata,
  LogFn,
  Margins,
  PageProfile,
  PaperSize,
  RenderedDocument,
} from '../types.js';
import { type FooterDecoration, type PageDecoration, renderPass } from './render-pass.js';

export const DEFAULT_TOC_TITLE = 'Contents';

interface BuilderState {
  cover: Cover | null;
  sections: readonly Section[];
  includeToc: boolean;
  tocTitle: string;
  suppressHeadings: boolean;
  trackPages: boolean;
  paper: PaperSize;
  margins: Margins;
  fontSize: number;
  lineHeight: number;
  fontFamily: string;
  header: PageDecoration | null;
  footer: FooterDecoration | null;
  metadata: DocumentMetadata;
  log: LogFn | null;
}

function initialState(profile: PageProfile): BuilderState {
  return {
    cover: null,
    sections: [],
    includeToc: false,
    tocTitle: DEFAULT_TOC_TITLE,
    suppressHeadings: false,
    trackPages: false,
    paper: profile.paper,
    margins: profile.margins,
    fontSize: profile.fontSize,
    lineHeight: profile.lineHeight,
    fontFamily: DEFAULT_FONT_FAMILY,
    header: null,
    footer: null,
    metadata: {},
    log: null,
  };
}

/**
 * Immutable document configuration. Every `with*` call returns a new builder.
 */
export class DocumentBuilder {
  private state: BuilderState;

  constructor(profile: PageProfile = defaultProfile) {
    this.state = initialState(profile);
  }

  private patch(patch: Partial<BuilderState>): DocumentBuilder {
    const next = new DocumentBuilder();
    next.state = { ...this.state, ...patch };
    return next;
  }

  withProfile(profile: PageProfile): DocumentBuilder {
    return this.patch({
      paper: profile.paper,
      margins: profile.margins,
      fontSize: profile.fontSize,
      lineHeight: profile.lineHeight,
    });
  }

  withCover(cover: Cover | null): DocumentBuilder {
    return this.patch({ cover });
  }

  addSection(section: Section): DocumentBuilder {
    return this.patch({ sections: [...this.state.sections, section] });
  }

  addSections(sections: Iterable<Section>): DocumentBuilder {
    return this.patch({ sections: [...this.state.sections, ...sections] });
  }

  includePrintedToc(includeToc: boolean): DocumentBuilder {
    return this.patch({ includeToc });
  }

  /**
   * Title printed above the table of contents; null restores the default
   */
  withTocTitle(title: string | null): DocumentBuilder {
    return this.patch({ tocTitle: title ?? DEFAULT_TOC_TITLE });
  }

  suppressSectionHeadings(suppressHeadings: boolean): DocumentBuilder {
    return this.patch({ suppressHeadings });
  }

  trackSectionPages(trackPages: boolean): DocumentBuilder {
    return this.patch({ trackPages });
  }

  withPaperSize(paper: PaperSize): DocumentBuilder {
    return this.patch({ paper });
  }

  withMargins(margins: Margins): DocumentBuilder {
    return this.patch({ margins });
  }

  withFontSize(fontSize: number, lineHeight: number = this.state.lineHeight): DocumentBuilder {
    return this.patch({ fontSize, lineHeight });
  }

  withFontFamily(fontFamily: string): DocumentBuilder {
    return this.patch({ fontFamily });
  }

  withHeader(header: ((pageNumber: number) => RichParagraph) | null): DocumentBuilder {
    return this.patch({ header });
  }

  withFooter(
    heightMm: number,
    content: (pageNumber: number) => RichParagraph,
  ): DocumentBuilder {
    return this.patch({ footer: { heightMm, content } });
  }

  withMetadata(metadata: DocumentMetadata): DocumentBuilder {
    return this.patch({ metadata: { ...this.state.metadata, ...metadata } });
  }

  withLogger(log: LogFn | null): DocumentBuilder {
    return this.patch({ log });
  }

  get sections(): readonly Section[] {
    return this.state.sections;
  }

  /**
   * Lay out the document. With a printed table of contents this runs a
   * discovery pass first to learn where each section starts.
   */
  async render(): Promise<RenderedDocument> {
    const state = this.state;
    const log = state.log ?? (() => {});

    assertFontFamilyAvailable(state.fontFamily);

    const printToc = state.includeToc && state.sections.length > 0;
    const base = {
      cover: state.cover,
      sections: state.sections,
      tocTitle: printToc ? state.tocTitle : null,
      suppressSectionHeadings: state.suppressHeadings,
      paper: state.paper,
      margins: state.margins,
      fontSize: state.fontSize,
      lineHeight: state.lineHeight,
      fontFamily: state.fontFamily,
      header: state.header,
      footer: state.footer,
      metadata: {
        ...state.metadata,
        creationDate: state.metadata.creationDate ?? new Date(),
      },
    };

    let discovered: Array<number | null> | null = null;
    if (printToc) {
      log('  Discovery pass: locating section start pages...');
      const discovery = await renderPass({ ...base, tocPages: null });
      discovered = discovery.sectionPages;
      log(`  Discovery pass: ${discovery.pageCount} pages`);
    }

    const final = await renderPass({ ...base, tocPages: discovered });
    log(`  Final pass: ${final.pageCount} pages`);

    return {
      bytes: final.bytes,
      pageCount: final.pageCount,
      sectionPages: state.trackPages ? final.sectionPages : null,
      discoveredSectionPages: discovered,
      tocPageNumber: final.tocPageNumber,
    };
  }

  /**
   * Render with page tracking and attach one bookmark per section that has a page
   */
  async renderWithBookmarks(): Promise<RenderedDocument> {
    const rendered = await this.trackSectionPages(true).render();
    const sectionPages = rendered.sectionPages ?? [];
    const bytes = await applySectionBookmarks(rendered.bytes, this.state.sections, sectionPages);
    return { ...rendered, bytes };
  }
}
