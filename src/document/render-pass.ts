/**
 * One layout pass over a document model.
 *
 * Both the discovery pass and the final pass run through here; they differ
 * only in the page labels printed in the table of contents.
 */

import { PDFDocument } from 'pdf-lib';
import { UnsupportedCharacterError } from '../errors.js';
import { type FontFamily, findUnsupportedCharacter, loadFontFamily } from '../fonts/font-family.js';
import { type Element, type ElementFactory, type FooterSpec, LayoutEngine } from '../layout/engine.js';
import { CaptionedImage, SectionMarker, Spacer, TocRow } from '../layout/elements.js';
import { type DecodedImage, decodeImage } from '../layout/images.js';
import { PageTracker } from '../layout/page-tracker.js';
import { TextBlock } from '../layout/text.js';
import {
  type Block,
  type Cover,
  type RichParagraph,
  type Section,
  Span,
  describeBlock,
} from '../model/content.js';
import { mmToPt } from '../page-profiles/profiles.js';
import type { DocumentMetadata, Margins, PaperSize } from '../types.js';

/**
 * Placeholder printed in the page column when a section has no known page
 */
export const TOC_PLACEHOLDER = '-';

const COVER_TITLE_SCALE = 2;
const COVER_SUBTITLE_SCALE = 1.3;
const HEADING_SCALE = 1.4;
const TOC_TITLE_SCALE = 1.5;
const DECORATION_SCALE = 0.8;

export type PageDecoration = (pageNumber: number) => RichParagraph;

export interface FooterDecoration {
  heightMm: number;
  content: PageDecoration;
}

export interface PassOptions {
  cover: Cover | null;
  sections: readonly Section[];
  /**
   * Title of the printed table of contents, or null when none is printed
   */
  tocTitle: string | null;
  /**
   * Page numbers printed in the table of contents; null prints placeholders
   */
  tocPages: ReadonlyArray<number | null> | null;
  suppressSectionHeadings: boolean;
  paper: PaperSize;
  margins: Margins;
  fontSize: number;
  lineHeight: number;
  fontFamily: string;
  header: PageDecoration | null;
  footer: FooterDecoration | null;
  metadata: DocumentMetadata & { creationDate: Date };
}

export interface PassResult {
  bytes: Uint8Array;
  pageCount: number;
  sectionPages: Array<number | null>;
  tocPageNumber: number | null;
}

type Instruction = { kind: 'element'; element: Element } | { kind: 'break' };

function applyMetadata(document: PDFDocument, metadata: PassOptions['metadata']): void {
  if (metadata.title) {
    document.setTitle(metadata.title);
  }
  if (metadata.author) {
    document.setAuthor(metadata.author);
  }
  if (metadata.subject) {
    document.setSubject(metadata.subject);
  }
  document.setCreator(metadata.creator ?? 'quire');
  document.setProducer('quire (pdf-lib)');
  document.setCreationDate(metadata.creationDate);
  document.setModificationDate(metadata.creationDate);
}

/**
 * Decode every image block up front so a broken image fails the pass before
 * any page is laid out
 */
async function decodeImages(
  document: PDFDocument,
  cover: Cover | null,
  sections: readonly Section[],
): Promise<Map<Block, DecodedImage>> {
  const decoded = new Map<Block, DecodedImage>();
  const owners: Array<[string, readonly Block[]]> = [];

  if (cover) {
    owners.push(['Cover', cover.blocks]);
  }
  sections.forEach((section, index) => {
    owners.push([`Section ${index + 1} "${section.title}"`, section.blocks]);
  });

  for (const [owner, blocks] of owners) {
    for (const [index, block] of blocks.entries()) {
      if (block.kind === 'image') {
        decoded.set(
          block,
          await decodeImage(document, block.image.source, describeBlock(block, owner, index)),
        );
      }
    }
  }

  return decoded;
}

function assertEncodable(fonts: FontFamily, spans: readonly Span[], location: string): void {
  const character = findUnsupportedCharacter(fonts, spans);
  if (character !== null) {
    throw new UnsupportedCharacterError(character, location, fonts.name);
  }
}

/**
 * Check every text the pass will draw, apart from per-page decorations,
 * before the first page is laid out
 */
function assertDocumentEncodable(fonts: FontFamily, options: PassOptions): void {
  const { cover, sections, tocTitle } = options;
  const checkBlocks = (owner: string, blocks: readonly Block[]) => {
    blocks.forEach((block, index) => {
      if (block.kind === 'paragraph') {
        assertEncodable(fonts, block.paragraph.spans, describeBlock(block, owner, index));
      } else if (block.kind === 'image' && block.image.caption) {
        assertEncodable(
          fonts,
          block.image.caption.spans,
          `Caption of ${describeBlock(block, owner, index)}`,
        );
      }
    });
  };

  if (cover) {
    assertEncodable(fonts, [new Span(cover.title, { bold: true })], 'Cover title');
    if (cover.subtitle) {
      assertEncodable(fonts, [new Span(cover.subtitle, { italic: true })], 'Cover subtitle');
    }
    checkBlocks('Cover', cover.blocks);
  }
  if (tocTitle !== null) {
    assertEncodable(fonts, [new Span(tocTitle, { bold: true })], 'Table of contents title');
  }
  sections.forEach((section, index) => {
    const owner = `Section ${index + 1} "${section.title}"`;
    // Titles are drawn as headings, TOC rows or both
    if (!options.suppressSectionHeadings) {
      assertEncodable(fonts, [new Span(section.title, { bold: true })], `${owner} title`);
    }
    if (tocTitle !== null) {
      assertEncodable(fonts, [new Span(section.title)], `${owner} title`);
    }
    checkBlocks(owner, section.blocks);
  });
}

function blockInstruction(
  block: Block,
  images: Map<Block, DecodedImage>,
  paragraphSpacing: number,
): Instruction {
  switch (block.kind) {
    case 'pageBreak':
      return { kind: 'break' };
    case 'paragraph':
      return {
        kind: 'element',
        element: new TextBlock(block.paragraph.spans, {
          alignment: block.paragraph.alignment,
          spaceAfter: paragraphSpacing,
        }),
      };
    case 'image': {
      const decoded = images.get(block);
      if (!decoded) {
        throw new Error('Image block was not decoded before layout');
      }
      const { caption, alignment, widthMm, captionSpacingMm } = block.image;
      return {
        kind: 'element',
        element: new CaptionedImage(
          decoded,
          caption?.spans ?? null,
          alignment,
          widthMm,
          captionSpacingMm,
        ),
      };
    }
  }
}

function run(engine: LayoutEngine, instructions: readonly Instruction[]): void {
  for (const instruction of instructions) {
    if (instruction.kind === 'break') {
      engine.breakPage();
    } else {
      engine.push(instruction.element);
    }
  }
}

function headerFactory(header: PageDecoration, fonts: FontFamily, fontSize: number): ElementFactory {
  return (pageNumber) => {
    const paragraph = header(pageNumber);
    assertEncodable(fonts, paragraph.spans, `Header on page ${pageNumber}`);
    return new TextBlock(paragraph.spans, {
      alignment: paragraph.alignment,
      fontSize: fontSize * DECORATION_SCALE,
      spaceAfter: mmToPt(4),
    });
  };
}

function footerSpec(footer: FooterDecoration, fonts: FontFamily, fontSize: number): FooterSpec {
  return {
    heightMm: footer.heightMm,
    build: (pageNumber) => {
      const paragraph = footer.content(pageNumber);
      assertEncodable(fonts, paragraph.spans, `Footer on page ${pageNumber}`);
      return new TextBlock(paragraph.spans, {
        alignment: paragraph.alignment,
        fontSize: fontSize * DECORATION_SCALE,
      });
    },
  };
}

/**
 * Lay out the whole document once and record where each section starts
 */
export async function renderPass(options: PassOptions): Promise<PassResult> {
  const { cover, sections, fontSize } = options;
  const document = await PDFDocument.create();
  applyMetadata(document, options.metadata);

  const fonts = await loadFontFamily(document, options.fontFamily);
  assertDocumentEncodable(fonts, options);
  const images = await decodeImages(document, cover, sections);
  const tracker = new PageTracker(sections.length);
  const paragraphSpacing = fontSize * 0.6;

  const engine = new LayoutEngine(document, fonts, {
    paper: options.paper,
    margins: options.margins,
    fontSize,
    lineHeight: options.lineHeight,
    header: options.header ? headerFactory(options.header, fonts, fontSize) : undefined,
    footer: options.footer ? footerSpec(options.footer, fonts, fontSize) : undefined,
    onPageStart: () => tracker.advance(),
  });

  const hasToc = options.tocTitle !== null;

  if (cover) {
    engine.push(
      new TextBlock([new Span(cover.title, { bold: true })], {
        alignment: 'center',
        fontSize: fontSize * COVER_TITLE_SCALE,
        spaceAfter: mmToPt(4),
      }),
    );
    if (cover.subtitle) {
      engine.push(
        new TextBlock([new Span(cover.subtitle, { italic: true })], {
          alignment: 'center',
          fontSize: fontSize * COVER_SUBTITLE_SCALE,
          spaceAfter: mmToPt(8),
        }),
      );
    }
    run(
      engine,
      cover.blocks.map((block) => blockInstruction(block, images, paragraphSpacing)),
    );
    if (hasToc || sections.length > 0) {
      engine.breakPage();
    }
  }

  let tocPageNumber: number | null = null;
  if (options.tocTitle !== null) {
    engine.push(
      new TextBlock([new Span(options.tocTitle, { bold: true })], {
        fontSize: fontSize * TOC_TITLE_SCALE,
        spaceAfter: mmToPt(6),
      }),
    );
    tocPageNumber = engine.currentPageNumber;

    sections.forEach((section, index) => {
      const page = options.tocPages?.[index] ?? null;
      engine.push(new TocRow([new Span(section.title)], page === null ? TOC_PLACEHOLDER : String(page)));
    });
    engine.breakPage();
  }

  sections.forEach((section, index) => {
    const blocks = [...section.blocks];
    while (blocks[0]?.kind === 'pageBreak') {
      blocks.shift();
      engine.breakPage();
    }

    const instructions = blocks.map((block) => blockInstruction(block, images, paragraphSpacing));
    if (!options.suppressSectionHeadings) {
      instructions.unshift({
        kind: 'element',
        element: new TextBlock([new Span(section.title, { bold: true })], {
          fontSize: fontSize * HEADING_SCALE,
          spaceAfter: mmToPt(3),
        }),
      });
    }

    const [first, ...rest] = instructions;
    if (first?.kind === 'element') {
      engine.push(new SectionMarker(first.element, tracker, index));
      run(engine, rest);
    } else {
      run(engine, instructions);
    }

    // A trailing break leaves a fresh page; a gap there would count as content
    if (instructions.length > 0 && engine.hasContent && index < sections.length - 1) {
      engine.push(new Spacer(mmToPt(4)));
    }
  });

  const pageCount = engine.finish();
  const bytes = await document.save();

  return {
    bytes,
    pageCount,
    sectionPages: tracker.snapshot(),
    tocPageNumber,
  };
}
