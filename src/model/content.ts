/**
 * Logical content of a document: spans, paragraphs, images, sections and the cover.
 *
 * Every type here is an immutable value. Withers return a fresh instance and
 * never share the caller's arrays, so a model can be rendered any number of
 * times without one render observing another.
 */

import type { HorizontalAlignment, Rgb } from '../types.js';

export interface SpanStyle {
  bold: boolean;
  italic: boolean;
  underline: boolean;
  color: Rgb | null;
}

const PLAIN_STYLE: SpanStyle = {
  bold: false,
  italic: false,
  underline: false,
  color: null,
};

/**
 * A slice of text with inline style attributes
 */
export class Span {
  readonly text: string;
  readonly bold: boolean;
  readonly italic: boolean;
  readonly underline: boolean;
  readonly color: Rgb | null;

  constructor(text: string, style: Partial<SpanStyle> = {}) {
    const resolved = { ...PLAIN_STYLE, ...style };
    this.text = text;
    this.bold = resolved.bold;
    this.italic = resolved.italic;
    this.underline = resolved.underline;
    this.color = resolved.color ? { ...resolved.color } : null;
  }

  get style(): SpanStyle {
    return {
      bold: this.bold,
      italic: this.italic,
      underline: this.underline,
      color: this.color,
    };
  }

  withText(text: string): Span {
    return new Span(text, this.style);
  }

  withBold(bold: boolean): Span {
    return new Span(this.text, { ...this.style, bold });
  }

  withItalic(italic: boolean): Span {
    return new Span(this.text, { ...this.style, italic });
  }

  withUnderline(underline: boolean): Span {
    return new Span(this.text, { ...this.style, underline });
  }

  withColor(color: Rgb | null): Span {
    return new Span(this.text, { ...this.style, color });
  }

  bolded(): Span {
    return this.withBold(true);
  }

  italicized(): Span {
    return this.withItalic(true);
  }

  underlined(): Span {
    return this.withUnderline(true);
  }

  colored(color: Rgb): Span {
    return this.withColor(color);
  }

  hasStyle(): boolean {
    return this.bold || this.italic || this.underline || this.color !== null;
  }

  equals(other: Span): boolean {
    return (
      this.text === other.text &&
      this.bold === other.bold &&
      this.italic === other.italic &&
      this.underline === other.underline &&
      colorsEqual(this.color, other.color)
    );
  }
}

export function colorsEqual(a: Rgb | null, b: Rgb | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.r === b.r && a.g === b.g && a.b === b.b;
}

/**
 * Shorthand for `new Span(text)`
 */
export function span(text: string): Span {
  return new Span(text);
}

/**
 * Styled paragraph
 */
export class RichParagraph {
  readonly spans: readonly Span[];
  readonly alignment: HorizontalAlignment;

  constructor(spans: readonly Span[], alignment: HorizontalAlignment = 'left') {
    this.spans = [...spans];
    this.alignment = alignment;
  }

  withAlignment(alignment: HorizontalAlignment): RichParagraph {
    return new RichParagraph(this.spans, alignment);
  }

  get text(): string {
    return this.spans.map((s) => s.text).join('');
  }
}

export type ImageSource =
  | { kind: 'bytes'; bytes: Uint8Array }
  | { kind: 'path'; path: string };

export function imageFromBytes(bytes: Uint8Array): ImageSource {
  return { kind: 'bytes', bytes };
}

export function imageFromPath(path: string): ImageSource {
  return { kind: 'path', path };
}

export const DEFAULT_CAPTION_SPACING_MM = 2;

/**
 * Image with optional caption. `widthMm` rescales uniformly and is independent
 * of the image's pixel dimensions.
 */
export class ImageBlock {
  readonly source: ImageSource;
  readonly caption: RichParagraph | null;
  readonly alignment: HorizontalAlignment;
  readonly widthMm: number | null;
  /** Gap between the image and its caption */
  readonly captionSpacingMm: number;

  constructor(
    source: ImageSource,
    options: {
      caption?: RichParagraph | null;
      alignment?: HorizontalAlignment;
      widthMm?: number | null;
      captionSpacingMm?: number;
    } = {},
  ) {
    this.source = source;
    this.caption = options.caption ?? null;
    this.alignment = options.alignment ?? 'left';
    this.widthMm = options.widthMm ?? null;
    this.captionSpacingMm = Math.max(0, options.captionSpacingMm ?? DEFAULT_CAPTION_SPACING_MM);
  }

  withCaption(caption: RichParagraph | null): ImageBlock {
    return new ImageBlock(this.source, { ...this.options(), caption });
  }

  withAlignment(alignment: HorizontalAlignment): ImageBlock {
    return new ImageBlock(this.source, { ...this.options(), alignment });
  }

  withWidthMm(widthMm: number | null): ImageBlock {
    return new ImageBlock(this.source, { ...this.options(), widthMm });
  }

  withCaptionSpacingMm(captionSpacingMm: number): ImageBlock {
    return new ImageBlock(this.source, { ...this.options(), captionSpacingMm });
  }

  private options() {
    return {
      caption: this.caption,
      alignment: this.alignment,
      widthMm: this.widthMm,
      captionSpacingMm: this.captionSpacingMm,
    };
  }
}

export type Block =
  | { kind: 'paragraph'; paragraph: RichParagraph }
  | { kind: 'image'; image: ImageBlock }
  | { kind: 'pageBreak' };

export function paragraphBlock(content: RichParagraph | readonly Span[]): Block {
  const paragraph = content instanceof RichParagraph ? content : new RichParagraph(content);
  return { kind: 'paragraph', paragraph };
}

export function imageBlock(image: ImageBlock | ImageSource): Block {
  return { kind: 'image', image: image instanceof ImageBlock ? image : new ImageBlock(image) };
}

export function pageBreak(): Block {
  return { kind: 'pageBreak' };
}

/**
 * Logical document section
 */
export class Section {
  readonly title: string;
  readonly identifier: string | null;
  readonly blocks: readonly Block[];

  constructor(title: string, blocks: readonly Block[] = [], identifier: string | null = null) {
    this.title = title;
    this.blocks = [...blocks];
    this.identifier = identifier;
  }

  static builder(title: string): SectionBuilder {
    return new SectionBuilder(title);
  }

  withIdentifier(identifier: string | null): Section {
    return new Section(this.title, this.blocks, identifier);
  }

  withBlock(block: Block): Section {
    return new Section(this.title, [...this.blocks, block], this.identifier);
  }

  withBlocks(blocks: Iterable<Block>): Section {
    return new Section(this.title, [...this.blocks, ...blocks], this.identifier);
  }
}

/**
 * Builder for sections that may need to start on a fresh page
 */
export class SectionBuilder {
  private readonly title: string;
  private readonly id: string | null;
  private readonly blocks: readonly Block[];
  private readonly newPage: boolean;

  constructor(
    title: string,
    state: { identifier?: string | null; blocks?: readonly Block[]; startOnNewPage?: boolean } = {},
  ) {
    this.title = title;
    this.id = state.identifier ?? null;
    this.blocks = state.blocks ?? [];
    this.newPage = state.startOnNewPage ?? false;
  }

  startOnNewPage(startOnNewPage: boolean): SectionBuilder {
    return new SectionBuilder(this.title, { ...this.state(), startOnNewPage });
  }

  identifier(identifier: string | null): SectionBuilder {
    return new SectionBuilder(this.title, { ...this.state(), identifier });
  }

  pushBlock(block: Block): SectionBuilder {
    return new SectionBuilder(this.title, { ...this.state(), blocks: [...this.blocks, block] });
  }

  extendBlocks(blocks: Iterable<Block>): SectionBuilder {
    return new SectionBuilder(this.title, {
      ...this.state(),
      blocks: [...this.blocks, ...blocks],
    });
  }

  build(): Section {
    const blocks = [...this.blocks];
    if (this.newPage && blocks[0]?.kind !== 'pageBreak') {
      blocks.unshift(pageBreak());
    }
    return new Section(this.title, blocks, this.id);
  }

  private state() {
    return { identifier: this.id, blocks: this.blocks, startOnNewPage: this.newPage };
  }
}

/**
 * Cover page rendered ahead of the table of contents and all sections
 */
export class Cover {
  readonly title: string;
  readonly subtitle: string | null;
  readonly identifier: string | null;
  readonly blocks: readonly Block[];

  constructor(
    title: string,
    options: { subtitle?: string | null; identifier?: string | null; blocks?: readonly Block[] } = {},
  ) {
    this.title = title;
    this.subtitle = options.subtitle ?? null;
    this.identifier = options.identifier ?? null;
    this.blocks = [...(options.blocks ?? [])];
  }

  withSubtitle(subtitle: string | null): Cover {
    return new Cover(this.title, { ...this.options(), subtitle });
  }

  withIdentifier(identifier: string | null): Cover {
    return new Cover(this.title, { ...this.options(), identifier });
  }

  withBlock(block: Block): Cover {
    return new Cover(this.title, { ...this.options(), blocks: [...this.blocks, block] });
  }

  withBlocks(blocks: Iterable<Block>): Cover {
    return new Cover(this.title, { ...this.options(), blocks: [...this.blocks, ...blocks] });
  }

  private options() {
    return { subtitle: this.subtitle, identifier: this.identifier, blocks: this.blocks };
  }
}

/**
 * Human-readable label for a block, used in error messages
 */
export function describeBlock(block: Block, owner: string, index: number): string {
  switch (block.kind) {
    case 'paragraph': {
      const text = block.paragraph.text;
      const preview = text.length > 40 ? `${text.slice(0, 37)}...` : text;
      return `${owner} block ${index} (paragraph "${preview}")`;
    }
    case 'image': {
      const source = block.image.source;
      const origin =
        source.kind === 'path' ? `path ${source.path}` : `${source.bytes.byteLength} bytes`;
      return `${owner} block ${index} (image from ${origin})`;
    }
    case 'pageBreak':
      return `${owner} block ${index} (page break)`;
  }
}
