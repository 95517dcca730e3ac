import { type Color, type PDFFont, rgb } from 'pdf-lib';
import { type FontFamily, selectFont } from '../fonts/font-family.js';
import type { Span } from '../model/content.js';
import type { HorizontalAlignment, Rgb } from '../types.js';
import type { Area, Element, LayoutContext, RenderResult } from './engine.js';

const UNDERLINE_OFFSET = 1.2;
const UNDERLINE_THICKNESS = 0.6;
const DEFAULT_TEXT_COLOR: Rgb = { r: 0, g: 0, b: 0 };

/**
 * A measured fragment of a line: a word or the whitespace between words
 */
export interface Piece {
  text: string;
  font: PDFFont;
  size: number;
  color: Rgb;
  underline: boolean;
  width: number;
  isSpace: boolean;
}

export interface Line {
  pieces: Piece[];
  width: number;
  /**
   * Last line of the paragraph or followed by a hard line break
   */
  endsParagraph: boolean;
}

export function toPdfColor(color: Rgb): Color {
  return rgb(color.r / 255, color.g / 255, color.b / 255);
}

function measure(span: Span, text: string, family: FontFamily, size: number, isSpace: boolean): Piece {
  const font = selectFont(family, span.bold, span.italic);
  return {
    text,
    font,
    size,
    color: span.color ?? DEFAULT_TEXT_COLOR,
    underline: span.underline,
    width: font.widthOfTextAtSize(text, size),
    isSpace,
  };
}

/**
 * Split a word that is wider than the line into chunks that fit
 */
function splitLongWord(piece: Piece, maxWidth: number): Piece[] {
  const chunks: Piece[] = [];
  let chunk = '';

  for (const character of piece.text) {
    const candidate = chunk + character;
    if (chunk && piece.font.widthOfTextAtSize(candidate, piece.size) > maxWidth) {
      chunks.push({ ...piece, text: chunk, width: piece.font.widthOfTextAtSize(chunk, piece.size) });
      chunk = character;
    } else {
      chunk = candidate;
    }
  }

  if (chunk) {
    chunks.push({ ...piece, text: chunk, width: piece.font.widthOfTextAtSize(chunk, piece.size) });
  }
  return chunks;
}

function trimTrailingSpaces(pieces: Piece[]): Piece[] {
  let end = pieces.length;
  while (end > 0 && pieces[end - 1]?.isSpace) {
    end -= 1;
  }
  return pieces.slice(0, end);
}

function finishLine(pieces: Piece[], endsParagraph: boolean): Line {
  const trimmed = trimTrailingSpaces(pieces);
  return {
    pieces: trimmed,
    width: trimmed.reduce((sum, piece) => sum + piece.width, 0),
    endsParagraph,
  };
}

/**
 * Greedy line breaking over styled spans. Whitespace runs collapse at line
 * starts and ends; `\n` forces a line break.
 */
export function breakLines(
  spans: readonly Span[],
  family: FontFamily,
  size: number,
  maxWidth: number,
): Line[] {
  const lines: Line[] = [];
  let current: Piece[] = [];
  let width = 0;

  const pushLine = (endsParagraph: boolean) => {
    lines.push(finishLine(current, endsParagraph));
    current = [];
    width = 0;
  };

  const appendWord = (piece: Piece) => {
    if (width + piece.width > maxWidth && current.some((p) => !p.isSpace)) {
      pushLine(false);
    }

    const parts = piece.width > maxWidth ? splitLongWord(piece, maxWidth) : [piece];
    parts.forEach((part, index) => {
      if (index > 0) {
        pushLine(false);
      }
      current.push(part);
      width += part.width;
    });
  };

  for (const span of spans) {
    const hardLines = span.text.split('\n');
    hardLines.forEach((segment, lineIndex) => {
      if (lineIndex > 0) {
        pushLine(true);
      }

      for (const token of segment.split(/(\s+)/)) {
        if (!token) {
          continue;
        }
        if (/^\s+$/.test(token)) {
          if (current.length === 0) {
            continue;
          }
          const space = measure(span, ' ', family, size, true);
          current.push(space);
          width += space.width;
          continue;
        }
        appendWord(measure(span, token, family, size, false));
      }
    });
  }

  if (current.length > 0 || lines.length === 0 || lines[lines.length - 1]?.endsParagraph) {
    pushLine(true);
  } else {
    const last = lines[lines.length - 1];
    if (last) {
      last.endsParagraph = true;
    }
  }

  return lines;
}

/**
 * Draw a single line with its top edge at `top`
 */
export function drawLine(
  context: LayoutContext,
  line: Line,
  x: number,
  top: number,
  width: number,
  lineHeight: number,
  size: number,
  alignment: HorizontalAlignment,
): void {
  const spaces = line.pieces.filter((piece) => piece.isSpace).length;
  const slack = Math.max(0, width - line.width);
  const justify = alignment === 'justified' && !line.endsParagraph && spaces > 0;
  const spaceBonus = justify ? slack / spaces : 0;

  let cursor = x;
  if (alignment === 'center') {
    cursor += slack / 2;
  } else if (alignment === 'right') {
    cursor += slack;
  }

  const baseline = top - (lineHeight - size) / 2 - size * 0.8;

  for (const piece of line.pieces) {
    const advance = piece.width + (piece.isSpace ? spaceBonus : 0);
    if (!piece.isSpace) {
      context.page.drawText(piece.text, {
        x: cursor,
        y: baseline,
        size: piece.size,
        font: piece.font,
        color: toPdfColor(piece.color),
      });
    }
    if (piece.underline) {
      context.page.drawLine({
        start: { x: cursor, y: baseline - UNDERLINE_OFFSET },
        end: { x: cursor + advance, y: baseline - UNDERLINE_OFFSET },
        thickness: UNDERLINE_THICKNESS,
        color: toPdfColor(piece.color),
      });
    }
    cursor += advance;
  }
}

export interface TextBlockOptions {
  alignment?: HorizontalAlignment;
  /**
   * Font size in points; defaults to the document font size
   */
  fontSize?: number;
  /**
   * Space after the last line, in points
   */
  spaceAfter?: number;
}

/**
 * Paragraph of styled spans that can flow across pages
 */
export class TextBlock implements Element {
  private lines: Line[] | null = null;
  private nextLine = 0;

  constructor(
    private readonly spans: readonly Span[],
    private readonly options: TextBlockOptions = {},
  ) {}

  render(context: LayoutContext, area: Area): RenderResult {
    const size = this.options.fontSize ?? context.fontSize;
    const lineHeight = size * context.lineHeight;
    const alignment = this.options.alignment ?? 'left';
    const lines = (this.lines ??= breakLines(this.spans, context.fonts, size, area.width));

    let used = 0;
    while (this.nextLine < lines.length) {
      const line = lines[this.nextLine];
      if (!line || used + lineHeight > area.height) {
        return { height: used, hasMore: true };
      }
      drawLine(context, line, area.x, area.top - used, area.width, lineHeight, size, alignment);
      used += lineHeight;
      this.nextLine += 1;
    }

    const spaceAfter = Math.min(this.options.spaceAfter ?? 0, area.height - used);
    return { height: used + Math.max(0, spaceAfter), hasMore: false };
  }
}
