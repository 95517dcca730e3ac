/**
 * Inline markup for styled text.
 *
 * Supported constructs (nestable):
 *
 * - `**bold**`
 * - `*italic*`
 * - `[color=#RRGGBB]{colored text}`
 *
 * The parser splits the input into maximal runs of constant style, so joining
 * the text of the returned spans reproduces the input minus the markup tokens.
 * Underline has no syntax; set it on the returned spans when needed.
 */

import { RichParagraph, Span, type SpanStyle } from '../model/content.js';
import type { HorizontalAlignment, Rgb } from '../types.js';

/**
 * Parse failure with the UTF-8 byte offset of the offending construct
 */
export class MarkupParseError extends Error {
  readonly index: number;
  readonly reason: string;

  constructor(index: number, reason: string) {
    super(`${reason} (at byte ${index})`);
    Object.setPrototypeOf(this, MarkupParseError.prototype);
    this.name = 'MarkupParseError';
    this.index = index;
    this.reason = reason;
  }
}

type Scope = 'bold' | 'italic' | 'color';

const CLOSING_TOKEN: Record<Scope, string> = {
  bold: '**',
  italic: '*',
  color: '}',
};

const COLOR_PREFIX = '[color=';
const HEX_DIGITS = 6;

interface ScopeResult {
  spans: Span[];
  next: number;
}

/**
 * Join neighbouring spans that ended up with the same style, e.g. `**a****b**`
 */
function mergeAdjacent(spans: Span[]): Span[] {
  const merged: Span[] = [];
  for (const span of spans) {
    const last = merged[merged.length - 1];
    if (last && last.withText('').equals(span.withText(''))) {
      merged[merged.length - 1] = last.withText(last.text + span.text);
    } else {
      merged.push(span);
    }
  }
  return merged;
}

class MarkupParser {
  constructor(private readonly input: string) {}

  parse(): Span[] {
    const { spans } = this.parseScope(
      0,
      { bold: false, italic: false, underline: false, color: null },
      null,
    );
    return mergeAdjacent(spans);
  }

  private parseScope(start: number, style: SpanStyle, scope: Scope | null): ScopeResult {
    const { input } = this;
    const spans: Span[] = [];
    let buffer = '';
    let index = start;

    const flush = () => {
      if (buffer.length > 0) {
        spans.push(new Span(buffer, style));
        buffer = '';
      }
    };

    const enter = (next: number, nestedStyle: SpanStyle, nestedScope: Scope) => {
      flush();
      const nested = this.parseScope(next, nestedStyle, nestedScope);
      spans.push(...nested.spans);
      return nested.next;
    };

    while (index < input.length) {
      if (scope && input.startsWith(CLOSING_TOKEN[scope], index)) {
        flush();
        return { spans, next: index + CLOSING_TOKEN[scope].length };
      }

      if (input.startsWith('**', index)) {
        index = enter(index + 2, { ...style, bold: true }, 'bold');
        continue;
      }

      if (input.startsWith('*', index)) {
        index = enter(index + 1, { ...style, italic: true }, 'italic');
        continue;
      }

      if (input.startsWith(COLOR_PREFIX, index)) {
        const directive = this.parseColorDirective(index);
        index = enter(directive.next, { ...style, color: directive.color }, 'color');
        continue;
      }

      const ch = input[index];
      if (ch === '}') {
        throw this.error(index, 'unexpected closing token `}` without matching `[color=...]`');
      }
      if (ch === ']') {
        throw this.error(index, 'unexpected closing token `]`');
      }
      if (ch === '[') {
        throw this.error(index, 'unsupported directive; expected `[color=#RRGGBB]{...}`');
      }

      const codePoint = input.codePointAt(index) ?? 0;
      const width = codePoint > 0xffff ? 2 : 1;
      buffer += input.slice(index, index + width);
      index += width;
    }

    if (scope) {
      throw this.error(index, `unterminated ${scope} span`);
    }

    flush();
    return { spans, next: index };
  }

  private parseColorDirective(start: number): { color: Rgb; next: number } {
    const { input } = this;
    const hashIndex = start + COLOR_PREFIX.length;
    if (input[hashIndex] !== '#') {
      throw this.error(hashIndex, 'expected `#` followed by a hexadecimal RGB value');
    }

    const hexStart = hashIndex + 1;
    const candidate = input.slice(hexStart, hexStart + HEX_DIGITS);
    const badOffset = candidate.split('').findIndex((c) => !/^[0-9a-fA-F]$/.test(c));

    if (badOffset !== -1 && (candidate[badOffset] === ']' || candidate[badOffset] === '{')) {
      throw this.error(
        hexStart,
        'incomplete color specification; expected 6 hexadecimal digits',
      );
    }
    if (badOffset !== -1) {
      throw this.error(
        hexStart + badOffset,
        'invalid RGB specification; use hexadecimal digits only',
      );
    }
    if (candidate.length < HEX_DIGITS) {
      throw this.error(
        hexStart,
        'incomplete color specification; expected 6 hexadecimal digits',
      );
    }

    const color: Rgb = {
      r: Number.parseInt(candidate.slice(0, 2), 16),
      g: Number.parseInt(candidate.slice(2, 4), 16),
      b: Number.parseInt(candidate.slice(4, 6), 16),
    };

    const bracketIndex = hexStart + HEX_DIGITS;
    if (input[bracketIndex] !== ']') {
      throw this.error(bracketIndex, 'expected `]` to close color directive');
    }

    const braceIndex = bracketIndex + 1;
    if (input[braceIndex] !== '{') {
      throw this.error(braceIndex, 'expected `{` to start the colored text');
    }

    return { color, next: braceIndex + 1 };
  }

  private error(index: number, message: string): MarkupParseError {
    return new MarkupParseError(Buffer.byteLength(this.input.slice(0, index), 'utf8'), message);
  }
}

/**
 * Parse markup into styled spans. Throws MarkupParseError; never returns a partial result.
 */
export function parseMarkup(text: string): Span[] {
  return new MarkupParser(text).parse();
}

/**
 * Parse markup straight into a paragraph
 */
export function parseParagraph(
  text: string,
  alignment: HorizontalAlignment = 'left',
): RichParagraph {
  return new RichParagraph(parseMarkup(text), alignment);
}
