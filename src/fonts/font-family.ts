import { type PDFDocument, type PDFFont, StandardFonts } from 'pdf-lib';
import { FontLoadError, describeError } from '../errors.js';
import type { Span } from '../model/content.js';

/**
 * The four embedded variants every text element picks from
 */
export interface FontFamily {
  name: string;
  regular: PDFFont;
  bold: PDFFont;
  italic: PDFFont;
  boldItalic: PDFFont;
}

type Variant = 'regular' | 'bold' | 'italic' | 'boldItalic';

/**
 * Standard PDF families, which every viewer ships and which need no font files
 */
const FAMILIES: Record<string, Record<Variant, StandardFonts>> = {
  helvetica: {
    regular: StandardFonts.Helvetica,
    bold: StandardFonts.HelveticaBold,
    italic: StandardFonts.HelveticaOblique,
    boldItalic: StandardFonts.HelveticaBoldOblique,
  },
  times: {
    regular: StandardFonts.TimesRoman,
    bold: StandardFonts.TimesRomanBold,
    italic: StandardFonts.TimesRomanItalic,
    boldItalic: StandardFonts.TimesRomanBoldItalic,
  },
  courier: {
    regular: StandardFonts.Courier,
    bold: StandardFonts.CourierBold,
    italic: StandardFonts.CourierOblique,
    boldItalic: StandardFonts.CourierBoldOblique,
  },
};

export const DEFAULT_FONT_FAMILY = 'Helvetica';

export const availableFontFamilies = (): string[] => Object.keys(FAMILIES);

/**
 * Fail early, before any layout pass, when a family name is unknown
 */
export function assertFontFamilyAvailable(name: string): void {
  if (!FAMILIES[name.toLowerCase()]) {
    throw new FontLoadError(
      'FONT_NOT_FOUND',
      `Font family "${name}" not found. Available: ${availableFontFamilies().join(', ')}`,
      availableFontFamilies(),
    );
  }
}

/**
 * Embed all four variants of a family into a document.
 *
 * A family is all-or-nothing: if any variant fails the whole load fails.
 */
export async function loadFontFamily(
  document: PDFDocument,
  name: string = DEFAULT_FONT_FAMILY,
): Promise<FontFamily> {
  assertFontFamilyAvailable(name);
  const variants = FAMILIES[name.toLowerCase()];

  const embed = async (variant: Variant): Promise<PDFFont> => {
    try {
      return await document.embedFont(variants[variant]);
    } catch (error) {
      throw new FontLoadError(
        'FONT_LOAD_FAILED',
        `Failed to embed ${variants[variant]}: ${describeError(error)}`,
        [variants[variant]],
        { cause: error },
      );
    }
  };

  return {
    name,
    regular: await embed('regular'),
    bold: await embed('bold'),
    italic: await embed('italic'),
    boldItalic: await embed('boldItalic'),
  };
}

/**
 * Pick the variant matching a span's weight and slant
 */
export function selectFont(family: FontFamily, bold: boolean, italic: boolean): PDFFont {
  if (bold && italic) {
    return family.boldItalic;
  }
  if (bold) {
    return family.bold;
  }
  return italic ? family.italic : family.regular;
}

const characterSets = new WeakMap<PDFFont, Set<number>>();

function characterSet(font: PDFFont): Set<number> {
  let set = characterSets.get(font);
  if (!set) {
    set = new Set(font.getCharacterSet());
    characterSets.set(font, set);
  }
  return set;
}

/**
 * First character of the spans that its font variant cannot encode, or null.
 * Whitespace is skipped: line breaking consumes it before anything is drawn.
 */
export function findUnsupportedCharacter(family: FontFamily, spans: readonly Span[]): string | null {
  for (const span of spans) {
    const supported = characterSet(selectFont(family, span.bold, span.italic));
    for (const character of span.text) {
      const codePoint = character.codePointAt(0);
      if (codePoint !== undefined && !/\s/u.test(character) && !supported.has(codePoint)) {
        return character;
      }
    }
  }
  return null;
}
