import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { PDFDocument, StandardFonts } from 'pdf-lib';
import { describe, expect, it } from 'vitest';
import { FontLoadError } from '../src/errors.js';
import {
  assertFontFamilyAvailable,
  availableFontFamilies,
  loadFontFamily,
  selectFont,
} from '../src/fonts/font-family.js';
import { decodeImage, detectImageFormat } from '../src/layout/images.js';
import { imageFromPath } from '../src/model/content.js';
import {
  a4Profile,
  getContentArea,
  getPageProfile,
  mmToPt,
  ptToMm,
} from '../src/page-profiles/profiles.js';

const fixturesDir = fileURLToPath(new URL('./fixtures', import.meta.url));

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

describe('font families', () => {
  it('lists the standard families', () => {
    expect(availableFontFamilies()).toEqual(['helvetica', 'times', 'courier']);
  });

  it('matches family names without regard to case', async () => {
    const family = await loadFontFamily(await PDFDocument.create(), 'Times');

    expect(family.name).toBe('Times');
    expect(family.regular.name).toBe(StandardFonts.TimesRoman);
    expect(family.boldItalic.name).toBe(StandardFonts.TimesRomanBoldItalic);
  });

  it('picks the variant for weight and slant', async () => {
    const family = await loadFontFamily(await PDFDocument.create());

    expect(selectFont(family, false, false)).toBe(family.regular);
    expect(selectFont(family, true, false)).toBe(family.bold);
    expect(selectFont(family, false, true)).toBe(family.italic);
    expect(selectFont(family, true, true)).toBe(family.boldItalic);
  });

  it('rejects unknown families with the available names', () => {
    try {
      assertFontFamilyAvailable('Garamond');
    } catch (error) {
      expect(error).toBeInstanceOf(FontLoadError);
      expect(error).toMatchObject({
        code: 'FONT_NOT_FOUND',
        attempts: ['helvetica', 'times', 'courier'],
      });
      return;
    }
    throw new Error('Expected an error');
  });
});

describe('page profiles', () => {
  it('converts between millimetres and points', () => {
    expect(mmToPt(25.4)).toBeCloseTo(72, 10);
    expect(ptToMm(72)).toBeCloseTo(25.4, 10);
  });

  it('looks profiles up by name', () => {
    expect(getPageProfile().name).toBe('a4');
    expect(getPageProfile('Letter').paper).toEqual({ width: 215.9, height: 279.4 });
    expect(() => getPageProfile('a3')).toThrow(
      'Unknown page profile: a3. Available: a4, letter, a5',
    );
  });

  it('computes the content area inside the margins', () => {
    expect(getContentArea(a4Profile.paper, a4Profile.margins)).toEqual({
      width: 170,
      height: 257,
      left: 20,
      top: 20,
    });
  });
});

describe('decodeImage', () => {
  it('detects formats from magic bytes', () => {
    expect(detectImageFormat(new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))).toBe(
      'png',
    );
    expect(detectImageFormat(new Uint8Array([0xff, 0xd8, 0xff, 0xe0]))).toBe('jpeg');
    expect(detectImageFormat(new Uint8Array([0x47, 0x49, 0x46]))).toBeNull();
  });

  it('derives the natural size from the pixel size', async () => {
    const decoded = await decodeImage(
      await PDFDocument.create(),
      imageFromPath(join(fixturesDir, 'swatch.png')),
      'test image',
    );

    expect(decoded.format).toBe('png');
    expect([decoded.pixelWidth, decoded.pixelHeight]).toEqual([60, 30]);
    expect(decoded.naturalWidthMm).toBeCloseTo(5.08, 6);
    expect(decoded.naturalHeightMm).toBeCloseTo(2.54, 6);
  });

  it('reports files that cannot be read', async () => {
    const path = join(fixturesDir, 'absent.png');
    const error = await rejection(
      decodeImage(await PDFDocument.create(), imageFromPath(path), 'Section 1 block 0'),
    );

    expect(error).toMatchObject({
      code: 'IMAGE_READ_FAILED',
      blockDescription: 'Section 1 block 0',
    });
    expect(error instanceof Error && error.message.startsWith(`Failed to open image file ${path}`)).toBe(
      true,
    );
  });
});
