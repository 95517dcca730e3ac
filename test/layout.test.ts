import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { PDFDocument } from 'pdf-lib';
import { describe, expect, it } from 'vitest';
import { LayoutError } from '../src/errors.js';
import { type FontFamily, loadFontFamily } from '../src/fonts/font-family.js';
import { CaptionedImage, SectionMarker, Spacer, TocRow } from '../src/layout/elements.js';
import {
  type Area,
  type Element,
  type LayoutContext,
  LayoutEngine,
  type LayoutOptions,
  type RenderResult,
} from '../src/layout/engine.js';
import { decodeImage } from '../src/layout/images.js';
import { PageTracker } from '../src/layout/page-tracker.js';
import { TextBlock, breakLines } from '../src/layout/text.js';
import { imageFromPath, span } from '../src/model/content.js';
import { a4Profile, mmToPt } from '../src/page-profiles/profiles.js';

const fixturesDir = fileURLToPath(new URL('./fixtures', import.meta.url));

const layoutOptions: LayoutOptions = {
  paper: a4Profile.paper,
  margins: a4Profile.margins,
  fontSize: 11,
  lineHeight: 1.35,
};

async function setup(options: Partial<LayoutOptions> = {}) {
  const document = await PDFDocument.create();
  const fonts = await loadFontFamily(document);
  const starts: number[] = [];
  const engine = new LayoutEngine(document, fonts, {
    ...layoutOptions,
    onPageStart: (pageNumber) => starts.push(pageNumber),
    ...options,
  });
  return { document, fonts, engine, starts };
}

/**
 * Element with a fixed height that never splits
 */
class Box implements Element {
  renders = 0;

  constructor(private readonly heightPt: number) {}

  render(_context: LayoutContext, area: Area): RenderResult {
    this.renders += 1;
    if (this.heightPt > area.height) {
      return { height: 0, hasMore: true };
    }
    return { height: this.heightPt, hasMore: false };
  }
}

const standardFonts = async (): Promise<FontFamily> => loadFontFamily(await PDFDocument.create());

function thrownBy(run: () => void): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error');
}

describe('breakLines', () => {
  it('produces one empty line for an empty paragraph', async () => {
    const fonts = await standardFonts();
    const lines = breakLines([span('')], fonts, 11, 100);

    expect(lines).toHaveLength(1);
    expect(lines[0]?.pieces).toEqual([]);
    expect(lines[0]?.endsParagraph).toBe(true);
  });

  it('collapses whitespace runs', async () => {
    const fonts = await standardFonts();
    const [line] = breakLines([span('  a   b  ')], fonts, 11, 500);

    expect(line?.pieces.map((piece) => piece.text).join('')).toBe('a b');
  });

  it('breaks on newlines', async () => {
    const fonts = await standardFonts();
    const lines = breakLines([span('first\nsecond')], fonts, 11, 500);

    expect(lines.map((line) => line.pieces.map((piece) => piece.text).join(''))).toEqual([
      'first',
      'second',
    ]);
    expect(lines.map((line) => line.endsParagraph)).toEqual([true, true]);
  });

  it('wraps words to the available width', async () => {
    const fonts = await standardFonts();
    const text = 'alpha beta gamma delta epsilon zeta eta theta iota kappa';
    const lines = breakLines([span(text)], fonts, 11, 80);

    expect(lines.length).toBeGreaterThan(1);
    for (const line of lines) {
      expect(line.width).toBeLessThanOrEqual(80);
    }
    expect(lines.map((line) => line.pieces.map((piece) => piece.text).join('')).join(' ')).toBe(
      text,
    );
    expect(lines.slice(0, -1).every((line) => !line.endsParagraph)).toBe(true);
  });

  it('splits words wider than the line', async () => {
    const fonts = await standardFonts();
    const word = 'a'.repeat(20);
    const lines = breakLines([span(word)], fonts, 11, 20);

    expect(lines.length).toBeGreaterThan(1);
    expect(lines.map((line) => line.pieces.map((piece) => piece.text).join('')).join('')).toBe(word);
    for (const line of lines) {
      expect(line.width).toBeLessThanOrEqual(20);
    }
  });

  it('keeps span styles on their pieces', async () => {
    const fonts = await standardFonts();
    const [line] = breakLines(
      [span('plain '), span('strong').bolded(), span(' red').colored({ r: 255, g: 0, b: 0 })],
      fonts,
      11,
      500,
    );
    const strong = line?.pieces.find((piece) => piece.text === 'strong');
    const red = line?.pieces.find((piece) => piece.text === 'red');

    expect(strong?.font).toBe(fonts.bold);
    expect(red?.color).toEqual({ r: 255, g: 0, b: 0 });
  });
});

describe('LayoutEngine', () => {
  it('starts a page on first push and reports page starts', async () => {
    const { engine, starts } = await setup();

    expect(engine.pageCount).toBe(0);
    engine.push(new Box(100));

    expect(engine.pageCount).toBe(1);
    expect(starts).toEqual([1]);
  });

  it('moves an element that does not fit to the next page', async () => {
    const { engine, starts } = await setup();
    const pageHeight = mmToPt(297 - 40);

    engine.push(new Box(pageHeight - 10));
    const box = new Box(20);
    engine.push(box);

    expect(engine.pageCount).toBe(2);
    expect(box.renders).toBe(2);
    expect(starts).toEqual([1, 2]);
  });

  it('ignores page breaks on a page without content', async () => {
    const { engine } = await setup();

    engine.breakPage();
    expect(engine.pageCount).toBe(0);

    engine.push(new Box(10));
    engine.breakPage();
    engine.breakPage();
    engine.push(new Box(10));

    expect(engine.pageCount).toBe(2);
  });

  it('reports whether the current page has content', async () => {
    const { engine } = await setup();

    expect(engine.hasContent).toBe(false);
    engine.push(new Box(10));
    expect(engine.hasContent).toBe(true);
    engine.breakPage();
    expect(engine.hasContent).toBe(false);
    engine.push(new Box(0));
    expect(engine.hasContent).toBe(false);
  });

  it('fails when an element cannot fit on an empty page', async () => {
    const { engine } = await setup();

    const error = thrownBy(() => engine.push(new Box(mmToPt(400))));

    expect(error).toBeInstanceOf(LayoutError);
    expect(error).toMatchObject({ code: 'PAGE_SIZE_EXCEEDED', pageNumber: 1 });
  });

  it('flows long paragraphs across pages', async () => {
    const { engine } = await setup();
    const text = Array.from({ length: 1500 }, (_, i) => `word${i}`).join(' ');

    engine.push(new TextBlock([span(text)]));

    expect(engine.pageCount).toBeGreaterThan(1);
  });

  it('rejects a footer taller than the content area', async () => {
    const { engine } = await setup({
      footer: { heightMm: 300, build: () => new Spacer(0) },
    });

    expect(thrownBy(() => engine.push(new Box(10)))).toMatchObject({
      code: 'FOOTER_TOO_TALL',
      pageNumber: 1,
    });
  });

  it('rejects a footer element that overflows its band', async () => {
    const { engine } = await setup({
      footer: { heightMm: 5, build: () => new Box(mmToPt(10)) },
    });

    expect(thrownBy(() => engine.push(new Box(10)))).toMatchObject({ code: 'FOOTER_TOO_TALL' });
  });

  it('rejects a header that fills the page', async () => {
    const { engine } = await setup({ header: () => new Box(mmToPt(257)) });

    expect(thrownBy(() => engine.push(new Box(10)))).toMatchObject({ code: 'HEADER_TOO_TALL' });
  });

  it('reserves header and footer space on every page', async () => {
    const headerHeight = mmToPt(20);
    const footerHeight = 30;
    const { engine } = await setup({
      header: () => new Box(headerHeight),
      footer: { heightMm: footerHeight, build: () => new Spacer(0) },
    });
    const available = mmToPt(257) - headerHeight - mmToPt(footerHeight);

    engine.push(new Box(available));
    expect(engine.pageCount).toBe(1);

    engine.push(new Box(1));
    expect(engine.pageCount).toBe(2);
  });
});

describe('PageTracker', () => {
  it('keeps the first page recorded for each section', () => {
    const tracker = new PageTracker(3);

    tracker.advance();
    tracker.markSection(0);
    tracker.advance();
    tracker.markSection(0);
    tracker.markSection(2);

    expect(tracker.currentPage).toBe(2);
    expect(tracker.snapshot()).toEqual([1, null, 2]);
  });

  it('ignores marks before the first page and out of range', () => {
    const tracker = new PageTracker(1);

    tracker.markSection(0);
    tracker.advance();
    tracker.markSection(5);

    expect(tracker.pageOf(0)).toBeNull();
  });
});

describe('layout elements', () => {
  it('records the section page only once content is drawn', async () => {
    const { document, fonts } = await setup();
    const tracker = new PageTracker(2);
    const pageHeight = mmToPt(257);

    const advancing = new LayoutEngine(document, fonts, {
      ...layoutOptions,
      onPageStart: () => tracker.advance(),
    });
    advancing.push(new Box(pageHeight - 5));
    advancing.push(new SectionMarker(new Box(50), tracker, 1));

    expect(tracker.snapshot()).toEqual([null, 2]);
  });

  it('gives table of contents rows the same height for any page label', async () => {
    const { document, fonts } = await setup();
    const page = document.addPage();
    const context: LayoutContext = { page, pageNumber: 1, fonts, fontSize: 11, lineHeight: 1.35 };
    const area: Area = { x: 50, top: 800, width: 400, height: 700 };

    const placeholder = new TocRow([span('Executive Highlights')], '-').render(context, area);
    const numbered = new TocRow([span('Executive Highlights')], '128').render(context, area);

    expect(placeholder).toEqual({ height: 11 * 1.35, hasMore: false });
    expect(numbered).toEqual(placeholder);
  });

  it('scales images to the requested width and keeps the aspect ratio', async () => {
    const { document } = await setup();
    const decoded = await decodeImage(
      document,
      imageFromPath(join(fixturesDir, 'swatch.png')),
      'test image',
    );

    const natural = new CaptionedImage(decoded, null).renderedSize(1000);
    const scaled = new CaptionedImage(decoded, null, 'center', 50).renderedSize(1000);
    const clamped = new CaptionedImage(decoded, null, 'center', 500).renderedSize(200);

    expect(natural.width).toBeCloseTo(mmToPt(5.08), 5);
    expect(natural.height).toBeCloseTo(mmToPt(2.54), 5);
    expect(scaled.width).toBeCloseTo(mmToPt(50), 5);
    expect(scaled.height).toBeCloseTo(mmToPt(25), 5);
    expect(clamped.width).toBe(200);
    expect(clamped.height).toBeCloseTo(100, 5);
  });
});
