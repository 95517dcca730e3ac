/**
 * Layout elements built on top of the text primitives: spacing, captioned
 * images, table of contents rows and the section start marker.
 */

import { DEFAULT_CAPTION_SPACING_MM, type Span, span } from '../model/content.js';
import { mmToPt } from '../page-profiles/profiles.js';
import type { HorizontalAlignment } from '../types.js';
import type { Area, Element, LayoutContext, RenderResult } from './engine.js';
import type { DecodedImage } from './images.js';
import type { PageTracker } from './page-tracker.js';
import { TextBlock, breakLines, drawLine } from './text.js';

const IMAGE_SPACE_AFTER_MM = 4;

/**
 * Fixed vertical gap. Truncated at the bottom of a page rather than carried over.
 */
export class Spacer implements Element {
  constructor(private readonly heightPt: number) {}

  render(_context: LayoutContext, area: Area): RenderResult {
    return { height: Math.min(this.heightPt, area.height), hasMore: false };
  }
}

/**
 * Image with an optional caption stacked underneath, sharing one alignment.
 *
 * The image is drawn at its natural size (or rescaled uniformly to the
 * requested width) and clamped to the available width. It is moved to the
 * next page as a whole when it does not fit; the caption may then flow.
 */
export class CaptionedImage implements Element {
  private imageDrawn = false;
  private readonly caption: TextBlock | null;

  constructor(
    private readonly decoded: DecodedImage,
    caption: readonly Span[] | null,
    private readonly alignment: HorizontalAlignment = 'left',
    private readonly widthMm: number | null = null,
    private readonly captionSpacingMm: number = DEFAULT_CAPTION_SPACING_MM,
  ) {
    this.caption =
      caption && caption.length > 0
        ? new TextBlock(caption, { alignment, spaceAfter: mmToPt(IMAGE_SPACE_AFTER_MM) })
        : null;
  }

  /**
   * Rendered size in points for a given available width
   */
  renderedSize(availableWidth: number): { width: number; height: number } {
    const { naturalWidthMm, naturalHeightMm } = this.decoded;
    let width = mmToPt(this.widthMm ?? naturalWidthMm);
    if (width > availableWidth) {
      width = availableWidth;
    }
    const ratio = naturalWidthMm > 0 ? naturalHeightMm / naturalWidthMm : 0;
    return { width, height: width * ratio };
  }

  render(context: LayoutContext, area: Area): RenderResult {
    let used = 0;

    if (!this.imageDrawn) {
      const size = this.renderedSize(area.width);
      if (size.height > area.height) {
        return { height: 0, hasMore: true };
      }

      let x = area.x;
      if (this.alignment === 'center') {
        x += (area.width - size.width) / 2;
      } else if (this.alignment === 'right') {
        x += area.width - size.width;
      }

      context.page.drawImage(this.decoded.image, {
        x,
        y: area.top - size.height,
        width: size.width,
        height: size.height,
      });
      this.imageDrawn = true;
      used = size.height;

      const gap = this.caption ? mmToPt(this.captionSpacingMm) : mmToPt(IMAGE_SPACE_AFTER_MM);
      used = Math.min(area.height, used + gap);
    }

    if (!this.caption) {
      return { height: used, hasMore: false };
    }

    const captionResult = this.caption.render(context, {
      ...area,
      top: area.top - used,
      height: area.height - used,
    });
    return { height: used + captionResult.height, hasMore: captionResult.hasMore };
  }
}

/**
 * Width of the page number column in table of contents rows
 */
export const TOC_NUMBER_COLUMN_MM = 18;

/**
 * One table of contents row: title on the left, page number right-aligned in a
 * fixed-width column. The row height depends only on the title, so a row with
 * a placeholder and a row with a real number take the same space.
 */
export class TocRow implements Element {
  constructor(
    private readonly title: readonly Span[],
    private readonly pageLabel: string,
  ) {}

  render(context: LayoutContext, area: Area): RenderResult {
    const size = context.fontSize;
    const lineHeight = size * context.lineHeight;
    const numberColumn = Math.min(mmToPt(TOC_NUMBER_COLUMN_MM), area.width / 2);
    const titleWidth = area.width - numberColumn;

    const titleLines = breakLines(this.title, context.fonts, size, titleWidth);
    const rowHeight = titleLines.length * lineHeight;
    if (rowHeight > area.height) {
      return { height: 0, hasMore: true };
    }

    titleLines.forEach((line, index) => {
      drawLine(context, line, area.x, area.top - index * lineHeight, titleWidth, lineHeight, size, 'left');
    });

    const [numberLine] = breakLines([span(this.pageLabel)], context.fonts, size, numberColumn);
    if (numberLine) {
      drawLine(context, numberLine, area.x + titleWidth, area.top, numberColumn, lineHeight, size, 'right');
    }

    return { height: rowHeight, hasMore: false };
  }
}

/**
 * Zero-size wrapper that records the page on which the wrapped element first
 * draws something. Later continuations on other pages never overwrite it.
 */
export class SectionMarker implements Element {
  constructor(
    private readonly inner: Element,
    private readonly tracker: PageTracker,
    private readonly sectionIndex: number,
  ) {}

  render(context: LayoutContext, area: Area): RenderResult {
    const result = this.inner.render(context, area);
    if (result.height > 0) {
      this.tracker.markSection(this.sectionIndex);
    }
    return result;
  }
}
