import type { PDFDocument, PDFPage } from 'pdf-lib';
import { LayoutError } from '../errors.js';
import type { FontFamily } from '../fonts/font-family.js';
import { getContentArea, mmToPt } from '../page-profiles/profiles.js';
import type { Margins, PaperSize } from '../types.js';

/**
 * Drawing area in PDF points. `top` is the y coordinate of the area's upper
 * edge (PDF origin is bottom-left); content grows downwards from it.
 */
export interface Area {
  x: number;
  top: number;
  width: number;
  height: number;
}

export interface LayoutContext {
  page: PDFPage;
  pageNumber: number;
  fonts: FontFamily;
  fontSize: number;
  lineHeight: number;
}

export interface RenderResult {
  /**
   * Vertical space consumed on the current page, in points
   */
  height: number;
  /**
   * True when the element still has content that must continue on the next page
   */
  hasMore: boolean;
}

/**
 * Anything the engine can place on a page. Elements are stateful: an element
 * that reports `hasMore` is rendered again on the next page and continues
 * where it stopped.
 */
export interface Element {
  render(context: LayoutContext, area: Area): RenderResult;
}

export type ElementFactory = (pageNumber: number) => Element;

export interface FooterSpec {
  heightMm: number;
  build: ElementFactory;
}

export interface LayoutOptions {
  paper: PaperSize;
  margins: Margins;
  fontSize: number;
  lineHeight: number;
  header?: ElementFactory;
  footer?: FooterSpec;
  /**
   * Called once per page, after the page is decorated and before any body content
   */
  onPageStart?: (pageNumber: number) => void;
}

/**
 * Flows elements over pages of a pdf-lib document.
 */
export class LayoutEngine {
  private page: PDFPage | null = null;
  private area: Area = { x: 0, top: 0, width: 0, height: 0 };
  private pageNumber = 0;
  private pageHasContent = false;

  constructor(
    readonly document: PDFDocument,
    readonly fonts: FontFamily,
    private readonly options: LayoutOptions,
  ) {}

  get currentPageNumber(): number {
    return this.pageNumber;
  }

  get pageCount(): number {
    return this.pageNumber;
  }

  /**
   * True once body content has been drawn on the current page
   */
  get hasContent(): boolean {
    return this.page !== null && this.pageHasContent;
  }

  /**
   * Render an element, continuing it on new pages while it has more content
   */
  push(element: Element): void {
    let context = this.ensurePage();

    for (;;) {
      const result = element.render(context, this.area);
      if (result.height > 0) {
        this.consume(result.height);
        this.pageHasContent = true;
      }

      if (!result.hasMore) {
        return;
      }

      if (!this.pageHasContent) {
        throw new LayoutError(
          'PAGE_SIZE_EXCEEDED',
          `Element does not fit on an empty page (page ${this.pageNumber})`,
          this.pageNumber,
        );
      }
      context = this.newPage();
    }
  }

  /**
   * Forced page break. A break on a page that has no body content yet is a
   * no-op, so consecutive breaks never produce blank pages.
   */
  breakPage(): void {
    if (this.page && this.pageHasContent) {
      this.newPage();
    }
  }

  /**
   * Make sure the document has at least one page
   */
  finish(): number {
    this.ensurePage();
    return this.pageNumber;
  }

  private ensurePage(): LayoutContext {
    if (!this.page) {
      return this.newPage();
    }
    return this.context(this.page);
  }

  private context(page: PDFPage): LayoutContext {
    return {
      page,
      pageNumber: this.pageNumber,
      fonts: this.fonts,
      fontSize: this.options.fontSize,
      lineHeight: this.options.lineHeight,
    };
  }

  private consume(height: number): void {
    this.area = {
      ...this.area,
      top: this.area.top - height,
      height: Math.max(0, this.area.height - height),
    };
  }

  private newPage(): LayoutContext {
    const { paper, margins, header, footer } = this.options;
    const page = this.document.addPage([mmToPt(paper.width), mmToPt(paper.height)]);
    this.page = page;
    this.pageNumber += 1;
    this.pageHasContent = false;

    const content = getContentArea(paper, margins);
    this.area = {
      x: mmToPt(content.left),
      top: mmToPt(paper.height - content.top),
      width: mmToPt(content.width),
      height: mmToPt(content.height),
    };

    const context = this.context(page);

    if (header) {
      const result = header(this.pageNumber).render(context, this.area);
      if (result.hasMore || result.height >= this.area.height) {
        throw new LayoutError(
          'HEADER_TOO_TALL',
          `Header does not fit on page ${this.pageNumber}`,
          this.pageNumber,
        );
      }
      this.consume(result.height);
    }

    if (footer) {
      const footerHeight = mmToPt(footer.heightMm);
      if (footerHeight > this.area.height) {
        throw new LayoutError(
          'FOOTER_TOO_TALL',
          `Footer height exceeds available space on page ${this.pageNumber}`,
          this.pageNumber,
        );
      }

      const footerArea: Area = {
        x: this.area.x,
        top: this.area.top - this.area.height + footerHeight,
        width: this.area.width,
        height: footerHeight,
      };
      const result = footer.build(this.pageNumber).render(context, footerArea);
      if (result.hasMore) {
        throw new LayoutError(
          'FOOTER_TOO_TALL',
          `Footer element does not fit into the reserved space on page ${this.pageNumber}`,
          this.pageNumber,
        );
      }
      this.area = { ...this.area, height: this.area.height - footerHeight };
    }

    this.options.onPageStart?.(this.pageNumber);
    return context;
  }
}
