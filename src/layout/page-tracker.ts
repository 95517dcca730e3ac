/**
 * Records the first page on which each section's content appears during one
 * render pass. Page numbers are 1-based.
 */
export class PageTracker {
  private page = 0;
  private readonly pages: Array<number | null>;

  constructor(sectionCount: number) {
    this.pages = new Array<number | null>(sectionCount).fill(null);
  }

  /**
   * Called by the layout engine whenever a new page starts
   */
  advance(): void {
    this.page += 1;
  }

  get currentPage(): number {
    return this.page;
  }

  /**
   * Record the current page for a section. The first recorded page wins.
   */
  markSection(index: number): void {
    if (index < 0 || index >= this.pages.length || this.page === 0) {
      return;
    }
    if (this.pages[index] === null) {
      this.pages[index] = this.page;
    }
  }

  pageOf(index: number): number | null {
    return this.pages[index] ?? null;
  }

  snapshot(): Array<number | null> {
    return [...this.pages];
  }
}
