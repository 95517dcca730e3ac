import { PDFArray, PDFDict, PDFDocument, PDFHexString, PDFName, PDFRef, PDFString } from 'pdf-lib';

export interface OutlineItem {
  title: string;
  /**
   * 1-based page the item jumps to, null when the destination is not a page of this document
   */
  pageNumber: number | null;
  name: string | null;
}

export interface PdfSummary {
  pageCount: number;
  title: string | null;
  outline: OutlineItem[];
}

function readText(dict: PDFDict, key: string): string | null {
  const value = dict.lookupMaybe(PDFName.of(key), PDFString, PDFHexString);
  return value ? value.decodeText() : null;
}

/**
 * Read the top-level outline items of a loaded document in order
 */
export function readOutline(document: PDFDocument): OutlineItem[] {
  const outlines = document.catalog.lookupMaybe(PDFName.of('Outlines'), PDFDict);
  if (!outlines) {
    return [];
  }

  const pageRefs = document.getPages().map((page) => page.ref);
  const items: OutlineItem[] = [];
  const visited = new Set<PDFDict>();
  let item = outlines.lookupMaybe(PDFName.of('First'), PDFDict);

  while (item && !visited.has(item)) {
    visited.add(item);

    const target = item.lookupMaybe(PDFName.of('Dest'), PDFArray)?.get(0);
    const pageIndex = target instanceof PDFRef ? pageRefs.indexOf(target) : -1;

    items.push({
      title: readText(item, 'Title') ?? '',
      pageNumber: pageIndex >= 0 ? pageIndex + 1 : null,
      name: readText(item, 'NM'),
    });
    item = item.lookupMaybe(PDFName.of('Next'), PDFDict);
  }

  return items;
}

/**
 * Page count, title and outline of a PDF file
 */
export async function inspectPdf(bytes: Uint8Array): Promise<PdfSummary> {
  const document = await PDFDocument.load(bytes, { updateMetadata: false });
  return {
    pageCount: document.getPageCount(),
    title: document.getTitle() ?? null,
    outline: readOutline(document),
  };
}
