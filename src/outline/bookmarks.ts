/**
 * Flat PDF outline (bookmarks) for rendered documents.
 *
 * The outline is wired directly into the object graph: one outline item per
 * section with a recorded page, linked through Prev/Next under a single
 * /Outlines root that the catalog points at.
 */

import {
  PDFDict,
  PDFDocument,
  PDFHexString,
  PDFName,
  PDFNumber,
  PDFRef,
} from 'pdf-lib';
import { BookmarkError, describeError } from '../errors.js';
import type { Section } from '../model/content.js';

interface OutlineEntry {
  ref: PDFRef;
  pageRef: PDFRef;
  title: string;
  name: string | null;
}

function collectEntries(
  document: PDFDocument,
  sections: readonly Section[],
  sectionPages: ReadonlyArray<number | null>,
): OutlineEntry[] {
  const pages = document.getPages();
  const entries: OutlineEntry[] = [];
  const count = Math.min(sections.length, sectionPages.length);

  for (let index = 0; index < count; index++) {
    const section = sections[index];
    const pageNumber = sectionPages[index];
    if (!section || pageNumber === null || pageNumber === undefined) {
      continue;
    }

    const page = Number.isInteger(pageNumber) ? pages[pageNumber - 1] : undefined;
    if (!page) {
      throw new BookmarkError(
        'MISSING_PAGE',
        `Section ${index} refers to missing page ${pageNumber} for bookmark destination`,
        { sectionIndex: index, pageNumber },
      );
    }

    entries.push({
      ref: document.context.nextRef(),
      pageRef: page.ref,
      title: section.title,
      name: section.identifier,
    });
  }

  return entries;
}

function resolveCatalog(document: PDFDocument): PDFDict {
  const root = document.context.trailerInfo.Root;
  if (!(root instanceof PDFRef)) {
    throw new BookmarkError('MISSING_CATALOG', 'PDF catalog entry is missing');
  }

  const catalog = document.context.lookup(root);
  if (catalog === undefined) {
    throw new BookmarkError('MISSING_CATALOG', 'PDF catalog entry is missing');
  }
  if (!(catalog instanceof PDFDict)) {
    throw new BookmarkError('INVALID_CATALOG', 'PDF catalog entry is not a dictionary');
  }
  return catalog;
}

function linkEntries(document: PDFDocument, outlinesRef: PDFRef, entries: OutlineEntry[]): void {
  const { context } = document;

  entries.forEach((entry, index) => {
    const item = context.obj({
      Title: PDFHexString.fromText(entry.title),
      Dest: [entry.pageRef, 'Fit'],
      Parent: outlinesRef,
    });

    if (entry.name !== null) {
      item.set(PDFName.of('NM'), PDFHexString.fromText(entry.name));
    }

    const previous = entries[index - 1];
    if (previous) {
      item.set(PDFName.of('Prev'), previous.ref);
    }
    const next = entries[index + 1];
    if (next) {
      item.set(PDFName.of('Next'), next.ref);
    }

    context.assign(entry.ref, item);
  });
}

/**
 * Attach a flat outline to a loaded document.
 *
 * Returns the number of outline items written; 0 means the document was left
 * unchanged because no section has a page. The catalog is resolved before any
 * page lookup.
 */
export function attachSectionOutline(
  document: PDFDocument,
  sections: readonly Section[],
  sectionPages: ReadonlyArray<number | null>,
): number {
  const count = Math.min(sections.length, sectionPages.length);
  if (!sectionPages.slice(0, count).some((page) => page !== null)) {
    return 0;
  }

  const catalog = resolveCatalog(document);
  const entries = collectEntries(document, sections, sectionPages);
  const outlinesRef = document.context.nextRef();
  linkEntries(document, outlinesRef, entries);

  const outlines = document.context.obj({ Type: 'Outlines' });
  outlines.set(PDFName.of('Count'), PDFNumber.of(entries.length));
  const first = entries[0];
  const last = entries[entries.length - 1];
  if (first && last) {
    outlines.set(PDFName.of('First'), first.ref);
    outlines.set(PDFName.of('Last'), last.ref);
  }
  document.context.assign(outlinesRef, outlines);
  catalog.set(PDFName.of('Outlines'), outlinesRef);

  return entries.length;
}

/**
 * Parse rendered PDF bytes, add section bookmarks and serialize the result.
 *
 * The caller's bytes are never modified. When no section has a page the input
 * bytes are returned as they are.
 */
export async function applySectionBookmarks(
  bytes: Uint8Array,
  sections: readonly Section[],
  sectionPages: ReadonlyArray<number | null>,
): Promise<Uint8Array> {
  let document: PDFDocument;
  try {
    document = await PDFDocument.load(bytes.slice(), { updateMetadata: false });
  } catch (error) {
    throw new BookmarkError(
      'PARSE_FAILED',
      `Failed to parse PDF bytes: ${describeError(error)}`,
      {},
      { cause: error },
    );
  }

  const written = attachSectionOutline(document, sections, sectionPages);
  if (written === 0) {
    return bytes;
  }

  return document.save();
}
