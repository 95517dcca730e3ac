/**
 * Runtime validation for render output
 */

import type { Section } from './model/content.js';
import type { RenderedDocument, ValidationResult } from './types.js';

function label(sections: readonly Section[], index: number): string {
  const section = sections[index];
  return section ? `Section ${index + 1} "${section.title}"` : `Section ${index + 1}`;
}

/**
 * Validate a rendered document's page map and return any issues found
 */
export function validateRenderResult(
  rendered: RenderedDocument,
  sections: readonly Section[],
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  // Check 1: At least one page was produced
  if (rendered.pageCount === 0) {
    errors.push('No pages were generated');
  }

  const pages = rendered.sectionPages ?? rendered.discoveredSectionPages;
  if (pages) {
    // Check 2: One entry per section
    if (pages.length !== sections.length) {
      errors.push(`Page map has ${pages.length} entries for ${sections.length} sections`);
    }

    let previous = 0;
    pages.forEach((page, index) => {
      if (page === null) {
        // Check 3: Sections that never rendered
        warnings.push(`${label(sections, index)} has no start page (no renderable content)`);
        return;
      }

      // Check 4: Page numbers exist in the document
      if (page < 1 || page > rendered.pageCount) {
        errors.push(
          `${label(sections, index)} starts on page ${page}, outside 1-${rendered.pageCount}`,
        );
      }

      // Check 5: Sections start in document order
      if (page < previous) {
        errors.push(
          `${label(sections, index)} starts on page ${page}, before the previous section (page ${previous})`,
        );
      }
      previous = Math.max(previous, page);

      // Check 6: Sections follow the printed table of contents
      if (rendered.tocPageNumber !== null && page <= rendered.tocPageNumber) {
        errors.push(
          `${label(sections, index)} starts on page ${page}, not after the table of contents (page ${rendered.tocPageNumber})`,
        );
      }
    });
  }

  // Check 7: The printed table of contents matches the final layout
  if (rendered.sectionPages && rendered.discoveredSectionPages) {
    rendered.sectionPages.forEach((page, index) => {
      const printed = rendered.discoveredSectionPages?.[index] ?? null;
      if (printed !== page) {
        warnings.push(
          `${label(sections, index)}: table of contents prints ${printed ?? '-'} but section starts on ${page ?? '-'}`,
        );
      }
    });
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Log validation results to console
 */
export function logValidationResult(result: ValidationResult): void {
  for (const error of result.errors) {
    console.log(`  Error: ${error}`);
  }

  for (const warning of result.warnings) {
    console.log(`  Warning: ${warning}`);
  }

  if (result.errors.length === 0 && result.warnings.length === 0) {
    console.log('  All checks passed');
  }
}
