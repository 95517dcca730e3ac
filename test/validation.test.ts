import { afterEach, describe, expect, it, vi } from 'vitest';
import { Section } from '../src/model/content.js';
import type { RenderedDocument } from '../src/types.js';
import { logValidationResult, validateRenderResult } from '../src/validation.js';

const sections = [new Section('Intro'), new Section('Body'), new Section('Outro')];

function rendered(overrides: Partial<RenderedDocument>): RenderedDocument {
  return {
    bytes: new Uint8Array(),
    pageCount: 4,
    sectionPages: [2, 3, 3],
    discoveredSectionPages: null,
    tocPageNumber: null,
    ...overrides,
  };
}

describe('validateRenderResult', () => {
  it('passes a consistent page map', () => {
    expect(validateRenderResult(rendered({}), sections)).toEqual({
      valid: true,
      errors: [],
      warnings: [],
    });
  });

  it('flags empty output', () => {
    const result = validateRenderResult(
      rendered({ pageCount: 0, sectionPages: null }),
      sections,
    );

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['No pages were generated']);
  });

  it('flags a page map of the wrong length', () => {
    const result = validateRenderResult(rendered({ sectionPages: [2, 3] }), sections);

    expect(result.errors).toEqual(['Page map has 2 entries for 3 sections']);
  });

  it('warns about sections that never rendered', () => {
    const result = validateRenderResult(rendered({ sectionPages: [2, null, 3] }), sections);

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['Section 2 "Body" has no start page (no renderable content)']);
  });

  it('flags pages outside the document and out of order', () => {
    const result = validateRenderResult(rendered({ sectionPages: [3, 2, 9] }), sections);

    expect(result.errors).toEqual([
      'Section 2 "Body" starts on page 2, before the previous section (page 3)',
      'Section 3 "Outro" starts on page 9, outside 1-4',
    ]);
  });

  it('flags sections that start on or before the table of contents', () => {
    const result = validateRenderResult(
      rendered({ tocPageNumber: 2, sectionPages: [2, 3, 3], discoveredSectionPages: [2, 3, 3] }),
      sections,
    );

    expect(result.errors).toEqual([
      'Section 1 "Intro" starts on page 2, not after the table of contents (page 2)',
    ]);
  });

  it('warns when the printed table of contents disagrees with the final layout', () => {
    const result = validateRenderResult(
      rendered({ tocPageNumber: 1, sectionPages: [2, 3, 4], discoveredSectionPages: [2, 3, 3] }),
      sections,
    );

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'Section 3 "Outro": table of contents prints 3 but section starts on 4',
    ]);
  });

  it('checks the discovered pages when final pages were not tracked', () => {
    const result = validateRenderResult(
      rendered({ tocPageNumber: 1, sectionPages: null, discoveredSectionPages: [1, 2, 2] }),
      sections,
    );

    expect(result.errors).toEqual([
      'Section 1 "Intro" starts on page 1, not after the table of contents (page 1)',
    ]);
  });
});

describe('logValidationResult', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints errors before warnings', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    logValidationResult({ valid: false, errors: ['broken'], warnings: ['odd'] });

    expect(log.mock.calls).toEqual([['  Error: broken'], ['  Warning: odd']]);
  });

  it('reports a clean result', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    logValidationResult({ valid: true, errors: [], warnings: [] });

    expect(log.mock.calls).toEqual([['  All checks passed']]);
  });
});
