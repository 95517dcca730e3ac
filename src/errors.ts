export type QuireErrorCode =
  | 'FONT_NOT_FOUND'
  | 'FONT_LOAD_FAILED'
  | 'IMAGE_DECODE_FAILED'
  | 'IMAGE_READ_FAILED'
  | 'PAGE_SIZE_EXCEEDED'
  | 'HEADER_TOO_TALL'
  | 'FOOTER_TOO_TALL'
  | 'PARSE_FAILED'
  | 'MISSING_CATALOG'
  | 'INVALID_CATALOG'
  | 'MISSING_PAGE'
  | 'INVALID_MANIFEST'
  | 'UNSUPPORTED_CHARACTER';

/**
 * Base class for every failure the render pipeline surfaces.
 *
 * Callers should switch on `error.code` (and read `details`) rather than parse
 * the message.
 */
export class QuireError extends Error {
  readonly code: QuireErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: QuireErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'QuireError';
    this.code = code;
    this.details = details;
  }
}

/**
 * A font family could not be located or embedded. Raised before any layout pass.
 */
export class FontLoadError extends QuireError {
  readonly attempts: string[];

  constructor(
    code: 'FONT_NOT_FOUND' | 'FONT_LOAD_FAILED',
    message: string,
    attempts: string[],
    options?: { cause?: unknown },
  ) {
    super(code, message, { attempts }, options);
    this.name = 'FontLoadError';
    this.attempts = attempts;
  }
}

/**
 * An image block could not be read or decoded.
 */
export class ImageDecodeError extends QuireError {
  readonly blockDescription: string;

  constructor(
    code: 'IMAGE_DECODE_FAILED' | 'IMAGE_READ_FAILED',
    message: string,
    blockDescription: string,
    options?: { cause?: unknown },
  ) {
    super(code, message, { block: blockDescription }, options);
    this.name = 'ImageDecodeError';
    this.blockDescription = blockDescription;
  }
}

/**
 * Geometry violation reported by the layout engine.
 */
export class LayoutError extends QuireError {
  readonly pageNumber: number;

  constructor(
    code: 'PAGE_SIZE_EXCEEDED' | 'HEADER_TOO_TALL' | 'FOOTER_TOO_TALL',
    message: string,
    pageNumber: number,
  ) {
    super(code, message, { pageNumber });
    this.name = 'LayoutError';
    this.pageNumber = pageNumber;
  }
}

/**
 * Text that the selected font family has no glyph encoding for.
 * `location` names the block, title or decoration holding it.
 */
export class UnsupportedCharacterError extends QuireError {
  readonly character: string;
  readonly location: string;

  constructor(character: string, location: string, fontFamily: string) {
    const codePoint = (character.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, '0');
    super(
      'UNSUPPORTED_CHARACTER',
      `${location} contains ${JSON.stringify(character)} (U+${codePoint}), which font family ${fontFamily} cannot encode`,
      { character, location, fontFamily },
    );
    this.name = 'UnsupportedCharacterError';
    this.character = character;
    this.location = location;
  }
}

/**
 * Failure while injecting the outline into an already rendered PDF.
 */
export class BookmarkError extends QuireError {
  readonly sectionIndex?: number;
  readonly pageNumber?: number;

  constructor(
    code: 'PARSE_FAILED' | 'MISSING_CATALOG' | 'INVALID_CATALOG' | 'MISSING_PAGE',
    message: string,
    location: { sectionIndex?: number; pageNumber?: number } = {},
    options?: { cause?: unknown },
  ) {
    super(code, message, location, options);
    this.name = 'BookmarkError';
    this.sectionIndex = location.sectionIndex;
    this.pageNumber = location.pageNumber;
  }
}

/**
 * A document manifest failed validation.
 */
export class ManifestError extends QuireError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_MANIFEST', `Invalid document manifest:\n  ${issues.join('\n  ')}`, {
      issues,
    });
    this.name = 'ManifestError';
    this.issues = issues;
  }
}

/**
 * Stringify an unknown thrown value for log output
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
