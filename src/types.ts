/**
 * Core TypeScript interfaces for Quire
 */

/**
 * 8-bit RGB color
 */
export interface Rgb {
  r: number;
  g: number;
  b: number;
}

/**
 * Horizontal alignment shared by paragraphs, images and captions
 */
export type HorizontalAlignment = 'left' | 'center' | 'right' | 'justified';

/**
 * Page margins in millimetres
 */
export interface Margins {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

/**
 * Paper size in millimetres
 */
export interface PaperSize {
  width: number;
  height: number;
}

/**
 * Named page setup used when a document does not configure its own geometry
 */
export interface PageProfile {
  name: string;
  paper: PaperSize;
  margins: Margins;
  fontSize: number;
  lineHeight: number; // Multiple of the font size
}

/**
 * Document-level PDF metadata. A fixed creationDate makes renders reproducible.
 */
export interface DocumentMetadata {
  title?: string;
  author?: string;
  subject?: string;
  creator?: string;
  creationDate?: Date;
}

/**
 * Result of a full document render
 */
export interface RenderedDocument {
  bytes: Uint8Array;
  pageCount: number;
  /**
   * One entry per input section (input order) when pages were tracked, otherwise null
   */
  sectionPages: Array<number | null> | null;
  /**
   * Page numbers recorded by the discovery pass, null when no discovery pass ran
   */
  discoveredSectionPages: Array<number | null> | null;
  /**
   * Page on which the printed table of contents starts, null without one
   */
  tocPageNumber: number | null;
}

/**
 * Result of validating render output
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[]; // Fatal issues
  warnings: string[]; // Non-fatal issues
}

/**
 * Progress logger used by the builder and the CLI
 */
export type LogFn = (message: string) => void;
