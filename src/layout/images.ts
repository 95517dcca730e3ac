import { readFile } from 'node:fs/promises';
import type { PDFDocument, PDFImage } from 'pdf-lib';
import { ImageDecodeError, describeError } from '../errors.js';
import type { ImageSource } from '../model/content.js';
import { MM_PER_INCH } from '../page-profiles/profiles.js';

/**
 * Resolution assumed when converting pixel dimensions into a natural size
 */
export const DEFAULT_IMAGE_DPI = 300;

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];

export type ImageFormat = 'png' | 'jpeg';

export interface DecodedImage {
  image: PDFImage;
  format: ImageFormat;
  pixelWidth: number;
  pixelHeight: number;
  /**
   * Size at DEFAULT_IMAGE_DPI, in millimetres
   */
  naturalWidthMm: number;
  naturalHeightMm: number;
}

function startsWith(bytes: Uint8Array, signature: number[]): boolean {
  return bytes.length >= signature.length && signature.every((b, i) => bytes[i] === b);
}

/**
 * Detect the container format from its magic bytes
 */
export function detectImageFormat(bytes: Uint8Array): ImageFormat | null {
  if (startsWith(bytes, PNG_SIGNATURE)) {
    return 'png';
  }
  if (startsWith(bytes, JPEG_SIGNATURE)) {
    return 'jpeg';
  }
  return null;
}

async function readSourceBytes(source: ImageSource, blockDescription: string): Promise<Uint8Array> {
  if (source.kind === 'bytes') {
    return source.bytes;
  }

  try {
    return new Uint8Array(await readFile(source.path));
  } catch (error) {
    throw new ImageDecodeError(
      'IMAGE_READ_FAILED',
      `Failed to open image file ${source.path} for ${blockDescription}: ${describeError(error)}`,
      blockDescription,
      { cause: error },
    );
  }
}

function describeSource(source: ImageSource, bytes: Uint8Array): string {
  return source.kind === 'path' ? `image file ${source.path}` : `image bytes (${bytes.byteLength} bytes)`;
}

/**
 * Read (when needed) and embed an image into the document
 */
export async function decodeImage(
  document: PDFDocument,
  source: ImageSource,
  blockDescription: string,
): Promise<DecodedImage> {
  const bytes = await readSourceBytes(source, blockDescription);
  const format = detectImageFormat(bytes);

  if (!format) {
    throw new ImageDecodeError(
      'IMAGE_DECODE_FAILED',
      `Failed to decode ${describeSource(source, bytes)} for ${blockDescription}: unsupported image format (expected PNG or JPEG)`,
      blockDescription,
    );
  }

  let image: PDFImage;
  try {
    image = format === 'png' ? await document.embedPng(bytes) : await document.embedJpg(bytes);
  } catch (error) {
    throw new ImageDecodeError(
      'IMAGE_DECODE_FAILED',
      `Failed to decode ${describeSource(source, bytes)} for ${blockDescription}: ${describeError(error)}`,
      blockDescription,
      { cause: error },
    );
  }

  return {
    image,
    format,
    pixelWidth: image.width,
    pixelHeight: image.height,
    naturalWidthMm: (MM_PER_INCH * image.width) / DEFAULT_IMAGE_DPI,
    naturalHeightMm: (MM_PER_INCH * image.height) / DEFAULT_IMAGE_DPI,
  };
}
