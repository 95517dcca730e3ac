export { DEFAULT_TOC_TITLE, DocumentBuilder } from './document/builder.js';
export { TOC_PLACEHOLDER, type FooterDecoration, type PageDecoration } from './document/render-pass.js';
export {
  BookmarkError,
  FontLoadError,
  ImageDecodeError,
  LayoutError,
  ManifestError,
  QuireError,
  type QuireErrorCode,
  UnsupportedCharacterError,
} from './errors.js';
export { DEFAULT_FONT_FAMILY, availableFontFamilies } from './fonts/font-family.js';
export {
  PAGE_NUMBER_TOKEN,
  builderFromManifest,
  loadDocumentManifest,
  parseDocumentManifest,
  type DocumentManifest,
} from './manifest/load-document.js';
export { MarkupParseError, parseMarkup, parseParagraph } from './markup/parse-markup.js';
export {
  type Block,
  Cover,
  ImageBlock,
  type ImageSource,
  RichParagraph,
  Section,
  SectionBuilder,
  Span,
  type SpanStyle,
  imageBlock,
  imageFromBytes,
  imageFromPath,
  pageBreak,
  paragraphBlock,
  span,
} from './model/content.js';
export { applySectionBookmarks, attachSectionOutline } from './outline/bookmarks.js';
export { inspectPdf, readOutline, type OutlineItem, type PdfSummary } from './outline/inspect.js';
export { getPageProfile, profiles } from './page-profiles/profiles.js';
export { buildSampleReport } from './samples/report.js';
export type * from './types.js';
export { logValidationResult, validateRenderResult } from './validation.js';
