/**
 * JSON document manifests.
 *
 * A manifest describes a cover, sections and render options. Paragraph,
 * caption, header and footer text use the inline markup syntax. Image paths
 * are resolved against the manifest's directory.
 */

import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { DocumentBuilder } from '../document/builder.js';
import { ManifestError, describeError } from '../errors.js';
import { MarkupParseError, parseMarkup, parseParagraph } from '../markup/parse-markup.js';
import {
  type Block,
  Cover,
  ImageBlock,
  type RichParagraph,
  Section,
  imageBlock,
  imageFromPath,
  pageBreak,
  paragraphBlock,
} from '../model/content.js';
import type { DocumentMetadata, HorizontalAlignment, PageProfile } from '../types.js';

const ALIGNMENTS = ['left', 'center', 'right', 'justified'] as const;

/**
 * Token replaced with the page number in header and footer text
 */
export const PAGE_NUMBER_TOKEN = '{page}';

function checkMarkup(text: string, ctx: z.RefinementCtx): void {
  try {
    parseMarkup(text);
  } catch (error) {
    if (error instanceof MarkupParseError) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
      return;
    }
    throw error;
  }
}

const text = () =>
  z.string({ required_error: 'is required', invalid_type_error: 'expected a string' });

// Markup text; offsets in errors refer to the text as written
const markupText = () => text().superRefine(checkMarkup);

// The page token is checked as digits of the same length so offsets still line up
const decorationText = () =>
  text().superRefine((value, ctx) =>
    checkMarkup(value.split(PAGE_NUMBER_TOKEN).join('0'.repeat(PAGE_NUMBER_TOKEN.length)), ctx),
  );

const alignmentSchema = z
  .enum(ALIGNMENTS, { errorMap: () => ({ message: `expected one of ${ALIGNMENTS.join(', ')}` }) })
  .default('left');

const positiveNumber = () =>
  z
    .number({ required_error: 'is required', invalid_type_error: 'expected a positive number' })
    .positive({ message: 'expected a positive number' });

const asObject = { invalid_type_error: 'expected an object' };

const blockSchema = z.discriminatedUnion(
  'type',
  [
    z.object({ type: z.literal('pageBreak') }, asObject),
    z.object({
      type: z.literal('paragraph'),
      text: markupText(),
      alignment: alignmentSchema,
    }, asObject),
    z.object({
      type: z.literal('image'),
      path: text().describe('Image file, relative to the manifest'),
      caption: markupText().nullish(),
      alignment: alignmentSchema,
      widthMm: positiveNumber().nullish(),
      captionSpacingMm: z
        .number({ invalid_type_error: 'expected a non-negative number' })
        .nonnegative({ message: 'expected a non-negative number' })
        .nullish(),
    }, asObject),
  ],
  {
    errorMap: (issue, ctx) => {
      if (issue.code === z.ZodIssueCode.invalid_union_discriminator) {
        return { message: 'expected "paragraph", "image" or "pageBreak"' };
      }
      if (issue.code === z.ZodIssueCode.invalid_type) {
        return { message: 'expected an object' };
      }
      return { message: ctx.defaultError };
    },
  },
);

const blocksSchema = z.array(blockSchema, { invalid_type_error: 'expected an array' }).default([]);

const sectionSchema = z.object({
  title: text(),
  identifier: text().nullish(),
  startOnNewPage: z.boolean({ invalid_type_error: 'expected true or false' }).default(false),
  blocks: blocksSchema,
}, asObject);

export const manifestSchema = z.object({
  title: text().nullish(),
  author: text().nullish(),
  subject: text().nullish(),
  creationDate: text()
    .refine((value) => !Number.isNaN(new Date(value).getTime()), {
      message: 'expected an ISO 8601 date',
    })
    .transform((value) => new Date(value))
    .nullish(),
  toc: z
    .union([z.boolean(), z.object({ title: z.string().nullish() })], {
      errorMap: () => ({ message: 'expected true, false or an object with a title' }),
    })
    .default(false),
  profile: text().nullish(),
  font: text().nullish(),
  suppressSectionHeadings: z
    .boolean({ invalid_type_error: 'expected true or false' })
    .default(false),
  header: z.object({ text: decorationText(), alignment: alignmentSchema }, asObject).nullish(),
  footer: z.object({
    heightMm: positiveNumber(),
    text: decorationText(),
    alignment: alignmentSchema,
  }, asObject).nullish(),
  cover: z.object({
    title: text(),
    subtitle: text().nullish(),
    identifier: text().nullish(),
    blocks: blocksSchema,
  }, asObject).nullish(),
  sections: z.array(sectionSchema, { invalid_type_error: 'expected an array' }).default([]),
}, asObject);

type ManifestData = z.infer<typeof manifestSchema>;
type BlockData = z.infer<typeof blockSchema>;

export interface ManifestFooter {
  heightMm: number;
  text: string;
  alignment: HorizontalAlignment;
}

export interface DocumentManifest {
  metadata: DocumentMetadata;
  profile: string | null;
  font: string | null;
  tocTitle: string | null;
  includeToc: boolean;
  suppressSectionHeadings: boolean;
  header: { text: string; alignment: HorizontalAlignment } | null;
  footer: ManifestFooter | null;
  cover: Cover | null;
  sections: Section[];
}

function formatPath(path: ReadonlyArray<string | number>): string {
  if (path.length === 0) {
    return '(root)';
  }
  return path.reduce<string>(
    (joined, key) =>
      typeof key === 'number' ? `${joined}[${key}]` : joined ? `${joined}.${key}` : key,
    '',
  );
}

function toBlock(block: BlockData, baseDir: string): Block {
  switch (block.type) {
    case 'pageBreak':
      return pageBreak();
    case 'paragraph':
      return paragraphBlock(parseParagraph(block.text, block.alignment));
    case 'image': {
      const source = imageFromPath(isAbsolute(block.path) ? block.path : resolve(baseDir, block.path));
      const caption = block.caption ? parseParagraph(block.caption, block.alignment) : null;
      return imageBlock(
        new ImageBlock(source, {
          caption,
          alignment: block.alignment,
          widthMm: block.widthMm ?? null,
          captionSpacingMm: block.captionSpacingMm ?? undefined,
        }),
      );
    }
  }
}

function toManifest(data: ManifestData, baseDir: string): DocumentManifest {
  const metadata: DocumentMetadata = {};
  if (data.title) metadata.title = data.title;
  if (data.author) metadata.author = data.author;
  if (data.subject) metadata.subject = data.subject;
  if (data.creationDate) metadata.creationDate = data.creationDate;

  const cover = data.cover
    ? new Cover(data.cover.title, {
        subtitle: data.cover.subtitle ?? null,
        identifier: data.cover.identifier ?? null,
        blocks: data.cover.blocks.map((block) => toBlock(block, baseDir)),
      })
    : null;

  return {
    metadata,
    profile: data.profile ?? null,
    font: data.font ?? null,
    includeToc: data.toc !== false,
    tocTitle: typeof data.toc === 'object' ? data.toc.title ?? null : null,
    suppressSectionHeadings: data.suppressSectionHeadings,
    header: data.header ?? null,
    footer: data.footer ?? null,
    cover,
    sections: data.sections.map((section) =>
      Section.builder(section.title)
        .identifier(section.identifier ?? null)
        .startOnNewPage(section.startOnNewPage)
        .extendBlocks(section.blocks.map((block) => toBlock(block, baseDir)))
        .build(),
    ),
  };
}

/**
 * Validate a parsed JSON value and turn it into a document description.
 * Throws ManifestError listing every problem found.
 */
export function parseDocumentManifest(json: unknown, baseDir: string = process.cwd()): DocumentManifest {
  const result = manifestSchema.safeParse(json);
  if (!result.success) {
    throw new ManifestError(
      result.error.issues.map((issue) => `${formatPath(issue.path)}: ${issue.message}`),
    );
  }
  return toManifest(result.data, baseDir);
}

/**
 * Read and validate a manifest file
 */
export async function loadDocumentManifest(path: string): Promise<DocumentManifest> {
  const content = await readFile(path, 'utf-8');

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ManifestError([`(root): invalid JSON: ${describeError(error)}`]);
  }

  return parseDocumentManifest(json, dirname(resolve(path)));
}

function pageDecoration(text: string, alignment: HorizontalAlignment) {
  return (pageNumber: number): RichParagraph =>
    parseParagraph(text.split(PAGE_NUMBER_TOKEN).join(String(pageNumber)), alignment);
}

/**
 * Configure a builder from a manifest. Options given here win over the manifest.
 */
export function builderFromManifest(
  manifest: DocumentManifest,
  profile: PageProfile,
  overrides: { includeToc?: boolean; font?: string } = {},
): DocumentBuilder {
  let builder = new DocumentBuilder(profile)
    .withMetadata(manifest.metadata)
    .withCover(manifest.cover)
    .addSections(manifest.sections)
    .includePrintedToc(overrides.includeToc || manifest.includeToc)
    .withTocTitle(manifest.tocTitle)
    .suppressSectionHeadings(manifest.suppressSectionHeadings);

  const font = overrides.font ?? manifest.font;
  if (font) {
    builder = builder.withFontFamily(font);
  }
  if (manifest.header) {
    builder = builder.withHeader(pageDecoration(manifest.header.text, manifest.header.alignment));
  }
  if (manifest.footer) {
    builder = builder.withFooter(
      manifest.footer.heightMm,
      pageDecoration(manifest.footer.text, manifest.footer.alignment),
    );
  }
  return builder;
}
