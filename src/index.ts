#!/usr/bin/env node

import { realpathSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { Command } from 'commander';
import { availableFontFamilies } from './fonts/font-family.js';
import { builderFromManifest, loadDocumentManifest } from './manifest/load-document.js';
import { inspectPdf } from './outline/inspect.js';
import { getPageProfile, profiles } from './page-profiles/profiles.js';
import { buildSampleReport } from './samples/report.js';
import type { PageProfile } from './types.js';
import { logValidationResult, validateRenderResult } from './validation.js';

const program = new Command();

program
  .name('quire')
  .description('Assemble documents into paginated PDFs with a resolved table of contents')
  .version('0.1.0');

program
  .command('render')
  .description('Render a JSON document manifest to PDF')
  .requiredOption('-i, --input <path>', 'Input manifest path')
  .option('-o, --output <path>', 'Output PDF path (default: <input>.pdf)')
  .option('-p, --profile <name>', `Page profile (${Object.keys(profiles).join(', ')})`)
  .option('--toc', 'Print a table of contents even if the manifest does not ask for one')
  .option('--bookmarks', 'Add one PDF bookmark per section')
  .option('--font <family>', `Font family (${availableFontFamilies().join(', ')})`)
  .action(async (options) => {
    try {
      await renderManifest(options.input, options.output, options.profile, {
        includeToc: options.toc ?? false,
        bookmarks: options.bookmarks ?? false,
        font: options.font,
      });
    } catch (err) {
      console.error('Render failed:', err);
      process.exit(1);
    }
  });

program
  .command('sample')
  .description('Render the built-in sample report')
  .option('-o, --output <dir>', 'Output directory', 'output')
  .option('-p, --profile <name>', `Page profile (${Object.keys(profiles).join(', ')})`)
  .option('--bookmarks', 'Also write a bookmarked variant')
  .action(async (options) => {
    try {
      const profile = getPageProfile(options.profile ?? process.env.QUIRE_PROFILE);
      await renderSample(options.output, profile, options.bookmarks ?? false);
    } catch (err) {
      console.error('Sample generation failed:', err);
      process.exit(1);
    }
  });

program
  .command('inspect')
  .description('Print page count and bookmarks of a PDF')
  .requiredOption('-i, --input <path>', 'Input PDF path')
  .action(async (options) => {
    try {
      await inspectFile(options.input);
    } catch (err) {
      console.error('Inspection failed:', err);
      process.exit(1);
    }
  });

function safeRealpath(path: string): string {
  try {
    return realpathSync(path);
  } catch {
    return resolve(path);
  }
}

/**
 * True when the module at `moduleUrl` is the script node was started with,
 * including through a symlinked bin wrapper
 */
export function isCliEntrypoint(argv: readonly string[], moduleUrl: string): boolean {
  const entrypointArg = argv[1];
  if (!entrypointArg) {
    return false;
  }

  const modulePath = safeRealpath(fileURLToPath(moduleUrl));
  return pathToFileURL(modulePath).href === pathToFileURL(safeRealpath(entrypointArg)).href;
}

if (isCliEntrypoint(process.argv, import.meta.url)) {
  program.parse();
}

/**
 * `quire render`: manifest to PDF, with step output on the console
 */
export async function renderManifest(
  inputPath: string,
  outputPath: string | undefined,
  profileName: string | undefined,
  options: { includeToc: boolean; bookmarks: boolean; font?: string },
): Promise<void> {
  const resolvedInput = resolve(inputPath);
  const defaultOutput = resolvedInput.replace(/\.json$/i, '') + '.pdf';
  const resolvedOutput = outputPath ? resolve(outputPath) : defaultOutput;

  console.log('Quire v0.1.0');
  console.log('============');
  console.log(`Input:  ${resolvedInput}`);
  console.log(`Output: ${resolvedOutput}`);
  console.log('');

  // Step 1: Load manifest
  console.log('Step 1: Loading manifest...');
  const manifest = await loadDocumentManifest(resolvedInput);
  console.log(`  Sections: ${manifest.sections.length}`);
  if (manifest.cover) {
    console.log(`  Cover: ${manifest.cover.title}`);
  }

  const profile = getPageProfile(profileName ?? manifest.profile ?? process.env.QUIRE_PROFILE);
  console.log(`  Profile: ${profile.name}`);
  const builder = builderFromManifest(manifest, profile, {
    includeToc: options.includeToc,
    font: options.font,
  }).withLogger((message) => console.log(message));

  // Step 2: Layout
  console.log('Step 2: Laying out pages...');
  const rendered = options.bookmarks
    ? await builder.renderWithBookmarks()
    : await builder.trackSectionPages(true).render();

  // Step 3: Write PDF
  console.log('Step 3: Writing PDF...');
  await writeFile(resolvedOutput, rendered.bytes);

  // Step 4: Validate output
  console.log('Step 4: Validating output...');
  logValidationResult(validateRenderResult(rendered, manifest.sections));

  console.log('');
  console.log('Render complete!');
  console.log(`  Pages: ${rendered.pageCount}`);
  console.log(`  Size: ${(rendered.bytes.byteLength / 1024).toFixed(1)} KB`);
}

export async function renderSample(outputDir: string, profile: PageProfile, bookmarks: boolean): Promise<void> {
  const resolvedDir = resolve(outputDir);
  await mkdir(resolvedDir, { recursive: true });

  const builder = buildSampleReport(profile).withLogger((message) => console.log(message));

  console.log('Step 1: Rendering sample report...');
  const rendered = await builder.trackSectionPages(true).render();
  const standardPath = join(resolvedDir, 'report.pdf');
  await writeFile(standardPath, rendered.bytes);
  console.log(`  Wrote ${standardPath} (${rendered.pageCount} pages)`);
  logValidationResult(validateRenderResult(rendered, builder.sections));

  if (bookmarks) {
    console.log('Step 2: Rendering bookmarked sample report...');
    const bookmarked = await builder.renderWithBookmarks();
    const bookmarkedPath = join(resolvedDir, 'report_bookmarks.pdf');
    await writeFile(bookmarkedPath, bookmarked.bytes);
    console.log(`  Wrote ${bookmarkedPath} (${bookmarked.pageCount} pages)`);
  }
}

export async function inspectFile(inputPath: string): Promise<void> {
  const resolvedInput = resolve(inputPath);
  const summary = await inspectPdf(new Uint8Array(await readFile(resolvedInput)));

  console.log(`File: ${resolvedInput}`);
  console.log(`  Title: ${summary.title ?? '(none)'}`);
  console.log(`  Pages: ${summary.pageCount}`);
  console.log(`  Bookmarks: ${summary.outline.length}`);
  for (const item of summary.outline) {
    const target = item.pageNumber === null ? 'unresolved' : `page ${item.pageNumber}`;
    const name = item.name ? ` [${item.name}]` : '';
    console.log(`    ${item.title}${name} -> ${target}`);
  }
}
