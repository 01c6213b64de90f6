#!/usr/bin/env node
/**
 * Sheet Image Extraction CLI
 *
 * Pull the embedded images out of one or more .xlsx workbooks and write
 * them, named after a column of the same row, into a ZIP archive.
 *
 * Usage:
 *   npx tsx cli/extract.ts <file.xlsx...> --image-column A --name-column B [options]
 *   npx tsx cli/extract.ts parts.xlsx -i A -n C -o parts.zip
 *   npx tsx cli/extract.ts q1.xlsx q2.xlsx -i B -n A --manifest
 *
 * Options:
 *   --image-column, -i  Column holding the images (required)
 *   --name-column, -n   Column holding the names (required)
 *   --output, -o        Archive path (default: sheet_images_<timestamp>.zip)
 *   --manifest          Add report.csv listing every image
 *   --fail-on-empty     Exit with an error when no image is found
 *   --quiet, -q         Suppress progress messages
 *   --help, -h          Show this help message
 */

import * as fs from 'fs';
import * as path from 'path';
import { errorMessage, isExtractorError } from '../lib/errors';
import { setLogLevel } from '../lib/logger';
import { processWorkbooks } from '../lib/pipeline';
import type { WorkbookInput } from '../lib/types';

// ============================================================================
// Argument Parsing
// ============================================================================

export interface CliArgs {
  inputs: string[];
  imageColumn: string;
  nameColumn: string;
  output?: string;
  manifest: boolean;
  failOnEmpty: boolean;
  quiet: boolean;
  help: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const args = argv.slice(2);
  const result: CliArgs = {
    inputs: [],
    imageColumn: '',
    nameColumn: '',
    output: undefined,
    manifest: false,
    failOnEmpty: false,
    quiet: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--image-column':
      case '-i':
        result.imageColumn = args[++i] ?? '';
        break;
      case '--name-column':
      case '-n':
        result.nameColumn = args[++i] ?? '';
        break;
      case '--output':
      case '-o':
        result.output = args[++i];
        break;
      case '--manifest':
        result.manifest = true;
        break;
      case '--fail-on-empty':
        result.failOnEmpty = true;
        break;
      case '--quiet':
      case '-q':
        result.quiet = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        if (!arg.startsWith('-')) {
          result.inputs.push(arg);
        }
        break;
    }
  }

  return result;
}

function showHelp() {
  console.log(`
Sheet Image Extraction CLI

Usage:
  npx tsx cli/extract.ts <file.xlsx...> -i <column> -n <column> [options]

Examples:
  npx tsx cli/extract.ts parts.xlsx -i A -n B                 # → sheet_images_<timestamp>.zip
  npx tsx cli/extract.ts parts.xlsx -i A -n C -o parts.zip
  npx tsx cli/extract.ts q1.xlsx q2.xlsx -i B -n A --manifest  # duplicates removed across files

Options:
  -i, --image-column <col>  Column holding the images (A, B, ..., XFD)
  -n, --name-column <col>   Column holding the names
  -o, --output <path>       Archive path (default: sheet_images_<timestamp>.zip)
  --manifest                Add report.csv listing every image
  --fail-on-empty           Exit with an error when no image is found
  -q, --quiet               Suppress progress messages
  -h, --help                Show this help message
`);
}

// ============================================================================
// Main
// ============================================================================

async function main() {
  const args = parseArgs(process.argv);

  if (args.help || args.inputs.length === 0 || !args.imageColumn || !args.nameColumn) {
    showHelp();
    process.exit(args.help ? 0 : 1);
  }

  if (args.quiet) setLogLevel('warn');
  const log = args.quiet ? () => {} : (msg: string) => console.error(msg);

  const inputs: WorkbookInput[] = [];
  for (const input of args.inputs) {
    const resolvedPath = path.resolve(input);
    if (!fs.existsSync(resolvedPath)) {
      console.error(`Error: File not found: ${input}`);
      process.exit(1);
    }
    inputs.push({ fileName: path.basename(resolvedPath), data: await fs.promises.readFile(resolvedPath) });
  }

  log(`Processing ${inputs.length} file(s), images in column ${args.imageColumn.toUpperCase()}`);

  const result = await processWorkbooks(
    inputs,
    { imageColumn: args.imageColumn, nameColumn: args.nameColumn },
    { plan: 'local', includeManifest: args.manifest, failOnEmpty: args.failOnEmpty }
  );

  const outputPath = args.output ?? result.fileName;
  await fs.promises.writeFile(outputPath, result.archive);

  log(`\n--- Summary ---`);
  log(`Images found: ${result.summary.processed}`);
  log(`Saved: ${result.summary.saved}`);
  log(`Duplicates skipped: ${result.summary.duplicates}`);
  log(`Archive written to: ${outputPath}`);
}

if (require.main === module) {
  main().catch(error => {
    const prefix = isExtractorError(error) ? `Error [${error.code}]` : 'Fatal error';
    console.error(`${prefix}: ${errorMessage(error)}`);
    process.exit(1);
  });
}
