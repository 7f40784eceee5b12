#!/usr/bin/env tsx
/**
 * label-crop: command-line front end.
 *
 * Usage:
 *   npx tsx src/main/main.ts [options] <file.pdf> [more.pdf ...]
 *
 * Reads every PDF, finds one label per page, keeps one output per identifier
 * and writes all outputs as a flat ZIP archive.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { parseArgs } from 'util';
import { logger } from '../utils/logger';
import {
  DEFAULT_TARGET_HEIGHT,
  DEFAULT_TARGET_WIDTH,
} from '../utils/labelCrop/ContentMaskCropDetector';
import { resolveConfig, type LabelCropConfig } from '../utils/labelCrop/config';
import { IDENTIFIER_GRAMMARS } from '../utils/labelCrop/IdentifierExtractor';
import { LabelConfigError, LabelCropCancelledError, describeError } from '../utils/labelCrop/errors';
import { LabelCropPipeline, type BatchResult, type DocumentRegion } from '../utils/labelCrop/LabelCropPipeline';
import type { SourceDocument } from '../utils/labelCrop/sources';
import { PdfJsDocumentSource, openPdfJsDocument } from '../utils/pdfIo/PdfJsDocumentSource';
import { PdfLibCompositor } from '../utils/pdfIo/PdfLibCompositor';
import { buildArchive } from '../utils/pdfIo/ZipBuilder';

const TAG = '[label-crop]';

const USAGE = `Usage: label-crop [options] <file.pdf> [more.pdf ...]

Presets:
  --preset hangtag          3 labels across, SKU codes, barcode-centered fixed size
  --preset carton           content-mask crop, REFERENCIA codes, pages grouped in place

Options:
  --config <file.json>      configuration file (same keys as below, camelCase)
  --out <file.zip>          archive path (default: preset archive name)
  --columns <n>             labels across the page
  --padding-x <n>           horizontal padding around the first column
  --padding-y <n>           vertical padding around the first column
  --min-barcode-digits <n>  shortest digit run accepted as barcode text
  --threshold <0-255>       content-mask intensity threshold
  --aspect-ratio <r>        content-mask target width / height
  --zoom <z>                rasterization zoom for the content mask
  --grammar <g>             sku | referencia
  --detection <d>           text-columns | content-mask
  --crop-policy <p>         barcode-centered | first-seen | none
  --reference-width <pt>    fixed / seeded output width
  --reference-height <pt>   fixed / seeded output height
  --duplicates <d>          drop | merge (merge needs --output-mode crop-in-place)
  --output-mode <m>         render | crop-in-place
  --prefix <text>           output names are "<prefix> <identifier>.pdf"
  --copies <n>              identical pages per output
  --compression <c>         deflate | store
  --preview <dir>           write a PNG preview of each content-mask crop
  -h, --help                show this help
`;

/** Flag name → config key, for flags that carry numbers */
const NUMERIC_FLAGS = {
  'columns': 'columns',
  'padding-x': 'paddingX',
  'padding-y': 'paddingY',
  'min-barcode-digits': 'minBarcodeDigits',
  'threshold': 'intensityThreshold',
  'aspect-ratio': 'targetAspectRatio',
  'zoom': 'rasterZoom',
  'reference-width': 'referenceWidth',
  'reference-height': 'referenceHeight',
  'copies': 'copies',
} as const;

/** Flag name → config key, for flags that carry strings */
const STRING_FLAGS = {
  'preset': 'preset',
  'grammar': 'grammar',
  'detection': 'detection',
  'crop-policy': 'cropPolicy',
  'duplicates': 'duplicates',
  'output-mode': 'output',
  'prefix': 'filePrefix',
  'compression': 'compression',
} as const;

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'help': { type: 'boolean', short: 'h' },
      'config': { type: 'string' },
      'out': { type: 'string' },
      'preview': { type: 'string' },
      'preset': { type: 'string' },
      'grammar': { type: 'string' },
      'detection': { type: 'string' },
      'crop-policy': { type: 'string' },
      'duplicates': { type: 'string' },
      'output-mode': { type: 'string' },
      'prefix': { type: 'string' },
      'compression': { type: 'string' },
      'columns': { type: 'string' },
      'padding-x': { type: 'string' },
      'padding-y': { type: 'string' },
      'min-barcode-digits': { type: 'string' },
      'threshold': { type: 'string' },
      'aspect-ratio': { type: 'string' },
      'zoom': { type: 'string' },
      'reference-width': { type: 'string' },
      'reference-height': { type: 'string' },
      'copies': { type: 'string' },
    },
  });
}

/** Flags as a config layer; numbers stay NaN when unparsable so validation reports them */
export function flagsToConfigLayer(values: Record<string, string | boolean | undefined>): Record<string, unknown> {
  const layer: Record<string, unknown> = {};
  for (const [flag, key] of Object.entries(NUMERIC_FLAGS)) {
    const v = values[flag];
    if (typeof v === 'string') layer[key] = Number(v);
  }
  for (const [flag, key] of Object.entries(STRING_FLAGS)) {
    const v = values[flag];
    if (typeof v === 'string') layer[key] = v;
  }
  return layer;
}

function readConfigFile(file: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    throw new LabelConfigError([`${file}: cannot read config file (${describeError(err)})`]);
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new LabelConfigError([`${file}: not valid JSON (${describeError(err)})`]);
  }
}

function readDocuments(files: string[]): SourceDocument[] {
  const documents: SourceDocument[] = [];
  for (const file of files) {
    try {
      documents.push({ name: path.basename(file), bytes: new Uint8Array(fs.readFileSync(file)) });
    } catch (err) {
      logger.error(`${TAG} Cannot read ${file}: ${describeError(err)}`);
    }
  }
  return documents;
}

function report(result: BatchResult): void {
  for (const output of result.outputs) {
    const pages = output.pages.map(p => p.pageIndex + 1).join(', ');
    const copies = output.copies > 1 ? ` x${output.copies}` : '';
    logger.info(`${TAG}   ${output.fileName}  (source: ${output.sourceName}, page ${pages})${copies}`);
  }
  for (const failure of result.failures) {
    logger.warn(`${TAG}   ${failure.sourceName}: ${failure.reason}`);
  }
  if (result.referenceSize) {
    const { width, height } = result.referenceSize;
    logger.info(`${TAG} Output size ${width.toFixed(2)} x ${height.toFixed(2)} pt`);
  }
}

async function writePreviews(
  regions: DocumentRegion[],
  documents: SourceDocument[],
  config: LabelCropConfig,
  dir: string,
): Promise<void> {
  if (regions.length === 0) {
    logger.warn(`${TAG} --preview only applies to content-mask detection`);
    return;
  }
  fs.mkdirSync(dir, { recursive: true });

  for (const region of regions) {
    const doc = await PdfJsDocumentSource.open(documents[region.documentIndex]);
    try {
      const page = await doc.getPage(0);
      const png = await page.renderPreviewPng(region.rect, DEFAULT_TARGET_WIDTH, DEFAULT_TARGET_HEIGHT, config.rasterZoom);
      const file = path.join(dir, `${path.parse(region.sourceName).name}.preview.png`);
      fs.writeFileSync(file, png);
      logger.info(`${TAG} Preview written to ${file}`);
    } finally {
      await doc.close();
    }
  }
}

export async function main(argv: string[]): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (err) {
    console.error(`${describeError(err)}\n\n${USAGE}`);
    return 2;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    const grammars = Object.values(IDENTIFIER_GRAMMARS).map(g => `  ${g.kind.padEnd(24)}  ${g.description}`);
    console.log(`${USAGE}\nGrammars:\n${grammars.join('\n')}`);
    return 0;
  }
  if (positionals.length === 0) {
    console.error(`No input PDFs given.\n\n${USAGE}`);
    return 2;
  }

  let config: LabelCropConfig;
  try {
    config = resolveConfig(
      { source: 'config file', raw: typeof values.config === 'string' ? readConfigFile(values.config) : undefined },
      { source: 'command line', raw: flagsToConfigLayer(values) },
    );
  } catch (err) {
    if (err instanceof LabelConfigError) {
      console.error(err.message);
      return 2;
    }
    throw err;
  }

  const documents = readDocuments(positionals);
  if (documents.length === 0) {
    logger.error(`${TAG} None of the input files could be read.`);
    return 1;
  }

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const pipeline = new LabelCropPipeline(config, {
    openDocument: openPdfJsDocument,
    compositor: new PdfLibCompositor(),
  });

  let result: BatchResult;
  try {
    result = await pipeline.run(documents, { signal: controller.signal });
  } catch (err) {
    if (err instanceof LabelCropCancelledError) {
      logger.warn(`${TAG} Cancelled.`);
      return 130;
    }
    throw err;
  }

  report(result);

  if (typeof values.preview === 'string') {
    await writePreviews(result.documentRegions, documents, config, values.preview);
  }

  if (result.outputs.length === 0) {
    logger.warn(`${TAG} No labels with recognizable identifiers were found.`);
    return 1;
  }

  const outFile = typeof values.out === 'string' ? values.out : config.archive.fileName;
  fs.writeFileSync(outFile, buildArchive(result.outputs, config.archive.compression));
  logger.info(`${TAG} Wrote ${result.outputs.length} file(s) to ${outFile}`);
  return 0;
}

// argv[1] may be the npm bin symlink
const invokedDirectly = process.argv[1] !== undefined
  && fs.existsSync(process.argv[1])
  && fs.realpathSync(process.argv[1]) === fs.realpathSync(fileURLToPath(import.meta.url));

if (invokedDirectly) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    err => {
      logger.error(`${TAG} Unexpected error:`, err);
      process.exitCode = 1;
    },
  );
}
