/**
 * Prints what label detection sees on each page of a PDF:
 * text fragments, column clustering, identifier, barcode anchor and crop.
 *
 *   npx tsx test-pdfs/diagnose-label-crop.ts <file.pdf> [--preset hangtag|carton]
 */
import * as fs from 'fs';
import * as path from 'path';
import { locateBarcodeAnchor } from '../src/utils/labelCrop/BarcodeAnchorLocator';
import { clusterXCenters, computeFirstLabelRect, leftmostColumn } from '../src/utils/labelCrop/ColumnClusterer';
import { resolveConfig } from '../src/utils/labelCrop/config';
import { detectContentCrop } from '../src/utils/labelCrop/ContentMaskCropDetector';
import { normalizeCrop } from '../src/utils/labelCrop/CropGeometryNormalizer';
import { centerX } from '../src/utils/labelCrop/geometry';
import { getGrammar } from '../src/utils/labelCrop/IdentifierExtractor';
import type { Rect } from '../src/utils/labelCrop/types';
import { PdfJsDocumentSource } from '../src/utils/pdfIo/PdfJsDocumentSource';

function fmt(r: Rect): string {
  return `(${r.x0.toFixed(1)}, ${r.y0.toFixed(1)}) - (${r.x1.toFixed(1)}, ${r.y1.toFixed(1)})`;
}

async function diagnose() {
  const args = process.argv.slice(2);
  const file = args.find(a => !a.startsWith('--'));
  const presetIndex = args.indexOf('--preset');
  const preset = presetIndex >= 0 ? args[presetIndex + 1] : 'hangtag';
  if (!file) {
    console.error('Usage: diagnose-label-crop.ts <file.pdf> [--preset hangtag|carton]');
    process.exit(2);
  }

  const config = resolveConfig({ source: 'command line', raw: { preset } });
  const grammar = getGrammar(config.grammar);
  const doc = await PdfJsDocumentSource.open({
    name: path.basename(file),
    bytes: new Uint8Array(fs.readFileSync(file)),
  });

  console.log(`${doc.name}: ${doc.pageCount} page(s), preset ${preset}`);

  for (let i = 0; i < doc.pageCount; i++) {
    const page = await doc.getPage(i);
    const { width, height } = page.dimensions;
    console.log(`\n=== PAGE ${i + 1} (${width.toFixed(1)} x ${height.toFixed(1)}) ===`);

    if (config.detection === 'content-mask') {
      const raster = await page.getRasterGray(config.rasterZoom);
      const crop = detectContentCrop(raster, page.dimensions, {
        threshold: config.intensityThreshold,
        targetAspectRatio: config.targetAspectRatio,
      });
      console.log(`  raster ${raster.width} x ${raster.height}, crop ${fmt(crop)}`);
      console.log(`  identifier: ${grammar.tryExtract(await page.getText()) ?? '(none)'}`);
      page.cleanup();
      continue;
    }

    const fragments = await page.getTextFragments();
    for (const f of fragments) {
      console.log(`  ${fmt(f.bbox).padEnd(36)} "${f.text}"`);
    }

    const { centers, assignments } = clusterXCenters(fragments.map(f => centerX(f.bbox)), config.columns);
    const first = leftmostColumn(centers);
    console.log(`  column centers: ${centers.map(c => c.toFixed(1)).join(', ')} (first = ${first})`);
    console.log(`  fragments in first column: ${assignments.filter(a => a === first).length}`);

    const region = computeFirstLabelRect(fragments, page.dimensions, config);
    const text = await page.getText(region);
    console.log(`  label region ${fmt(region)}`);
    console.log(`  region text: ${JSON.stringify(text)}`);
    console.log(`  identifier: ${grammar.tryExtract(text) ?? '(none)'}`);

    const anchor = locateBarcodeAnchor(await page.getWords(region), config.minBarcodeDigits);
    console.log(`  barcode anchor: ${anchor ? `${anchor.digits} at x=${anchor.centerX.toFixed(1)}` : '(none)'}`);
    console.log(`  crop ${fmt(normalizeCrop(config.cropPolicy, region, anchor, page.dimensions))}`);
    page.cleanup();
  }

  await doc.close();
}

diagnose().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
