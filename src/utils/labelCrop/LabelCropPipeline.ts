/**
 * LabelCropPipeline: batch orchestration over a set of PDFs.
 *
 * Two passes:
 *   1. detect (sequential, batch order)
 *        per page: region -> identifier -> crop rect -> PageGroupAggregator
 *        the first label also fixes the run's reference size (first-seen policy)
 *   2. render (parallel)
 *        per group: compositor output at the resolved size -> optional copies
 *
 * Only pass 1 ever writes the ReferenceSizeCell, and pass 2 starts after pass 1
 * has finished, so every output reads the same size whatever order pass 2
 * completes in.
 *
 * Failures stay local: a document that cannot be opened or read is reported
 * and skipped, a group that cannot be rendered is reported and skipped, and
 * the run returns whatever it produced.
 */

import { logger } from '../logger';
import { locateBarcodeAnchor, type BarcodeAnchor } from './BarcodeAnchorLocator';
import { computeFirstLabelRect } from './ColumnClusterer';
import { copiesFor, outputFileName, type LabelCropConfig } from './config';
import { detectContentCrop } from './ContentMaskCropDetector';
import {
  normalizeCrop,
  offerReferenceSize,
  resolveOutputSize,
} from './CropGeometryNormalizer';
import { describeError, throwIfCancelled } from './errors';
import { getGrammar } from './IdentifierExtractor';
import { PageGroupAggregator, type DuplicatePage } from './PageGroupAggregator';
import { ReferenceSizeCell } from './ReferenceSizeCell';
import type {
  DocumentOpener,
  InPlaceCrop,
  LabelCompositor,
  LabelDocumentSource,
  LabelPageSource,
  SourceDocument,
} from './sources';
import type {
  Group,
  Identifier,
  PageDimensions,
  PageRef,
  Rect,
  ReferenceSize,
} from './types';

const TAG = '[LabelCropPipeline]';

export interface LabelCropDeps {
  openDocument: DocumentOpener;
  compositor: LabelCompositor;
}

export interface LabelCropRunOptions {
  signal?: AbortSignal;
  /** Shares a reference size across several runs; a fresh cell per run otherwise */
  referenceCell?: ReferenceSizeCell;
}

/** What pass 1 learned about the page that opened a group */
export interface DetectedLabel {
  ref: PageRef;
  identifier: Identifier;
  page: PageDimensions;
  /** Candidate region before normalization */
  region: Rect;
  anchor: BarcodeAnchor | null;
  crop: Rect;
}

export interface LabelOutput {
  fileName: string;
  identifier: Identifier;
  sourceName: string;
  pages: PageRef[];
  crop: Rect;
  outputSize: ReferenceSize;
  copies: number;
  bytes: Uint8Array;
}

export interface DocumentFailure {
  sourceName: string;
  reason: string;
}

/** Per-document crop shared by all its pages (content-mask detection) */
export interface DocumentRegion {
  documentIndex: number;
  sourceName: string;
  rect: Rect;
  page: PageDimensions;
}

export interface DetectionResult {
  groups: readonly Group<PageRef>[];
  labels: ReadonlyMap<Identifier, DetectedLabel>;
  duplicates: readonly DuplicatePage<PageRef>[];
  skippedPages: PageRef[];
  documentRegions: DocumentRegion[];
  failures: DocumentFailure[];
}

export interface BatchResult {
  outputs: LabelOutput[];
  failures: DocumentFailure[];
  duplicates: readonly DuplicatePage<PageRef>[];
  skippedPages: PageRef[];
  documentRegions: DocumentRegion[];
  referenceSize: ReferenceSize | null;
}

export class LabelCropPipeline {
  constructor(
    private readonly config: LabelCropConfig,
    private readonly deps: LabelCropDeps,
  ) {}

  /** Detect, group and render every label in `documents`. */
  async run(documents: readonly SourceDocument[], options: LabelCropRunOptions = {}): Promise<BatchResult> {
    const cell = options.referenceCell ?? new ReferenceSizeCell(this.config.referenceSize ?? undefined);

    const detection = await this.detect(documents, cell, options.signal);
    const { outputs, failures } = await this.render(documents, detection, cell, options.signal);

    logger.info(
      `${TAG} ${outputs.length} label file(s) from ${documents.length} document(s); ` +
      `${detection.duplicates.length} duplicate page(s), ` +
      `${detection.failures.length + failures.length} failure(s)`,
    );

    return {
      outputs,
      failures: [...detection.failures, ...failures],
      duplicates: detection.duplicates,
      skippedPages: detection.skippedPages,
      documentRegions: detection.documentRegions,
      referenceSize: cell.get(),
    };
  }

  // ─── Pass 1: detection ────────────────────────────────────────

  async detect(
    documents: readonly SourceDocument[],
    cell: ReferenceSizeCell,
    signal?: AbortSignal,
  ): Promise<DetectionResult> {
    const aggregator = new PageGroupAggregator<PageRef>(this.config.duplicates);
    const labels = new Map<Identifier, DetectedLabel>();
    const skippedPages: PageRef[] = [];
    const documentRegions: DocumentRegion[] = [];
    const failures: DocumentFailure[] = [];

    for (let documentIndex = 0; documentIndex < documents.length; documentIndex++) {
      throwIfCancelled(signal);
      const source = documents[documentIndex];

      let doc: LabelDocumentSource;
      try {
        doc = await this.deps.openDocument(source);
      } catch (err) {
        logger.error(`${TAG} Error opening ${source.name}:`, err);
        failures.push({ sourceName: source.name, reason: `could not open: ${describeError(err)}` });
        continue;
      }

      try {
        if (doc.pageCount === 0) {
          logger.warn(`${TAG} ${source.name}: no pages.`);
          failures.push({ sourceName: source.name, reason: 'no pages' });
          continue;
        }

        logger.info(`${TAG} Processing ${source.name} (${doc.pageCount} page(s))`);
        const region = this.config.detection === 'content-mask'
          ? await this.detectDocumentRegion(doc, documentIndex)
          : null;
        if (region) documentRegions.push(region);

        for (let pageIndex = 0; pageIndex < doc.pageCount; pageIndex++) {
          throwIfCancelled(signal);
          const ref: PageRef = { documentIndex, pageIndex };
          const page = await doc.getPage(pageIndex);
          const label = region
            ? await this.readMaskedPage(page, ref, region.rect)
            : await this.readColumnPage(page, ref, aggregator);

          if (label === null) {
            skippedPages.push(ref);
            continue;
          }

          const outcome = aggregator.offer(ref, label.identifier, () => label.crop);
          if (outcome === 'opened') {
            labels.set(label.identifier, label);
            if (offerReferenceSize(this.config.cropPolicy, label.crop, cell)) {
              logger.info(`${TAG} Reference size set by ${label.identifier}: ${formatSize(cell.require())}`);
            }
          } else if (outcome === 'duplicate') {
            logger.debug(`${TAG} ${source.name} p${pageIndex + 1}: duplicate ${label.identifier}, dropped`);
          }
        }
      } catch (err) {
        if (signal?.aborted) throw err;
        logger.error(`${TAG} Error reading ${source.name}:`, err);
        failures.push({ sourceName: source.name, reason: `could not read: ${describeError(err)}` });
      } finally {
        await doc.close();
      }
    }

    return {
      groups: aggregator.groups(),
      labels,
      duplicates: aggregator.duplicates(),
      skippedPages,
      documentRegions,
      failures,
    };
  }

  /** Content-mask crop from the document's first page, shared by all pages. */
  private async detectDocumentRegion(doc: LabelDocumentSource, documentIndex: number): Promise<DocumentRegion> {
    const first = await doc.getPage(0);
    const raster = await first.getRasterGray(this.config.rasterZoom);
    const rect = detectContentCrop(raster, first.dimensions, {
      threshold: this.config.intensityThreshold,
      targetAspectRatio: this.config.targetAspectRatio,
    });
    logger.debug(`${TAG} ${doc.name}: content crop ${formatRect(rect)}`);
    return { documentIndex, sourceName: doc.name, rect, page: first.dimensions };
  }

  private async readMaskedPage(page: LabelPageSource, ref: PageRef, region: Rect): Promise<DetectedLabel | null> {
    const identifier = getGrammar(this.config.grammar).tryExtract(await page.getText());
    if (identifier === null) return null;

    return {
      ref,
      identifier,
      page: page.dimensions,
      region,
      anchor: null,
      crop: normalizeCrop(this.config.cropPolicy, region, null, page.dimensions),
    };
  }

  private async readColumnPage(
    page: LabelPageSource,
    ref: PageRef,
    aggregator: PageGroupAggregator<PageRef>,
  ): Promise<DetectedLabel | null> {
    const { columns, paddingX, paddingY } = this.config;
    const fragments = await page.getTextFragments();
    const region = computeFirstLabelRect(fragments, page.dimensions, { columns, paddingX, paddingY });

    const identifier = getGrammar(this.config.grammar).tryExtract(await page.getText(region));
    if (identifier === null) return null;

    // Duplicates never need their own crop
    if (aggregator.has(identifier)) {
      return { ref, identifier, page: page.dimensions, region, anchor: null, crop: region };
    }

    const anchor = this.config.cropPolicy.kind === 'barcode-centered'
      ? locateBarcodeAnchor(await page.getWords(region), this.config.minBarcodeDigits)
      : null;
    if (this.config.cropPolicy.kind === 'barcode-centered' && anchor === null) {
      logger.debug(`${TAG} p${ref.pageIndex + 1}: no barcode digits for ${identifier}, using label region`);
    }

    return {
      ref,
      identifier,
      page: page.dimensions,
      region,
      anchor,
      crop: normalizeCrop(this.config.cropPolicy, region, anchor, page.dimensions),
    };
  }

  // ─── Pass 2: rendering ────────────────────────────────────────

  async render(
    documents: readonly SourceDocument[],
    detection: DetectionResult,
    cell: ReferenceSizeCell,
    signal?: AbortSignal,
  ): Promise<{ outputs: LabelOutput[]; failures: DocumentFailure[] }> {
    throwIfCancelled(signal);
    const regionByDocument = new Map(detection.documentRegions.map(r => [r.documentIndex, r.rect]));

    const settled = await Promise.all(
      detection.groups.map(async (group): Promise<LabelOutput | DocumentFailure> => {
        const first = group.pages[0];
        const source = documents[first.documentIndex];
        try {
          throwIfCancelled(signal);
          const outputSize = resolveOutputSize(this.config.cropPolicy, group.sharedRect, cell);

          let bytes: Uint8Array;
          if (this.config.output === 'crop-in-place') {
            const pages: InPlaceCrop[] = group.pages.map(ref => ({
              source: documents[ref.documentIndex],
              pageIndex: ref.pageIndex,
              rect: regionByDocument.get(ref.documentIndex) ?? group.sharedRect,
            }));
            bytes = await this.deps.compositor.cropPagesInPlace(pages);
          } else {
            bytes = await this.deps.compositor.renderCroppedPage(
              source,
              first.pageIndex,
              group.sharedRect,
              outputSize,
            );
          }

          const copies = copiesFor(this.config, group.key);
          if (copies > 1) {
            bytes = await this.deps.compositor.repeatPages(bytes, copies);
          }

          return {
            fileName: outputFileName(this.config, group.key),
            identifier: group.key,
            sourceName: source.name,
            pages: [...group.pages],
            crop: group.sharedRect,
            outputSize,
            copies,
            bytes,
          };
        } catch (err) {
          if (signal?.aborted) throw err;
          logger.error(`${TAG} Failed to render ${group.key} from ${source.name}:`, err);
          return { sourceName: source.name, reason: `could not render ${group.key}: ${describeError(err)}` };
        }
      }),
    );

    const outputs: LabelOutput[] = [];
    const failures: DocumentFailure[] = [];
    for (const item of settled) {
      if ('bytes' in item) outputs.push(item);
      else failures.push(item);
    }
    return { outputs, failures };
  }
}

function formatSize(size: ReferenceSize): string {
  return `${size.width.toFixed(2)} x ${size.height.toFixed(2)}`;
}

function formatRect(r: Rect): string {
  return `(${r.x0.toFixed(1)}, ${r.y0.toFixed(1)}, ${r.x1.toFixed(1)}, ${r.y1.toFixed(1)})`;
}
