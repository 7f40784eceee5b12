/**
 * PdfJsDocumentSource: Document Access Layer on pdfjs-dist.
 *
 *   page → getTextContent() → positionItem() → TextFragment[] (top-left origin)
 *                          → splitWords()   → WordToken[]
 *   page → render(canvas)   → getImageData() → GrayRaster
 *
 * Coordinates go through the page viewport at scale 1, so CropBox offsets and
 * page rotation are already applied: results are in the same space as the
 * page as displayed, in PDF points.
 */

import { createCanvas } from '@napi-rs/canvas';
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { TextItem } from 'pdfjs-dist/types/src/display/api';
import { rgbaToGray } from '../labelCrop/ContentMaskCropDetector';
import { containsCenter } from '../labelCrop/geometry';
import type {
  LabelDocumentSource,
  LabelPageSource,
  SourceDocument,
} from '../labelCrop/sources';
import type {
  GrayRaster,
  PageDimensions,
  Rect,
  TextFragment,
  WordToken,
} from '../labelCrop/types';
import { PDFJS_DOCUMENT_OPTIONS } from './pdfjsConfig';

type PageViewport = ReturnType<pdfjsLib.PDFPageProxy['getViewport']>;

/** Text item with the page-space box it occupies */
interface PositionedItem {
  item: TextItem;
  bbox: Rect;
}

function isTextItem(item: unknown): item is TextItem {
  return typeof item === 'object' && item !== null && 'str' in item && 'transform' in item;
}

/**
 * Map a rectangle given in PDF user space (bottom-left origin) into viewport
 * space (top-left origin), normalizing corner order.
 */
function toViewportRect(viewport: PageViewport, x0: number, y0: number, x1: number, y1: number): Rect {
  const [a, b, c, d, e, f] = viewport.transform;
  const ax = a * x0 + c * y0 + e;
  const ay = b * x0 + d * y0 + f;
  const bx = a * x1 + c * y1 + e;
  const by = b * x1 + d * y1 + f;
  return {
    x0: Math.min(ax, bx),
    y0: Math.min(ay, by),
    x1: Math.max(ax, bx),
    y1: Math.max(ay, by),
  };
}

/** Font size from the text matrix: sqrt(a^2 + b^2) */
function fontSizeOf(item: TextItem): number {
  const [a, b] = item.transform;
  return Math.sqrt(a * a + b * b);
}

function positionItem(item: TextItem, viewport: PageViewport): PositionedItem | null {
  const transform = item.transform;
  if (!transform || transform.length < 6) return null;

  const fontSize = fontSizeOf(item);
  const height = item.height > 0 ? item.height : fontSize;
  const width = item.width > 0 ? item.width : item.str.length * fontSize * 0.5;
  if (height <= 0) return null;

  const x = transform[4];
  const y = transform[5];
  return { item, bbox: toViewportRect(viewport, x, y, x + width, y + height) };
}

/**
 * Split an item into words. pdfjs reports one box per text run, so word boxes
 * are interpolated by character offset along the run.
 */
function splitWords(positioned: PositionedItem, viewport: PageViewport): WordToken[] {
  const { item } = positioned;
  const text = item.str;
  if (text.length === 0) return [];

  const transform = item.transform;
  const fontSize = fontSizeOf(item);
  const runWidth = item.width > 0 ? item.width : text.length * fontSize * 0.5;
  const height = item.height > 0 ? item.height : fontSize;
  const x = transform[4];
  const y = transform[5];

  const words: WordToken[] = [];
  for (const match of text.matchAll(/\S+/g)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    const wx0 = x + (runWidth * start) / text.length;
    const wx1 = x + (runWidth * end) / text.length;
    words.push({ text: match[0], bbox: toViewportRect(viewport, wx0, y, wx1, y + height) });
  }
  return words;
}

/** Top-to-bottom, left-to-right text; items on the same line are space-joined. */
function readingOrderText(fragments: readonly TextFragment[]): string {
  const sorted = [...fragments].sort((a, b) => a.bbox.y0 - b.bbox.y0 || a.bbox.x0 - b.bbox.x0);
  const lines: TextFragment[][] = [];

  for (const fragment of sorted) {
    const line = lines[lines.length - 1];
    const anchor = line?.[0];
    const tolerance = anchor ? (anchor.bbox.y1 - anchor.bbox.y0) / 2 : 0;
    if (line && anchor && Math.abs(fragment.bbox.y0 - anchor.bbox.y0) <= tolerance) {
      line.push(fragment);
    } else {
      lines.push([fragment]);
    }
  }

  return lines
    .map(line => line.sort((a, b) => a.bbox.x0 - b.bbox.x0).map(f => f.text).join(' '))
    .join('\n');
}

export class PdfJsPageSource implements LabelPageSource {
  readonly dimensions: PageDimensions;
  private readonly viewport: PageViewport;
  private positioned: Promise<PositionedItem[]> | null = null;

  constructor(
    private readonly page: pdfjsLib.PDFPageProxy,
    readonly pageIndex: number,
  ) {
    this.viewport = page.getViewport({ scale: 1 });
    this.dimensions = { width: this.viewport.width, height: this.viewport.height };
  }

  private items(): Promise<PositionedItem[]> {
    if (!this.positioned) {
      this.positioned = this.page.getTextContent().then(content => {
        const out: PositionedItem[] = [];
        for (const item of content.items) {
          if (!isTextItem(item) || !item.str.trim()) continue;
          const p = positionItem(item, this.viewport);
          if (p) out.push(p);
        }
        return out;
      });
    }
    return this.positioned;
  }

  async getTextFragments(): Promise<TextFragment[]> {
    const items = await this.items();
    return items.map(({ item, bbox }) => ({ bbox, text: item.str }));
  }

  async getWords(clip: Rect): Promise<WordToken[]> {
    const items = await this.items();
    return items
      .flatMap(p => splitWords(p, this.viewport))
      .filter(w => containsCenter(clip, w.bbox));
  }

  async getText(clip?: Rect): Promise<string> {
    const fragments = await this.getTextFragments();
    return readingOrderText(clip ? fragments.filter(f => containsCenter(clip, f.bbox)) : fragments);
  }

  /** Render at `zoom` onto a white background. */
  private async renderCanvas(zoom: number) {
    const viewport = this.page.getViewport({ scale: zoom });
    const width = Math.ceil(viewport.width);
    const height = Math.ceil(viewport.height);
    const canvas = createCanvas(width, height);
    const context = canvas.getContext('2d');
    context.fillStyle = '#ffffff';
    context.fillRect(0, 0, width, height);

    await this.page.render({
      // @napi-rs/canvas implements the 2D context pdfjs draws with
      canvasContext: context as unknown as CanvasRenderingContext2D,
      viewport,
    }).promise;

    return { canvas, context, width, height };
  }

  async getRasterGray(zoom: number): Promise<GrayRaster> {
    const { context, width, height } = await this.renderCanvas(zoom);
    const { data } = context.getImageData(0, 0, width, height);
    return rgbaToGray(data, width, height);
  }

  /**
   * PNG of `crop` (page space) rendered at `zoom` and resized to
   * `width` x `height` pixels.
   */
  async renderPreviewPng(crop: Rect, width: number, height: number, zoom = 2): Promise<Uint8Array> {
    const { canvas } = await this.renderCanvas(zoom);
    const preview = createCanvas(width, height);
    const ctx = preview.getContext('2d');
    ctx.imageSmoothingQuality = 'high';
    ctx.drawImage(
      canvas,
      Math.round(crop.x0 * zoom),
      Math.round(crop.y0 * zoom),
      Math.max(1, Math.round((crop.x1 - crop.x0) * zoom)),
      Math.max(1, Math.round((crop.y1 - crop.y0) * zoom)),
      0,
      0,
      width,
      height,
    );
    return preview.encode('png');
  }

  cleanup(): void {
    this.page.cleanup();
  }
}

export class PdfJsDocumentSource implements LabelDocumentSource {
  private constructor(
    private readonly pdf: pdfjsLib.PDFDocumentProxy,
    readonly name: string,
  ) {}

  static async open(source: SourceDocument): Promise<PdfJsDocumentSource> {
    // pdfjs transfers the buffer to its worker; hand it a copy
    const pdf = await pdfjsLib.getDocument({
      data: source.bytes.slice(),
      ...PDFJS_DOCUMENT_OPTIONS,
    }).promise;
    return new PdfJsDocumentSource(pdf, source.name);
  }

  get pageCount(): number {
    return this.pdf.numPages;
  }

  async getPage(pageIndex: number): Promise<PdfJsPageSource> {
    const page = await this.pdf.getPage(pageIndex + 1);
    return new PdfJsPageSource(page, pageIndex);
  }

  async close(): Promise<void> {
    await this.pdf.destroy();
  }
}

export const openPdfJsDocument = (source: SourceDocument): Promise<PdfJsDocumentSource> =>
  PdfJsDocumentSource.open(source);

export const _testExports = {
  readingOrderText,
};
