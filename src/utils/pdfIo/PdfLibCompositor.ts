/**
 * PdfLibCompositor: Rendering/Compositing Layer on pdf-lib.
 *
 * Crop rectangles arrive in page space (top-left origin, relative to the
 * page's CropBox, as produced by PdfJsDocumentSource). pdf-lib works in PDF
 * user space (bottom-left origin), so every rectangle is flipped against the
 * source page's CropBox before use.
 *
 *   renderCroppedPage  clip → embedPage(boundingBox) → drawPage scaled to fit, centered
 *   cropPagesInPlace   copyPages → setCropBox
 *   repeatPages        embedPage(CropBox) once → drawPage on N new pages
 */

import { PDFDocument, type PDFPage } from 'pdf-lib';
import { logger } from '../logger';
import type {
  InPlaceCrop,
  LabelCompositor,
  SourceDocument,
} from '../labelCrop/sources';
import type { Rect, ReferenceSize } from '../labelCrop/types';

const TAG = '[PdfLibCompositor]';

/** PDF user-space box, the shape embedPage() takes */
export interface PdfBox {
  left: number;
  bottom: number;
  right: number;
  top: number;
}

/** Page-space rect → PDF user-space box of `page` */
export function toPdfBox(page: PDFPage, rect: Rect): PdfBox {
  const crop = page.getCropBox();
  const top = crop.y + crop.height;
  return {
    left: crop.x + rect.x0,
    right: crop.x + rect.x1,
    top: top - rect.y0,
    bottom: top - rect.y1,
  };
}

function warnIfRotated(page: PDFPage, what: string): void {
  const angle = page.getRotation().angle % 360;
  if (angle !== 0) {
    logger.warn(`${TAG} ${what} is rotated ${angle}°; crop boxes assume an upright page`);
  }
}

export class PdfLibCompositor implements LabelCompositor {
  private readonly loaded = new WeakMap<SourceDocument, Promise<PDFDocument>>();

  /** Each source is parsed once per compositor */
  private load(source: SourceDocument): Promise<PDFDocument> {
    let doc = this.loaded.get(source);
    if (!doc) {
      doc = PDFDocument.load(source.bytes, { ignoreEncryption: true });
      this.loaded.set(source, doc);
    }
    return doc;
  }

  async renderCroppedPage(
    source: SourceDocument,
    pageIndex: number,
    clip: Rect,
    outputSize: ReferenceSize,
  ): Promise<Uint8Array> {
    const clipWidth = clip.x1 - clip.x0;
    const clipHeight = clip.y1 - clip.y0;
    if (clipWidth <= 0 || clipHeight <= 0) {
      throw new Error(`Empty crop on ${source.name} page ${pageIndex + 1}`);
    }

    const srcDoc = await this.load(source);
    const srcPage = srcDoc.getPage(pageIndex);
    warnIfRotated(srcPage, `${source.name} page ${pageIndex + 1}`);

    const out = await PDFDocument.create();
    const embedded = await out.embedPage(srcPage, toPdfBox(srcPage, clip));
    const page = out.addPage([outputSize.width, outputSize.height]);

    // Keep proportions: fit the clip inside the output page and center it
    const scale = Math.min(outputSize.width / clipWidth, outputSize.height / clipHeight);
    const width = clipWidth * scale;
    const height = clipHeight * scale;
    page.drawPage(embedded, {
      x: (outputSize.width - width) / 2,
      y: (outputSize.height - height) / 2,
      width,
      height,
    });

    return out.save();
  }

  async cropPagesInPlace(pages: readonly InPlaceCrop[]): Promise<Uint8Array> {
    const out = await PDFDocument.create();

    for (const { source, pageIndex, rect } of pages) {
      const srcDoc = await this.load(source);
      const [copied] = await out.copyPages(srcDoc, [pageIndex]);
      warnIfRotated(copied, `${source.name} page ${pageIndex + 1}`);

      const box = toPdfBox(copied, rect);
      copied.setCropBox(box.left, box.bottom, box.right - box.left, box.top - box.bottom);
      out.addPage(copied);
    }

    return out.save();
  }

  async repeatPages(pdf: Uint8Array, copies: number): Promise<Uint8Array> {
    const srcDoc = await PDFDocument.load(pdf);
    const out = await PDFDocument.create();

    const embedded = [];
    for (const page of srcDoc.getPages()) {
      const crop = page.getCropBox();
      const xobject = await out.embedPage(page, {
        left: crop.x,
        bottom: crop.y,
        right: crop.x + crop.width,
        top: crop.y + crop.height,
      });
      embedded.push({ xobject, width: crop.width, height: crop.height });
    }

    for (let copy = 0; copy < Math.max(1, copies); copy++) {
      for (const { xobject, width, height } of embedded) {
        const page = out.addPage([width, height]);
        page.drawPage(xobject, { x: 0, y: 0, width, height });
      }
    }

    return out.save();
  }
}
