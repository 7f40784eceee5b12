/**
 * PdfLibCompositor Tests
 *
 * Source PDFs are built in-process with pdf-lib; outputs are loaded back and
 * checked for page count, page size and crop box.
 */
import { describe, it, expect, beforeAll } from 'vitest';
import { PDFDocument, rgb } from 'pdf-lib';
import type { SourceDocument } from '../../labelCrop/sources';
import { PdfLibCompositor, toPdfBox } from '../PdfLibCompositor';

async function makeSource(name: string, pageCount: number): Promise<SourceDocument> {
  const doc = await PDFDocument.create();
  for (let i = 0; i < pageCount; i++) {
    const page = doc.addPage([200, 300]);
    page.drawRectangle({ x: 20, y: 200, width: 60, height: 40, color: rgb(0, 0, 0) });
  }
  return { name, bytes: await doc.save() };
}

describe('toPdfBox', () => {
  it('flips a top-left rect into PDF user space', async () => {
    const doc = await PDFDocument.create();
    const page = doc.addPage([200, 300]);
    expect(toPdfBox(page, { x0: 10, y0: 20, x1: 60, y1: 120 })).toEqual({ left: 10, right: 60, top: 280, bottom: 180 });
  });

  it('offsets by the page crop box', async () => {
    const doc = await PDFDocument.create();
    const page = doc.addPage([200, 300]);
    page.setCropBox(50, 50, 100, 100);
    expect(toPdfBox(page, { x0: 0, y0: 0, x1: 10, y1: 10 })).toEqual({ left: 50, right: 60, top: 150, bottom: 140 });
  });
});

describe('PdfLibCompositor', () => {
  let source: SourceDocument;

  beforeAll(async () => {
    source = await makeSource('sheet.pdf', 2);
  });

  it('renders a crop onto a page of the output size', async () => {
    const compositor = new PdfLibCompositor();
    const bytes = await compositor.renderCroppedPage(
      source,
      1,
      { x0: 10, y0: 20, x1: 60, y1: 120 },
      { width: 100, height: 50 },
    );

    const out = await PDFDocument.load(bytes);
    expect(out.getPageCount()).toBe(1);
    expect(out.getPage(0).getSize()).toEqual({ width: 100, height: 50 });
  });

  it('rejects an empty crop', async () => {
    const compositor = new PdfLibCompositor();
    await expect(
      compositor.renderCroppedPage(source, 0, { x0: 10, y0: 10, x1: 10, y1: 40 }, { width: 10, height: 10 }),
    ).rejects.toThrow('Empty crop on sheet.pdf page 1');
  });

  it('copies pages and sets their crop boxes', async () => {
    const other = await makeSource('other.pdf', 1);
    const compositor = new PdfLibCompositor();
    const bytes = await compositor.cropPagesInPlace([
      { source, pageIndex: 0, rect: { x0: 10, y0: 20, x1: 60, y1: 120 } },
      { source: other, pageIndex: 0, rect: { x0: 0, y0: 0, x1: 200, y1: 100 } },
    ]);

    const out = await PDFDocument.load(bytes);
    expect(out.getPageCount()).toBe(2);
    expect(out.getPage(0).getCropBox()).toEqual({ x: 10, y: 180, width: 50, height: 100 });
    expect(out.getPage(1).getCropBox()).toEqual({ x: 0, y: 200, width: 200, height: 100 });
    // media box untouched
    expect(out.getPage(0).getSize()).toEqual({ width: 200, height: 300 });
  });

  it('repeats a document\'s pages at their visible size', async () => {
    const compositor = new PdfLibCompositor();
    const cropped = await compositor.cropPagesInPlace([
      { source, pageIndex: 0, rect: { x0: 10, y0: 20, x1: 60, y1: 120 } },
    ]);

    const out = await PDFDocument.load(await compositor.repeatPages(cropped, 3));
    expect(out.getPageCount()).toBe(3);
    for (const page of out.getPages()) {
      expect(page.getSize()).toEqual({ width: 50, height: 100 });
    }
  });
});
