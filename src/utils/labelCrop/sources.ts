/**
 * Seams between the pure label-crop core and PDF I/O.
 *
 * The pipeline only talks to these interfaces; `pdfIo/` implements them on
 * pdfjs-dist (reading) and pdf-lib (writing), tests implement them in memory.
 */

import type {
  GrayRaster,
  PageDimensions,
  Rect,
  ReferenceSize,
  TextFragment,
  WordToken,
} from './types';

/** A PDF handed to a run: display name plus raw bytes */
export interface SourceDocument {
  name: string;
  bytes: Uint8Array;
}

/** Read access to one page */
export interface LabelPageSource {
  readonly pageIndex: number;
  readonly dimensions: PageDimensions;
  /** Non-empty text runs with their boxes */
  getTextFragments(): Promise<TextFragment[]>;
  /** Words whose box center lies inside `clip` */
  getWords(clip: Rect): Promise<WordToken[]>;
  /** Reading-order text of the page, or of the part inside `clip` */
  getText(clip?: Rect): Promise<string>;
  /** Page rendered at `zoom` x its size, as 8-bit luminance */
  getRasterGray(zoom: number): Promise<GrayRaster>;
}

export interface LabelDocumentSource {
  readonly name: string;
  readonly pageCount: number;
  getPage(pageIndex: number): Promise<LabelPageSource>;
  close(): Promise<void>;
}

export type DocumentOpener = (source: SourceDocument) => Promise<LabelDocumentSource>;

/** One page of a crop-in-place output */
export interface InPlaceCrop {
  source: SourceDocument;
  pageIndex: number;
  rect: Rect;
}

/** Write access: produces new single-purpose PDFs */
export interface LabelCompositor {
  /** One page of `outputSize` showing `clip` of the source page, scaled to fit and centered */
  renderCroppedPage(
    source: SourceDocument,
    pageIndex: number,
    clip: Rect,
    outputSize: ReferenceSize,
  ): Promise<Uint8Array>;
  /** Copies of the given pages with their CropBox set, in order */
  cropPagesInPlace(pages: readonly InPlaceCrop[]): Promise<Uint8Array>;
  /** The document's page sequence repeated `copies` times */
  repeatPages(pdf: Uint8Array, copies: number): Promise<Uint8Array>;
}
