/**
 * Label Crop Type Definitions
 *
 * Shared geometry and text types for the label-crop pipeline:
 *   ColumnClusterer / ContentMaskCropDetector (region) -> IdentifierExtractor (key)
 *   -> BarcodeAnchorLocator + CropGeometryNormalizer (rect) -> PageGroupAggregator (groups)
 *
 * All coordinates use a top-left origin with y increasing downward, in the unit
 * of the page or raster they were measured on (never mixed in one computation).
 */

// ─── Geometry ──────────────────────────────────────────────────

/** Axis-aligned rectangle, x0 <= x1 and y0 <= y1 */
export interface Rect {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface PageDimensions {
  width: number;
  height: number;
}

/** Canonical output page size, fixed once per run */
export interface ReferenceSize {
  width: number;
  height: number;
}

// ─── Text ──────────────────────────────────────────────────────

/** A positioned run of recognized text on a page */
export interface TextFragment {
  readonly bbox: Rect;
  readonly text: string;
}

/** A single whitespace-delimited word with its box */
export type WordToken = TextFragment;

/** Canonical identifier read from a label, e.g. "C50039 0007 0001" */
export type Identifier = string;

// ─── Regions ───────────────────────────────────────────────────

/** Candidate label box before final normalization */
export interface LabelRegion {
  rect: Rect;
  sourcePageIndex: number;
}

/** Row-major 8-bit luminance raster (0 = black, 255 = white) */
export interface GrayRaster {
  width: number;
  height: number;
  data: Uint8Array | Uint8ClampedArray;
}

// ─── Grouping ──────────────────────────────────────────────────

/** Locates one page within a batch of documents */
export interface PageRef {
  documentIndex: number;
  pageIndex: number;
}

export interface Group<TRef = PageRef> {
  key: Identifier;
  /** Non-empty, in order of first appearance */
  pages: TRef[];
  sharedRect: Rect;
}
