/**
 * ContentMaskCropDetector: crop box from rendered pixels.
 *
 * Pipeline:
 *   raster -> content mask (luminance < threshold) -> bounding box
 *          -> expand to target aspect ratio about the box center -> clamp to raster
 *          -> scale into page coordinates (per axis)
 *
 * Used when labels carry no reliable text layout; only the first page of a
 * document is rasterized and its box is shared by every page.
 */

import { clamp } from './geometry';
import type { GrayRaster, PageDimensions, Rect } from './types';

/** Output shape of the carton label previews (px) */
export const DEFAULT_TARGET_WIDTH = 680;
export const DEFAULT_TARGET_HEIGHT = 480;
export const DEFAULT_TARGET_RATIO = DEFAULT_TARGET_WIDTH / DEFAULT_TARGET_HEIGHT;

/** Near-white cutoff: anything darker counts as printed content */
export const DEFAULT_INTENSITY_THRESHOLD = 250;

export interface ContentMaskOptions {
  /** Pixels with luminance strictly below this are content (0..255) */
  threshold: number;
  /** width / height of the expanded box */
  targetAspectRatio: number;
}

/**
 * Pixel-space bounding box of every pixel darker than `threshold`, or null
 * when the raster is blank. x1/y1 are the last content column/row (inclusive).
 */
export function findContentBounds(raster: GrayRaster, threshold: number): Rect | null {
  const { width, height, data } = raster;
  let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;

  for (let y = 0; y < height; y++) {
    const row = y * width;
    for (let x = 0; x < width; x++) {
      if (data[row + x] < threshold) {
        if (x < minX) minX = x;
        if (x > maxX) maxX = x;
        if (y < minY) minY = y;
        if (y > maxY) maxY = y;
      }
    }
  }

  if (maxX < 0) return null;
  return { x0: minX, y0: minY, x1: maxX, y1: maxY };
}

/**
 * Grow the narrower dimension of `box` until width / height equals
 * `targetRatio`, keeping the box center. Never shrinks.
 */
export function expandToAspectRatio(box: Rect, targetRatio: number): Rect {
  const width = box.x1 - box.x0;
  const height = box.y1 - box.y0;
  const currentRatio = height > 0 ? width / height : Infinity;

  if (currentRatio > targetRatio) {
    // too wide: add height
    const newHeight = width / targetRatio;
    const cy = (box.y0 + box.y1) / 2;
    return { x0: box.x0, y0: cy - newHeight / 2, x1: box.x1, y1: cy + newHeight / 2 };
  }

  const newWidth = height * targetRatio;
  const cx = (box.x0 + box.x1) / 2;
  return { x0: cx - newWidth / 2, y0: box.y0, x1: cx + newWidth / 2, y1: box.y1 };
}

/** Map a raster-space box onto the page, scaling each axis independently. */
export function rasterToPage(box: Rect, raster: GrayRaster, page: PageDimensions): Rect {
  const scaleX = page.width / raster.width;
  const scaleY = page.height / raster.height;
  return {
    x0: box.x0 * scaleX,
    y0: box.y0 * scaleY,
    x1: box.x1 * scaleX,
    y1: box.y1 * scaleY,
  };
}

/**
 * Raster-space crop box: content bounds expanded to the target ratio and
 * clamped to the raster. Blank rasters yield the full raster.
 */
export function detectRasterCrop(raster: GrayRaster, options: ContentMaskOptions): Rect {
  const bounds = findContentBounds(raster, options.threshold);
  if (bounds === null) {
    return { x0: 0, y0: 0, x1: raster.width, y1: raster.height };
  }

  const expanded = expandToAspectRatio(bounds, options.targetAspectRatio);
  return {
    x0: clamp(expanded.x0, 0, raster.width),
    y0: clamp(expanded.y0, 0, raster.height),
    x1: clamp(expanded.x1, 0, raster.width),
    y1: clamp(expanded.y1, 0, raster.height),
  };
}

/** Page-space crop box for a rasterized page. */
export function detectContentCrop(
  raster: GrayRaster,
  page: PageDimensions,
  options: ContentMaskOptions,
): Rect {
  return rasterToPage(detectRasterCrop(raster, options), raster, page);
}

/**
 * Luminance from interleaved RGBA pixels, ITU-R 601-2 weights in 16.16
 * fixed point, rounded. Alpha is ignored.
 */
export function rgbaToGray(rgba: Uint8Array | Uint8ClampedArray, width: number, height: number): GrayRaster {
  const data = new Uint8Array(width * height);
  for (let i = 0, p = 0; i < data.length; i++, p += 4) {
    data[i] = (rgba[p] * 19595 + rgba[p + 1] * 38470 + rgba[p + 2] * 7471 + 0x8000) >>> 16;
  }
  return { width, height, data };
}
