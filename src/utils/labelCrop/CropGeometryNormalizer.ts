/**
 * CropGeometryNormalizer: final crop window and output size per label.
 *
 * Policies:
 *   barcode-centered  fixed-size window centered on the barcode digits, output at that fixed size
 *   first-seen        crop = detected region, output at the size of the run's first label
 *   none              crop = detected region, output at the crop's own size
 */

import type { BarcodeAnchor } from './BarcodeAnchorLocator';
import { clamp, rectHeight, rectWidth } from './geometry';
import type { ReferenceSizeCell } from './ReferenceSizeCell';
import type { PageDimensions, Rect, ReferenceSize } from './types';

export type CropPolicy =
  | { kind: 'barcode-centered'; width: number; height: number }
  | { kind: 'first-seen' }
  | { kind: 'none' };

export type CropPolicyKind = CropPolicy['kind'];

/**
 * Move a [start, start + length] window rigidly so it lies inside [0, limit].
 * Returns the new start. A window longer than the range is pinned at 0 and
 * cut by the caller's clamp.
 */
function shiftIntoRange(start: number, length: number, limit: number): number {
  if (length >= limit) return 0;
  if (start < 0) return 0;
  if (start + length > limit) return limit - length;
  return start;
}

/**
 * Fixed-size window centered horizontally on the barcode anchor, top-aligned
 * with the detected label region. Without an anchor the region is returned as-is.
 */
export function centerOnBarcode(
  region: Rect,
  anchor: BarcodeAnchor | null,
  target: ReferenceSize,
  page: PageDimensions,
): Rect {
  if (anchor === null) return { ...region };

  const x0 = shiftIntoRange(anchor.centerX - target.width / 2, target.width, page.width);
  const y0 = shiftIntoRange(region.y0, target.height, page.height);

  return {
    x0,
    y0,
    x1: Math.min(page.width, x0 + target.width),
    y1: Math.min(page.height, y0 + target.height),
  };
}

/** Crop rectangle for one label under the given policy. */
export function normalizeCrop(
  policy: CropPolicy,
  region: Rect,
  anchor: BarcodeAnchor | null,
  page: PageDimensions,
): Rect {
  const crop = policy.kind === 'barcode-centered'
    ? centerOnBarcode(region, anchor, policy, page)
    : { ...region };

  return {
    x0: clamp(crop.x0, 0, page.width),
    y0: clamp(crop.y0, 0, page.height),
    x1: clamp(crop.x1, 0, page.width),
    y1: clamp(crop.y1, 0, page.height),
  };
}

/**
 * Offer a label's crop as the run's reference size. Only the first-seen policy
 * records anything; returns true when this call established the size.
 */
export function offerReferenceSize(
  policy: CropPolicy,
  crop: Rect,
  cell: ReferenceSizeCell,
): boolean {
  if (policy.kind !== 'first-seen') return false;
  return cell.trySet({ width: rectWidth(crop), height: rectHeight(crop) });
}

/** Page size the compositor scales a crop into. */
export function resolveOutputSize(
  policy: CropPolicy,
  crop: Rect,
  cell: ReferenceSizeCell,
): ReferenceSize {
  switch (policy.kind) {
    case 'barcode-centered':
      return { width: policy.width, height: policy.height };
    case 'first-seen':
      return { ...cell.require() };
    case 'none':
      return { width: rectWidth(crop), height: rectHeight(crop) };
  }
}

export const _testExports = {
  shiftIntoRange,
};
