/**
 * ColumnClusterer: Leftmost Label Column Finder
 *
 * Label sheets print the same label `k` times across the page. The x-center of
 * every text fragment is clustered into `k` columns with a 1-D k-means, and the
 * column with the smallest centroid is taken as the first label.
 *
 * The k-means runs a fixed budget of CLUSTER_ROUNDS rounds with no convergence
 * check; nearest-center ties go to the lowest column index. Early exit changes
 * the result on pathological inputs, so keep both rules as they are.
 */

import { centerX, clampRect } from './geometry';
import type { PageDimensions, Rect, TextFragment } from './types';

/** Fixed number of assign/update rounds */
export const CLUSTER_ROUNDS = 10;

export interface ColumnClusterOptions {
  /** Number of labels across the page (>= 1) */
  columns: number;
  /** Horizontal padding added on both sides of the tight bound */
  paddingX: number;
  /** Vertical padding added above and below the tight bound */
  paddingY: number;
}

export interface ColumnClustering {
  /** Final centroid of every column, indexed by column */
  centers: number[];
  /** Column index for every input value */
  assignments: number[];
}

/**
 * 1-D k-means over `xs`, initialized from the observed data range
 * (not the page width).
 */
export function clusterXCenters(xs: number[], k: number): ColumnClustering {
  if (xs.length === 0) return { centers: [], assignments: [] };

  let minX = Infinity;
  let maxX = -Infinity;
  for (const x of xs) {
    if (x < minX) minX = x;
    if (x > maxX) maxX = x;
  }

  // One effective column: everything sits on the midpoint center
  if (k <= 1 || maxX === minX) {
    return {
      centers: [(minX + maxX) / 2],
      assignments: xs.map(() => 0),
    };
  }

  const spacing = (maxX - minX) / (k - 1);
  let centers = Array.from({ length: k }, (_, i) => minX + i * spacing);
  const assignments = xs.map(() => 0);

  for (let round = 0; round < CLUSTER_ROUNDS; round++) {
    for (let i = 0; i < xs.length; i++) {
      assignments[i] = nearestCenter(xs[i], centers);
    }

    const sums = new Array<number>(k).fill(0);
    const counts = new Array<number>(k).fill(0);
    for (let i = 0; i < xs.length; i++) {
      sums[assignments[i]] += xs[i];
      counts[assignments[i]]++;
    }
    // Empty columns keep their previous center
    centers = centers.map((c, j) => (counts[j] > 0 ? sums[j] / counts[j] : c));
  }

  return { centers, assignments };
}

function nearestCenter(x: number, centers: number[]): number {
  let best = 0;
  let bestDistance = Math.abs(x - centers[0]);
  for (let j = 1; j < centers.length; j++) {
    const d = Math.abs(x - centers[j]);
    // strict < keeps the lowest index on ties
    if (d < bestDistance) {
      bestDistance = d;
      best = j;
    }
  }
  return best;
}

/** Index of the column with the smallest centroid */
export function leftmostColumn(centers: number[]): number {
  let best = 0;
  for (let j = 1; j < centers.length; j++) {
    if (centers[j] < centers[best]) best = j;
  }
  return best;
}

/** Equal-width first column used when clustering has nothing to work with. */
export function naiveColumnRect(page: PageDimensions, columns: number): Rect {
  return { x0: 0, y0: 0, x1: page.width / Math.max(1, columns), y1: page.height };
}

/**
 * Bounding rectangle of the leftmost label column, padded and clamped to the page.
 */
export function computeFirstLabelRect(
  fragments: readonly TextFragment[],
  page: PageDimensions,
  options: ColumnClusterOptions,
): Rect {
  const usable = fragments.filter(f => f.text.trim().length > 0);
  if (usable.length === 0) {
    return naiveColumnRect(page, options.columns);
  }

  const { centers, assignments } = clusterXCenters(
    usable.map(f => centerX(f.bbox)),
    options.columns,
  );
  const first = leftmostColumn(centers);
  const members = usable.filter((_, i) => assignments[i] === first);

  if (members.length === 0) {
    return naiveColumnRect(page, options.columns);
  }

  let x0 = Infinity, y0 = Infinity, x1 = -Infinity, y1 = -Infinity;
  for (const { bbox } of members) {
    if (bbox.x0 < x0) x0 = bbox.x0;
    if (bbox.y0 < y0) y0 = bbox.y0;
    if (bbox.x1 > x1) x1 = bbox.x1;
    if (bbox.y1 > y1) y1 = bbox.y1;
  }

  return clampRect(
    {
      x0: x0 - options.paddingX,
      y0: y0 - options.paddingY,
      x1: x1 + options.paddingX,
      y1: y1 + options.paddingY,
    },
    page,
  );
}
