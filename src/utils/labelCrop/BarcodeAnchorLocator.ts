import { centerX } from './geometry';
import type { Rect, WordToken } from './types';

/** Shorter digit runs are usually prices or quantities, not barcode text */
export const DEFAULT_MIN_BARCODE_DIGITS = 8;

export interface BarcodeAnchor {
  bbox: Rect;
  centerX: number;
  /** The token text with every non-digit removed */
  digits: string;
  text: string;
}

/**
 * Find the word most likely to be the human-readable barcode digits:
 * the one with the most digits. First token wins ties.
 */
export function locateBarcodeAnchor(
  words: readonly WordToken[],
  minDigits: number = DEFAULT_MIN_BARCODE_DIGITS,
): BarcodeAnchor | null {
  let best: WordToken | null = null;
  let bestDigits = '';

  for (const word of words) {
    const digits = word.text.replace(/\D/g, '');
    if (digits.length > bestDigits.length) {
      best = word;
      bestDigits = digits;
    }
  }

  if (best === null || bestDigits.length < minDigits) return null;

  return {
    bbox: best.bbox,
    centerX: centerX(best.bbox),
    digits: bestDigits,
    text: best.text,
  };
}
