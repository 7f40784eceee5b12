/**
 * Shared pdfjs-dist configuration for document loading under Node.
 *
 * standardFontDataUrl: the Foxit / Liberation font files shipped inside the
 * pdfjs-dist package, so pages that reference the standard 14 fonts
 * (Helvetica, Times, Courier, etc.) without embedding them still rasterize.
 *
 * cMapUrl: the bundled CMap files for CJK font encoding.
 */

import { createRequire } from 'module';
import path from 'path';

const requireFromHere = createRequire(import.meta.url);
const PDFJS_ROOT = path.dirname(requireFromHere.resolve('pdfjs-dist/package.json'));

/** Base options to spread into every pdfjsLib.getDocument() call. */
export const PDFJS_DOCUMENT_OPTIONS = {
  standardFontDataUrl: path.join(PDFJS_ROOT, 'standard_fonts') + path.sep,
  cMapUrl: path.join(PDFJS_ROOT, 'cmaps') + path.sep,
  cMapPacked: true,
  isEvalSupported: false,
  verbosity: 0,
} as const;
