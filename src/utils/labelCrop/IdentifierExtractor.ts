/**
 * IdentifierExtractor: structured label codes from free text.
 *
 * Each grammar is a tagged strategy with a single `tryExtract` entry point.
 * A missing code is a normal outcome for non-label pages and yields `null`.
 */

import type { Identifier } from './types';

export type GrammarKind = 'sku' | 'referencia';

export interface IdentifierGrammar {
  readonly kind: GrammarKind;
  /** Human-readable description for logs and CLI help */
  readonly description: string;
  tryExtract(text: string): Identifier | null;
}

/** Collapse every whitespace run (newlines included) into a single space. */
export function normalizeWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

// "C50039 0007 0001" or "C 50039 0007 0001"
const SKU_PATTERN = /([A-Z])\s?(\d{5})\s+(\d{4})\s+(\d{4})/;

// "REFERENCIA: C400080003XX"
const REFERENCIA_PATTERN = /REFERENCIA:\s*([A-Z0-9]+)/;

const skuGrammar: IdentifierGrammar = {
  kind: 'sku',
  description: 'letter + 5 digits + 4 digits + 4 digits, e.g. C50039 0007 0001',
  tryExtract(text) {
    const m = SKU_PATTERN.exec(normalizeWhitespace(text));
    if (!m) return null;
    return `${m[1]}${m[2]} ${m[3]} ${m[4]}`;
  },
};

const referenciaGrammar: IdentifierGrammar = {
  kind: 'referencia',
  description: 'REFERENCIA: <alphanumeric code>, e.g. C400080003XX',
  tryExtract(text) {
    const m = REFERENCIA_PATTERN.exec(normalizeWhitespace(text));
    return m ? m[1] : null;
  },
};

export const IDENTIFIER_GRAMMARS: Readonly<Record<GrammarKind, IdentifierGrammar>> = {
  sku: skuGrammar,
  referencia: referenciaGrammar,
};

export function isGrammarKind(value: string): value is GrammarKind {
  return Object.prototype.hasOwnProperty.call(IDENTIFIER_GRAMMARS, value);
}

export function getGrammar(kind: GrammarKind): IdentifierGrammar {
  return IDENTIFIER_GRAMMARS[kind];
}
