/**
 * Tokenization utilities
 */

import type { Token } from './types.js';

/**
 * Split pre-tokenized text on runs of whitespace
 * - Empty fragments are dropped, so blank input yields []
 * - Tokens are kept verbatim (no case folding, no numeric parsing)
 */
export function splitTokens(text: string): Token[] {
  return text.split(/\s+/).filter(Boolean);
}

/**
 * Character-level target tokenization: one token per code point
 * e.g. "ab c" -> "a b   c"
 */
export function spaceChars(text: string): string {
  return Array.from(text).join(' ');
}
