/**
 * Frequency-rank encoding
 * Replaces every token by the rank of its frequency within the same sequence
 */

import { splitTokens } from './tokenize.js';
import type { Rank, RankTable, Token, TokenStat } from './types.js';

/**
 * Count tokens and remember where each one first appears
 * @returns Stats keyed by token, in first-occurrence order
 */
export function tokenStats(tokens: Token[]): Map<Token, TokenStat> {
  const stats = new Map<Token, TokenStat>();
  for (let i = 0; i < tokens.length; i++) {
    const hit = stats.get(tokens[i]);
    if (hit) hit.count++;
    else stats.set(tokens[i], { count: 1, firstIndex: i });
  }
  return stats;
}

/**
 * Build the rank table for one token sequence
 * Sorted by: 1) count (desc), 2) first occurrence (asc).
 * First occurrence is unique per token, so no further key is needed.
 */
export function buildRankTable(tokens: Token[]): RankTable {
  const ordered = [...tokenStats(tokens)].sort(([, a], [, b]) => {
    if (b.count !== a.count) return b.count - a.count;
    return a.firstIndex - b.firstIndex;
  });

  const table: RankTable = new Map();
  ordered.forEach(([token], rank) => table.set(token, rank));
  return table;
}

export function encodeTokens(tokens: Token[]): Rank[] {
  const table = buildRankTable(tokens);
  return tokens.map(t => table.get(t) ?? 0);
}

/**
 * Encode a whitespace-delimited token string as rank IDs
 * @example freqEncode("150 273 150 14 273 150") // "0 1 0 2 1 0"
 */
export function freqEncode(text: string): string {
  return encodeTokens(splitTokens(text)).join(' ');
}
