/**
 * Seeded randomness for reproducible dataset splits
 */

/** Returns floats in [0, 1) */
export type RandomSource = () => number;

/**
 * FNV1a32 hash function
 */
export function fnv1a32(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return (h >>> 0);
}

/**
 * Mulberry32 PRNG
 */
export function mulberry32(seed: number): RandomSource {
  return function() {
    let t = seed += 0x6D2B79F5;
    t = Math.imul(t ^ (t >>> 15), 1 | t);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Random source derived from a string seed
 * @param seed - Any string; equal seeds give equal sequences
 */
export function seededRandom(seed: string): RandomSource {
  return mulberry32(fnv1a32(seed));
}

/**
 * Fisher-Yates shuffle on a copy of the array
 */
export function shuffle<T>(arr: readonly T[], rand: RandomSource): T[] {
  const a = arr.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = Math.floor(rand() * (i + 1));
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}
