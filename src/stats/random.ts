/**
 * Seedable random source and shuffling.
 */

/** Uniform draw in [0, 1) */
export type RandomSource = () => number;

export function mulberry32(seed: number): RandomSource {
  let t = seed >>> 0;
  return () => {
    t += 0x6D2B79F5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * mulberry32 over the given seed, or over a fresh one drawn from Math.random
 */
export function createRandomSource(seed?: number | null): RandomSource {
  const s = seed ?? Math.floor(Math.random() * 0x1_0000_0000);
  return mulberry32(s);
}

/**
 * Fisher-Yates shuffle of a copy; the input is left untouched
 */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const tmp = copy[i];
    copy[i] = copy[j];
    copy[j] = tmp;
  }
  return copy;
}
