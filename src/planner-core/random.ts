// ---------------------------------------------------------------------------
// Random sources for narrative filling
// ---------------------------------------------------------------------------

/** Returns a float in [0, 1). `Math.random` satisfies this. */
export type RandomSource = () => number;

/** Seeded PRNG -- mulberry32. Same seed, same sequence. */
export function createSeededRandom(seed: number): RandomSource {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Pick an element using the given source; `undefined` for an empty list. */
export function pick<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) return undefined;
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}
