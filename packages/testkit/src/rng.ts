/**
 * Seeded PRNG for property-style tests.
 *
 * Mulberry32: small, fast and reproducible across runs, so a failing seed can
 * be replayed.
 */

export type Rng = Readonly<{
  /** Uniform float in [0, 1). */
  next: () => number;
  /** Uniform integer in [0, n). */
  int: (n: number) => number;
  bool: () => boolean;
  pick: <T>(items: readonly T[]) => T;
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
  const int = (n: number): number => Math.floor(next() * n);
  return Object.freeze({
    next,
    int,
    bool: () => next() < 0.5,
    pick: <T>(items: readonly T[]): T => {
      const item = items[int(items.length)];
      if (item === undefined) throw new Error("createRng.pick: empty list");
      return item;
    },
  });
}
