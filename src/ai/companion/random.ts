// src/ai/companion/random.ts

/** Source of floats in [0, 1). Injected so tests can pin every draw. */
export interface RandomSource {
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * mulberry32: small and fast, good enough for picking templates.
 * Each source owns its state; nothing is shared between instances.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next() {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

export function pick<T>(random: RandomSource, items: readonly T[]): T | undefined {
  if (!items.length) return undefined;
  const i = Math.floor(random.next() * items.length);
  return items[Math.min(i, items.length - 1)];
}

/** true with probability `p` */
export function chance(random: RandomSource, p: number): boolean {
  return random.next() < p;
}
