/** uniform float in [0, 1) */
export type Random = () => number;

/** mulberry32, deterministic for a given 32-bit seed */
export function createRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomSeed(): number {
  return Math.floor(Math.random() * 4294967296) >>> 0;
}

/** index in [0, n) */
export function randomIndex(random: Random, n: number): number {
  return Math.min(Math.floor(random() * n), n - 1);
}
