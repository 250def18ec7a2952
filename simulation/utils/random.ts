export type RandomSource = () => number;

// FNV-1a, 32-bit
function hashSeed(seed: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < seed.length; i += 1) {
    h ^= seed.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/**
 * Seedable uniform source in [0, 1). Linear congruential, so runs with the same seed
 * draw the same sequence. Falls back to Math.random when no seed is given.
 */
export function createRng(seed?: string | number): RandomSource {
  if (seed === undefined) {
    return Math.random;
  }
  let state = typeof seed === 'number' ? seed >>> 0 : hashSeed(seed);
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 4294967296;
  };
}

export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + (max - min) * rng();
}

// Box-Muller transform
export function normal(rng: RandomSource, mean: number, std: number): number {
  if (std === 0) {
    return mean;
  }
  const u1 = Math.max(rng(), Number.EPSILON);
  const u2 = rng();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + std * z;
}

export function pick<T>(rng: RandomSource, items: readonly T[]): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  return items[Math.min(items.length - 1, Math.floor(rng() * items.length))];
}
