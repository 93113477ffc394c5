export type RngState = {
  seed: number;
};

// Simple LCG so a seeded arena generates the same world every time.
export function createRng(seed: number): RngState {
  return { seed: seed >>> 0 };
}

/** Uniform in [0, 1). */
export function nextFloat(rng: RngState): number {
  // LCG parameters (Numerical Recipes)
  rng.seed = (rng.seed * 1664525 + 1013904223) >>> 0;
  return rng.seed / 0x100000000;
}

export function nextRange(rng: RngState, min: number, max: number): number {
  return min + nextFloat(rng) * (max - min);
}

export function nextInt(rng: RngState, min: number, max: number): number {
  return Math.floor(nextRange(rng, min, max + 1));
}

export function pick<T>(rng: RngState, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[nextInt(rng, 0, items.length - 1)];
}
