/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

/**
 * Uniform pick. Returns undefined only for an empty list.
 */
export function pick<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) return undefined;
  const index = Math.floor(random() * items.length);
  // Clamp sources that misbehave at the edges (negative, >= 1, NaN)
  const safe = Number.isFinite(index) ? Math.min(Math.max(index, 0), items.length - 1) : 0;
  return items[safe];
}

/**
 * Deterministic generator for reproducible sessions (mulberry32).
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Replays fixed values in order, wrapping around. Handy for scripted tests.
 */
export function createSequenceRandom(values: readonly number[]): RandomSource {
  let position = 0;
  return () => {
    if (values.length === 0) return 0;
    const value = values[position % values.length];
    position += 1;
    return value;
  };
}
