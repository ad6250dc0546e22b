/** Uniform source in [0, 1). Injected so ticks can be replayed in tests. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error("Cannot pick from an empty list");
  }
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}
