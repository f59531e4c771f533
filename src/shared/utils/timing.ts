export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;
export type RandomSource = () => number;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Uniform jitter in `[min, max)` milliseconds.
 */
export function jitter(range: { min: number; max: number; }, random: RandomSource = Math.random): number {
  return range.min + random() * (range.max - range.min);
}
