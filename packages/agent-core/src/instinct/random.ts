export type RandomSource = () => number;

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random();
}

/** Inclusive on both ends. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function pick<T>(random: RandomSource, options: readonly T[]): T {
  const index = Math.min(options.length - 1, Math.floor(random() * options.length));
  return options[index];
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}
