import type { Level } from "./types.js";

export const LEVELS: readonly Level[] = Object.freeze([
  { scoreThreshold: 0, ticksPerSecond: 5 },
  { scoreThreshold: 50, ticksPerSecond: 8 },
  { scoreThreshold: 100, ticksPerSecond: 12 },
  { scoreThreshold: 150, ticksPerSecond: 15 },
]);

export function levelFor(score: number, levels: readonly Level[] = LEVELS): number {
  for (let i = levels.length - 1; i > 0; i--) {
    if (levels[i].scoreThreshold <= score) return i;
  }
  return 0;
}

export function isLevelIndex(index: number, levels: readonly Level[] = LEVELS): boolean {
  return Number.isInteger(index) && index >= 0 && index < levels.length;
}

export function ticksPerSecondFor(levelIndex: number, levels: readonly Level[] = LEVELS): number {
  return levels[levelIndex].ticksPerSecond;
}

/** Seconds between ticks at the given level. */
export function tickIntervalFor(levelIndex: number, levels: readonly Level[] = LEVELS): number {
  return 1 / ticksPerSecondFor(levelIndex, levels);
}
