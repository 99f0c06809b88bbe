import type { Puzzle, RandomSource, Solution, Targets } from "../types/game";
import { TOTAL_CELLS, toIndex } from "../types/game";
import { prefillCountForLevel } from "./levelRules";

function randomIndex(random: RandomSource, bound: number): number {
  return Math.min(bound - 1, Math.floor(random() * bound));
}

/**
 * Fisher-Yates shuffle on a copy of the input
 * @param items - Values to shuffle
 * @param random - Source of numbers in [0, 1)
 */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const out = items.slice();
  for (let i = out.length - 1; i > 0; i--) {
    const j = randomIndex(random, i + 1);
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

/**
 * Row and column totals of a solution grid
 * @param solution - Nine values addressed by row * 3 + col
 */
export function computeTargets(solution: Solution): {
  rowTargets: Targets;
  colTargets: Targets;
} {
  const line = (at: (i: number) => number): Targets => [at(0), at(1), at(2)];
  const sum = (indices: number[]) =>
    indices.reduce((total, idx) => total + solution[idx], 0);
  const across = (row: number) =>
    sum([0, 1, 2].map((col) => toIndex(row, col)));
  const down = (col: number) => sum([0, 1, 2].map((row) => toIndex(row, col)));

  return { rowTargets: line(across), colTargets: line(down) };
}

/**
 * Check that values are a permutation of 1..9
 */
export function isValidSolution(values: readonly number[]): boolean {
  if (values.length !== TOTAL_CELLS) {
    return false;
  }
  const seen = new Set(values);
  if (seen.size !== TOTAL_CELLS) {
    return false;
  }
  return values.every((v) => Number.isInteger(v) && v >= 1 && v <= 9);
}

/**
 * Build a new board for the given level
 * @param level - Level used to pick how many cells start filled
 * @param random - Source of numbers in [0, 1)
 * @returns Solution, its targets and the indices to seed
 */
export function generatePuzzle(
  level: number,
  random: RandomSource = Math.random
): Puzzle {
  const solution = shuffle(
    Array.from({ length: TOTAL_CELLS }, (_, i) => i + 1),
    random
  );
  const { rowTargets, colTargets } = computeTargets(solution);

  const prefillCount = prefillCountForLevel(level);
  const indices = Array.from({ length: TOTAL_CELLS }, (_, i) => i);
  const prefilled = shuffle(indices, random)
    .slice(0, prefillCount)
    .sort((a, b) => a - b);

  return { solution, rowTargets, colTargets, prefilled };
}
