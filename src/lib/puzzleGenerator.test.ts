import { describe, expect, it } from "vitest";
import { DIGIT_TOTAL } from "../types/game";
import {
  computeTargets,
  generatePuzzle,
  isValidSolution,
  shuffle,
} from "./puzzleGenerator";

// Deterministic stream cycling through fixed values
const sequence = (...values: number[]) => {
  let i = 0;
  return () => values[i++ % values.length];
};

const sum = (values: readonly number[]) => values.reduce((a, b) => a + b, 0);

describe("shuffle", () => {
  it("keeps the order when every draw picks the last slot", () => {
    expect(shuffle([1, 2, 3, 4, 5, 6, 7, 8, 9], () => 0.999999)).toEqual([
      1, 2, 3, 4, 5, 6, 7, 8, 9,
    ]);
  });

  it("rotates left when every draw picks the first slot", () => {
    expect(shuffle([1, 2, 3, 4, 5, 6, 7, 8, 9], () => 0)).toEqual([
      2, 3, 4, 5, 6, 7, 8, 9, 1,
    ]);
  });

  it("does not mutate its input", () => {
    const input = [1, 2, 3];
    shuffle(input, () => 0);
    expect(input).toEqual([1, 2, 3]);
  });
});

describe("computeTargets", () => {
  it("sums rows and columns of the grid", () => {
    expect(computeTargets([2, 7, 6, 9, 5, 1, 4, 3, 8])).toEqual({
      rowTargets: [15, 15, 15],
      colTargets: [15, 15, 15],
    });
  });

  it("handles an arbitrary permutation", () => {
    expect(computeTargets([3, 1, 8, 9, 4, 2, 5, 7, 6])).toEqual({
      rowTargets: [12, 15, 18],
      colTargets: [17, 12, 16],
    });
  });
});

describe("isValidSolution", () => {
  it("accepts a permutation of 1..9", () => {
    expect(isValidSolution([9, 8, 7, 6, 5, 4, 3, 2, 1])).toBe(true);
  });

  it("rejects repeats, wrong lengths and out of range values", () => {
    expect(isValidSolution([1, 1, 3, 4, 5, 6, 7, 8, 9])).toBe(false);
    expect(isValidSolution([1, 2, 3, 4, 5, 6, 7, 8])).toBe(false);
    expect(isValidSolution([0, 2, 3, 4, 5, 6, 7, 8, 9])).toBe(false);
  });
});

describe("generatePuzzle", () => {
  it("always produces a permutation whose targets add up to 45", () => {
    for (let run = 0; run < 50; run++) {
      const puzzle = generatePuzzle(1);
      expect(isValidSolution(puzzle.solution)).toBe(true);
      expect(sum(puzzle.rowTargets)).toBe(DIGIT_TOTAL);
      expect(sum(puzzle.colTargets)).toBe(DIGIT_TOTAL);
      expect(computeTargets(puzzle.solution)).toEqual({
        rowTargets: puzzle.rowTargets,
        colTargets: puzzle.colTargets,
      });
    }
  });

  it("derives targets from the shuffled solution", () => {
    const puzzle = generatePuzzle(5, () => 0.999999);
    expect(puzzle.solution).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(puzzle.rowTargets).toEqual([6, 15, 24]);
    expect(puzzle.colTargets).toEqual([12, 15, 18]);
    expect(puzzle.prefilled).toEqual([]);
  });

  it("pre-fills fewer cells as the level rises", () => {
    expect(generatePuzzle(1).prefilled).toHaveLength(4);
    expect(generatePuzzle(2).prefilled).toHaveLength(3);
    expect(generatePuzzle(3).prefilled).toHaveLength(2);
    expect(generatePuzzle(4).prefilled).toHaveLength(1);
    expect(generatePuzzle(5).prefilled).toHaveLength(0);
    expect(generatePuzzle(12).prefilled).toHaveLength(0);
  });

  it("picks distinct, sorted pre-fill indices", () => {
    const { prefilled } = generatePuzzle(1, sequence(0.3, 0.7, 0.1, 0.9));
    expect(new Set(prefilled).size).toBe(4);
    expect([...prefilled].sort((a, b) => a - b)).toEqual(prefilled);
    prefilled.forEach((i) => {
      expect(i).toBeGreaterThanOrEqual(0);
      expect(i).toBeLessThan(9);
    });
  });
});
