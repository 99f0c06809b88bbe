// Core game types for Sum Grid
export const DIGITS = ["1", "2", "3", "4", "5", "6", "7", "8", "9"] as const;
export type Digit = (typeof DIGITS)[number];

// An entry cell is either empty or holds one digit
export type CellValue = Digit | "";

// Permutation of 1..9, addressed by row * 3 + col
export type Solution = readonly number[];

export type Targets = readonly [number, number, number];

export interface Puzzle {
  solution: Solution;
  rowTargets: Targets;
  colTargets: Targets;
  // Indices seeded with their solution digit before play starts
  prefilled: number[];
}

// Pending collision between two cells holding the same digit
export interface DuplicateHighlight {
  indices: [number, number];
  // Most recently written cell, reset to empty when the highlight expires
  clearIndex: number;
  expiresAt: number;
}

// Round status
export type SessionStatus = "in-progress" | "success" | "game-over";

export type RandomSource = () => number;

export type EditRejection = "invalid-index" | "invalid-value" | "round-over";

export type EditResult =
  | { accepted: true; duplicateOf?: number }
  | { accepted: false; reason: EditRejection };

export type SubmitResult =
  | { accepted: true; outcome: "success" }
  | {
      accepted: true;
      outcome: "mismatch";
      wrongRows: number[];
      wrongCols: number[];
    }
  | { accepted: false; reason: "incomplete" | "round-over" };

export type HintResult =
  | { accepted: true; index: number }
  | { accepted: false; reason: "board-full" | "round-over" };

export type AdvanceResult =
  | { accepted: true; level: number }
  | { accepted: false; reason: "round-in-progress" };

// Immutable view handed to observers after every change
export interface SessionSnapshot {
  generation: number;
  status: SessionStatus;
  score: number;
  level: number;
  timeLeft: number;
  isTimeLow: boolean;
  showErrors: boolean;
  cells: readonly CellValue[];
  rowTargets: Targets;
  colTargets: Targets;
  rowSums: Targets;
  colSums: Targets;
  rowMismatches: readonly boolean[];
  colMismatches: readonly boolean[];
  duplicateIndices: readonly number[];
  correctCells: readonly boolean[];
  canSubmit: boolean;
}

// Constants
export const GRID_SIZE = 3;
export const TOTAL_CELLS = GRID_SIZE * GRID_SIZE;
export const DIGIT_TOTAL = 45;

export function isDigit(value: string): value is Digit {
  return DIGITS.some((digit) => digit === value);
}

export function toIndex(row: number, col: number): number {
  return row * GRID_SIZE + col;
}

export function isCellIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < TOTAL_CELLS;
}
