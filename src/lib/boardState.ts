import type {
  CellValue,
  Digit,
  DuplicateHighlight,
  EditResult,
  RandomSource,
  Solution,
  Targets,
} from "../types/game";
import {
  DIGITS,
  GRID_SIZE,
  TOTAL_CELLS,
  isCellIndex,
  isDigit,
  toIndex,
} from "../types/game";
import type { TaskScheduler } from "./scheduler";

export interface BoardStateOptions {
  scheduler: TaskScheduler;
  invalidationDelayMs: number;
  // Runs after an expired duplicate has been wiped from the grid
  onInvalidate?: (index: number) => void;
  now?: () => number;
}

const digitFor = (value: number): Digit => DIGITS[value - 1];

const numericValue = (value: CellValue): number =>
  value === "" ? 0 : Number(value);

/**
 * The 3x3 entry grid of one round.
 *
 * Writes never enforce uniqueness. A digit that already sits in another cell
 * is still written, and the pair is remembered until the invalidation delay
 * runs out, at which point the newer entry is wiped.
 */
export class BoardState {
  private readonly cells: CellValue[] = Array.from(
    { length: TOTAL_CELLS },
    (): CellValue => ""
  );
  private pending: DuplicateHighlight | null = null;
  private readonly options: BoardStateOptions;

  constructor(options: BoardStateOptions) {
    this.options = options;
  }

  /**
   * Write a digit (or "" to clear) into a cell
   * @returns Rejection reason, or the index of the colliding cell if any
   */
  setCell(index: number, value: string): EditResult {
    if (!isCellIndex(index)) {
      return { accepted: false, reason: "invalid-index" };
    }
    if (value === "") {
      return this.clearCell(index);
    }
    if (!isDigit(value)) {
      return { accepted: false, reason: "invalid-value" };
    }

    const existing = this.cells.findIndex(
      (cell, i) => i !== index && cell === value
    );
    this.cells[index] = value;

    if (existing !== -1) {
      this.markDuplicate(existing, index);
      return { accepted: true, duplicateOf: existing };
    }

    this.reconcileDuplicate();
    return { accepted: true };
  }

  clearCell(index: number): EditResult {
    if (!isCellIndex(index)) {
      return { accepted: false, reason: "invalid-index" };
    }
    this.cells[index] = "";
    this.reconcileDuplicate();
    return { accepted: true };
  }

  currentValue(index: number): CellValue {
    return isCellIndex(index) ? this.cells[index] : "";
  }

  values(): readonly CellValue[] {
    return this.cells.slice();
  }

  /**
   * Seed cells with their solution digit before play starts
   */
  seed(solution: Solution, indices: readonly number[]): void {
    for (const index of indices) {
      if (isCellIndex(index)) {
        this.cells[index] = digitFor(solution[index]);
      }
    }
  }

  rowSum(row: number): number {
    let total = 0;
    for (let col = 0; col < GRID_SIZE; col++) {
      total += numericValue(this.currentValue(toIndex(row, col)));
    }
    return total;
  }

  colSum(col: number): number {
    let total = 0;
    for (let row = 0; row < GRID_SIZE; row++) {
      total += numericValue(this.currentValue(toIndex(row, col)));
    }
    return total;
  }

  rowSums(): Targets {
    return [this.rowSum(0), this.rowSum(1), this.rowSum(2)];
  }

  colSums(): Targets {
    return [this.colSum(0), this.colSum(1), this.colSum(2)];
  }

  // Every cell filled and no digit used twice
  isComplete(): boolean {
    return (
      this.cells.every((cell) => cell !== "") &&
      new Set(this.cells).size === TOTAL_CELLS
    );
  }

  isFullyCorrect(solution: Solution): boolean {
    return this.cells.every(
      (cell, i) => cell !== "" && Number(cell) === solution[i]
    );
  }

  isCellCorrect(index: number, solution: Solution): boolean {
    const cell = this.currentValue(index);
    return cell !== "" && Number(cell) === solution[index];
  }

  /**
   * Fill one random empty cell with its solution digit
   * @returns The filled index, or null when the grid has no empty cell
   */
  revealHint(
    solution: Solution,
    random: RandomSource = Math.random
  ): number | null {
    const empty: number[] = [];
    this.cells.forEach((cell, i) => {
      if (cell === "") empty.push(i);
    });
    if (empty.length === 0) {
      return null;
    }

    const pick = Math.min(empty.length - 1, Math.floor(random() * empty.length));
    const index = empty[pick];
    this.cells[index] = digitFor(solution[index]);
    return index;
  }

  get duplicate(): DuplicateHighlight | null {
    if (!this.pending) {
      return null;
    }
    return { ...this.pending, indices: [...this.pending.indices] };
  }

  duplicateIndices(): number[] {
    return this.pending ? [...this.pending.indices] : [];
  }

  dispose(): void {
    this.dropDuplicate();
  }

  private markDuplicate(existing: number, written: number): void {
    const { scheduler, invalidationDelayMs, now = Date.now } = this.options;
    scheduler.schedule("invalidate", invalidationDelayMs, () =>
      this.expireDuplicate()
    );
    this.pending = {
      indices: [existing, written],
      clearIndex: written,
      expiresAt: now() + invalidationDelayMs,
    };
  }

  // A pair that no longer holds the same digit needs no forced clear
  private reconcileDuplicate(): void {
    if (!this.pending) {
      return;
    }
    const [a, b] = this.pending.indices;
    if (this.cells[a] === "" || this.cells[a] !== this.cells[b]) {
      this.dropDuplicate();
    }
  }

  private dropDuplicate(): void {
    if (this.pending) {
      this.options.scheduler.cancel("invalidate");
      this.pending = null;
    }
  }

  private expireDuplicate(): void {
    if (!this.pending) {
      return;
    }
    const index = this.pending.clearIndex;
    this.cells[index] = "";
    this.pending = null;
    this.options.onInvalidate?.(index);
  }
}
