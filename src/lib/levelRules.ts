import { GRID_SIZE } from "../types/game";

// Cells handed out for free at levels 1..4; none from level 5 on
const PREFILL_BY_LEVEL: readonly number[] = [4, 3, 2, 1];

/**
 * Number of cells pre-filled with their correct digit at the start of a round
 * @param level - Current level (1-based)
 */
export function prefillCountForLevel(level: number): number {
  if (level < 1) {
    return PREFILL_BY_LEVEL[0];
  }
  return PREFILL_BY_LEVEL[level - 1] ?? 0;
}

/**
 * Whether correct entries in a row may be shown as correct at this level.
 * Levels 1-5 show every row, 6 only the top and bottom rows, 7 only the
 * middle row, 8 and above none.
 */
export function isRowHighlightAllowed(level: number, row: number): boolean {
  if (row < 0 || row >= GRID_SIZE) {
    return false;
  }
  if (level <= 5) {
    return true;
  }
  if (level === 6) {
    return row === 0 || row === GRID_SIZE - 1;
  }
  if (level === 7) {
    return row === 1;
  }
  return false;
}
