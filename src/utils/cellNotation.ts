import { GRID_SIZE, isCellIndex } from "../types/game";

const COLUMN_LETTERS = ["A", "B", "C"] as const;

/**
 * Spreadsheet-style label for a cell
 * @param index - Cell index (0-8)
 * @returns Column letter plus 1-based row (e.g., "A1", "C2"), or "" if out of range
 */
export function cellLabel(index: number): string {
  if (!isCellIndex(index)) {
    return "";
  }
  const row = Math.floor(index / GRID_SIZE);
  const col = index % GRID_SIZE;
  return `${COLUMN_LETTERS[col]}${row + 1}`;
}

/**
 * Format remaining seconds as mm:ss
 */
export function formatTime(seconds: number): string {
  const s = Math.max(0, Math.floor(seconds));
  const mm = Math.floor(s / 60);
  const ss = s % 60;
  return `${mm.toString().padStart(2, "0")}:${ss.toString().padStart(2, "0")}`;
}
