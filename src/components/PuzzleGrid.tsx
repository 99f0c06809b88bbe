import React from "react";
import { clsx } from "clsx";
import type { SessionSnapshot } from "../types/game";
import { GRID_SIZE, toIndex } from "../types/game";
import { GridCell } from "./GridCell";

interface PuzzleGridProps {
  snapshot: SessionSnapshot;
  onEdit: (index: number, value: string) => void;
  disabled?: boolean;
}

const LINES = Array.from({ length: GRID_SIZE }, (_, i) => i);

export const PuzzleGrid: React.FC<PuzzleGridProps> = React.memo(
  ({ snapshot, onEdit, disabled = false }) => {
    const {
      cells,
      rowTargets,
      colTargets,
      rowMismatches,
      colMismatches,
      duplicateIndices,
      correctCells,
    } = snapshot;

    return (
      <div className="flex flex-col items-center" role="grid" aria-label="Sum grid">
        <div className="flex items-center space-x-3">
          <div className="flex flex-col space-y-2">
            {LINES.map((row) => (
              <div key={row} className="flex space-x-2" role="row">
                {LINES.map((col) => {
                  const index = toIndex(row, col);
                  return (
                    <GridCell
                      key={index}
                      index={index}
                      value={cells[index]}
                      isDuplicate={duplicateIndices.includes(index)}
                      isCorrect={correctCells[index]}
                      onChange={onEdit}
                      disabled={disabled}
                    />
                  );
                })}
              </div>
            ))}
          </div>

          {/* Row targets */}
          <div className="flex flex-col space-y-2">
            {rowTargets.map((target, row) => (
              <span
                key={row}
                data-testid={`row-target-${row}`}
                className={clsx(
                  "flex h-16 items-center text-lg font-bold",
                  rowMismatches[row] ? "text-red-400" : "text-white"
                )}
              >
                = {target}
              </span>
            ))}
          </div>
        </div>

        {/* Column targets */}
        <div className="mt-3 flex space-x-2 pr-12">
          {colTargets.map((target, col) => (
            <div key={col} className="flex w-16 flex-col items-center">
              <span className="text-sm text-white/50">+</span>
              <span className="my-0.5 h-px w-9 bg-white/30" />
              <span
                data-testid={`col-target-${col}`}
                className={clsx(
                  "text-lg font-bold",
                  colMismatches[col] ? "text-red-400" : "text-white"
                )}
              >
                {target}
              </span>
            </div>
          ))}
        </div>
      </div>
    );
  }
);
