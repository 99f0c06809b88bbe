import React from "react";
import { clsx } from "clsx";
import type { CellValue } from "../types/game";
import { cellLabel } from "../utils/cellNotation";

// The character the keystroke added, wherever the caret was
const typedCharacter = (next: string, previous: string): string =>
  (next.replace(previous, "") || next).slice(-1);

interface GridCellProps {
  index: number;
  value: CellValue;
  isDuplicate: boolean;
  isCorrect: boolean;
  onChange: (index: number, value: string) => void;
  disabled?: boolean;
}

export const GridCell: React.FC<GridCellProps> = React.memo(
  ({ index, value, isDuplicate, isCorrect, onChange, disabled = false }) => {
    const label = cellLabel(index);

    const handleChange = (event: React.ChangeEvent<HTMLInputElement>) => {
      // Typing over a filled cell replaces its digit
      onChange(index, typedCharacter(event.target.value, value));
    };

    return (
      <div
        className={clsx(
          "relative h-16 w-16 rounded-lg border-2 shadow-md bg-white",
          {
            "border-red-500 bg-red-50": isDuplicate,
            "border-green-500": isCorrect && !isDuplicate,
            "border-blue-500": value !== "" && !isCorrect && !isDuplicate,
            "border-gray-200": value === "" && !isDuplicate,
          }
        )}
      >
        {value === "" && (
          <span className="absolute left-1 top-1 text-[10px] text-gray-300">
            {label}
          </span>
        )}
        <input
          type="text"
          inputMode="numeric"
          aria-label={`Cell ${label}`}
          value={value}
          onChange={handleChange}
          disabled={disabled}
          className={clsx(
            "h-full w-full bg-transparent text-center text-2xl font-extrabold focus:outline-none",
            isDuplicate ? "text-red-600" : "text-slate-700"
          )}
        />
      </div>
    );
  }
);
