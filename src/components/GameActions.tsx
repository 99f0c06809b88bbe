import React from "react";
import { clsx } from "clsx";

interface GameActionsProps {
  canSubmit: boolean;
  onSubmit: () => void;
  onReset: () => void;
  onHint: () => void;
}

export const GameActions: React.FC<GameActionsProps> = ({
  canSubmit,
  onSubmit,
  onReset,
  onHint,
}) => {
  return (
    <div className="w-full max-w-sm space-y-3">
      <button
        type="button"
        onClick={onSubmit}
        disabled={!canSubmit}
        className={clsx(
          "h-14 w-full rounded-full text-lg font-black transition-colors",
          canSubmit
            ? "bg-green-600 text-white shadow-lg hover:bg-green-700"
            : "cursor-not-allowed bg-gray-500/30 text-white/50"
        )}
      >
        SUBMIT
      </button>

      <div className="flex space-x-3">
        <button
          type="button"
          onClick={onReset}
          className="h-12 flex-1 rounded-full border-2 border-white/50 text-sm text-white hover:bg-white/10"
        >
          ↻ RESET
        </button>
        <button
          type="button"
          onClick={onHint}
          className="h-12 flex-1 rounded-full border-2 border-white/50 text-sm text-white hover:bg-white/10"
        >
          ⓘ HINT
        </button>
      </div>
    </div>
  );
};
