import React, { useEffect } from "react";
import { GameHeader } from "./GameHeader";
import { PuzzleGrid } from "./PuzzleGrid";
import { GameActions } from "./GameActions";
import { ResultOverlay } from "./ResultOverlay";
import {
  useSnapshot,
  useGameError,
  useEditCell,
  useSubmit,
  useResetBoard,
  useRequestHint,
  useAdvanceOrRetry,
  useQuitToMenu,
  useClearError,
} from "../store/puzzleStore";

export const GameScreen: React.FC = () => {
  const snapshot = useSnapshot();
  const error = useGameError();

  const editCell = useEditCell();
  const submit = useSubmit();
  const resetBoard = useResetBoard();
  const requestHint = useRequestHint();
  const advanceOrRetry = useAdvanceOrRetry();
  const quitToMenu = useQuitToMenu();
  const clearError = useClearError();

  // Clear error after 3 seconds
  useEffect(() => {
    if (error) {
      const timer = setTimeout(() => {
        clearError();
      }, 3000);
      return () => clearTimeout(timer);
    }
  }, [error, clearError]);

  if (!snapshot) {
    return (
      <div className="flex h-screen items-center justify-center bg-indigo-950">
        <p className="text-white/70">Starting new game...</p>
      </div>
    );
  }

  const isFinished = snapshot.status !== "in-progress";

  return (
    <div className="relative flex min-h-screen flex-col items-center bg-gradient-to-b from-purple-900 to-indigo-900 px-5 py-3">
      <GameHeader
        score={snapshot.score}
        level={snapshot.level}
        timeLeft={snapshot.timeLeft}
        isTimeLow={snapshot.isTimeLow}
      />

      {error && (
        <div className="mt-2 w-full max-w-sm rounded border border-red-200 bg-red-50 p-2 text-center">
          <p className="text-sm font-medium text-red-800">{error}</p>
        </div>
      )}

      <div className="mt-4">
        <PuzzleGrid
          snapshot={snapshot}
          onEdit={editCell}
          disabled={isFinished}
        />
      </div>

      <div className="flex-1" />

      <GameActions
        canSubmit={snapshot.canSubmit}
        onSubmit={submit}
        onReset={resetBoard}
        onHint={requestHint}
      />

      <button
        type="button"
        onClick={quitToMenu}
        className="mt-3 text-xs text-white/60 hover:text-white"
      >
        Back to Menu
      </button>

      <ResultOverlay status={snapshot.status} onPlayAgain={advanceOrRetry} />
    </div>
  );
};
