import React from "react";
import type { SessionStatus } from "../types/game";

interface ResultOverlayProps {
  status: SessionStatus;
  onPlayAgain: () => void;
}

export const ResultOverlay: React.FC<ResultOverlayProps> = ({
  status,
  onPlayAgain,
}) => {
  if (status === "in-progress") {
    return null;
  }

  return (
    <div
      role="dialog"
      aria-modal="true"
      className="fixed inset-0 z-50 flex items-center justify-center bg-black/80"
    >
      <div className="flex flex-col items-center">
        <h2 className="text-5xl font-extrabold text-white">
          {status === "success" ? "VICTORY!" : "GAME OVER"}
        </h2>
        <button
          type="button"
          onClick={onPlayAgain}
          className="mt-6 rounded-lg bg-green-600 px-8 py-2 font-medium text-white hover:bg-green-700"
        >
          PLAY AGAIN
        </button>
      </div>
    </div>
  );
};
