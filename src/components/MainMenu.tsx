import React from "react";
import { Instructions } from "./Instructions";

export interface MainMenuProps {
  onPlay: () => void;
}

export const MainMenu: React.FC<MainMenuProps> = ({ onPlay }) => {
  return (
    <div className="flex h-screen items-center justify-center bg-gray-50">
      <div className="mx-4 w-full max-w-md rounded-lg bg-white p-8 shadow-lg">
        <div className="mb-6 text-center">
          <h1 className="mb-2 text-3xl font-bold text-gray-900">
            {__APP_TITLE__}
          </h1>
          <p className="text-gray-600">
            Fill the grid so every row and column hits its target
          </p>
        </div>

        <Instructions />

        <button
          type="button"
          onClick={onPlay}
          className="mt-6 w-full rounded-lg bg-blue-600 px-6 py-3 text-lg font-medium text-white transition-colors hover:bg-blue-700"
        >
          Play
        </button>
      </div>
    </div>
  );
};
