import { create } from "zustand";
import type { StateCreator } from "zustand";
import { devtools } from "zustand/middleware";
import type { SessionSnapshot } from "../types/game";
import { SessionController } from "../lib/sessionController";
import type { SessionOptions } from "../lib/sessionController";
import { readEnvConfig } from "../config/gameConfig";

export type Screen = "menu" | "playing";

type RejectionReason =
  | "invalid-index"
  | "invalid-value"
  | "round-over"
  | "incomplete"
  | "board-full"
  | "round-in-progress";

const REJECTION_MESSAGES: Record<RejectionReason, string> = {
  "invalid-index": "That cell is not on the grid",
  "invalid-value": "Cells only take a single digit from 1 to 9",
  "round-over": "This round is already over",
  incomplete: "Fill every cell with a different digit before submitting",
  "board-full": "There is no empty cell left to reveal",
  "round-in-progress": "Finish the current round first",
};

interface PuzzleStore {
  // Session state
  session: SessionController | null;
  snapshot: SessionSnapshot | null;

  // UI state
  error: string | null;
  currentScreen: Screen;

  // Actions
  startGame: (options?: SessionOptions) => void;
  editCell: (index: number, value: string) => void;
  submit: () => void;
  resetBoard: () => void;
  requestHint: () => void;
  advanceOrRetry: () => void;
  quitToMenu: () => void;
  clearError: () => void;
}

const createPuzzleStore: StateCreator<
  PuzzleStore,
  [["zustand/devtools", never]]
> = (set, get) => {
  const reject = (action: string, reason: RejectionReason) => {
    console.warn(`Rejected ${action}:`, reason);
    set({ error: REJECTION_MESSAGES[reason] });
  };

  return {
    // Initial state
    session: null,
    snapshot: null,
    error: null,
    currentScreen: "menu",

    // Actions
    startGame: (options?: SessionOptions) => {
      get().session?.dispose();

      const session = new SessionController({
        ...options,
        config: { ...readEnvConfig(import.meta.env), ...options?.config },
      });

      session.subscribe((snapshot) => {
        const previous = get().snapshot;
        if (previous && previous.status !== snapshot.status) {
          console.log(
            `Round ${snapshot.generation} ${snapshot.status} (level ${snapshot.level}, score ${snapshot.score})`
          );
        }
        set({ snapshot });
      });

      const snapshot = session.getSnapshot();
      console.log(`Session started at level ${snapshot.level}`);
      set({
        session,
        snapshot,
        error: null,
        currentScreen: "playing",
      });
    },

    editCell: (index: number, value: string) => {
      const { session } = get();
      if (!session) {
        set({ error: "No active game" });
        return;
      }
      const result = session.editCell(index, value);
      if (!result.accepted) {
        reject("edit", result.reason);
        return;
      }
      set({ error: null });
    },

    submit: () => {
      const { session } = get();
      if (!session) {
        set({ error: "No active game" });
        return;
      }
      const result = session.submit();
      if (!result.accepted) {
        reject("submit", result.reason);
        return;
      }
      if (result.outcome === "mismatch") {
        console.log("Submitted totals do not match", {
          rows: result.wrongRows,
          cols: result.wrongCols,
        });
      }
      set({ error: null });
    },

    resetBoard: () => {
      const { session } = get();
      if (!session) {
        get().startGame();
        return;
      }
      session.reset();
      set({ error: null });
    },

    requestHint: () => {
      const { session } = get();
      if (!session) {
        set({ error: "No active game" });
        return;
      }
      const result = session.hint();
      if (!result.accepted) {
        reject("hint", result.reason);
        return;
      }
      set({ error: null });
    },

    advanceOrRetry: () => {
      const { session } = get();
      if (!session) {
        get().startGame();
        return;
      }
      const result = session.advanceOrRetry();
      if (!result.accepted) {
        reject("play again", result.reason);
        return;
      }
      set({ error: null });
    },

    quitToMenu: () => {
      get().session?.dispose();
      set({
        session: null,
        snapshot: null,
        error: null,
        currentScreen: "menu",
      });
    },

    clearError: () => {
      set({ error: null });
    },
  };
};

export const usePuzzleStore = create<PuzzleStore>()(
  devtools(createPuzzleStore, {
    name: "sum-grid",
    enabled: import.meta.env.DEV,
  })
);

// Selector hooks
export const useSnapshot = () => usePuzzleStore((state) => state.snapshot);
export const useGameError = () => usePuzzleStore((state) => state.error);
export const useCurrentScreen = () =>
  usePuzzleStore((state) => state.currentScreen);

// Action hooks
export const useStartGame = () => usePuzzleStore((state) => state.startGame);
export const useEditCell = () => usePuzzleStore((state) => state.editCell);
export const useSubmit = () => usePuzzleStore((state) => state.submit);
export const useResetBoard = () => usePuzzleStore((state) => state.resetBoard);
export const useRequestHint = () =>
  usePuzzleStore((state) => state.requestHint);
export const useAdvanceOrRetry = () =>
  usePuzzleStore((state) => state.advanceOrRetry);
export const useQuitToMenu = () => usePuzzleStore((state) => state.quitToMenu);
export const useClearError = () => usePuzzleStore((state) => state.clearError);
