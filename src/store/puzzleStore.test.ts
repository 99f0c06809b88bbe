import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Puzzle } from "../types/game";
import { usePuzzleStore } from "./puzzleStore";

const SOLUTION = [3, 1, 8, 9, 4, 2, 5, 7, 6];

const fixedPuzzle = (): Puzzle => ({
  solution: SOLUTION,
  rowTargets: [12, 15, 18],
  colTargets: [17, 12, 16],
  prefilled: [],
});

const startFixedGame = () =>
  usePuzzleStore
    .getState()
    .startGame({ autoTick: false, createPuzzle: fixedPuzzle });

describe("puzzleStore", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    usePuzzleStore.getState().quitToMenu();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("starts on the menu with no session", () => {
    const state = usePuzzleStore.getState();
    expect(state.currentScreen).toBe("menu");
    expect(state.snapshot).toBeNull();
  });

  it("reports edits made before a game exists", () => {
    usePuzzleStore.getState().editCell(0, "1");
    expect(usePuzzleStore.getState().error).toBe("No active game");
  });

  it("opens the playing screen with a fresh snapshot", () => {
    startFixedGame();
    const state = usePuzzleStore.getState();
    expect(state.currentScreen).toBe("playing");
    expect(state.snapshot?.score).toBe(120);
    expect(state.snapshot?.rowTargets).toEqual([12, 15, 18]);
  });

  it("mirrors session changes into the snapshot", () => {
    startFixedGame();
    usePuzzleStore.getState().editCell(4, "4");
    expect(usePuzzleStore.getState().snapshot?.cells[4]).toBe("4");
  });

  it("turns rejected intents into messages", () => {
    startFixedGame();
    const { editCell, submit, advanceOrRetry } = usePuzzleStore.getState();

    editCell(0, "x");
    expect(usePuzzleStore.getState().error).toBe(
      "Cells only take a single digit from 1 to 9"
    );

    submit();
    expect(usePuzzleStore.getState().error).toBe(
      "Fill every cell with a different digit before submitting"
    );

    advanceOrRetry();
    expect(usePuzzleStore.getState().error).toBe(
      "Finish the current round first"
    );
  });

  it("clears the message on the next accepted edit", () => {
    startFixedGame();
    usePuzzleStore.getState().editCell(0, "x");
    usePuzzleStore.getState().editCell(0, "3");
    expect(usePuzzleStore.getState().error).toBeNull();
  });

  it("clears the message when a hint is revealed", () => {
    startFixedGame();
    usePuzzleStore.getState().submit();
    expect(usePuzzleStore.getState().error).toBe(
      "Fill every cell with a different digit before submitting"
    );

    usePuzzleStore.getState().requestHint();
    expect(usePuzzleStore.getState().error).toBeNull();
    expect(
      usePuzzleStore.getState().snapshot?.cells.filter((c) => c !== "")
    ).toHaveLength(1);
  });

  it("follows the session through a win and into the next level", () => {
    startFixedGame();
    const { editCell } = usePuzzleStore.getState();
    SOLUTION.forEach((v, i) => editCell(i, String(v)));

    vi.advanceTimersByTime(500);
    expect(usePuzzleStore.getState().snapshot?.status).toBe("success");

    usePuzzleStore.getState().advanceOrRetry();
    const snapshot = usePuzzleStore.getState().snapshot;
    expect(snapshot?.level).toBe(2);
    expect(snapshot?.score).toBe(170);
  });

  it("returns to the menu and drops the session", () => {
    startFixedGame();
    usePuzzleStore.getState().quitToMenu();
    const state = usePuzzleStore.getState();
    expect(state.currentScreen).toBe("menu");
    expect(state.session).toBeNull();
    expect(state.snapshot).toBeNull();
  });
});
