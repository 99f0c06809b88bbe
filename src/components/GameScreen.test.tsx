import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { act, fireEvent, render, screen } from "@testing-library/react";
import type { Puzzle } from "../types/game";
import { usePuzzleStore } from "../store/puzzleStore";
import { GameScreen } from "./GameScreen";

const SOLUTION = [3, 1, 8, 9, 4, 2, 5, 7, 6];
const LABELS = ["A1", "B1", "C1", "A2", "B2", "C2", "A3", "B3", "C3"];

const fixedPuzzle = (): Puzzle => ({
  solution: SOLUTION,
  rowTargets: [12, 15, 18],
  colTargets: [17, 12, 16],
  prefilled: [],
});

describe("GameScreen", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    act(() => {
      usePuzzleStore
        .getState()
        .startGame({ autoTick: false, createPuzzle: fixedPuzzle });
    });
  });

  afterEach(() => {
    act(() => {
      usePuzzleStore.getState().quitToMenu();
    });
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  const type = (label: string, value: string) =>
    fireEvent.change(screen.getByLabelText(`Cell ${label}`), {
      target: { value },
    });

  it("shows score, timer and level", () => {
    render(<GameScreen />);
    expect(screen.getByText("Score").nextSibling).toHaveTextContent("120");
    expect(screen.getByRole("timer")).toHaveTextContent("05:00");
    expect(screen.getByText("Level").nextSibling).toHaveTextContent("1");
  });

  it("keeps submit disabled until the grid is complete", () => {
    render(<GameScreen />);
    const submit = screen.getByRole("button", { name: "SUBMIT" });
    expect(submit).toBeDisabled();

    SOLUTION.forEach((v, i) => type(LABELS[i], String(v)));
    expect(submit).toBeEnabled();
  });

  it("shows the victory overlay after a correct submission", () => {
    render(<GameScreen />);
    SOLUTION.forEach((v, i) => type(LABELS[i], String(v)));
    fireEvent.click(screen.getByRole("button", { name: "SUBMIT" }));

    expect(screen.getByText("VICTORY!")).toBeInTheDocument();
    expect(screen.getByText("Score").nextSibling).toHaveTextContent("170");

    fireEvent.click(screen.getByRole("button", { name: "PLAY AGAIN" }));
    expect(screen.queryByText("VICTORY!")).not.toBeInTheDocument();
    expect(screen.getByText("Level").nextSibling).toHaveTextContent("2");
  });

  it("shows and then clears an error for a rejected entry", () => {
    render(<GameScreen />);
    type("A1", "x");
    expect(
      screen.getByText("Cells only take a single digit from 1 to 9")
    ).toBeInTheDocument();

    act(() => {
      vi.advanceTimersByTime(3000);
    });
    expect(
      screen.queryByText("Cells only take a single digit from 1 to 9")
    ).not.toBeInTheDocument();
  });

  it("fills a cell when a hint is requested", () => {
    render(<GameScreen />);
    fireEvent.click(screen.getByRole("button", { name: /HINT/ }));
    const filled = screen
      .getAllByRole("textbox")
      .filter((el) => el instanceof HTMLInputElement && el.value !== "");
    expect(filled).toHaveLength(1);
  });
});
