import type {
  AdvanceResult,
  EditResult,
  HintResult,
  Puzzle,
  RandomSource,
  SessionSnapshot,
  SessionStatus,
  SubmitResult,
  Targets,
} from "../types/game";
import { GRID_SIZE, TOTAL_CELLS } from "../types/game";
import type { GameConfig } from "../config/gameConfig";
import { resolveGameConfig } from "../config/gameConfig";
import { BoardState } from "./boardState";
import { isRowHighlightAllowed } from "./levelRules";
import { generatePuzzle } from "./puzzleGenerator";
import { TaskScheduler } from "./scheduler";

export type SnapshotListener = (snapshot: SessionSnapshot) => void;

export interface SessionOptions {
  config?: Partial<GameConfig>;
  random?: RandomSource;
  // Count down on the session's own timer; turn off to drive tick() by hand
  autoTick?: boolean;
  level?: number;
  score?: number;
  createPuzzle?: (level: number, random: RandomSource) => Puzzle;
}

const mismatches = (actual: Targets, expected: Targets): boolean[] =>
  actual.map((value, i) => value !== expected[i]);

const indicesOf = (flags: readonly boolean[]): number[] =>
  flags.flatMap((flag, i) => (flag ? [i] : []));

/**
 * One player's run of rounds: score, level, countdown and the live board.
 *
 * All intents are synchronous. Delayed effects (countdown, success settle,
 * duplicate invalidation) go through a TaskScheduler whose generation is
 * bumped on every start(), so nothing armed for an earlier board survives.
 */
export class SessionController {
  private readonly config: GameConfig;
  private readonly random: RandomSource;
  private readonly autoTick: boolean;
  private readonly createPuzzle: (level: number, random: RandomSource) => Puzzle;
  private readonly scheduler = new TaskScheduler();
  private readonly listeners = new Set<SnapshotListener>();

  private board: BoardState;
  private puzzle: Puzzle;
  private status: SessionStatus = "in-progress";
  private score: number;
  private level: number;
  private timeLeft: number;
  private showErrors = false;
  private snapshot: SessionSnapshot;

  constructor(options: SessionOptions = {}) {
    this.config = resolveGameConfig(options.config);
    this.random = options.random ?? Math.random;
    this.autoTick = options.autoTick ?? true;
    this.createPuzzle = options.createPuzzle ?? generatePuzzle;
    this.score = options.score ?? this.config.startingScore;
    this.level = Math.max(1, Math.floor(options.level ?? 1));
    this.timeLeft = this.config.roundSeconds;

    this.scheduler.advance();
    this.puzzle = this.createPuzzle(this.level, this.random);
    this.board = this.createBoard();
    this.beginRound();
    this.snapshot = this.buildSnapshot();
  }

  /**
   * Discard the current board and begin a fresh round
   * @param level - Level to play; defaults to the current one
   */
  start(level: number = this.level): void {
    this.board.dispose();
    this.scheduler.advance();

    this.level = Math.max(1, Math.floor(level));
    this.puzzle = this.createPuzzle(this.level, this.random);
    this.board = this.createBoard();
    this.beginRound();
    this.publish();
  }

  editCell(index: number, value: string): EditResult {
    if (this.status !== "in-progress") {
      return { accepted: false, reason: "round-over" };
    }
    const result = this.board.setCell(index, value);
    if (result.accepted) {
      this.checkAutoSuccess();
      this.publish();
    }
    return result;
  }

  hint(): HintResult {
    if (this.status !== "in-progress") {
      return { accepted: false, reason: "round-over" };
    }
    const index = this.board.revealHint(this.puzzle.solution, this.random);
    if (index === null) {
      return { accepted: false, reason: "board-full" };
    }
    this.checkAutoSuccess();
    this.publish();
    return { accepted: true, index };
  }

  /**
   * Check the six totals against the targets. Only a complete grid with no
   * repeated digit may be submitted.
   */
  submit(): SubmitResult {
    if (this.status !== "in-progress") {
      return { accepted: false, reason: "round-over" };
    }
    if (!this.board.isComplete()) {
      return { accepted: false, reason: "incomplete" };
    }

    const wrongRows = indicesOf(
      mismatches(this.board.rowSums(), this.puzzle.rowTargets)
    );
    const wrongCols = indicesOf(
      mismatches(this.board.colSums(), this.puzzle.colTargets)
    );

    if (wrongRows.length === 0 && wrongCols.length === 0) {
      this.succeed();
      this.publish();
      return { accepted: true, outcome: "success" };
    }

    this.showErrors = true;
    this.publish();
    return { accepted: true, outcome: "mismatch", wrongRows, wrongCols };
  }

  // Same level, new board, score untouched
  reset(): void {
    this.start(this.level);
  }

  /**
   * Leave a finished round: next level after a win, same level after a loss
   */
  advanceOrRetry(): AdvanceResult {
    if (this.status === "in-progress") {
      return { accepted: false, reason: "round-in-progress" };
    }
    const level = this.status === "success" ? this.level + 1 : this.level;
    this.start(level);
    return { accepted: true, level };
  }

  tick(): void {
    if (this.status !== "in-progress") {
      return;
    }
    this.timeLeft = Math.max(0, this.timeLeft - 1);
    if (this.timeLeft === 0) {
      this.status = "game-over";
      this.stopRoundTimers();
    }
    this.publish();
  }

  /**
   * Arm the settle delay while the grid matches the solution; disarm it as
   * soon as it no longer does. The transition re-checks on expiry.
   */
  checkAutoSuccess(): void {
    if (
      this.status !== "in-progress" ||
      !this.board.isFullyCorrect(this.puzzle.solution)
    ) {
      this.scheduler.cancel("settle");
      return;
    }
    // Already counting down from the moment the grid became correct
    if (this.scheduler.isPending("settle")) {
      return;
    }
    this.scheduler.schedule("settle", this.config.settleDelayMs, () => {
      if (
        this.status === "in-progress" &&
        this.board.isFullyCorrect(this.puzzle.solution)
      ) {
        this.succeed();
        this.publish();
      }
    });
  }

  getSnapshot(): SessionSnapshot {
    return this.snapshot;
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    this.board.dispose();
    this.scheduler.cancelAll();
    this.listeners.clear();
  }

  private beginRound(): void {
    this.board.seed(this.puzzle.solution, this.puzzle.prefilled);
    this.timeLeft = this.config.roundSeconds;
    this.status = "in-progress";
    this.showErrors = false;

    if (this.autoTick) {
      this.scheduler.repeat("tick", this.config.tickIntervalMs, () =>
        this.tick()
      );
    }
  }

  private createBoard(): BoardState {
    return new BoardState({
      scheduler: this.scheduler,
      invalidationDelayMs: this.config.invalidationDelayMs,
      onInvalidate: () => {
        this.checkAutoSuccess();
        this.publish();
      },
    });
  }

  private succeed(): void {
    this.status = "success";
    this.score += this.config.successAward;
    this.stopRoundTimers();
  }

  private stopRoundTimers(): void {
    this.scheduler.cancel("tick");
    this.scheduler.cancel("settle");
    this.board.dispose();
  }

  private publish(): void {
    this.snapshot = this.buildSnapshot();
    for (const listener of this.listeners) {
      listener(this.snapshot);
    }
  }

  private buildSnapshot(): SessionSnapshot {
    const { solution, rowTargets, colTargets } = this.puzzle;
    const rowSums = this.board.rowSums();
    const colSums = this.board.colSums();
    const correctCells = Array.from({ length: TOTAL_CELLS }, (_, i) =>
      this.board.isCellCorrect(i, solution) &&
      isRowHighlightAllowed(this.level, Math.floor(i / GRID_SIZE))
    );

    return Object.freeze({
      generation: this.scheduler.currentGeneration,
      status: this.status,
      score: this.score,
      level: this.level,
      timeLeft: this.timeLeft,
      isTimeLow: this.timeLeft < this.config.lowTimeThreshold,
      showErrors: this.showErrors,
      cells: this.board.values(),
      rowTargets,
      colTargets,
      rowSums,
      colSums,
      rowMismatches: this.showErrors
        ? mismatches(rowSums, rowTargets)
        : [false, false, false],
      colMismatches: this.showErrors
        ? mismatches(colSums, colTargets)
        : [false, false, false],
      duplicateIndices: this.board.duplicateIndices(),
      correctCells,
      canSubmit: this.status === "in-progress" && this.board.isComplete(),
    });
  }
}
