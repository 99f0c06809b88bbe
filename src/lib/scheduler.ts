export type TaskKey = "tick" | "settle" | "invalidate";

type TimerId = ReturnType<typeof setTimeout>;

interface ArmedTask {
  id: TimerId;
  repeating: boolean;
}

/**
 * Keyed timers for a single game session.
 *
 * Each key holds at most one armed timer; arming a key again replaces the
 * previous one. Callbacks remember the generation they were armed in and are
 * dropped if `advance()` has been called since, so a late timer can never
 * touch a board that replaced the one it was meant for.
 */
export class TaskScheduler {
  private generation = 0;
  private readonly tasks = new Map<TaskKey, ArmedTask>();

  get currentGeneration(): number {
    return this.generation;
  }

  /**
   * Cancel every armed task and start a new generation
   * @returns The new generation number
   */
  advance(): number {
    this.cancelAll();
    this.generation += 1;
    return this.generation;
  }

  schedule(key: TaskKey, delayMs: number, task: () => void): void {
    this.cancel(key);
    const armedIn = this.generation;
    const id = setTimeout(() => {
      this.tasks.delete(key);
      if (armedIn === this.generation) {
        task();
      }
    }, delayMs);
    this.tasks.set(key, { id, repeating: false });
  }

  repeat(key: TaskKey, intervalMs: number, task: () => void): void {
    this.cancel(key);
    const armedIn = this.generation;
    const id = setInterval(() => {
      if (armedIn !== this.generation) {
        clearInterval(id);
        return;
      }
      task();
    }, intervalMs);
    this.tasks.set(key, { id, repeating: true });
  }

  cancel(key: TaskKey): boolean {
    const armed = this.tasks.get(key);
    if (!armed) {
      return false;
    }
    if (armed.repeating) {
      clearInterval(armed.id);
    } else {
      clearTimeout(armed.id);
    }
    this.tasks.delete(key);
    return true;
  }

  isPending(key: TaskKey): boolean {
    return this.tasks.has(key);
  }

  cancelAll(): void {
    for (const key of [...this.tasks.keys()]) {
      this.cancel(key);
    }
  }
}
