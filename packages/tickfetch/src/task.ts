/**
 * tickfetch/task
 *
 * Single-shot resumable units of work. A task wraps a generator body; the
 * body runs only when `resume()` is called and stops at every awaiter it
 * yields. The awaiter decides when to continue it.
 *
 * @example
 * ```typescript
 * const task = createTask(function* () {
 *   const file = yield* awaitGet(scheduler, "http://localhost:5001/file1.txt");
 *   return file.ok ? file.value.byteLength : 0;
 * });
 * task.resume();
 * while (task.isInProgress()) scheduler.tick();
 * ```
 */

import { ContractViolationError, taskFailure, type TaskFailure } from "./errors";
import { err, ok, type Result } from "./result";

// =============================================================================
// Types
// =============================================================================

/**
 * A suspension point yielded by a task body.
 */
export interface Awaiter {
  /** True when the value is already available and no suspension is needed */
  awaitReady(): boolean;
  /**
   * Called once when the task suspends on this awaiter. `resume` must be
   * invoked exactly once, later, to continue the task.
   */
  awaitSuspend(resume: () => void): void;
}

export type TaskBody<T> = () => Generator<Awaiter, T, unknown>;

export type TaskState = "suspended" | "running" | "done";

// =============================================================================
// CoroutineTask
// =============================================================================

export class CoroutineTask<T = void> {
  private readonly body: TaskBody<T>;
  private iterator: Generator<Awaiter, T, unknown> | undefined;
  private current: TaskState = "suspended";
  private waitingOn: Awaiter | undefined;
  private destroyed = false;
  private outcome: Result<T, TaskFailure> | undefined;

  constructor(body: TaskBody<T>) {
    this.body = body;
  }

  get state(): TaskState {
    return this.current;
  }

  /** The body's return value once done, or the error it threw. */
  get result(): Result<T, TaskFailure> | undefined {
    return this.outcome;
  }

  /** True while suspended on an awaiter whose operation has not completed */
  get isWaiting(): boolean {
    return this.waitingOn !== undefined;
  }

  isInProgress(): boolean {
    return this.current !== "done";
  }

  /**
   * Run the body until its next suspension point or its end. Only valid on a
   * task that is suspended and not waiting on an awaiter.
   */
  resume(): void {
    if (this.destroyed) {
      throw new ContractViolationError("resume", "task has been destroyed");
    }
    if (this.current === "done") {
      throw new ContractViolationError("resume", "task has already completed");
    }
    if (this.current === "running") {
      throw new ContractViolationError("resume", "task is already running");
    }
    if (this.waitingOn !== undefined) {
      throw new ContractViolationError(
        "resume",
        "task is waiting on a pending operation; its awaiter resumes it"
      );
    }
    this.advance();
  }

  /**
   * Discard the task. Refused while an awaiter still holds a way back into
   * it, because that awaiter would later resume a discarded task.
   */
  destroy(): void {
    if (this.waitingOn !== undefined) {
      throw new ContractViolationError(
        "destroy",
        "task is suspended on a pending operation"
      );
    }
    this.destroyed = true;
    this.iterator = undefined;
  }

  private advance(): void {
    this.current = "running";
    const iterator = (this.iterator ??= this.body());

    for (;;) {
      let step: IteratorResult<Awaiter, T>;
      try {
        step = iterator.next();
      } catch (thrown) {
        this.finish(err(taskFailure(thrown)));
        throw thrown;
      }

      if (step.done) {
        this.finish(ok(step.value));
        return;
      }

      const awaiter = step.value;
      if (awaiter.awaitReady()) continue;

      this.current = "suspended";
      this.waitingOn = awaiter;
      try {
        awaiter.awaitSuspend(() => this.continueFrom(awaiter));
      } catch (thrown) {
        this.waitingOn = undefined;
        this.finish(err(taskFailure(thrown)));
        throw thrown;
      }
      return;
    }
  }

  private continueFrom(awaiter: Awaiter): void {
    if (this.waitingOn !== awaiter) {
      throw new ContractViolationError(
        "resume",
        "awaiter resumed a task that is not suspended on it"
      );
    }
    this.waitingOn = undefined;
    this.advance();
  }

  private finish(outcome: Result<T, TaskFailure>): void {
    this.current = "done";
    this.outcome = outcome;
    this.iterator = undefined;
  }
}

/**
 * Create a task. The body does not start until the first `resume()`.
 */
export function createTask<T>(body: TaskBody<T>): CoroutineTask<T> {
  return new CoroutineTask(body);
}
