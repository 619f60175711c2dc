/**
 * tickfetch/scheduler
 *
 * Owns one engine session and turns many concurrent, non-blocking transfers
 * into a single completion-delivery point: `tick()`.
 *
 * @example
 * ```typescript
 * const scheduler = unwrap(AsyncScheduler.create(engine));
 * scheduler.register(handle, (h) => console.log("done", h.id));
 * while (scheduler.pendingCount > 0) scheduler.tick();
 * scheduler.destroy();
 * ```
 */

import type { EngineSession, TransferEngine, TransferHandle } from "./engine";
import { ContractViolationError, type SetupFailure } from "./errors";
import { err, ok, type Result } from "./result";

// =============================================================================
// Types
// =============================================================================

/** Invoked once, from inside `tick()`, when its transfer reaches a terminal state. */
export type CompletionCallback = (handle: TransferHandle) => void;

export type SchedulerEvent =
  | { type: "scheduler_open"; schedulerId: string; ts: number }
  | { type: "transfer_registered"; schedulerId: string; transferId: number; url?: string; ts: number }
  | {
      type: "transfer_complete";
      schedulerId: string;
      transferId: number;
      url: string;
      status: number;
      bytes: number;
      durationMs: number;
      ts: number;
    }
  | {
      type: "transfer_error";
      schedulerId: string;
      transferId: number;
      url: string;
      status: number;
      error: unknown;
      durationMs: number;
      ts: number;
    }
  | { type: "scheduler_destroyed"; schedulerId: string; ts: number };

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An event as reported by its source, before the scheduler stamps it. */
export type SchedulerEventInput = DistributiveOmit<SchedulerEvent, "schedulerId" | "ts">;

export interface SchedulerOptions {
  /** Identifier stamped on every event. @default "scheduler-<n>" */
  id?: string;
  /**
   * Receives lifecycle events. Exceptions thrown here propagate to the caller;
   * during `tick()` they are rethrown with callback failures once every ready
   * completion has been delivered.
   */
  onEvent?: (event: SchedulerEvent) => void;
  /** Time source for event timestamps. @default Date.now */
  clock?: () => number;
}

let schedulerCount = 0;

// =============================================================================
// AsyncScheduler
// =============================================================================

export class AsyncScheduler {
  readonly id: string;

  private readonly pending = new Map<TransferHandle, CompletionCallback>();
  private readonly onEvent: ((event: SchedulerEvent) => void) | undefined;
  private readonly clock: () => number;
  private ticking = false;
  private tickFailures: unknown[] | undefined;
  private destroyed = false;

  private constructor(
    private readonly session: EngineSession,
    options: SchedulerOptions
  ) {
    this.id = options.id ?? `scheduler-${++schedulerCount}`;
    this.onEvent = options.onEvent;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Open an engine session and wrap it in a scheduler.
   * Engine initialisation failure comes back as `SetupFailure`.
   */
  static create(
    engine: TransferEngine,
    options: SchedulerOptions = {}
  ): Result<AsyncScheduler, SetupFailure> {
    const opened = engine.open();
    if (!opened.ok) return err(opened.error);
    const scheduler = new AsyncScheduler(opened.value, options);
    try {
      scheduler.emit({ type: "scheduler_open" });
    } catch (error) {
      opened.value.close();
      throw error;
    }
    return ok(scheduler);
  }

  /** The engine session. Transfer builders use it to create and configure handles. */
  get engine(): EngineSession {
    this.assertAlive("engine");
    return this.session;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  isPending(handle: TransferHandle): boolean {
    return this.pending.has(handle);
  }

  /**
   * Attach a configured transfer to the multiplexer and remember who to call
   * when it finishes.
   */
  register(handle: TransferHandle, callback: CompletionCallback, url?: string): void {
    this.assertAlive("register");
    if (typeof callback !== "function") {
      throw new ContractViolationError("register", "callback must be a function");
    }
    if (this.pending.has(handle)) {
      throw new ContractViolationError(
        "register",
        `transfer ${handle.id} is already registered`
      );
    }
    this.session.attach(handle);
    this.pending.set(handle, callback);
    try {
      this.emit({ type: "transfer_registered", transferId: handle.id, url });
    } catch (error) {
      this.pending.delete(handle);
      this.session.detach(handle);
      throw error;
    }
  }

  /**
   * Advance every registered transfer once and deliver the completions that
   * became ready. Each finished transfer is detached and forgotten before its
   * callback runs. A throwing callback does not stop delivery to the others;
   * its error, like one from the event hook, is rethrown once all ready
   * completions have been delivered.
   */
  tick(): void {
    this.assertAlive("tick");
    if (this.ticking) {
      throw new ContractViolationError("tick", "tick() called from inside a completion callback");
    }
    this.ticking = true;
    const failures: unknown[] = [];
    this.tickFailures = failures;
    try {
      for (const handle of this.session.perform()) {
        const callback = this.pending.get(handle);
        if (callback === undefined) {
          failures.push(
            new ContractViolationError("tick", `engine finished unknown transfer ${handle.id}`)
          );
          continue;
        }
        this.pending.delete(handle);
        try {
          this.session.detach(handle);
        } catch (error) {
          failures.push(error);
        }
        try {
          callback(handle);
        } catch (error) {
          failures.push(error);
        }
      }
    } finally {
      this.ticking = false;
      this.tickFailures = undefined;
    }

    if (failures.length === 1) throw failures[0];
    if (failures.length > 1) {
      throw new AggregateError(failures, `${failures.length} completion callbacks failed`);
    }
  }

  /**
   * Close the engine session. Refused while any transfer is still pending,
   * since its handle and callback would otherwise leak.
   */
  destroy(): void {
    this.assertAlive("destroy");
    if (this.pending.size > 0) {
      throw new ContractViolationError(
        "destroy",
        `${this.pending.size} transfer(s) still pending`
      );
    }
    this.destroyed = true;
    this.session.close();
    this.emit({ type: "scheduler_destroyed" });
  }

  /** @internal used by transfer builders to report outcomes */
  emit(event: SchedulerEventInput): void {
    if (!this.onEvent) return;
    const stamped: SchedulerEvent = { ...event, schedulerId: this.id, ts: this.clock() };
    if (this.tickFailures === undefined) {
      this.onEvent(stamped);
      return;
    }
    try {
      this.onEvent(stamped);
    } catch (error) {
      this.tickFailures.push(error);
    }
  }

  /** @internal */
  now(): number {
    return this.clock();
  }

  private assertAlive(operation: string): void {
    if (this.destroyed) {
      throw new ContractViolationError(operation, "scheduler has been destroyed");
    }
  }
}

/**
 * Functional alias for `AsyncScheduler.create`.
 */
export function createScheduler(
  engine: TransferEngine,
  options?: SchedulerOptions
): Result<AsyncScheduler, SetupFailure> {
  return AsyncScheduler.create(engine, options);
}
