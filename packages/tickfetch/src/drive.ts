import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type { TransferEngine } from "./engine";
import {
  ContractViolationError,
  taskFailure,
  tickLimitExceeded,
  type SetupFailure,
  type TaskFailure,
  type TickLimitExceeded,
  type TransferError,
} from "./errors";
import { err, ok, type AsyncResult, type Result } from "./result";
import { AsyncScheduler, type SchedulerOptions } from "./scheduler";
import type { CoroutineTask } from "./task";
import { getAsync, type GetOptions, type GetResult } from "./transfer";

/**
 * `fetchBytes` ran out of ticks. The transfer is still registered on
 * `scheduler`; drive it until `pendingCount` is 0, then `destroy()` it.
 */
export type FetchStalled = TickLimitExceeded & { readonly scheduler: AsyncScheduler };

export interface DriveOptions {
  /** Give up after this many ticks. @default unlimited */
  maxTicks?: number;
}

/**
 * Call `tick()` until `done()` holds, letting the event loop run between
 * ticks so engines doing real I/O make progress.
 */
export async function runUntil(
  scheduler: AsyncScheduler,
  done: () => boolean,
  options: DriveOptions = {}
): AsyncResult<number, TickLimitExceeded> {
  const maxTicks = options.maxTicks ?? Number.POSITIVE_INFINITY;
  let ticks = 0;
  while (!done()) {
    if (ticks >= maxTicks) {
      return err(tickLimitExceeded(ticks));
    }
    scheduler.tick();
    ticks++;
    if (!done()) await yieldToEventLoop();
  }
  return ok(ticks);
}

/**
 * Start a fresh task and drive the scheduler until it finishes. A body that
 * throws comes back as `TaskFailure`; anything else thrown while driving
 * (another callback failing inside the same tick) propagates.
 */
export async function runTask<T>(
  scheduler: AsyncScheduler,
  task: CoroutineTask<T>,
  options?: DriveOptions
): AsyncResult<T, TaskFailure | TickLimitExceeded> {
  try {
    task.resume();
    const driven = await runUntil(scheduler, () => !task.isInProgress(), options);
    if (!driven.ok) return driven;
  } catch (thrown) {
    const failed = task.result;
    if (failed !== undefined && !failed.ok && failed.error.thrown === thrown) {
      return failed;
    }
    throw thrown;
  }
  return task.result ?? err(taskFailure(new Error("task finished without a result")));
}

/**
 * One-shot GET: opens a scheduler on `engine`, fetches `url`, tears the
 * scheduler down again and returns the body. When `maxTicks` runs out first
 * the live scheduler comes back in `FetchStalled`.
 *
 * @example
 * ```typescript
 * const body = await fetchBytes(createUndiciEngine(), "http://localhost:5001/file1.txt");
 * if (body.ok) console.log(new TextDecoder().decode(body.value));
 * ```
 */
export async function fetchBytes(
  engine: TransferEngine,
  url: string,
  options: GetOptions & SchedulerOptions & DriveOptions = {}
): AsyncResult<Uint8Array, TransferError | SetupFailure | FetchStalled> {
  const created = AsyncScheduler.create(engine, options);
  if (!created.ok) return created;
  const scheduler = created.value;

  let outcome: GetResult | undefined;
  getAsync(scheduler, url, undefined, (_, result) => {
    outcome = result;
  }, options);

  const driven = await runUntil(scheduler, () => outcome !== undefined, options);
  // No cancellation: the caller finishes and destroys the scheduler
  if (!driven.ok) return err({ ...driven.error, scheduler });
  scheduler.destroy();
  return settled(outcome);
}

function settled(outcome: GetResult | undefined): Result<Uint8Array, TransferError> {
  if (outcome === undefined) {
    throw new ContractViolationError("fetchBytes", "drive loop ended before the transfer completed");
  }
  return outcome;
}
