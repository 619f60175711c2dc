/**
 * tickfetch
 *
 * Caller-driven HTTP fetching: many transfers multiplexed on one thread,
 * completions delivered from `tick()` either to callbacks or into
 * suspended generator tasks.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { AsyncScheduler, createTask, awaitGet, runTask, unwrap } from 'tickfetch';
 * import { createUndiciEngine } from 'tickfetch-undici';
 *
 * const scheduler = unwrap(AsyncScheduler.create(createUndiciEngine()));
 * const task = createTask(function* () {
 *   const index = yield* awaitGet(scheduler, 'http://localhost:5001/index.txt');
 *   return index.ok ? index.value.byteLength : 0;
 * });
 * const size = await runTask(scheduler, task);
 * scheduler.destroy();
 * ```
 *
 * ## Entry Points
 *
 * - `tickfetch` - scheduler, callback and task APIs, Result primitives
 * - `tickfetch/testing` - in-process mock engine and Result assertions
 */

// Result primitives
export {
  type Ok,
  type Err,
  type Result,
  type AsyncResult,
  ok,
  err,
  isOk,
  isErr,
  unwrap,
  UnwrapError,
} from "./result";

// Errors
export {
  type SetupFailure,
  type ProtocolError,
  type TransferAborted,
  type TickLimitExceeded,
  type TaskFailure,
  type TransferError,
  setupFailure,
  protocolError,
  transferAborted,
  tickLimitExceeded,
  taskFailure,
  ContractViolationError,
  isProtocolError,
  isTransferAborted,
  isTransferError,
  isContractViolation,
} from "./errors";

// Engine boundary
export {
  TransferHandle,
  type TransferConfig,
  type TransferInfo,
  type DataSink,
  type EngineSession,
  type TransferEngine,
} from "./engine";

// Scheduler
export {
  AsyncScheduler,
  createScheduler,
  type CompletionCallback,
  type SchedulerEvent,
  type SchedulerEventInput,
  type SchedulerOptions,
} from "./scheduler";

// Callback transfers
export { getAsync, type GetCallback, type GetOptions, type GetResult } from "./transfer";

// Tasks
export {
  CoroutineTask,
  createTask,
  type Awaiter,
  type TaskBody,
  type TaskState,
} from "./task";
export { TransferAwaiter, awaitGet } from "./awaiter";

// Driving
export { runUntil, runTask, fetchBytes, type DriveOptions, type FetchStalled } from "./drive";
