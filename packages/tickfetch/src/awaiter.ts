import { ContractViolationError } from "./errors";
import type { AsyncScheduler } from "./scheduler";
import type { Awaiter } from "./task";
import { getAsync, type GetOptions, type GetResult } from "./transfer";

/**
 * The suspension point behind `awaitGet`. Never ready up front; on suspend
 * it starts one `getAsync` whose completion stores the result and resumes
 * the task from inside the scheduler's `tick()`.
 */
export class TransferAwaiter implements Awaiter {
  private resumeTask: (() => void) | undefined;
  private stored: GetResult | undefined;
  private spent = false;

  constructor(
    private readonly scheduler: AsyncScheduler,
    readonly url: string,
    private readonly options: GetOptions = {}
  ) {}

  awaitReady(): boolean {
    return false;
  }

  awaitSuspend(resume: () => void): void {
    if (this.resumeTask !== undefined || this.spent) {
      throw new ContractViolationError("awaitSuspend", "awaiter is single-use");
    }
    this.resumeTask = resume;
    getAsync(
      this.scheduler,
      this.url,
      this,
      (self, result) => {
        self.stored = result;
        const continuation = self.resumeTask;
        self.resumeTask = undefined;
        continuation?.();
      },
      this.options
    );
  }

  awaitResume(): GetResult {
    const result = this.stored;
    if (result === undefined || this.spent) {
      throw new ContractViolationError("awaitResume", "no completed result to hand over");
    }
    this.spent = true;
    this.stored = undefined;
    return result;
  }
}

/**
 * GET `url` from inside a task body. Delegate with `yield*`; the task
 * suspends until the transfer completes and the expression evaluates to the
 * same Result a direct `getAsync` would have delivered.
 *
 * @example
 * ```typescript
 * const task = createTask(function* () {
 *   const first = yield* awaitGet(scheduler, "http://localhost:5001/file1.txt");
 *   if (!first.ok) return;
 *   const second = yield* awaitGet(scheduler, "http://localhost:5001/file2.txt");
 * });
 * ```
 */
export function* awaitGet(
  scheduler: AsyncScheduler,
  url: string,
  options?: GetOptions
): Generator<Awaiter, GetResult, unknown> {
  const awaiter = new TransferAwaiter(scheduler, url, options);
  yield awaiter;
  return awaiter.awaitResume();
}
