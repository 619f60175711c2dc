import type { TransferHandle } from "./engine";
import {
  protocolError,
  transferAborted,
  type TransferError,
} from "./errors";
import { err, ok, type Result } from "./result";
import type { AsyncScheduler } from "./scheduler";

// =============================================================================
// Types
// =============================================================================

export type GetResult = Result<Uint8Array, TransferError>;

export type GetCallback<U> = (userData: U, result: GetResult) => void;

export interface GetOptions {
  /** Follow 3xx responses that carry a Location header. @default true */
  followRedirects?: boolean;
  /** Maximum redirect hops; engine default when omitted */
  maxRedirects?: number;
}

// =============================================================================
// Response buffer
// =============================================================================

/** Accumulates body chunks for one in-flight transfer. */
class ResponseBuffer {
  private chunks: Uint8Array[] = [];
  private length = 0;

  append(chunk: Uint8Array): number {
    // Engines may reuse their chunk memory after the sink returns
    this.chunks.push(chunk.slice());
    this.length += chunk.byteLength;
    return chunk.byteLength;
  }

  /** Hand the bytes over. The buffer is empty afterwards. */
  take(): Uint8Array {
    const out = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.byteLength;
    }
    this.chunks = [];
    this.length = 0;
    return out;
  }
}

const isSuccess = (status: number): boolean => status >= 200 && status < 300;

// =============================================================================
// getAsync
// =============================================================================

/**
 * Start a GET for `url` on `scheduler`. The body accumulates in a buffer
 * owned by the transfer; when a later `tick()` sees the transfer finish,
 * `onComplete(userData, result)` runs exactly once with the whole body or
 * the reason it failed. Failures are never retried.
 *
 * @example
 * ```typescript
 * const state = { body: "", done: false };
 * getAsync(scheduler, "http://localhost:5001/file1.txt", state, (s, result) => {
 *   s.body = result.ok ? new TextDecoder().decode(result.value) : "";
 *   s.done = true;
 * });
 * while (!state.done) scheduler.tick();
 * ```
 */
export function getAsync<U>(
  scheduler: AsyncScheduler,
  url: string,
  userData: U,
  onComplete: GetCallback<U>,
  options: GetOptions = {}
): TransferHandle {
  const engine = scheduler.engine;
  const handle = engine.createTransfer();
  engine.configure(handle, {
    url,
    followRedirects: options.followRedirects ?? true,
    maxRedirects: options.maxRedirects,
  });

  const buffer = new ResponseBuffer();
  engine.setSink(handle, (chunk) => buffer.append(chunk));

  const startedAt = scheduler.now();

  try {
    scheduler.register(
      handle,
      (finished) => {
        const info = engine.info(finished);
        engine.release(finished);
        const body = buffer.take();
        const durationMs = scheduler.now() - startedAt;

        let result: GetResult;
        if (info.error !== undefined) {
          result = err(transferAborted(url, info.error));
        } else if (!isSuccess(info.status)) {
          result = err(protocolError(url, info.status, body));
        } else {
          result = ok(body);
        }

        if (result.ok) {
          scheduler.emit({
            type: "transfer_complete",
            transferId: finished.id,
            url,
            status: info.status,
            bytes: body.byteLength,
            durationMs,
          });
        } else {
          scheduler.emit({
            type: "transfer_error",
            transferId: finished.id,
            url,
            status: info.status,
            error: result.error,
            durationMs,
          });
        }

        onComplete(userData, result);
      },
      url
    );
  } catch (error) {
    // Nothing will ever complete this transfer
    engine.release(handle);
    throw error;
  }

  return handle;
}
