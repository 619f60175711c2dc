/**
 * tickfetch/engine
 *
 * The boundary to whatever performs the actual network I/O. The scheduler
 * only ever talks to these two interfaces; `tickfetch-undici` provides a
 * real implementation and `tickfetch/testing` an in-process one.
 */

import type { Result } from "./result";
import type { SetupFailure } from "./errors";

// =============================================================================
// Handles
// =============================================================================

/**
 * Opaque identity of one outstanding request. Engines create and own these;
 * callers compare them by identity only.
 */
export class TransferHandle {
  private static nextId = 1;

  /** Process-unique id, for diagnostics only */
  readonly id: number = TransferHandle.nextId++;
}

// =============================================================================
// Transfer configuration
// =============================================================================

export interface TransferConfig {
  url: string;
  followRedirects: boolean;
  /** Maximum redirect hops. Engines pick their own default when omitted */
  maxRedirects?: number;
}

/**
 * Receives body chunks in arrival order. Must return the number of bytes it
 * consumed; anything short of `chunk.byteLength` makes the engine abort the
 * transfer.
 */
export type DataSink = (chunk: Uint8Array) => number;

/**
 * Final state of a transfer that `perform()` reported as finished.
 * `status` is 0 when no response arrived.
 */
export interface TransferInfo {
  status: number;
  /** Set when the engine gave up on the transfer */
  error?: unknown;
}

// =============================================================================
// Engine
// =============================================================================

/**
 * One initialised engine context. A scheduler owns exactly one session and
 * closes it exactly once.
 */
export interface EngineSession {
  createTransfer(): TransferHandle;
  configure(handle: TransferHandle, config: TransferConfig): void;
  setSink(handle: TransferHandle, sink: DataSink): void;
  /** Add to the multiplexer. The transfer starts moving on the next `perform()` */
  attach(handle: TransferHandle): void;
  detach(handle: TransferHandle): void;
  /**
   * Advance every attached transfer without blocking and return the handles
   * that reached a terminal state since the last call.
   */
  perform(): readonly TransferHandle[];
  info(handle: TransferHandle): TransferInfo;
  release(handle: TransferHandle): void;
  close(): void;
}

/**
 * Factory for engine sessions. `open()` replaces process-wide global
 * initialisation with an explicit context.
 */
export interface TransferEngine {
  open(): Result<EngineSession, SetupFailure>;
}
