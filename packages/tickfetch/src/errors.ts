/**
 * tickfetch/errors
 *
 * Failure values surfaced through Result, plus the one thrown error type for
 * broken usage contracts.
 *
 * @example
 * ```typescript
 * getAsync(scheduler, url, null, (_, result) => {
 *   if (result.ok) return;
 *   switch (result.error._tag) {
 *     case "ProtocolError":
 *       console.log(`HTTP ${result.error.status}`);
 *       break;
 *     case "TransferAborted":
 *       console.log("transfer aborted", result.error.reason);
 *       break;
 *   }
 * });
 * ```
 */

// =============================================================================
// Error Types
// =============================================================================

/** The transfer engine could not be initialised. */
export type SetupFailure = {
  readonly _tag: "SetupFailure";
  readonly cause: unknown;
};

/** The server answered with a non-success status. */
export type ProtocolError = {
  readonly _tag: "ProtocolError";
  readonly url: string;
  readonly status: number;
  /** Whatever body bytes arrived with the error response */
  readonly body: Uint8Array;
};

/** The transfer ended without a complete response. */
export type TransferAborted = {
  readonly _tag: "TransferAborted";
  readonly url: string;
  readonly reason: unknown;
};

/** A drive loop gave up before its condition was met. */
export type TickLimitExceeded = {
  readonly _tag: "TickLimitExceeded";
  readonly ticks: number;
};

/** A task body threw. */
export type TaskFailure = {
  readonly _tag: "TaskFailure";
  readonly thrown: unknown;
};

/** Convenience union: every way a single transfer can fail */
export type TransferError = ProtocolError | TransferAborted;

// =============================================================================
// Constructors
// =============================================================================

export const setupFailure = (cause: unknown): SetupFailure => ({
  _tag: "SetupFailure",
  cause,
});

export const protocolError = (
  url: string,
  status: number,
  body: Uint8Array
): ProtocolError => ({ _tag: "ProtocolError", url, status, body });

export const transferAborted = (url: string, reason: unknown): TransferAborted => ({
  _tag: "TransferAborted",
  url,
  reason,
});

export const tickLimitExceeded = (ticks: number): TickLimitExceeded => ({
  _tag: "TickLimitExceeded",
  ticks,
});

export const taskFailure = (thrown: unknown): TaskFailure => ({
  _tag: "TaskFailure",
  thrown,
});

// =============================================================================
// Contract violations
// =============================================================================

/**
 * Thrown when the caller breaks a usage contract: registering a transfer
 * twice, resuming a finished task, destroying a scheduler that still has
 * pending transfers, and so on. These are programming errors, never
 * transfer outcomes.
 */
export class ContractViolationError extends Error {
  readonly _tag = "ContractViolationError" as const;

  constructor(
    public readonly operation: string,
    detail: string
  ) {
    super(`${operation}: ${detail}`);
    this.name = "ContractViolationError";
  }
}

// =============================================================================
// Type Guards
// =============================================================================

function hasTag(value: unknown, tag: string): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    "_tag" in value &&
    value._tag === tag
  );
}

export const isProtocolError = (e: unknown): e is ProtocolError =>
  hasTag(e, "ProtocolError");

export const isTransferAborted = (e: unknown): e is TransferAborted =>
  hasTag(e, "TransferAborted");

export const isTransferError = (e: unknown): e is TransferError =>
  isProtocolError(e) || isTransferAborted(e);

export const isContractViolation = (e: unknown): e is ContractViolationError =>
  e instanceof ContractViolationError;
