/**
 * tickfetch-undici
 *
 * TransferEngine implementation on top of an undici Dispatcher.
 */

import { Agent, type Dispatcher } from "undici";
import {
  err,
  ok,
  setupFailure,
  TransferHandle,
  type AsyncResult,
  type DataSink,
  type EngineSession,
  type Result,
  type SetupFailure,
  type TransferConfig,
  type TransferEngine,
  type TransferInfo,
} from "tickfetch";

/**
 * Options for the undici engine.
 */
export interface UndiciEngineOptions {
  /**
   * Dispatcher to send requests through. The engine never closes a
   * dispatcher it did not create.
   * @default a new undici Agent per session
   */
  dispatcher?: Dispatcher;

  /**
   * Redirect hops allowed when a transfer does not set its own limit.
   * @default 30
   */
  maxRedirects?: number;

  /** Extra request headers sent with every transfer. */
  headers?: Record<string, string>;

  /**
   * Time allowed for response headers, in ms (own Agent only).
   * @default undici's default
   */
  headersTimeout?: number;

  /**
   * Time allowed between body chunks, in ms (own Agent only).
   * @default undici's default
   */
  bodyTimeout?: number;
}

export interface UndiciEngine extends TransferEngine {
  /**
   * Settles once every dispatcher created by a closed session has shut down.
   */
  drained(): AsyncResult<void, unknown>;
}

interface UndiciTransfer {
  config: TransferConfig | undefined;
  sink: DataSink | undefined;
  /** URL of the hop currently in flight */
  url: string;
  redirects: number;
  redirectTo: string | undefined;
  attached: boolean;
  started: boolean;
  terminal: boolean;
  status: number;
  error: unknown;
  abort: ((reason?: Error) => void) | undefined;
}

const DEFAULT_MAX_REDIRECTS = 30;

function isRedirect(status: number): boolean {
  return status === 301 || status === 302 || status === 303 || status === 307 || status === 308;
}

function findHeader(rawHeaders: readonly unknown[], name: string): string | undefined {
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    if (String(rawHeaders[i]).toLowerCase() === name) return String(rawHeaders[i + 1]);
  }
  return undefined;
}

/**
 * Create an engine that performs transfers with undici.
 *
 * @example
 * ```typescript
 * import { AsyncScheduler, getAsync, unwrap } from 'tickfetch';
 * import { createUndiciEngine } from 'tickfetch-undici';
 *
 * const scheduler = unwrap(AsyncScheduler.create(createUndiciEngine({ bodyTimeout: 10_000 })));
 * ```
 */
export function createUndiciEngine(options: UndiciEngineOptions = {}): UndiciEngine {
  const closing: Promise<Result<void, unknown>>[] = [];

  const createDispatcher = (): Result<{ dispatcher: Dispatcher; owned: boolean }, SetupFailure> => {
    if (options.dispatcher) return ok({ dispatcher: options.dispatcher, owned: false });
    try {
      const agent = new Agent({
        headersTimeout: options.headersTimeout,
        bodyTimeout: options.bodyTimeout,
      });
      return ok({ dispatcher: agent, owned: true });
    } catch (cause) {
      return err(setupFailure(cause));
    }
  };

  return {
    open(): Result<EngineSession, SetupFailure> {
      const created = createDispatcher();
      if (!created.ok) return created;
      const { dispatcher, owned } = created.value;
      const session = new UndiciSession(dispatcher, options);
      return ok({
        createTransfer: () => session.createTransfer(),
        configure: (handle, config) => session.configure(handle, config),
        setSink: (handle, sink) => session.setSink(handle, sink),
        attach: (handle) => session.attach(handle),
        detach: (handle) => session.detach(handle),
        perform: () => session.perform(),
        info: (handle) => session.info(handle),
        release: (handle) => session.release(handle),
        close: () => {
          session.close();
          if (owned) {
            closing.push(
              dispatcher.close().then(
                () => ok(undefined),
                (cause: unknown) => err(cause)
              )
            );
          }
        },
      });
    },

    async drained(): AsyncResult<void, unknown> {
      for (const result of await Promise.all(closing)) {
        if (!result.ok) return result;
      }
      return ok(undefined);
    },
  };
}

// =============================================================================
// Session
// =============================================================================

class UndiciSession {
  private readonly transfers = new Map<TransferHandle, UndiciTransfer>();
  private readonly finished: TransferHandle[] = [];
  private closed = false;

  constructor(
    private readonly dispatcher: Dispatcher,
    private readonly options: UndiciEngineOptions
  ) {}

  createTransfer(): TransferHandle {
    this.assertOpen("createTransfer");
    const handle = new TransferHandle();
    this.transfers.set(handle, {
      config: undefined,
      sink: undefined,
      url: "",
      redirects: 0,
      redirectTo: undefined,
      attached: false,
      started: false,
      terminal: false,
      status: 0,
      error: undefined,
      abort: undefined,
    });
    return handle;
  }

  configure(handle: TransferHandle, config: TransferConfig): void {
    const transfer = this.lookup(handle, "configure");
    if (transfer.started) {
      throw new Error(`undici engine: transfer ${handle.id} is already running`);
    }
    transfer.config = { ...config };
    transfer.url = config.url;
  }

  setSink(handle: TransferHandle, sink: DataSink): void {
    this.lookup(handle, "setSink").sink = sink;
  }

  attach(handle: TransferHandle): void {
    this.assertOpen("attach");
    const transfer = this.lookup(handle, "attach");
    if (transfer.attached) throw new Error(`undici engine: transfer ${handle.id} already attached`);
    if (!transfer.config) throw new Error(`undici engine: transfer ${handle.id} has no URL`);
    transfer.attached = true;
  }

  detach(handle: TransferHandle): void {
    const transfer = this.lookup(handle, "detach");
    if (!transfer.attached) throw new Error(`undici engine: transfer ${handle.id} is not attached`);
    transfer.attached = false;
  }

  /**
   * Dispatch transfers that are attached but not yet on the wire, then hand
   * back everything the network finished since the previous call. Network
   * callbacks only record state; nothing is delivered outside this method.
   */
  perform(): readonly TransferHandle[] {
    this.assertOpen("perform");
    for (const [handle, transfer] of this.transfers) {
      if (transfer.attached && !transfer.started && !transfer.terminal) {
        this.dispatch(handle, transfer);
      }
    }
    const done = this.finished.filter((handle) => this.transfers.get(handle)?.attached);
    this.finished.length = 0;
    return done;
  }

  info(handle: TransferHandle): TransferInfo {
    const transfer = this.lookup(handle, "info");
    if (!transfer.terminal) {
      throw new Error(`undici engine: transfer ${handle.id} has not finished`);
    }
    return transfer.error === undefined
      ? { status: transfer.status }
      : { status: transfer.status, error: transfer.error };
  }

  release(handle: TransferHandle): void {
    const transfer = this.lookup(handle, "release");
    if (transfer.started && !transfer.terminal) {
      transfer.abort?.(new Error("transfer released while in flight"));
    }
    this.transfers.delete(handle);
  }

  close(): void {
    this.assertOpen("close");
    this.closed = true;
  }

  private dispatch(handle: TransferHandle, transfer: UndiciTransfer): void {
    transfer.started = true;
    transfer.status = 0;
    transfer.redirectTo = undefined;

    let target: URL;
    try {
      target = new URL(transfer.url);
    } catch (cause) {
      this.finish(handle, transfer, cause);
      return;
    }

    const follow = transfer.config?.followRedirects ?? true;
    const handler: Dispatcher.DispatchHandlers = {
      onConnect: (abort) => {
        transfer.abort = abort;
      },
      onHeaders: (statusCode, rawHeaders) => {
        transfer.status = statusCode;
        if (follow && isRedirect(statusCode)) {
          const location = findHeader(rawHeaders, "location");
          if (location !== undefined) {
            transfer.redirectTo = new URL(location, transfer.url).toString();
          }
        }
        return true;
      },
      onData: (chunk) => {
        if (transfer.terminal) return false;
        // Bodies of responses we are about to follow are dropped
        if (transfer.redirectTo !== undefined) return true;
        const consumed = transfer.sink ? transfer.sink(chunk) : chunk.byteLength;
        if (consumed !== chunk.byteLength) {
          const reason = new Error(`sink consumed ${consumed} of ${chunk.byteLength} bytes`);
          transfer.abort?.(reason);
          this.finish(handle, transfer, reason);
          return false;
        }
        return true;
      },
      onComplete: () => {
        if (transfer.terminal) return;
        if (transfer.redirectTo !== undefined) {
          this.redirect(handle, transfer, transfer.redirectTo);
          return;
        }
        this.finish(handle, transfer, undefined);
      },
      onError: (error) => {
        this.finish(handle, transfer, error);
      },
    };

    try {
      this.dispatcher.dispatch(
        {
          origin: target.origin,
          path: `${target.pathname}${target.search}`,
          method: "GET",
          headers: this.options.headers,
        },
        handler
      );
    } catch (cause) {
      this.finish(handle, transfer, cause);
    }
  }

  private redirect(handle: TransferHandle, transfer: UndiciTransfer, location: string): void {
    const limit =
      transfer.config?.maxRedirects ?? this.options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
    if (transfer.redirects >= limit) {
      this.finish(handle, transfer, new Error(`maximum redirects (${limit}) followed`));
      return;
    }
    transfer.redirects++;
    transfer.url = location;
    // Picked up again by the next perform()
    transfer.started = false;
  }

  private finish(handle: TransferHandle, transfer: UndiciTransfer, error: unknown): void {
    if (transfer.terminal) return;
    transfer.terminal = true;
    transfer.error = error;
    transfer.abort = undefined;
    if (this.transfers.has(handle)) this.finished.push(handle);
  }

  private lookup(handle: TransferHandle, operation: string): UndiciTransfer {
    const transfer = this.transfers.get(handle);
    if (!transfer) {
      throw new Error(`undici engine: ${operation} on unknown or released transfer ${handle.id}`);
    }
    return transfer;
  }

  private assertOpen(operation: string): void {
    if (this.closed) throw new Error(`undici engine: ${operation} on a closed session`);
  }
}
