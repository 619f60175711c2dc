/**
 * tickfetch-undici
 *
 * undici transport for tickfetch schedulers.
 * Provides a ready-to-use TransferEngine backed by an undici Agent or any
 * Dispatcher you pass in (a Pool, a ProxyAgent, a MockAgent in tests).
 */

import type { Dispatcher } from "undici";
import { createUndiciEngine, type UndiciEngine } from "./undici-engine";

export { createUndiciEngine } from "./undici-engine";
export type { UndiciEngine, UndiciEngineOptions } from "./undici-engine";

// Re-export types for convenience
export type { TransferEngine, EngineSession } from "tickfetch";

// =============================================================================
// undici() - One-liner engine setup
// =============================================================================

/**
 * Create an engine over an existing dispatcher.
 *
 * @example
 * ```typescript
 * import { Pool } from 'undici';
 * import { fetchBytes } from 'tickfetch';
 * import { undici } from 'tickfetch-undici';
 *
 * const engine = undici(new Pool('http://localhost:5001', { connections: 4 }));
 * const result = await fetchBytes(engine, 'http://localhost:5001/file1.txt');
 * ```
 */
export function undici(dispatcher?: Dispatcher): UndiciEngine {
  return createUndiciEngine(dispatcher ? { dispatcher } : {});
}
