/**
 * Resource Context
 *
 * State the bridge shares with its resources. `transport` is cleared when
 * the bridge is disposed; nothing else changes after construction.
 */

import type { DebugFn } from '../config.js';
import type { Settings } from '../types/settings.js';
import type { HttpTransport } from '../utils/http.js';
import type { BridgeMetrics } from '../utils/instrumentation.js';

export interface ResourceContext {
  settings: Settings | undefined;
  transport: HttpTransport | undefined;
  debug: DebugFn | null;
  instrumentation?: BridgeMetrics;
}

/** Per-call options */
export interface CallOptions {
  /** Abort the in-flight request */
  signal?: AbortSignal;
}
