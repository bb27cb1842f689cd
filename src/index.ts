/**
 * Metrics Bridge & Health Monitor for Node.js
 *
 * @example
 * ```typescript
 * import { MetricsBridge, BridgeMetrics } from 'metrics-bridge';
 *
 * const bridge = new MetricsBridge({
 *   configuration: { path: 'http://localhost:3000' },
 *   secrets: { apiKey: process.env.MONITOR_API_KEY },
 *   instrumentation: new BridgeMetrics(),
 * });
 *
 * const { status, message } = await bridge.checkHealth();
 *
 * const envelope = await bridge.query([
 *   { refId: 'A', payload: { metric: 'go_threads' } },
 * ]);
 * // { A: { frame: { metric_name: 'go_threads', metric_value: 12 } } }
 * ```
 *
 * @module metrics-bridge
 */

// Main bridge
export { MetricsBridge, createBridge } from './bridge.js';
export type { MetricsBridgeOptions } from './bridge.js';

// Configuration
export type {
  TransportOptions,
  ResolvedTransportConfig,
  TlsOptions,
  ProxyOptions,
  FetchFn,
  FetchInit,
  FetchResponse,
  DebugFn,
} from './config.js';
export { resolveConfig, validateConfig, DEFAULT_CONFIG, BRIDGE_VERSION } from './config.js';

// Settings
export { loadSettings, loadSecrets, resolveEndpoint } from './settings.js';

// Errors
export {
  BridgeError,
  ConfigurationError,
  ValidationError,
  TransportError,
  NetworkError,
  TimeoutError,
  MetricNotFoundError,
  isBridgeError,
  isRetryableError,
} from './errors.js';

// Types
export * from './types/index.js';

// Resources
export { HealthResource, MetricsResource, QueryResource, decodeQuery } from './resources/index.js';
export type { CallOptions } from './resources/index.js';

// Utilities (for advanced users)
export { HttpTransport, createTransport } from './utils/http.js';
export type { TransportRequestOptions, TransportResponse, TextResponse } from './utils/http.js';
export { findMetric, parseExposition, parseSampleValue } from './utils/exposition.js';
export { BridgeMetrics } from './utils/instrumentation.js';
export type { BridgeMetricsOptions, QueryOutcomeLabel } from './utils/instrumentation.js';
