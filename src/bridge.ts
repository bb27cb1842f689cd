/**
 * Metrics Bridge
 *
 * Main entry point. The host constructs a bridge from instance settings and
 * calls `checkHealth()` and `query()` on its own schedule, possibly
 * concurrently. The bridge does no background work of its own.
 */

import { type DebugFn, type TransportOptions, resolveDebug } from './config.js';
import { ConfigurationError } from './errors.js';
import { HealthResource, MetricsResource, QueryResource } from './resources/index.js';
import type { CallOptions, ResourceContext } from './resources/index.js';
import { loadSettings } from './settings.js';
import type { HealthVerdict } from './types/health.js';
import type { DataQuery, ResponseEnvelope } from './types/query.js';
import type { ConfigurationBlob, SecretMap, Settings } from './types/settings.js';
import { createTransport } from './utils/http.js';
import type { BridgeMetrics } from './utils/instrumentation.js';

/** Bridge construction options */
export interface MetricsBridgeOptions {
  /** JSON settings blob: `{ path, healthPath?, metricsPath? }` */
  configuration: ConfigurationBlob;
  /** Decrypted secret map; must contain a non-empty `apiKey` */
  secrets?: SecretMap;
  /** Connection options for the shared transport */
  http?: TransportOptions;
  /** Collectors to record health checks and queries in */
  instrumentation?: BridgeMetrics;
  /** Enable debug logging (applies to the transport unless `http.debug` is set) */
  debug?: boolean | DebugFn;
}

/**
 * Metrics bridge
 *
 * @example
 * ```typescript
 * const bridge = new MetricsBridge({
 *   configuration: '{"path":"http://localhost:3000"}',
 *   secrets: { apiKey: process.env.MONITOR_API_KEY },
 *   http: { timeout: 5000 },
 * });
 *
 * const health = await bridge.checkHealth();
 * const result = await bridge.query([{ refId: 'A', payload: '{"metric":"go_threads"}' }]);
 * ```
 */
export class MetricsBridge {
  private readonly context: ResourceContext;

  /** Liveness probe */
  readonly health: HealthResource;

  /** Scrape endpoint */
  readonly metrics: MetricsResource;

  /** Query batches */
  readonly queries: QueryResource;

  /**
   * @throws ConfigurationError if settings, secrets or transport options are invalid
   */
  constructor(options: MetricsBridgeOptions) {
    const debug = resolveDebug(options.debug);
    const settings = loadSettings(options.configuration, options.secrets);
    const transport = createTransport({
      ...options.http,
      debug: options.http?.debug ?? debug ?? undefined,
    });

    this.context = {
      settings,
      transport,
      debug,
      instrumentation: options.instrumentation,
    };

    this.health = new HealthResource(this.context);
    this.metrics = new MetricsResource(this.context);
    this.queries = new QueryResource(this.context, this.metrics);

    debug?.('Metrics bridge initialized', {
      path: settings.path,
      healthPath: settings.healthPath,
      metricsPath: settings.metricsPath,
      hasApiKey: Boolean(settings.secrets?.apiKey),
    });
  }

  /**
   * Check liveness of the monitored endpoint
   */
  checkHealth(options?: CallOptions): Promise<HealthVerdict> {
    return this.health.check(options);
  }

  /**
   * Answer a query batch from one scrape
   *
   * @throws ValidationError if no query in the batch names a metric
   */
  query(batch: readonly DataQuery[], options?: CallOptions): Promise<ResponseEnvelope> {
    return this.queries.execute(batch, options);
  }

  /**
   * Get the loaded settings (read-only)
   */
  getSettings(): Settings {
    const { settings } = this.context;
    if (!settings) {
      throw new ConfigurationError('settings not initialized', 'NOT_INITIALIZED');
    }
    return settings;
  }

  /**
   * Close the shared transport. Later health checks report
   * `client not initialized`; later queries reject.
   */
  async dispose(): Promise<void> {
    const { transport } = this.context;
    this.context.transport = undefined;
    await transport?.close();
    this.context.debug?.('Metrics bridge disposed');
  }
}

/**
 * Create a new MetricsBridge instance
 */
export function createBridge(options: MetricsBridgeOptions): MetricsBridge {
  return new MetricsBridge(options);
}
