/**
 * Bridge Instrumentation
 *
 * Counters for health checks and queries, owned by an explicit registry
 * that the host passes into the bridge.
 */

import { Counter, Histogram, Registry } from 'prom-client';
import type { HealthStatus } from '../types/health.js';

/** Outcome label recorded for each answered query */
export type QueryOutcomeLabel =
  | 'ok'
  | 'not_found'
  | 'malformed_value'
  | 'invalid'
  | 'transport_error';

export interface BridgeMetricsOptions {
  /** Registry to register the collectors with (default: a new private registry) */
  registry?: Registry;
  /** Metric name prefix (default: metrics_bridge_) */
  prefix?: string;
}

export class BridgeMetrics {
  readonly registry: Registry;
  readonly queriesTotal: Counter<'outcome'>;
  readonly healthChecksTotal: Counter<'status'>;
  readonly healthCheckDuration: Histogram;

  constructor(options: BridgeMetricsOptions = {}) {
    this.registry = options.registry ?? new Registry();
    const prefix = options.prefix ?? 'metrics_bridge_';

    this.queriesTotal = new Counter({
      name: `${prefix}queries_total`,
      help: 'Total number of queries.',
      labelNames: ['outcome'] as const,
      registers: [this.registry],
    });

    this.healthChecksTotal = new Counter({
      name: `${prefix}health_checks_total`,
      help: 'Total number of health check calls.',
      labelNames: ['status'] as const,
      registers: [this.registry],
    });

    this.healthCheckDuration = new Histogram({
      name: `${prefix}health_check_duration_seconds`,
      help: 'Duration of health check requests.',
      registers: [this.registry],
    });
  }

  recordQuery(outcome: QueryOutcomeLabel): void {
    this.queriesTotal.inc({ outcome });
  }

  /**
   * Start timing a health check; call the returned function with the verdict
   */
  startHealthCheck(): (status: HealthStatus) => void {
    const end = this.healthCheckDuration.startTimer();
    return (status) => {
      end();
      this.healthChecksTotal.inc({ status });
    };
  }

  /** Text exposition of every collector in the registry */
  expose(): Promise<string> {
    return this.registry.metrics();
  }
}
