/**
 * Metrics Resource
 */

import { BridgeError, ConfigurationError, MetricNotFoundError, TransportError, errorMessage } from '../errors.js';
import { resolveEndpoint } from '../settings.js';
import type { MetricSample, ScrapeOutcome } from '../types/metrics.js';
import { findMetric } from '../utils/exposition.js';
import type { CallOptions, ResourceContext } from './context.js';

export class MetricsResource {
  constructor(private readonly context: ResourceContext) {}

  /**
   * Fetch the raw exposition document.
   *
   * GET {path}{metricsPath}
   *
   * @throws TransportError on network failure, timeout or a non-2xx status
   */
  async scrape(options: CallOptions = {}): Promise<string> {
    const { settings, transport, debug } = this.context;
    if (!settings || !transport) {
      throw new ConfigurationError('client not initialized', 'NOT_INITIALIZED');
    }

    let url: string;
    try {
      url = resolveEndpoint(settings, settings.metricsPath);
    } catch (error) {
      throw new TransportError(
        `failed to create scrape request: ${errorMessage(error)}`,
        0,
        'INVALID_REQUEST',
        undefined,
        error instanceof Error ? error : undefined
      );
    }

    // The body is read inside the transport so the timeout and the caller's
    // signal still apply while it streams in.
    const response = await transport.getText(url, {
      // Ensure we get the raw text response.
      headers: { Accept: 'text/plain' },
      signal: options.signal,
    });

    if (!response.ok) {
      throw new TransportError(
        `failed to fetch metrics from endpoint: ${`${response.status} ${response.statusText}`.trim()}`,
        response.status,
        'HTTP_ERROR'
      );
    }

    const document = response.text;
    debug?.('Fetched metrics data', { url, bytes: document.length });
    return document;
  }

  /**
   * Scrape and look up one metric by exact name
   */
  async find(name: string, options: CallOptions = {}): Promise<ScrapeOutcome> {
    const document = await this.scrape(options);
    return findMetric(document, name);
  }

  /**
   * Scrape and return one metric sample
   *
   * @throws MetricNotFoundError if no `<name> <value>` line exists
   * @throws BridgeError with code MALFORMED_VALUE if the value is not a float
   */
  async get(name: string, options: CallOptions = {}): Promise<MetricSample> {
    const outcome = await this.find(name, options);
    switch (outcome.kind) {
      case 'found':
        return outcome.sample;
      case 'not_found':
        throw new MetricNotFoundError(name);
      case 'malformed_value':
        throw new BridgeError(
          `metric ${name} has malformed value "${outcome.raw}"`,
          0,
          'MALFORMED_VALUE',
          { metricName: name, raw: outcome.raw }
        );
    }
  }
}
