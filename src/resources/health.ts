/**
 * Health Resource
 */

import { errorMessage } from '../errors.js';
import { resolveEndpoint } from '../settings.js';
import type { HealthStatus, HealthVerdict } from '../types/health.js';
import type { CallOptions, ResourceContext } from './context.js';

function verdict(status: HealthStatus, message: string): HealthVerdict {
  return { status, message };
}

export class HealthResource {
  constructor(private readonly context: ResourceContext) {}

  /**
   * Liveness probe.
   *
   * GET {path}{healthPath} with `Authorization: Bearer <apiKey>`. Local
   * checks run before any I/O; a missing API key never reaches the network.
   * Never throws.
   */
  async check(options: CallOptions = {}): Promise<HealthVerdict> {
    const done = this.context.instrumentation?.startHealthCheck();
    const result = await this.probe(options);
    done?.(result.status);
    if (result.status === 'error') {
      this.context.debug?.(`Health check failed: ${result.message}`);
    }
    return result;
  }

  private async probe(options: CallOptions): Promise<HealthVerdict> {
    const { settings, transport } = this.context;

    if (!settings) {
      return verdict('error', 'settings not initialized');
    }
    if (!transport) {
      return verdict('error', 'client not initialized');
    }

    const apiKey = settings.secrets?.apiKey;
    if (!apiKey) {
      return verdict('error', 'missing API key');
    }

    let url: string;
    try {
      url = resolveEndpoint(settings, settings.healthPath);
    } catch (error) {
      return verdict('error', `failed to create health check request: ${errorMessage(error)}`);
    }

    let status: number;
    let statusText: string;
    try {
      const response = await transport.get(url, {
        headers: { Authorization: `Bearer ${apiKey}` },
        signal: options.signal,
      });
      status = response.status;
      statusText = response.statusText;
    } catch (error) {
      return verdict('error', `request error: ${errorMessage(error)}`);
    }

    if (status < 200 || status > 299) {
      return verdict('error', `unexpected response: ${`${status} ${statusText}`.trim()}`);
    }

    return verdict('ok', 'healthy');
  }
}
