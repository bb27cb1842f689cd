/**
 * Bridge Configuration
 *
 * Defines transport options and defaults for the metrics bridge.
 */

import { ConfigurationError } from './errors.js';

/** TLS options for the monitored endpoints */
export interface TlsOptions {
  /** PEM-encoded CA bundle used to verify the server certificate */
  ca?: string;
  /** PEM-encoded client certificate (requires `key`) */
  cert?: string;
  /** PEM-encoded client private key (requires `cert`) */
  key?: string;
  /** Skip server certificate verification (default: false) */
  skipVerify?: boolean;
  /** Server name used for SNI and certificate checks */
  serverName?: string;
}

/** Forward proxy options */
export interface ProxyOptions {
  /** Proxy URL, e.g. http://proxy.internal:3128 */
  url: string;
  /** Basic auth user for the proxy */
  username?: string;
  /** Basic auth password for the proxy */
  password?: string;
}

/** Minimal request init the transport hands to fetch */
export interface FetchInit {
  method: 'GET';
  headers: Record<string, string>;
  signal: AbortSignal;
}

/** Minimal response shape the bridge reads */
export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  body?: { cancel(): Promise<void> } | null;
  text(): Promise<string>;
}

/** Fetch implementation accepted by the transport */
export type FetchFn = (url: string, init: FetchInit) => Promise<FetchResponse>;

/** Debug logging function type */
export type DebugFn = (message: string, meta?: unknown) => void;

/** Host-supplied connection options */
export interface TransportOptions {
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** TLS configuration */
  tls?: TlsOptions;
  /** Forward proxy configuration */
  proxy?: ProxyOptions;
  /** Additional headers to include in all requests */
  headers?: Record<string, string>;
  /** Custom user agent string */
  userAgent?: string;
  /** Custom fetch implementation (for testing or special runtimes); bypasses the TLS/proxy dispatcher */
  fetch?: FetchFn;
  /** Enable debug logging */
  debug?: boolean | DebugFn;
}

/** Resolved transport configuration with all defaults applied */
export interface ResolvedTransportConfig {
  timeout: number;
  tls?: TlsOptions;
  proxy?: ProxyOptions;
  headers: Record<string, string>;
  userAgent: string;
  fetch?: FetchFn;
  debug: DebugFn | null;
}

/** Bridge version */
export const BRIDGE_VERSION = '0.3.0';

/** Default configuration values */
export const DEFAULT_CONFIG = {
  timeout: 30000,
  healthPath: '/api/health',
  metricsPath: '/metrics',
  userAgent: `metrics-bridge/${BRIDGE_VERSION}`,
} as const;

/**
 * Build the debug function from the `debug` option
 */
export function resolveDebug(debug: boolean | DebugFn | undefined): DebugFn | null {
  if (debug === true) {
    return (message: string, meta?: unknown) => {
      // eslint-disable-next-line no-console
      console.log(`[metrics-bridge] ${message}`, meta !== undefined ? meta : '');
    };
  }
  if (typeof debug === 'function') {
    return debug;
  }
  return null;
}

/**
 * Resolve transport options by merging them with defaults
 */
export function resolveConfig(options: TransportOptions = {}): ResolvedTransportConfig {
  return {
    timeout: options.timeout ?? DEFAULT_CONFIG.timeout,
    tls: options.tls,
    proxy: options.proxy,
    headers: { ...options.headers },
    userAgent: options.userAgent ?? DEFAULT_CONFIG.userAgent,
    fetch: options.fetch,
    debug: resolveDebug(options.debug),
  };
}

/**
 * Validate resolved transport options
 * @throws ConfigurationError if the options cannot produce a transport
 */
export function validateConfig(config: ResolvedTransportConfig): void {
  if (!Number.isFinite(config.timeout) || config.timeout <= 0) {
    throw new ConfigurationError('timeout must be a positive number', 'INVALID_TIMEOUT');
  }

  for (const [name, value] of Object.entries(config.headers)) {
    if (/[\r\n]/.test(name) || /[\r\n]/.test(value)) {
      throw new ConfigurationError(`header ${name} contains a line break`, 'INVALID_HEADER');
    }
  }

  if (config.tls) {
    const { cert, key } = config.tls;
    if (Boolean(cert) !== Boolean(key)) {
      throw new ConfigurationError(
        'tls.cert and tls.key must be provided together',
        'INVALID_TLS'
      );
    }
  }

  if (config.proxy) {
    let proxyUrl: URL;
    try {
      proxyUrl = new URL(config.proxy.url);
    } catch (error) {
      throw new ConfigurationError(
        `proxy.url is not a valid URL: ${config.proxy.url}`,
        'INVALID_PROXY',
        undefined,
        error instanceof Error ? error : undefined
      );
    }
    if (proxyUrl.protocol !== 'http:' && proxyUrl.protocol !== 'https:') {
      throw new ConfigurationError('proxy.url must start with http:// or https://', 'INVALID_PROXY');
    }
  }
}
