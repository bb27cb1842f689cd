/**
 * HTTP Transport
 *
 * Provides a reusable fetch wrapper with:
 * - Default and per-call headers
 * - Timeout support via AbortController
 * - Caller cancellation through an AbortSignal
 * - TLS and proxy options through an undici dispatcher
 *
 * The transport never retries and never throws on a non-2xx status;
 * classifying responses is left to callers. The timeout and the caller's
 * signal cover the body read as well as the headers.
 */

import { Agent, ProxyAgent, fetch as undiciFetch, type Dispatcher } from 'undici';
import {
  type DebugFn,
  type FetchFn,
  type FetchResponse,
  type ResolvedTransportConfig,
  type TransportOptions,
  resolveConfig,
  validateConfig,
} from '../config.js';
import { ConfigurationError, NetworkError, TimeoutError, TransportError, errorMessage } from '../errors.js';

/** Per-call request options */
export interface TransportRequestOptions {
  /** Additional headers */
  headers?: Record<string, string>;
  /** Request timeout in milliseconds (overrides transport default) */
  timeout?: number;
  /** Optional abort signal */
  signal?: AbortSignal;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

function proxyToken(username: string | undefined, password: string | undefined): string | undefined {
  if (username === undefined) {
    return undefined;
  }
  return `Basic ${Buffer.from(`${username}:${password ?? ''}`).toString('base64')}`;
}

/** Status line of a response whose body was discarded */
export interface TransportResponse {
  ok: boolean;
  status: number;
  statusText: string;
}

/** Status line plus the body read as text */
export interface TextResponse extends TransportResponse {
  text: string;
}

/**
 * Build the undici dispatcher for TLS / proxy options, if any are set
 */
function createDispatcher(config: ResolvedTransportConfig): Dispatcher | undefined {
  const tls = config.tls;
  const connect = tls
    ? {
        ca: tls.ca,
        cert: tls.cert,
        key: tls.key,
        servername: tls.serverName,
        rejectUnauthorized: !tls.skipVerify,
      }
    : undefined;

  try {
    if (config.proxy) {
      return new ProxyAgent({
        uri: config.proxy.url,
        token: proxyToken(config.proxy.username, config.proxy.password),
        requestTls: connect,
      });
    }
    if (connect) {
      return new Agent({ connect });
    }
  } catch (error) {
    throw new ConfigurationError(
      `failed to create HTTP transport: ${errorMessage(error)}`,
      'INVALID_TRANSPORT',
      undefined,
      error instanceof Error ? error : undefined
    );
  }
  return undefined;
}

/**
 * HTTP Transport class
 *
 * Immutable after construction and safe to share between concurrent calls.
 */
export class HttpTransport {
  private readonly config: ResolvedTransportConfig;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly fetchFn: FetchFn;
  private readonly debug: DebugFn | null;

  constructor(config: ResolvedTransportConfig) {
    this.config = config;
    this.debug = config.debug;
    this.dispatcher = createDispatcher(config);

    const dispatcher = this.dispatcher;
    if (config.fetch) {
      this.fetchFn = config.fetch;
    } else if (dispatcher) {
      this.fetchFn = (url, init) => undiciFetch(url, { ...init, dispatcher });
    } else {
      this.fetchFn = (url, init) => globalThis.fetch(url, init);
    }
  }

  /** Default request timeout in milliseconds */
  get timeout(): number {
    return this.config.timeout;
  }

  /**
   * Build request headers
   */
  private buildHeaders(customHeaders?: Record<string, string>): Record<string, string> {
    return {
      ...this.config.headers,
      'User-Agent': this.config.userAgent,
      ...customHeaders,
    };
  }

  /**
   * Execute a GET request and read its response, both within the timeout.
   * The timer and the caller's abort stay armed until `read` settles.
   */
  private async send<T>(
    url: string,
    options: TransportRequestOptions,
    read: (response: FetchResponse) => Promise<T>
  ): Promise<T> {
    const timeoutMs = options.timeout ?? this.config.timeout;
    const externalSignal = options.signal;

    if (externalSignal?.aborted) {
      throw new TransportError('Request aborted', 0, 'ABORTED');
    }

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    externalSignal?.addEventListener('abort', onAbort, { once: true });
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    this.debug?.(`GET ${url}`, { timeout: timeoutMs });

    try {
      const response = await this.fetchFn(url, {
        method: 'GET',
        headers: this.buildHeaders(options.headers),
        signal: controller.signal,
      });
      this.debug?.(`Response: ${response.status}`, { url });
      return await read(response);
    } catch (error) {
      if (isAbortError(error) || controller.signal.aborted) {
        // Check if this was a timeout or a caller abort
        if (externalSignal?.aborted) {
          throw new TransportError('Request aborted', 0, 'ABORTED');
        }
        throw new TimeoutError(`Request timed out after ${timeoutMs}ms`, timeoutMs);
      }
      const cause = error instanceof Error ? error : undefined;
      throw new NetworkError(`Network request failed: ${cause?.message ?? 'Unknown error'}`, cause);
    } finally {
      clearTimeout(timeoutId);
      externalSignal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Execute a GET request and discard the body
   */
  async get(url: string, options: TransportRequestOptions = {}): Promise<TransportResponse> {
    return this.send(url, options, async (response) => {
      await response.body?.cancel();
      return { ok: response.ok, status: response.status, statusText: response.statusText };
    });
  }

  /**
   * Execute a GET request and read a 2xx body as text.
   * Non-2xx bodies are discarded and `text` is empty.
   */
  async getText(url: string, options: TransportRequestOptions = {}): Promise<TextResponse> {
    return this.send(url, options, async (response) => {
      let text = '';
      if (response.ok) {
        text = await response.text();
      } else {
        await response.body?.cancel();
      }
      return { ok: response.ok, status: response.status, statusText: response.statusText, text };
    });
  }

  /**
   * Release pooled connections held by the dispatcher
   */
  async close(): Promise<void> {
    await this.dispatcher?.close();
  }
}

/**
 * Create an HTTP transport from host-supplied connection options
 * @throws ConfigurationError if the options are invalid
 */
export function createTransport(options: TransportOptions = {}): HttpTransport {
  const config = resolveConfig(options);
  validateConfig(config);
  return new HttpTransport(config);
}
