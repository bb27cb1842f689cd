/**
 * HTTP Transport tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { http, HttpResponse } from 'msw';
import { setupServer } from 'msw/node';
import { HttpTransport, createTransport } from '../../src/utils/http.js';
import type { FetchFn, FetchInit } from '../../src/config.js';
import { ConfigurationError, NetworkError, TimeoutError, TransportError } from '../../src/errors.js';

const server = setupServer();

beforeEach(() => {
  server.listen({ onUnhandledRequest: 'error' });
});

afterEach(() => {
  server.resetHandlers();
  server.close();
});

/** A fetch that never answers and rejects once its signal aborts */
function hangingFetch(): FetchFn {
  return (_url: string, init: FetchInit) =>
    new Promise((_resolve, reject) => {
      init.signal.addEventListener('abort', () => {
        reject(new DOMException('The operation was aborted.', 'AbortError'));
      });
    });
}

/**
 * A fetch whose headers arrive at once but whose body sends one line and then
 * stalls until the request signal aborts
 */
function stalledBodyFetch(): FetchFn {
  return (_url: string, init: FetchInit) => {
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('foo 1\n'));
        init.signal.addEventListener('abort', () => {
          controller.error(new DOMException('The operation was aborted.', 'AbortError'));
        });
      },
    });
    return Promise.resolve(new Response(body, { status: 200 }));
  };
}

describe('createTransport', () => {
  it('should create a transport with defaults', () => {
    const transport = createTransport();
    expect(transport).toBeInstanceOf(HttpTransport);
    expect(transport.timeout).toBe(30000);
  });

  it('should throw ConfigurationError for invalid options', () => {
    expect(() => createTransport({ timeout: 0 })).toThrow(ConfigurationError);
    expect(() => createTransport({ proxy: { url: '::nope::' } })).toThrow(ConfigurationError);
  });

  it('should build a TLS transport and release it', async () => {
    const transport = createTransport({ tls: { skipVerify: true, serverName: 'monitor.test' } });
    await expect(transport.close()).resolves.toBeUndefined();
  });

  it('should build a proxy transport and release it', async () => {
    const transport = createTransport({
      proxy: { url: 'http://proxy.test:3128', username: 'user', password: 'test-secret' },
    });
    await expect(transport.close()).resolves.toBeUndefined();
  });
});

describe('HttpTransport', () => {
  describe('get', () => {
    it('should make a GET request and return the status line', async () => {
      server.use(
        http.get('http://monitor.test/api/health', () => {
          return HttpResponse.text('ok');
        })
      );

      const transport = createTransport();
      const response = await transport.get('http://monitor.test/api/health');

      expect(response).toMatchObject({ ok: true, status: 200 });
      expect(response).not.toHaveProperty('text');
    });

    it('should not throw on a non-2xx status', async () => {
      server.use(
        http.get('http://monitor.test/api/health', () => {
          return new HttpResponse('down', { status: 503, statusText: 'Service Unavailable' });
        })
      );

      const response = await createTransport().get('http://monitor.test/api/health');

      expect(response.ok).toBe(false);
      expect(response.status).toBe(503);
      expect(response.statusText).toBe('Service Unavailable');
    });
  });

  describe('getText', () => {
    it('should read a 2xx body as text', async () => {
      server.use(
        http.get('http://monitor.test/metrics', () => {
          return HttpResponse.text('foo 1\n');
        })
      );

      const response = await createTransport().getText('http://monitor.test/metrics');

      expect(response).toMatchObject({ ok: true, status: 200, text: 'foo 1\n' });
    });

    it('should discard a non-2xx body', async () => {
      server.use(
        http.get('http://monitor.test/metrics', () => {
          return new HttpResponse('broken', { status: 500, statusText: 'Internal Server Error' });
        })
      );

      const response = await createTransport().getText('http://monitor.test/metrics');

      expect(response).toEqual({
        ok: false,
        status: 500,
        statusText: 'Internal Server Error',
        text: '',
      });
    });

    it('should time out while the body stalls', async () => {
      const transport = createTransport({ timeout: 20, fetch: stalledBodyFetch() });

      const request = transport.getText('http://monitor.test/metrics');

      await expect(request).rejects.toThrow(TimeoutError);
      await expect(request).rejects.toThrow('Request timed out after 20ms');
    });

    it('should abort while the body stalls when the caller signal fires', async () => {
      const transport = createTransport({ timeout: 60000, fetch: stalledBodyFetch() });
      const controller = new AbortController();

      const request = transport.getText('http://monitor.test/metrics', { signal: controller.signal });
      setTimeout(() => controller.abort(), 10);

      await expect(request).rejects.toThrow(TransportError);
      await expect(request).rejects.toMatchObject({ code: 'ABORTED', message: 'Request aborted' });
    });
  });

  describe('headers', () => {
    it('should send default, user agent and per-call headers', async () => {
      let headers: Headers | undefined;
      server.use(
        http.get('http://monitor.test/metrics', ({ request }) => {
          headers = request.headers;
          return HttpResponse.text('');
        })
      );

      const transport = createTransport({ headers: { 'X-Tenant': 'blue' } });
      await transport.get('http://monitor.test/metrics', { headers: { Accept: 'text/plain' } });

      expect(headers?.get('X-Tenant')).toBe('blue');
      expect(headers?.get('Accept')).toBe('text/plain');
      expect(headers?.get('User-Agent')).toBe('metrics-bridge/0.3.0');
    });

    it('should let per-call headers override defaults', async () => {
      let tenant: string | null = null;
      server.use(
        http.get('http://monitor.test/metrics', ({ request }) => {
          tenant = request.headers.get('X-Tenant');
          return HttpResponse.text('');
        })
      );

      const transport = createTransport({ headers: { 'X-Tenant': 'blue' } });
      await transport.get('http://monitor.test/metrics', { headers: { 'X-Tenant': 'green' } });

      expect(tenant).toBe('green');
    });
  });

  describe('custom fetch', () => {
    it('should use the injected fetch', async () => {
      const fetch = vi.fn<FetchFn>().mockResolvedValue(new Response('x 1', { status: 200 }));
      const transport = createTransport({ fetch });

      const response = await transport.getText('http://monitor.test/metrics');

      expect(fetch).toHaveBeenCalledTimes(1);
      expect(fetch.mock.calls[0]?.[0]).toBe('http://monitor.test/metrics');
      expect(fetch.mock.calls[0]?.[1].method).toBe('GET');
      expect(response.text).toBe('x 1');
    });
  });

  describe('failures', () => {
    it('should throw NetworkError when fetch rejects', async () => {
      server.use(
        http.get('http://monitor.test/api/health', () => {
          return HttpResponse.error();
        })
      );

      const transport = createTransport();
      const request = transport.get('http://monitor.test/api/health');

      await expect(request).rejects.toThrow(NetworkError);
      await expect(request).rejects.toThrow(/^Network request failed: /);
    });

    it('should throw TimeoutError after the timeout', async () => {
      const transport = createTransport({ timeout: 20, fetch: hangingFetch() });

      const request = transport.get('http://monitor.test/api/health');

      await expect(request).rejects.toThrow(TimeoutError);
      await expect(request).rejects.toThrow('Request timed out after 20ms');
    });

    it('should honour a per-call timeout', async () => {
      const transport = createTransport({ timeout: 60000, fetch: hangingFetch() });

      await expect(
        transport.get('http://monitor.test/api/health', { timeout: 10 })
      ).rejects.toThrow('Request timed out after 10ms');
    });

    it('should abort when the caller signal fires', async () => {
      const transport = createTransport({ timeout: 60000, fetch: hangingFetch() });
      const controller = new AbortController();

      const request = transport.get('http://monitor.test/api/health', { signal: controller.signal });
      controller.abort();

      await expect(request).rejects.toThrow(TransportError);
      await expect(request).rejects.toMatchObject({ code: 'ABORTED', message: 'Request aborted' });
    });

    it('should not send a request when the signal is already aborted', async () => {
      const fetch = vi.fn<FetchFn>();
      const transport = createTransport({ fetch });
      const controller = new AbortController();
      controller.abort();

      await expect(
        transport.get('http://monitor.test/api/health', { signal: controller.signal })
      ).rejects.toMatchObject({ code: 'ABORTED' });
      expect(fetch).not.toHaveBeenCalled();
    });
  });

  describe('debug logging', () => {
    it('should log requests and responses', async () => {
      const debug = vi.fn();
      const fetch = vi.fn<FetchFn>().mockResolvedValue(new Response(null, { status: 204 }));
      const transport = createTransport({ fetch, debug, timeout: 1000 });

      await transport.get('http://monitor.test/api/health');

      expect(debug).toHaveBeenCalledWith('GET http://monitor.test/api/health', { timeout: 1000 });
      expect(debug).toHaveBeenCalledWith('Response: 204', { url: 'http://monitor.test/api/health' });
    });
  });
});
