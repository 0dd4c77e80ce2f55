import { SourceFetchError } from '../errors';
import { createLogger, errorMessage } from '../utils/logger';

export const USER_AGENT = 'Mozilla/5.0 (compatible; JobTracker/1.0)';

const log = createLogger('HTTP');

export interface HttpOptions {
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  throttle?: PerHostThrottle;
}

export interface RequestOptions {
  source: string;
  headers?: Record<string, string>;
}

export interface HttpClient {
  getJson<T>(url: string, opts: RequestOptions): Promise<T>;
  postJson<T>(url: string, body: unknown, opts: RequestOptions): Promise<T>;
  getText(url: string, opts: RequestOptions): Promise<string>;
  /** Raw response for callers that need headers; 4xx is returned, 5xx throws after retries. */
  getRaw(url: string, opts: RequestOptions): Promise<Response>;
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Keeps at most one request in flight per host and spaces consecutive
 * requests to the same host by `minIntervalMs`.
 */
export class PerHostThrottle {
  private readonly tails = new Map<string, Promise<void>>();

  constructor(private readonly minIntervalMs: number) {}

  run<T>(url: string, fn: () => Promise<T>): Promise<T> {
    const host = new URL(url).host;
    const previous = this.tails.get(host) ?? Promise.resolve();
    const task = previous.then(fn);
    const pause = () => delay(this.minIntervalMs);
    this.tails.set(host, task.then(pause, pause));
    return task;
  }
}

interface OutgoingRequest {
  method: 'GET' | 'POST';
  body?: string;
  headers?: Record<string, string>;
}

class RetryableStatus extends Error {
  constructor(readonly status: number) {
    super(`HTTP ${status}`);
  }
}

export function createHttpClient(options: HttpOptions): HttpClient {
  async function send(url: string, init: OutgoingRequest, opts: RequestOptions): Promise<Response> {
    const attempt = async (): Promise<Response> => {
      const response = await fetch(url, {
        method: init.method,
        body: init.body,
        headers: { 'User-Agent': USER_AGENT, ...opts.headers, ...init.headers },
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      if (response.status >= 500) throw new RetryableStatus(response.status);
      return response;
    };

    let lastError: unknown;
    for (let i = 0; i <= options.maxRetries; i++) {
      try {
        return options.throttle ? await options.throttle.run(url, attempt) : await attempt();
      } catch (error) {
        lastError = error;
        if (i < options.maxRetries) {
          const wait = options.retryDelayMs * Math.pow(2, i);
          log.debug(`${opts.source}: attempt ${i + 1} failed (${errorMessage(error)}), retrying in ${wait}ms`);
          await delay(wait);
        }
      }
    }

    const status = lastError instanceof RetryableStatus ? lastError.status : undefined;
    throw new SourceFetchError(opts.source, url, errorMessage(lastError), status);
  }

  async function ensureOk(response: Response, url: string, opts: RequestOptions): Promise<Response> {
    if (!response.ok) {
      throw new SourceFetchError(opts.source, url, `HTTP ${response.status}`, response.status);
    }
    return response;
  }

  async function readJson<T>(response: Response, url: string, opts: RequestOptions): Promise<T> {
    try {
      return (await response.json()) as T;
    } catch (error) {
      throw new SourceFetchError(opts.source, url, `malformed JSON: ${errorMessage(error)}`, response.status);
    }
  }

  return {
    async getJson<T>(url: string, opts: RequestOptions): Promise<T> {
      const response = await ensureOk(await send(url, { method: 'GET' }, opts), url, opts);
      return readJson<T>(response, url, opts);
    },

    async postJson<T>(url: string, body: unknown, opts: RequestOptions): Promise<T> {
      const response = await ensureOk(
        await send(
          url,
          {
            method: 'POST',
            body: JSON.stringify(body),
            headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
          },
          opts,
        ),
        url,
        opts,
      );
      return readJson<T>(response, url, opts);
    },

    async getText(url: string, opts: RequestOptions): Promise<string> {
      const response = await ensureOk(await send(url, { method: 'GET' }, opts), url, opts);
      return response.text();
    },

    getRaw(url: string, opts: RequestOptions): Promise<Response> {
      return send(url, { method: 'GET' }, opts);
    },
  };
}

/** First value of the named cookie among the response's Set-Cookie headers. */
export function readCookie(headers: Headers, name: string): string | undefined {
  const cookies = typeof headers.getSetCookie === 'function' ? headers.getSetCookie() : [];
  const all = cookies.length > 0 ? cookies : (headers.get('set-cookie') ?? '').split(/,(?=\s*[^;,]+=)/);
  for (const cookie of all) {
    const [pair] = cookie.split(';');
    const eq = pair.indexOf('=');
    if (eq > 0 && pair.slice(0, eq).trim() === name) {
      return pair.slice(eq + 1).trim();
    }
  }
  return undefined;
}
