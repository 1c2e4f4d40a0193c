import pRetry, { AbortError } from 'p-retry';
import type { z } from 'zod';
import type { SourceId } from '../adapters/types.js';
import { AdapterError } from './errors.js';
import { RateLimiter } from './rate-limiter.js';
import { createChildLogger, type Logger } from './logger.js';

export interface HttpClientOptions {
  source: SourceId;
  rateLimiter: RateLimiter;
  timeoutMs?: number;
  retries?: number;
  /** Delay before the first retry; later retries back off exponentially. */
  retryDelayMs?: number;
  userAgent?: string;
}

export const DEFAULT_USER_AGENT = 'TopicScout/1.0 (Topic Search Aggregator)';

/**
 * fetch wrapper shared by adapters: every attempt takes a rate-limiter token
 * and runs under a timeout. Server errors, 429s and network failures are
 * retried; other 4xx responses fail at once.
 */
export class HttpClient {
  private readonly source: SourceId;
  private readonly rateLimiter: RateLimiter;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly userAgent: string;
  private readonly logger: Logger;

  constructor(options: HttpClientOptions) {
    this.source = options.source;
    this.rateLimiter = options.rateLimiter;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.logger = createChildLogger(`http:${options.source}`);
  }

  async getText(url: string, init: RequestInit = {}): Promise<string> {
    const response = await this.request(url, init);
    return response.text();
  }

  async getJson<S extends z.ZodTypeAny>(url: string, schema: S, init: RequestInit = {}): Promise<z.infer<S>> {
    const response = await this.request(url, {
      ...init,
      headers: withDefaults(init.headers, { Accept: 'application/json' }),
    });
    return this.parseJson(url, response, schema);
  }

  async postForm<S extends z.ZodTypeAny>(
    url: string,
    body: Record<string, string>,
    schema: S,
    init: RequestInit = {}
  ): Promise<z.infer<S>> {
    const response = await this.request(url, {
      ...init,
      method: 'POST',
      body: new URLSearchParams(body).toString(),
      headers: withDefaults(init.headers, {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      }),
    });
    return this.parseJson(url, response, schema);
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    return pRetry(
      async () => {
        await this.rateLimiter.acquire();
        this.logger.debug({ url, method: init.method ?? 'GET' }, 'HTTP request');

        let response: Response;
        try {
          response = await fetch(url, {
            ...init,
            signal: init.signal ?? AbortSignal.timeout(this.timeoutMs),
            headers: withDefaults(init.headers, { 'User-Agent': this.userAgent }),
          });
        } catch (error) {
          if (error instanceof Error && error.name === 'TimeoutError') {
            throw new AdapterError(this.source, `Request timed out: ${url}`, undefined, { cause: error });
          }
          throw new AdapterError(this.source, `Fetch failed: ${url}`, undefined, { cause: error });
        }

        if (!response.ok) {
          const failure = new AdapterError(
            this.source,
            `HTTP ${response.status}: ${response.statusText}`,
            response.status
          );
          if (response.status >= 400 && response.status < 500 && response.status !== 429) {
            throw new AbortError(failure);
          }
          throw failure;
        }

        return response;
      },
      {
        retries: this.retries,
        minTimeout: this.retryDelayMs,
        onFailedAttempt: (error) => {
          this.logger.debug(
            { url, attempt: error.attemptNumber, retriesLeft: error.retriesLeft, error: error.message },
            'Retry attempt'
          );
        },
      }
    );
  }

  private async parseJson<S extends z.ZodTypeAny>(url: string, response: Response, schema: S): Promise<z.infer<S>> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new AdapterError(this.source, `Invalid JSON from ${url}`, response.status, { cause: error });
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      throw new AdapterError(this.source, `Unexpected response shape from ${url}`, response.status, {
        cause: result.error,
      });
    }
    return result.data;
  }
}

/** Caller-supplied headers win over the defaults. */
function withDefaults(headers: RequestInit['headers'], defaults: Record<string, string>): Headers {
  const merged = new Headers(headers);
  for (const [name, value] of Object.entries(defaults)) {
    if (!merged.has(name)) {
      merged.set(name, value);
    }
  }
  return merged;
}
