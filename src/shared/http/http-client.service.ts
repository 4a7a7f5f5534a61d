import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { Pool, Dispatcher } from 'undici';
import { PinoLoggerService } from '../logging/pino-logger.service';

export interface HttpRequestOptions {
  method?: Dispatcher.HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
}

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  /** Parsed JSON when the body is JSON, the raw text otherwise */
  body: unknown;
}

/**
 * Thin JSON client over one undici connection pool per origin. Pools are
 * shared by every caller; each request is independent.
 */
@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly logger: PinoLoggerService;
  private readonly pools: Map<string, Dispatcher> = new Map();
  private readonly defaultTimeout = 30000;
  private readonly defaultMaxRetries = 3;
  private readonly defaultRetryDelay = 1000;

  constructor(logger: PinoLoggerService) {
    this.logger = logger.forContext(HttpClientService.name);
  }

  /**
   * Route every request for `origin` through the given dispatcher instead of
   * a default pool (proxy agents, undici MockAgent pools).
   */
  useDispatcher(origin: string, dispatcher: Dispatcher): void {
    this.pools.set(new URL(origin).origin, dispatcher);
  }

  private getPool(origin: string): Dispatcher {
    let pool = this.pools.get(origin);
    if (!pool) {
      pool = new Pool(origin, {
        connections: 10,
        pipelining: 1,
        keepAliveTimeout: 30000,
        keepAliveMaxTimeout: 60000,
      });
      this.pools.set(origin, pool);
    }
    return pool;
  }

  async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const parsedUrl = new URL(url);
    const path = parsedUrl.pathname + parsedUrl.search;

    const pool = this.getPool(parsedUrl.origin);
    const maxRetries = options.maxRetries ?? this.defaultMaxRetries;
    const retryDelay = options.retryDelay ?? this.defaultRetryDelay;

    let lastError: Error = new Error(`Request to ${url} was not attempted`);

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        const response = await pool.request({
          path,
          method: options.method || 'GET',
          headers: options.headers,
          body: options.body,
          headersTimeout: options.timeout ?? this.defaultTimeout,
          bodyTimeout: options.timeout ?? this.defaultTimeout,
        });

        const bodyText = await response.body.text();

        return {
          statusCode: response.statusCode,
          headers: response.headers,
          body: this.parseBody(bodyText),
        };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (attempt < maxRetries) {
          this.logger.warn({ url, attempt, error: lastError.message }, 'HTTP request failed, retrying');
          await this.delay(retryDelay * Math.pow(2, attempt));
        }
      }
    }

    this.logger.debug({ url, maxRetries, error: lastError.message }, 'HTTP request failed');
    throw lastError;
  }

  async get(
    url: string,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, { ...options, method: 'GET' });
  }

  async post(
    url: string,
    body: unknown,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, {
      ...options,
      method: 'POST',
      body: JSON.stringify(body),
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        ...options?.headers,
      },
    });
  }

  private parseBody(text: string): unknown {
    if (text.length === 0) {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  async onModuleDestroy(): Promise<void> {
    await this.destroy();
  }

  async destroy(): Promise<void> {
    const closePromises = Array.from(this.pools.values()).map((pool) => pool.close());
    await Promise.all(closePromises);
    this.pools.clear();
  }
}
