/**
 * Base HTTP Client
 *
 * Provides a consistent HTTP client with:
 * - Request/response interceptors
 * - User-Agent identification
 * - Error mapping
 * - Request logging
 */

import {
  NetworkError,
  NotFoundError,
  RateLimitError,
  ServerError,
  ValidationError,
} from '../types/errors';
import { ErrorResponseSchema } from '../utils/validators';
import { validateSafe } from '../utils/validation';
import { silentLogger, type Logger } from '../utils/logger';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type RequestInterceptor = (config: RequestConfig) => RequestConfig | Promise<RequestConfig>;

export interface ResponseInterceptor {
  onFulfilled?: (response: Response) => Response | Promise<Response>;
  onRejected?: (error: Error) => Error | Promise<Error>;
}

export interface RequestConfig {
  url: string;
  method?: 'GET' | 'POST';
  params?: QueryParams;
  headers?: Record<string, string>;
  body?: string;
  timeout?: number;
}

export interface HTTPClientConfig {
  baseURL?: string;
  timeout?: number;
  headers?: Record<string, string>;
  userAgent?: string;
}

interface Exchange {
  url: string;
  signal: AbortSignal;
  timeout: number;
}

export class BaseClient {
  private httpConfig: Required<HTTPClientConfig>;
  private requestInterceptors: RequestInterceptor[] = [];
  private responseInterceptors: ResponseInterceptor[] = [];
  private readonly logger: Logger;

  constructor(httpConfig?: HTTPClientConfig, logger: Logger = silentLogger) {
    this.logger = logger.child('HTTPClient');
    this.httpConfig = {
      baseURL: httpConfig?.baseURL ?? '',
      timeout: httpConfig?.timeout ?? 30000,
      headers: httpConfig?.headers ?? {},
      userAgent: httpConfig?.userAgent ?? '',
    };
  }

  /**
   * Add request interceptor
   *
   * @returns Index of the interceptor for removal
   */
  addRequestInterceptor(interceptor: RequestInterceptor): number {
    this.requestInterceptors.push(interceptor);
    return this.requestInterceptors.length - 1;
  }

  removeRequestInterceptor(index: number): void {
    if (index >= 0 && index < this.requestInterceptors.length) {
      this.requestInterceptors.splice(index, 1);
    }
  }

  /**
   * Add response interceptor
   *
   * @returns Index of the interceptor for removal
   */
  addResponseInterceptor(interceptor: ResponseInterceptor): number {
    this.responseInterceptors.push(interceptor);
    return this.responseInterceptors.length - 1;
  }

  removeResponseInterceptor(index: number): void {
    if (index >= 0 && index < this.responseInterceptors.length) {
      this.responseInterceptors.splice(index, 1);
    }
  }

  /**
   * Perform HTTP GET request
   *
   * @param url - Path relative to the base URL, or an absolute URL
   * @returns Decoded JSON body, or the body text for other content types
   */
  async get(url: string, config?: Omit<RequestConfig, 'url' | 'method' | 'body'>): Promise<unknown> {
    return this.request({
      url,
      method: 'GET',
      ...config,
    });
  }

  /**
   * Perform HTTP POST request
   *
   * @param url - Path relative to the base URL, or an absolute URL
   * @param data - Request body, sent as JSON
   */
  async post(
    url: string,
    data?: unknown,
    config?: Omit<RequestConfig, 'url' | 'method' | 'body'>
  ): Promise<unknown> {
    return this.request({
      url,
      method: 'POST',
      body: data !== undefined ? JSON.stringify(data) : undefined,
      ...config,
    });
  }

  /**
   * Perform HTTP request with interceptors.
   * The timeout covers the whole exchange, body included.
   */
  async request(config: RequestConfig): Promise<unknown> {
    try {
      let requestConfig = { ...config };
      for (const interceptor of this.requestInterceptors) {
        requestConfig = await interceptor(requestConfig);
      }

      const url = this.buildURL(requestConfig.url, requestConfig.params);
      const headers = this.buildHeaders(requestConfig);
      const method = requestConfig.method ?? 'GET';
      const timeout = requestConfig.timeout ?? this.httpConfig.timeout;

      this.logger.debug(`${method} ${url}`);

      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);
      const exchange: Exchange = { url, signal: controller.signal, timeout };

      try {
        const response = await this.send(exchange, { method, headers, body: requestConfig.body });

        let finalResponse = response;
        for (const interceptor of this.responseInterceptors) {
          if (interceptor.onFulfilled) {
            finalResponse = await interceptor.onFulfilled(finalResponse);
          }
        }

        if (!finalResponse.ok) {
          throw await this.handleErrorResponse(finalResponse, exchange);
        }

        return await this.readBody(finalResponse, exchange);
      } finally {
        clearTimeout(timeoutId);
      }
    } catch (error) {
      let finalError = error instanceof Error ? error : new Error(String(error));
      for (const interceptor of this.responseInterceptors) {
        if (interceptor.onRejected) {
          finalError = await interceptor.onRejected(finalError);
        }
      }

      throw finalError;
    }
  }

  /**
   * Build full URL with query parameters. Undefined parameters are left out.
   */
  private buildURL(url: string, params?: QueryParams): string {
    const fullURL = url.startsWith('http') ? url : `${this.httpConfig.baseURL}${url}`;

    const entries = Object.entries(params ?? {}).filter(
      (entry): entry is [string, string | number | boolean] => entry[1] !== undefined
    );
    if (entries.length === 0) {
      return fullURL;
    }

    const urlObj = new URL(fullURL);
    entries.forEach(([key, value]) => {
      urlObj.searchParams.append(key, String(value));
    });
    return urlObj.toString();
  }

  private buildHeaders(config: RequestConfig): Record<string, string> {
    const headers: Record<string, string> = {
      ...this.httpConfig.headers,
      ...config.headers,
    };

    if (this.httpConfig.userAgent && !headers['User-Agent']) {
      headers['User-Agent'] = this.httpConfig.userAgent;
    }

    if (config.method === 'POST' && config.body && !headers['Content-Type']) {
      headers['Content-Type'] = 'application/json';
    }

    return headers;
  }

  private async send(
    exchange: Exchange,
    init: { method: string; headers: Record<string, string>; body?: string }
  ): Promise<Response> {
    try {
      return await fetch(exchange.url, { ...init, signal: exchange.signal });
    } catch (error) {
      throw this.transportError(error, exchange);
    }
  }

  /**
   * Decoded JSON for `application/json` responses, text otherwise
   */
  private async readBody(response: Response, exchange: Exchange): Promise<unknown> {
    const isJSON = response.headers.get('content-type')?.includes('application/json') ?? false;

    try {
      return await untilAborted(isJSON ? response.json() : response.text(), exchange.signal);
    } catch (error) {
      if (error instanceof SyntaxError && !exchange.signal.aborted) {
        throw new ValidationError(`Response body is not valid JSON: ${error.message}`, undefined, {
          url: exchange.url,
          status: response.status,
        });
      }
      throw this.transportError(error, exchange);
    }
  }

  private transportError(error: unknown, exchange: Exchange): NetworkError {
    const { url, timeout } = exchange;
    if (exchange.signal.aborted || (error instanceof Error && error.name === 'AbortError')) {
      return new NetworkError(`Request timeout after ${timeout}ms`, error, { url, timeout });
    }
    return new NetworkError('Network request failed', error, { url });
  }

  /**
   * Map a non-2xx response onto the error taxonomy
   */
  private async handleErrorResponse(response: Response, exchange: Exchange): Promise<Error> {
    const { url } = exchange;
    let errorMessage = `HTTP ${response.status}: ${response.statusText}`;
    let errorBody: unknown;

    try {
      const contentType = response.headers.get('content-type');
      if (contentType?.includes('application/json')) {
        errorBody = await untilAborted(response.json(), exchange.signal);
        const body = validateSafe(ErrorResponseSchema, errorBody);
        errorMessage = body?.message ?? body?.error ?? errorMessage;
      } else {
        const text = await untilAborted(response.text(), exchange.signal);
        errorBody = text;
        if (text) {
          errorMessage = text;
        }
      }
    } catch (error) {
      this.logger.debug('Could not read error body', { url, error });
    }

    const context = { url, statusCode: response.status, body: errorBody };

    if (response.status === 404) {
      return new NotFoundError(errorMessage, context);
    }

    if (response.status === 429) {
      const retryAfter = Number.parseInt(response.headers.get('retry-after') ?? '', 10);
      return new RateLimitError(
        errorMessage,
        Number.isNaN(retryAfter) ? undefined : retryAfter,
        context
      );
    }

    return new ServerError(errorMessage, response.status, context);
  }

  getConfig(): Required<HTTPClientConfig> {
    return { ...this.httpConfig };
  }

  updateConfig(config: Partial<HTTPClientConfig>): void {
    this.httpConfig = {
      ...this.httpConfig,
      ...config,
    };
  }
}

/**
 * Settle with `promise`, or reject once `signal` aborts. A mocked or proxied
 * body stream does not always observe the fetch signal itself.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  const aborted = new Promise<never>((_resolve, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    signal.addEventListener('abort', () => reject(abortReason(signal)), { once: true });
  });
  // Racing both keeps a late rejection of `promise` handled
  return Promise.race([aborted, promise]);
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('The operation was aborted');
}
