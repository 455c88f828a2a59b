import { OldServerError, createOldError } from './errors.js';
import type { OldClientConfig } from './types.js';

export type QueryValue = string | number | boolean | undefined;

export interface HttpRequestOptions {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE';
  path: string;
  query?: Record<string, QueryValue>;
  body?: unknown;
  headers?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface BinaryResponse {
  body: Uint8Array;
  headers: Record<string, string>;
}

export class OldHttpClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly fetchFn: typeof globalThis.fetch;
  private readonly defaultHeaders: Record<string, string>;
  private readonly defaultTimeoutMs: number;

  constructor(config: OldClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
    this.fetchFn = config.fetch ?? globalThis.fetch.bind(globalThis);
    this.defaultHeaders = config.defaultHeaders ?? {};
    this.defaultTimeoutMs = config.timeoutMs ?? 30_000;
  }

  /**
   * JSON request; the parsed body is trusted to match T
   */
  async request<T>(options: HttpRequestOptions): Promise<T> {
    return this.send(options, async (response, headers) => {
      const text = await response.text();
      const parsed = parseJsonSafely(text);

      if (parsed === undefined) {
        throw new OldServerError('Expected JSON response from OLD API', {
          status: response.status,
          code: 'INVALID_RESPONSE',
          headers,
        });
      }

      return parsed as T;
    });
  }

  async requestBinary(options: HttpRequestOptions): Promise<BinaryResponse> {
    return this.send(options, async (response, headers) => ({
      body: new Uint8Array(await response.arrayBuffer()),
      headers,
    }));
  }

  private async send<T>(
    options: HttpRequestOptions,
    read: (response: Response, headers: Record<string, string>) => Promise<T>,
  ): Promise<T> {
    const url = buildUrl(this.baseUrl, options.path, options.query);
    const headers = buildHeaders({
      apiKey: this.apiKey,
      defaultHeaders: this.defaultHeaders,
      requestHeaders: options.headers,
      hasBody: options.body !== undefined,
    });

    const controller = new AbortController();
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    let timedOut = false;
    let onAbort: (() => void) | undefined;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    if (options.signal) {
      if (options.signal.aborted) {
        controller.abort();
      } else {
        onAbort = () => controller.abort();
        options.signal.addEventListener('abort', onAbort, { once: true });
      }
    }

    try {
      const response = await this.fetchFn(url, {
        method: options.method,
        headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });

      const responseHeaders = headersToObject(response.headers);

      if (!response.ok) {
        const { message, errors } = parseErrorBody(response.status, await response.text());
        throw createOldError(message, {
          status: response.status,
          code: `HTTP_${response.status}`,
          errors,
          headers: responseHeaders,
        });
      }

      return await read(response, responseHeaders);
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        const message = timedOut
          ? `Request timed out after ${timeoutMs}ms`
          : 'Request was aborted';
        throw new OldServerError(message, {
          status: 408,
          code: timedOut ? 'TIMEOUT' : 'ABORTED',
        });
      }

      throw error;
    } finally {
      clearTimeout(timeoutId);
      if (options.signal && onAbort) {
        options.signal.removeEventListener('abort', onAbort);
      }
    }
  }
}

function buildUrl(baseUrl: string, path: string, query?: Record<string, QueryValue>): string {
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  const url = new URL(`${baseUrl}${normalizedPath}`);

  if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value === undefined) continue;
      url.searchParams.set(key, String(value));
    }
  }

  return url.toString();
}

function buildHeaders(input: {
  apiKey: string;
  defaultHeaders: Record<string, string>;
  requestHeaders?: Record<string, string>;
  hasBody: boolean;
}): Headers {
  const merged = new Headers();

  for (const [key, value] of Object.entries(input.defaultHeaders)) {
    merged.set(key, value);
  }

  if (input.requestHeaders) {
    for (const [key, value] of Object.entries(input.requestHeaders)) {
      merged.set(key, value);
    }
  }

  if (!merged.has('x-api-key') && !merged.has('authorization')) {
    merged.set('X-API-Key', input.apiKey);
  }

  if (input.hasBody && !merged.has('content-type')) {
    merged.set('Content-Type', 'application/json');
  }

  return merged;
}

function headersToObject(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key] = value;
  });
  return out;
}

function parseJsonSafely(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The API answers failures with `{error: string}` or `{errors: {field: message}}`
 */
function parseErrorBody(
  status: number,
  text: string,
): { message: string; errors?: Record<string, string> } {
  const fallback = `OLD API request failed with status ${status}`;
  const parsed = parseJsonSafely(text);
  if (!isRecord(parsed)) {
    return { message: fallback };
  }

  if (typeof parsed.error === 'string') {
    return { message: parsed.error };
  }

  if (isRecord(parsed.errors)) {
    const errors: Record<string, string> = {};
    for (const [field, value] of Object.entries(parsed.errors)) {
      errors[field] = typeof value === 'string' ? value : JSON.stringify(value);
    }
    const message = Object.entries(errors)
      .map(([field, value]) => `${field}: ${value}`)
      .join('; ');
    return { message: message || fallback, errors };
  }

  return { message: fallback };
}
