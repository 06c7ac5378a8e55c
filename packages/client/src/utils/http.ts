import ky, { type KyInstance } from 'ky';
import type { Logger } from 'pino';
import { applyCredential, type Credential } from '../credentials.js';
import { createApiError, NetworkError } from '../errors/index.js';
import { USER_AGENT } from '../version.js';
import { encodeJson } from './envelope.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Statuses each verb treats as success; anything else becomes an ApiError
 */
export const ACCEPTED_STATUSES: Readonly<Record<HttpMethod, readonly number[]>> = {
  GET: [200],
  POST: [200, 201],
  // some mutation endpoints (webhooks) answer 204 No Content
  PUT: [200, 204],
  PATCH: [200, 204],
  DELETE: [204],
};

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent': USER_AGENT,
  'Content-Type': 'application/json',
};

/**
 * Per-call options
 */
export interface RequestOptions {
  /**
   * Aborts the request; the call rejects with a NetworkError
   */
  signal?: AbortSignal;
}

/**
 * The five verbs every resource and the raw pass-throughs are built on
 */
export interface Requester {
  get(path: string, options?: RequestOptions): Promise<Uint8Array>;
  post(path: string, data: unknown, options?: RequestOptions): Promise<Uint8Array>;
  put(path: string, data: unknown, options?: RequestOptions): Promise<Uint8Array>;
  patch(path: string, data: unknown, options?: RequestOptions): Promise<Uint8Array>;
  delete(path: string, data?: unknown, options?: RequestOptions): Promise<void>;
}

export interface PipelineSettings {
  endpoint: string;
  headers: Headers;
  logger: Logger;
  timeout?: number;
  fetch?: typeof globalThis.fetch;
}

/**
 * Default headers, then configured headers verbatim, then the credential
 */
export function buildHeaders(
  extra: Readonly<Record<string, string>>,
  credential: Credential | undefined,
): Headers {
  const headers = new Headers(DEFAULT_HEADERS);
  for (const [key, value] of Object.entries(extra)) {
    headers.set(key, value);
  }
  applyCredential(headers, credential);
  return headers;
}

/**
 * Create a ky instance with retries and HTTP error throwing disabled;
 * status handling belongs to the pipeline
 */
export function createKyInstance(settings: PipelineSettings): KyInstance {
  return ky.create({
    headers: settings.headers,
    timeout: settings.timeout ?? false,
    retry: 0,
    throwHttpErrors: false,
    ...(settings.fetch ? { fetch: settings.fetch } : {}),
  });
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Single authenticated round trip with uniform success/failure semantics
 */
export class HttpPipeline implements Requester {
  private readonly http: KyInstance;
  private readonly endpoint: string;
  private readonly logger: Logger;

  constructor(settings: PipelineSettings) {
    this.http = createKyInstance(settings);
    this.endpoint = settings.endpoint;
    this.logger = settings.logger;
  }

  /**
   * Execute a request and return the raw body if the status is accepted for the verb.
   * A DELETE with `data` undefined or null goes out without a body.
   *
   * @throws {ApiError} status outside the verb's accepted set
   * @throws {NetworkError} transport or body-read failure
   * @throws {EncodingError} body cannot be serialized
   */
  async request(
    method: HttpMethod,
    path: string,
    data?: unknown,
    options?: RequestOptions,
  ): Promise<Uint8Array> {
    const url = this.endpoint + path;
    const body =
      method === 'GET' || (method === 'DELETE' && data == null)
        ? undefined
        : encodeJson(data);
    const startedAt = Date.now();

    let response: Response;
    let raw: Uint8Array;
    try {
      response = await this.http(url, {
        method,
        body,
        signal: options?.signal,
      });
      raw = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      this.logger.debug({ method, url, err: error }, 'zendesk request failed');
      throw new NetworkError(`${method} ${url} failed: ${reasonOf(error)}`, error);
    }

    const durationMs = Date.now() - startedAt;
    const status = response.status;

    if (!ACCEPTED_STATUSES[method].includes(status)) {
      this.logger.debug({ method, url, status, durationMs }, 'zendesk request rejected');
      throw createApiError(
        {
          method,
          url,
          status,
          statusText: response.statusText,
          headers: response.headers,
        },
        raw,
      );
    }

    this.logger.debug({ method, url, status, durationMs }, 'zendesk request completed');
    return raw;
  }

  get(path: string, options?: RequestOptions): Promise<Uint8Array> {
    return this.request('GET', path, undefined, options);
  }

  post(path: string, data: unknown, options?: RequestOptions): Promise<Uint8Array> {
    return this.request('POST', path, data ?? null, options);
  }

  put(path: string, data: unknown, options?: RequestOptions): Promise<Uint8Array> {
    return this.request('PUT', path, data ?? null, options);
  }

  patch(path: string, data: unknown, options?: RequestOptions): Promise<Uint8Array> {
    return this.request('PATCH', path, data ?? null, options);
  }

  async delete(path: string, data?: unknown, options?: RequestOptions): Promise<void> {
    await this.request('DELETE', path, data, options);
  }
}
