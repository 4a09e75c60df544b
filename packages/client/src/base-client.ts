/**
 * Base API Client
 * ===============
 * HTTP transport shared by the Windmill client and work units. Every call is a
 * single request: no retries, no rate limiting, no caching.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import type { z } from 'zod';
import { createLogger } from '@windmill/utils';
import { WINDMILL_API_NAME, WindmillClientError } from './errors.js';

const logger = createLogger('client');

export const API_PREFIX = 'api/v0';

export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Base API client configuration
 */
export interface BaseApiClientConfig {
  endpoint: string;
  timeout?: number;
  /** Optional axios instance for testing */
  axiosInstance?: AxiosInstance;
}

/**
 * Render a response body as text. Bodies are requested raw, but an injected
 * axios instance may still hand back parsed data.
 */
function bodyToText(data: unknown): string {
  if (data === undefined || data === null) return '';
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return JSON.stringify(data);
}

export class BaseApiClient {
  readonly endpoint: string;
  protected readonly axiosInstance: AxiosInstance;
  protected readonly timeout?: number;

  constructor(config: BaseApiClientConfig) {
    this.endpoint = config.endpoint;
    this.timeout = config.timeout;

    // Use injected axios instance or create a new one
    this.axiosInstance = config.axiosInstance ?? axios.create();
  }

  /**
   * Absolute URL of an API path
   */
  protected url(path: string): string {
    return `${this.endpoint}/${API_PREFIX}/${path}`;
  }

  /**
   * Send one request and return the raw response body.
   *
   * Non-2xx responses reject with WindmillClientError carrying that body.
   */
  protected async request(path: string, config: AxiosRequestConfig): Promise<string> {
    const url = this.url(path);
    const method = config.method?.toUpperCase() ?? 'GET';
    const startTime = Date.now();

    let response: AxiosResponse<unknown>;
    try {
      response = await this.axiosInstance.request<unknown>({
        ...config,
        url,
        ...(this.timeout !== undefined ? { timeout: this.timeout } : {}),
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });
    } catch (error: unknown) {
      if (axios.isAxiosError(error) && error.response) {
        response = error.response;
      } else {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`${WINDMILL_API_NAME} request failed without a response`, {
          method,
          path,
          error: message,
        });
        throw new WindmillClientError(`Network error: ${message}`, undefined, undefined, {
          url,
          method,
        });
      }
    }

    const body = bodyToText(response.data);
    const latencyMs = Date.now() - startTime;

    if (response.status < 200 || response.status >= 300) {
      logger.warn(`${WINDMILL_API_NAME} request failed`, {
        method,
        path,
        status: response.status,
        latencyMs,
      });
      throw new WindmillClientError(body, response.status, body, { url, method });
    }

    logger.debug(`${WINDMILL_API_NAME} request completed`, {
      method,
      path,
      status: response.status,
      latencyMs,
    });
    return body;
  }

  /**
   * Decode a successful JSON body against its schema
   */
  protected parseBody<T>(path: string, body: string, schema: ResponseSchema<T>): T {
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new WindmillClientError(`Malformed response from ${path}: ${message}`, undefined, body);
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new WindmillClientError(`Malformed response from ${path}: ${issues}`, undefined, body);
    }
    return result.data;
  }

  /**
   * GET request with query parameters
   */
  async get<T>(path: string, params: QueryParams, schema: ResponseSchema<T>): Promise<T> {
    const body = await this.request(path, { method: 'GET', params });
    return this.parseBody(path, body, schema);
  }

  /**
   * POST request with a JSON body
   */
  post(path: string, data: unknown): Promise<void>;
  post<T>(path: string, data: unknown, schema: ResponseSchema<T>): Promise<T>;
  async post<T>(path: string, data: unknown, schema?: ResponseSchema<T>): Promise<T | void> {
    const body = await this.request(path, { method: 'POST', data });
    if (schema) {
      return this.parseBody(path, body, schema);
    }
  }

  /**
   * POST request with a multipart/form-data body
   */
  async postMultipart(path: string, form: FormData): Promise<void> {
    await this.request(path, { method: 'POST', data: form });
  }

  /**
   * Get axios instance for advanced usage
   */
  getAxiosInstance(): AxiosInstance {
    return this.axiosInstance;
  }
}
