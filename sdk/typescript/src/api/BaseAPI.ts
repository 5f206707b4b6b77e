/**
 * Base API client with automatic auth and error handling
 */

import type {CreateOptions, ErrorContext, PlatformConfig, RequestOptions} from '../types';
import {TokenManager} from '../auth/TokenManager';
import {ConflictError, DecodeError} from '../errors';
import {buildUrl, DEFAULT_TIMEOUT, fetchWithTimeout, userAgent} from '../utils/http';
import {errorFromResponse} from '../utils/response';

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Id of the existing resource behind a 409 whose body says it is identical; rethrows anything else.
 */
export function idFromIdenticalConflict(error: unknown): string {
  if (error instanceof ConflictError && error.conflict?.identical) {
    return error.conflict.id;
  }
  throw error;
}

export class BaseAPI {
  protected config: PlatformConfig;
  protected tokenManager: TokenManager;
  protected fetchFn: typeof fetch;

  constructor(config: PlatformConfig, tokenManager: TokenManager) {
    this.config = config;
    this.tokenManager = tokenManager;
    this.fetchFn = config.fetch || ((input, init) => fetch(input, init));
  }

  /**
   * Make authenticated HTTP request; fails on status >= 400
   */
  private async send(
    method: HttpMethod,
    endpoint: string,
    body: unknown,
    options: RequestOptions = {}
  ): Promise<{ response: Response; context: ErrorContext }> {
    const url = buildUrl(this.config.baseUrl, endpoint, options.params);
    const headers = await this.buildHeaders(options, body !== undefined);

    const response = await fetchWithTimeout(
      this.fetchFn,
      url,
      {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
      },
      options.timeout || this.config.timeout || DEFAULT_TIMEOUT
    );

    const context = {
      url,
      method,
      status: response.status,
      statusText: response.statusText,
    };

    return { response, context };
  }

  /**
   * Build request headers
   */
  private async buildHeaders(options: RequestOptions, hasBody: boolean): Promise<Headers> {
    const headers = new Headers({ ...this.config.headers, ...options.headers });

    if (hasBody && !headers.has('Content-Type')) {
      headers.set('Content-Type', 'application/json');
    }

    const token = await this.tokenManager.getAccessToken();
    headers.set('Authorization', `Bearer ${token}`);
    headers.set('User-Agent', userAgent(this.config.sessionName));

    return headers;
  }

  private async request(
    method: HttpMethod,
    endpoint: string,
    body?: unknown,
    options?: RequestOptions
  ): Promise<unknown> {
    const { response, context } = await this.send(method, endpoint, body, options);

    if (response.status >= 400) {
      throw await errorFromResponse(response, context);
    }

    // 204 No Content
    if (response.status === 204) {
      return undefined;
    }

    const text = await response.text();
    if (!text) {
      return undefined;
    }

    try {
      return JSON.parse(text);
    } catch {
      throw new DecodeError(`Response is not valid JSON: ${text.slice(0, 200)}`, context);
    }
  }

  /**
   * GET request
   */
  protected async httpGet(endpoint: string, options?: RequestOptions): Promise<unknown> {
    return this.request('GET', endpoint, undefined, options);
  }

  /**
   * POST request
   */
  protected async httpPost(
    endpoint: string,
    body?: unknown,
    options?: RequestOptions
  ): Promise<unknown> {
    return this.request('POST', endpoint, body, options);
  }

  /**
   * PUT request
   */
  protected async httpPut(
    endpoint: string,
    body?: unknown,
    options?: RequestOptions
  ): Promise<unknown> {
    return this.request('PUT', endpoint, body, options);
  }

  /**
   * DELETE request. Resolves false when the resource was already gone.
   */
  protected async httpDelete(endpoint: string, options?: RequestOptions): Promise<boolean> {
    const { response, context } = await this.send('DELETE', endpoint, undefined, options);

    if (response.status === 404) {
      return false;
    }

    if (response.status >= 400) {
      throw await errorFromResponse(response, context);
    }

    return response.status === 204;
  }

  /**
   * GET request returning the raw body
   */
  protected async httpDownload(endpoint: string, options?: RequestOptions): Promise<string> {
    const { response, context } = await this.send('GET', endpoint, undefined, options);

    if (response.status >= 400) {
      throw await errorFromResponse(response, context);
    }

    return response.text();
  }

  /**
   * Run a create call; with `ifNotExists`, an identical existing resource is adopted instead.
   */
  protected async createOrAdopt<T extends { id: string }>(
    resource: T,
    options: CreateOptions | undefined,
    create: () => Promise<T>
  ): Promise<T> {
    try {
      return await create();
    } catch (error) {
      if (options?.ifNotExists) {
        return { ...resource, id: idFromIdenticalConflict(error) };
      }
      throw error;
    }
  }
}
