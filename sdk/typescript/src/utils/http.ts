/**
 * fetch wrapper with timeout
 */

import type {QueryValue} from '../types';
import {NetworkError} from '../errors';

export const SDK_VERSION = '1.0.0';

export const DEFAULT_TIMEOUT = 30000;

export function userAgent(sessionName?: string): string {
  const base = `PrivacyPlatform-SDK-TypeScript/${SDK_VERSION}`;
  return sessionName ? `${base} (session ${sessionName})` : base;
}

/**
 * Build full URL with query parameters
 */
export function buildUrl(
  baseUrl: string,
  endpoint: string,
  params?: Record<string, QueryValue>
): string {
  const base = `${baseUrl}${endpoint}`;

  if (!params) {
    return base;
  }

  const searchParams = new URLSearchParams();
  Object.entries(params).forEach(([key, value]) => {
    if (value !== undefined && value !== null) {
      searchParams.append(key, String(value));
    }
  });

  const query = searchParams.toString();
  if (!query) {
    return base;
  }
  return base.includes('?') ? `${base}&${query}` : `${base}?${query}`;
}

/**
 * Issue one request, aborting it after `timeout` ms
 */
export async function fetchWithTimeout(
  fetchFn: typeof fetch,
  url: string,
  init: RequestInit,
  timeout: number
): Promise<Response> {
  const method = init.method || 'GET';
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    return await fetchFn(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new NetworkError(`Request timeout after ${timeout}ms`, { url, method });
    }

    throw new NetworkError(
      error instanceof Error ? error.message : 'Request failed',
      { url, method }
    );
  } finally {
    clearTimeout(timeoutId);
  }
}
