import {PlatformClient} from '../../src/client';
import type {PlatformConfig} from '../../src/types';

export const BASE_URL = 'https://tenant.test';

export type FetchArgs = [input: string | URL | Request, init?: RequestInit];

/**
 * Unsigned JWT carrying only `sub` and `exp`
 */
export function makeJwt(expSeconds: number, subject = 'test-client'): string {
  const encode = (value: object): string => Buffer.from(JSON.stringify(value)).toString('base64url');
  return `${encode({ alg: 'HS256', typ: 'JWT' })}.${encode({ sub: subject, exp: expSeconds })}.test-signature`;
}

export function freshJwt(subject?: string): string {
  return makeJwt(Math.floor(Date.now() / 1000) + 3600, subject);
}

export function expiredJwt(subject?: string): string {
  return makeJwt(Math.floor(Date.now() / 1000) - 60, subject);
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

export function textResponse(body: string, status: number, headers: Record<string, string> = {}): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'text/plain', ...headers } });
}

export function noContent(): Response {
  return new Response(null, { status: 204 });
}

export function tokenResponse(accessToken: string = freshJwt()): Response {
  return jsonResponse({ access_token: accessToken, token_type: 'Bearer', expires_in: 3600 });
}

export function testClient(fetchFn: typeof fetch, overrides: Partial<PlatformConfig> = {}): PlatformClient {
  return new PlatformClient({
    baseUrl: BASE_URL,
    clientId: 'test-client',
    clientSecret: 'test-secret',
    fetch: fetchFn,
    ...overrides,
  });
}

export function requestUrl(input: string | URL | Request): URL {
  if (typeof input === 'string') {
    return new URL(input);
  }
  return input instanceof URL ? input : new URL(input.url);
}

export function requestHeaders(init: RequestInit | undefined): Headers {
  return new Headers(init?.headers);
}

export function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}
