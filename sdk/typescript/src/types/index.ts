/**
 * Core type definitions for the Privacy Platform SDK
 */

import type {TokenFreshnessCheck} from '../auth/freshness';

export interface PlatformConfig {
  /** Tenant base URL, e.g. https://mytenant.tenant.example.com */
  baseUrl: string;
  /** OAuth client ID */
  clientId: string;
  /** OAuth client secret */
  clientSecret: string;
  /** Custom storage for the cached access token */
  storage?: Storage;
  /** Custom fetch implementation */
  fetch?: typeof fetch;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
  /** Optional session label, appended to the User-Agent */
  sessionName?: string;
  /** Decides whether a cached access token can still be used */
  tokenFreshness?: TokenFreshnessCheck;
}

export interface TokenResponse {
  access_token: string;
  token_type?: string;
  expires_in?: number;
  id_token?: string;
}

/**
 * Reference to another resource, either by id or by name.
 */
export type ResourceID =
  | { id: string; name?: never }
  | { name: string; id?: never };

/**
 * Cursor pagination for list endpoints. `limit` of 0 uses the server default.
 */
export interface ListOptions {
  limit?: number;
  startingAfter?: string;
}

export interface CreateOptions {
  /** Adopt the id of an identical existing resource instead of failing */
  ifNotExists?: boolean;
}

export interface Storage {
  getItem(key: string): string | null | Promise<string | null>;
  setItem(key: string, value: string): void | Promise<void>;
  removeItem(key: string): void | Promise<void>;
}

export type QueryValue = string | number | boolean | undefined | null;

export interface RequestOptions {
  headers?: Record<string, string>;
  params?: Record<string, QueryValue>;
  timeout?: number;
}

export interface ErrorContext {
  url: string;
  method: string;
  status?: number;
  statusText?: string;
}

/**
 * Body of a 409 response; `identical` means the existing resource matches the request.
 */
export interface APIErrorResponse {
  error: string;
  id: string;
  identical: boolean;
}

export type {JsonValue, JsonObject} from '../utils/json';
export * from './authn';
export * from './userstore';
export * from './tokenizer';
export * from './authz';
