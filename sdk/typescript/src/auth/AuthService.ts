/**
 * OAuth 2.0 client credentials grant
 */

import type {PlatformConfig, TokenResponse} from '../types';
import {TokenManager} from './TokenManager';
import {DecodeError} from '../errors';
import {DEFAULT_TIMEOUT, fetchWithTimeout, userAgent} from '../utils/http';
import {errorFromResponse} from '../utils/response';
import {isRecord, readOptionalString, readString} from '../utils/json';

export const TOKEN_ENDPOINT = '/oidc/token';

/**
 * Percent-encodes everything except letters, digits, `-_.~` and `/`
 */
function quoteCredential(value: string): string {
  return encodeURIComponent(value)
    .replace(/%2F/g, '/')
    .replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * HTTP Basic credentials for the token endpoint
 */
export function encodeBasicCredentials(clientId: string, clientSecret: string): string {
  const pair = `${quoteCredential(clientId)}:${quoteCredential(clientSecret)}`;
  return Buffer.from(pair, 'latin1').toString('base64');
}

export class AuthService {
  private config: PlatformConfig;
  private tokenManager: TokenManager;
  private fetchFn: typeof fetch;
  private readonly authorization: string;

  constructor(config: PlatformConfig, tokenManager: TokenManager) {
    this.config = config;
    this.tokenManager = tokenManager;
    this.fetchFn = config.fetch || ((input, init) => fetch(input, init));
    this.authorization = encodeBasicCredentials(config.clientId, config.clientSecret);

    this.tokenManager.setTokenSource(() => this.fetchToken());
  }

  /**
   * Request a new access token. Never goes through the token cache.
   */
  async fetchToken(): Promise<TokenResponse> {
    const url = `${this.config.baseUrl}${TOKEN_ENDPOINT}`;
    const response = await fetchWithTimeout(
      this.fetchFn,
      url,
      {
        method: 'POST',
        headers: {
          'Authorization': `Basic ${this.authorization}`,
          'Content-Type': 'application/x-www-form-urlencoded',
          'User-Agent': userAgent(this.config.sessionName),
        },
        body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
      },
      this.config.timeout || DEFAULT_TIMEOUT
    );

    const context = {
      url,
      method: 'POST',
      status: response.status,
      statusText: response.statusText,
    };

    if (response.status >= 400) {
      throw await errorFromResponse(response, context);
    }

    const data: unknown = await response.json().catch(() => undefined);
    if (!isRecord(data)) {
      throw new DecodeError('Token response is not a JSON object', context);
    }

    const tokenResponse: TokenResponse = {
      access_token: readString(data, 'access_token'),
      token_type: readOptionalString(data, 'token_type'),
      id_token: readOptionalString(data, 'id_token'),
    };
    if (typeof data.expires_in === 'number') {
      tokenResponse.expires_in = data.expires_in;
    }

    return tokenResponse;
  }

  /**
   * Force a new token on the next request
   */
  async invalidateToken(): Promise<void> {
    await this.tokenManager.clearToken();
  }
}
