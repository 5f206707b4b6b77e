/**
 * Access token cache with refresh on expiry
 */

import type {Storage, TokenResponse} from '../types';
import {ConfigurationError} from '../errors';
import {MemoryStorage} from '../utils/storage';
import {jwtExpiryCheck, TokenFreshnessCheck} from './freshness';

const TOKEN_KEY = 'access_token';

export class TokenManager {
  private storage: Storage;
  private freshness: TokenFreshnessCheck;
  private refreshPromise: Promise<string> | null = null;
  private tokenSource?: () => Promise<TokenResponse>;

  constructor(
    storage?: Storage,
    freshness?: TokenFreshnessCheck,
    tokenSource?: () => Promise<TokenResponse>
  ) {
    this.storage = storage || new MemoryStorage();
    this.freshness = freshness || jwtExpiryCheck;
    this.tokenSource = tokenSource;
  }

  /**
   * Set the call that acquires a new access token
   */
  setTokenSource(source: () => Promise<TokenResponse>): void {
    this.tokenSource = source;
  }

  /**
   * Store an access token
   */
  async setToken(tokenResponse: TokenResponse): Promise<void> {
    await this.storage.setItem(TOKEN_KEY, tokenResponse.access_token);
  }

  /**
   * Get a usable access token, acquiring a new one when none is cached or the cached one expired
   */
  async getAccessToken(): Promise<string> {
    const token = await this.storage.getItem(TOKEN_KEY);

    if (token && this.freshness.isFresh(token, Date.now())) {
      return token;
    }

    return this.refresh();
  }

  /**
   * Acquire a new token (concurrent callers share one request)
   */
  async refresh(): Promise<string> {
    if (this.refreshPromise) {
      return await this.refreshPromise;
    }

    this.refreshPromise = this.performRefresh();

    try {
      return await this.refreshPromise;
    } finally {
      this.refreshPromise = null;
    }
  }

  private async performRefresh(): Promise<string> {
    if (!this.tokenSource) {
      throw new ConfigurationError('No token source configured');
    }

    const tokenResponse = await this.tokenSource();
    await this.setToken(tokenResponse);
    return tokenResponse.access_token;
  }

  /**
   * Drop the cached token
   */
  async clearToken(): Promise<void> {
    await this.storage.removeItem(TOKEN_KEY);
  }

  async hasToken(): Promise<boolean> {
    const token = await this.storage.getItem(TOKEN_KEY);
    return !!token;
  }
}
