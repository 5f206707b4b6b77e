/**
 * Access token freshness checks
 */

import {isRecord} from '../utils/json';

/**
 * Decides whether a cached access token can still be sent.
 */
export interface TokenFreshnessCheck {
  isFresh(token: string, nowMs: number): boolean;
}

/**
 * Decode a JWT payload without verification. Only the server checks the signature.
 */
export function decodeJwtPayload(token: string): Record<string, unknown> {
  const parts = token.split('.');
  if (parts.length !== 3) {
    throw new Error('Invalid JWT format');
  }
  const payload: unknown = JSON.parse(Buffer.from(parts[1], 'base64url').toString('utf-8'));
  if (!isRecord(payload)) {
    throw new Error('JWT payload is not an object');
  }
  return payload;
}

/**
 * Reads the `exp` claim of a JWT access token.
 * Tokens that do not decode, or carry no `exp`, are stale.
 */
export const jwtExpiryCheck: TokenFreshnessCheck = {
  isFresh(token: string, nowMs: number): boolean {
    let exp: unknown;
    try {
      exp = decodeJwtPayload(token).exp;
    } catch {
      return false;
    }
    return typeof exp === 'number' && exp * 1000 >= nowMs;
  },
};
