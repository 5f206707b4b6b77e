/**
 * Tokens API service
 */

import {BaseAPI} from './BaseAPI';
import type {InspectTokenResponse, ResolveTokenResponse, ResourceID} from '../types';
import {DecodeError} from '../errors';
import {decodeInspectTokenResponse, decodeResolveTokenResponse} from '../models/tokenizer';
import type {JsonObject} from '../utils/json';
import {expectRecord, readArray, readString} from '../utils/json';

function decodeTokenString(raw: unknown): string {
  if (typeof raw !== 'string') {
    throw new DecodeError('expected token to be a string');
  }
  return raw;
}

export class TokensAPI extends BaseAPI {
  /**
   * Tokenize a value
   */
  async create(data: string, transformer: ResourceID, accessPolicy: ResourceID): Promise<string> {
    const json = await this.httpPost('/tokenizer/tokens', {
      data,
      transformer_rid: transformer,
      access_policy_rid: accessPolicy,
    });
    return readString(expectRecord(json, 'create token response'), 'data');
  }

  /**
   * Return existing tokens for each value, creating the missing ones.
   * The three arrays are parallel.
   */
  async lookupOrCreate(
    data: string[],
    transformers: ResourceID[],
    accessPolicies: ResourceID[]
  ): Promise<string[]> {
    const json = await this.httpPost('/tokenizer/tokens/actions/lookuporcreate', {
      data,
      transformer_rids: transformers,
      access_policy_rids: accessPolicies,
    });
    return readArray(expectRecord(json, 'lookup or create response'), 'tokens', decodeTokenString);
  }

  /**
   * Resolve tokens back to their values, in request order
   */
  async resolve(
    tokens: string[],
    context: JsonObject,
    purposes: ResourceID[]
  ): Promise<ResolveTokenResponse[]> {
    const json = await this.httpPost('/tokenizer/tokens/actions/resolve', {
      tokens,
      context,
      purposes,
    });
    if (!Array.isArray(json)) {
      throw new DecodeError('expected resolve response to be an array');
    }
    return json.map((item) => decodeResolveTokenResponse(item));
  }

  /**
   * Describe a token: its transformer and access policy
   */
  async inspect(token: string): Promise<InspectTokenResponse> {
    return decodeInspectTokenResponse(
      await this.httpPost('/tokenizer/tokens/actions/inspect', { token })
    );
  }

  /**
   * Find the tokens already issued for a value
   */
  async lookup(data: string, transformer: ResourceID, accessPolicy: ResourceID): Promise<string[]> {
    const json = await this.httpPost('/tokenizer/tokens/actions/lookup', {
      data,
      transformer_rid: transformer,
      access_policy_rid: accessPolicy,
    });
    return readArray(expectRecord(json, 'lookup response'), 'tokens', decodeTokenString);
  }

  /**
   * Delete token
   */
  async delete(token: string): Promise<boolean> {
    return this.httpDelete('/tokenizer/tokens', { params: { token } });
  }
}
