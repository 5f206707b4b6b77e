/**
 * Users API service
 */

import {BaseAPI} from './BaseAPI';
import type {ListUsersOptions, RowData, UserResponse} from '../types';
import {AuthnType} from '../constants';
import {decodeUserResponse} from '../models/authn';
import type {JsonObject} from '../utils/json';
import {expectRecord, readListData, readString} from '../utils/json';
import {listParams} from '../utils/pagination';

function readCreatedId(json: unknown): string {
  return readString(expectRecord(json, 'create user response'), 'id');
}

export class UsersAPI extends BaseAPI {
  /**
   * Create an empty user
   */
  async create(): Promise<string> {
    return readCreatedId(await this.httpPost('/authn/users', {}));
  }

  /**
   * Create a user that signs in with username and password
   */
  async createWithPassword(username: string, password: string): Promise<string> {
    const json = await this.httpPost('/authn/users', {
      username,
      password,
      authn_type: AuthnType.PASSWORD,
    });
    return readCreatedId(json);
  }

  /**
   * Create a user and write its first values through a mutator
   */
  async createWithMutator(
    mutatorId: string,
    context: JsonObject,
    rowData: RowData,
    region?: string
  ): Promise<string> {
    const body = {
      mutator_id: mutatorId,
      context,
      row_data: rowData,
      region,
    };
    const json = await this.httpPost('/userstore/api/users', body);
    if (typeof json === 'string') {
      return json;
    }
    return readCreatedId(json);
  }

  /**
   * List users
   */
  async list(options: ListUsersOptions = {}): Promise<UserResponse[]> {
    const params = listParams(options);
    if (options.email !== undefined) {
      params.email = options.email;
    }
    const json = await this.httpGet('/authn/users', { params });
    return readListData(json, decodeUserResponse);
  }

  /**
   * Get user by ID
   */
  async get(id: string): Promise<UserResponse> {
    return decodeUserResponse(await this.httpGet(`/authn/users/${id}`));
  }

  /**
   * Replace a user's profile
   */
  async update(id: string, profile: JsonObject): Promise<UserResponse> {
    return decodeUserResponse(await this.httpPut(`/authn/users/${id}`, { profile }));
  }

  /**
   * Delete user
   */
  async delete(id: string): Promise<boolean> {
    return this.httpDelete(`/authn/users/${id}`);
  }
}
