/**
 * AuthZ objects API service
 */

import {BaseAPI} from './BaseAPI';
import type {AuthzObject, CreateOptions, ListOptions} from '../types';
import {decodeObject} from '../models/authz';
import {readListData} from '../utils/json';
import {listParams} from '../utils/pagination';

export class ObjectsAPI extends BaseAPI {
  /**
   * Create an object
   */
  async create(object: AuthzObject, options?: CreateOptions): Promise<AuthzObject> {
    return this.createOrAdopt(object, options, async () =>
      decodeObject(await this.httpPost('/authz/objects', object))
    );
  }

  /**
   * Get object by ID
   */
  async get(id: string): Promise<AuthzObject> {
    return decodeObject(await this.httpGet(`/authz/objects/${id}`));
  }

  /**
   * List objects
   */
  async list(options?: ListOptions): Promise<AuthzObject[]> {
    const json = await this.httpGet('/authz/objects', { params: listParams(options) });
    return readListData(json, decodeObject);
  }

  /**
   * Update object
   */
  async update(object: AuthzObject): Promise<AuthzObject> {
    return decodeObject(await this.httpPut(`/authz/objects/${object.id}`, object));
  }

  /**
   * Delete object
   */
  async delete(id: string): Promise<boolean> {
    return this.httpDelete(`/authz/objects/${id}`);
  }
}
