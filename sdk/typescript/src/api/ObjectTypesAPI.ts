/**
 * AuthZ object types API service
 */

import {BaseAPI} from './BaseAPI';
import type {CreateOptions, ListOptions, ObjectType} from '../types';
import {decodeObjectType} from '../models/authz';
import {readListData} from '../utils/json';
import {listParams} from '../utils/pagination';

export class ObjectTypesAPI extends BaseAPI {
  /**
   * Create an object type
   */
  async create(objectType: ObjectType, options?: CreateOptions): Promise<ObjectType> {
    return this.createOrAdopt(objectType, options, async () =>
      decodeObjectType(await this.httpPost('/authz/objecttypes', objectType))
    );
  }

  /**
   * Get object type by ID
   */
  async get(id: string): Promise<ObjectType> {
    return decodeObjectType(await this.httpGet(`/authz/objecttypes/${id}`));
  }

  /**
   * List object types
   */
  async list(options?: ListOptions): Promise<ObjectType[]> {
    const json = await this.httpGet('/authz/objecttypes', { params: listParams(options) });
    return readListData(json, decodeObjectType);
  }

  /**
   * Delete object type
   */
  async delete(id: string): Promise<boolean> {
    return this.httpDelete(`/authz/objecttypes/${id}`);
  }
}
