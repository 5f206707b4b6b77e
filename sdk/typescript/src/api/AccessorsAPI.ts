/**
 * Accessors API service
 */

import {BaseAPI} from './BaseAPI';
import type {Accessor, CreateOptions, ExecuteAccessorResponse, ListOptions, ResourceID} from '../types';
import {decodeAccessor, decodeExecuteAccessorResponse} from '../models/userstore';
import type {JsonObject, JsonValue} from '../utils/json';
import {readListData} from '../utils/json';
import {listParams} from '../utils/pagination';

export class AccessorsAPI extends BaseAPI {
  /**
   * Create an accessor
   */
  async create(accessor: Accessor, options?: CreateOptions): Promise<Accessor> {
    return this.createOrAdopt(accessor, options, async () =>
      decodeAccessor(await this.httpPost('/userstore/config/accessors', { accessor }))
    );
  }

  /**
   * Get accessor by ID
   */
  async get(id: string): Promise<Accessor> {
    return decodeAccessor(await this.httpGet(`/userstore/config/accessors/${id}`));
  }

  /**
   * List accessors
   */
  async list(options?: ListOptions): Promise<Accessor[]> {
    const json = await this.httpGet('/userstore/config/accessors', { params: listParams(options) });
    return readListData(json, decodeAccessor);
  }

  /**
   * Update accessor
   */
  async update(accessor: Accessor): Promise<Accessor> {
    const json = await this.httpPut(`/userstore/config/accessors/${accessor.id}`, { accessor });
    return decodeAccessor(json);
  }

  /**
   * Delete accessor
   */
  async delete(id: string): Promise<boolean> {
    return this.httpDelete(`/userstore/config/accessors/${id}`);
  }

  /**
   * Run an accessor. `selectorValues` fill the `?` placeholders of its where clause.
   */
  async execute(
    accessorId: string,
    context: JsonObject,
    selectorValues: JsonValue[],
    purposes?: ResourceID[]
  ): Promise<ExecuteAccessorResponse> {
    const json = await this.httpPost('/userstore/api/accessors', {
      accessor_id: accessorId,
      context,
      selector_values: selectorValues,
      purposes,
    });
    return decodeExecuteAccessorResponse(json);
  }
}
