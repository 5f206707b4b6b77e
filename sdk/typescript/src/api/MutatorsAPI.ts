/**
 * Mutators API service
 */

import {BaseAPI} from './BaseAPI';
import type {CreateOptions, ExecuteMutatorResponse, ListOptions, Mutator, RowData} from '../types';
import {decodeMutator} from '../models/userstore';
import type {JsonObject, JsonValue} from '../utils/json';
import {readListData, toJsonValue} from '../utils/json';
import {listParams} from '../utils/pagination';

export class MutatorsAPI extends BaseAPI {
  /**
   * Create a mutator
   */
  async create(mutator: Mutator, options?: CreateOptions): Promise<Mutator> {
    return this.createOrAdopt(mutator, options, async () =>
      decodeMutator(await this.httpPost('/userstore/config/mutators', { mutator }))
    );
  }

  /**
   * Get mutator by ID
   */
  async get(id: string): Promise<Mutator> {
    return decodeMutator(await this.httpGet(`/userstore/config/mutators/${id}`));
  }

  /**
   * List mutators
   */
  async list(options?: ListOptions): Promise<Mutator[]> {
    const json = await this.httpGet('/userstore/config/mutators', { params: listParams(options) });
    return readListData(json, decodeMutator);
  }

  /**
   * Update mutator
   */
  async update(mutator: Mutator): Promise<Mutator> {
    return decodeMutator(await this.httpPut(`/userstore/config/mutators/${mutator.id}`, { mutator }));
  }

  /**
   * Delete mutator
   */
  async delete(id: string): Promise<boolean> {
    return this.httpDelete(`/userstore/config/mutators/${id}`);
  }

  /**
   * Run a mutator against the users its where clause selects
   */
  async execute(
    mutatorId: string,
    context: JsonObject,
    selectorValues: JsonValue[],
    rowData: RowData
  ): Promise<ExecuteMutatorResponse> {
    const json = await this.httpPost('/userstore/api/mutators', {
      mutator_id: mutatorId,
      context,
      selector_values: selectorValues,
      row_data: rowData,
    });
    return toJsonValue(json ?? null);
  }
}
