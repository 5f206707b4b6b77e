/**
 * Userstore columns API service
 */

import {BaseAPI} from './BaseAPI';
import type {Column, CreateOptions, ListOptions} from '../types';
import {decodeColumn} from '../models/userstore';
import {readListData} from '../utils/json';
import {listParams} from '../utils/pagination';

export class ColumnsAPI extends BaseAPI {
  /**
   * Create a column
   */
  async create(column: Column, options?: CreateOptions): Promise<Column> {
    return this.createOrAdopt(column, options, async () =>
      decodeColumn(await this.httpPost('/userstore/config/columns', { column }))
    );
  }

  /**
   * Get column by ID
   */
  async get(id: string): Promise<Column> {
    return decodeColumn(await this.httpGet(`/userstore/config/columns/${id}`));
  }

  /**
   * List columns
   */
  async list(options?: ListOptions): Promise<Column[]> {
    const json = await this.httpGet('/userstore/config/columns', { params: listParams(options) });
    return readListData(json, decodeColumn);
  }

  /**
   * Update column
   */
  async update(column: Column): Promise<Column> {
    return decodeColumn(await this.httpPut(`/userstore/config/columns/${column.id}`, { column }));
  }

  /**
   * Delete column
   */
  async delete(id: string): Promise<boolean> {
    return this.httpDelete(`/userstore/config/columns/${id}`);
  }
}
