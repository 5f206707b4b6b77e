/**
 * Userstore purposes API service
 */

import {BaseAPI} from './BaseAPI';
import type {CreateOptions, ListOptions, Purpose} from '../types';
import {decodePurpose} from '../models/userstore';
import {readListData} from '../utils/json';
import {listParams} from '../utils/pagination';

export class PurposesAPI extends BaseAPI {
  /**
   * Create a purpose
   */
  async create(purpose: Purpose, options?: CreateOptions): Promise<Purpose> {
    return this.createOrAdopt(purpose, options, async () =>
      decodePurpose(await this.httpPost('/userstore/config/purposes', { purpose }))
    );
  }

  /**
   * Get purpose by ID
   */
  async get(id: string): Promise<Purpose> {
    return decodePurpose(await this.httpGet(`/userstore/config/purposes/${id}`));
  }

  /**
   * List purposes
   */
  async list(options?: ListOptions): Promise<Purpose[]> {
    const json = await this.httpGet('/userstore/config/purposes', { params: listParams(options) });
    return readListData(json, decodePurpose);
  }

  /**
   * Update purpose
   */
  async update(purpose: Purpose): Promise<Purpose> {
    return decodePurpose(
      await this.httpPut(`/userstore/config/purposes/${purpose.id}`, { purpose })
    );
  }

  /**
   * Delete purpose
   */
  async delete(id: string): Promise<boolean> {
    return this.httpDelete(`/userstore/config/purposes/${id}`);
  }
}
