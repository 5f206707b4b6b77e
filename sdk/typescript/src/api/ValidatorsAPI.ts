/**
 * Validators API service
 */

import {BaseAPI} from './BaseAPI';
import type {CreateOptions, ListOptions, Validator} from '../types';
import {decodeValidator} from '../models/tokenizer';
import {readListData} from '../utils/json';
import {listParams} from '../utils/pagination';

const PATH = '/tokenizer/policies/validation';

export class ValidatorsAPI extends BaseAPI {
  /**
   * Create a validator
   */
  async create(validator: Validator, options?: CreateOptions): Promise<Validator> {
    return this.createOrAdopt(validator, options, async () =>
      decodeValidator(await this.httpPost(PATH, { validator }))
    );
  }

  /**
   * Get validator by ID
   */
  async get(id: string): Promise<Validator> {
    return decodeValidator(await this.httpGet(`${PATH}/${id}`));
  }

  /**
   * List validators
   */
  async list(options?: ListOptions): Promise<Validator[]> {
    const json = await this.httpGet(PATH, { params: listParams(options) });
    return readListData(json, decodeValidator);
  }

  /**
   * Update validator
   */
  async update(validator: Validator): Promise<Validator> {
    return decodeValidator(await this.httpPut(`${PATH}/${validator.id}`, { validator }));
  }

  /**
   * Delete validator
   */
  async delete(id: string): Promise<boolean> {
    return this.httpDelete(`${PATH}/${id}`);
  }
}
