/**
 * Transformers API service
 */

import {BaseAPI} from './BaseAPI';
import type {CreateOptions, ListOptions, ResourceID, Transformer} from '../types';
import {decodeTransformer} from '../models/tokenizer';
import {readListData} from '../utils/json';
import {listParams} from '../utils/pagination';

const PATH = '/tokenizer/policies/transformation';

export class TransformersAPI extends BaseAPI {
  /**
   * Create a transformer
   */
  async create(transformer: Transformer, options?: CreateOptions): Promise<Transformer> {
    return this.createOrAdopt(transformer, options, async () =>
      decodeTransformer(await this.httpPost(PATH, { transformer }))
    );
  }

  /**
   * Get transformer by ID or name
   */
  async get(rid: ResourceID): Promise<Transformer> {
    const json = rid.id !== undefined
      ? await this.httpGet(`${PATH}/${rid.id}`)
      : await this.httpGet(PATH, { params: { name: rid.name } });
    return decodeTransformer(json);
  }

  /**
   * List transformers
   */
  async list(options?: ListOptions): Promise<Transformer[]> {
    const json = await this.httpGet(PATH, { params: listParams(options) });
    return readListData(json, decodeTransformer);
  }

  /**
   * Delete transformer
   */
  async delete(id: string): Promise<boolean> {
    return this.httpDelete(`${PATH}/${id}`);
  }
}
