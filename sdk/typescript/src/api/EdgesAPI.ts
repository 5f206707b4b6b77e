/**
 * AuthZ edges API service
 */

import {BaseAPI} from './BaseAPI';
import type {CreateOptions, Edge, ListOptions} from '../types';
import {decodeEdge} from '../models/authz';
import {readListData} from '../utils/json';
import {listParams} from '../utils/pagination';

export class EdgesAPI extends BaseAPI {
  /**
   * Create an edge
   */
  async create(edge: Edge, options?: CreateOptions): Promise<Edge> {
    return this.createOrAdopt(edge, options, async () =>
      decodeEdge(await this.httpPost('/authz/edges', edge))
    );
  }

  /**
   * Get edge by ID
   */
  async get(id: string): Promise<Edge> {
    return decodeEdge(await this.httpGet(`/authz/edges/${id}`));
  }

  /**
   * List edges
   */
  async list(options?: ListOptions): Promise<Edge[]> {
    const json = await this.httpGet('/authz/edges', { params: listParams(options) });
    return readListData(json, decodeEdge);
  }

  /**
   * Delete edge
   */
  async delete(id: string): Promise<boolean> {
    return this.httpDelete(`/authz/edges/${id}`);
  }
}
