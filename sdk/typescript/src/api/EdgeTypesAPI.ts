/**
 * AuthZ edge types API service
 */

import {BaseAPI} from './BaseAPI';
import type {CreateOptions, EdgeType, ListOptions} from '../types';
import {decodeEdgeType} from '../models/authz';
import {readListData} from '../utils/json';
import {listParams} from '../utils/pagination';

export class EdgeTypesAPI extends BaseAPI {
  /**
   * Create an edge type
   */
  async create(edgeType: EdgeType, options?: CreateOptions): Promise<EdgeType> {
    return this.createOrAdopt(edgeType, options, async () =>
      decodeEdgeType(await this.httpPost('/authz/edgetypes', edgeType))
    );
  }

  /**
   * Get edge type by ID
   */
  async get(id: string): Promise<EdgeType> {
    return decodeEdgeType(await this.httpGet(`/authz/edgetypes/${id}`));
  }

  /**
   * List edge types
   */
  async list(options?: ListOptions): Promise<EdgeType[]> {
    const json = await this.httpGet('/authz/edgetypes', { params: listParams(options) });
    return readListData(json, decodeEdgeType);
  }

  /**
   * Update edge type
   */
  async update(edgeType: EdgeType): Promise<EdgeType> {
    return decodeEdgeType(await this.httpPut(`/authz/edgetypes/${edgeType.id}`, edgeType));
  }

  /**
   * Delete edge type
   */
  async delete(id: string): Promise<boolean> {
    return this.httpDelete(`/authz/edgetypes/${id}`);
  }
}
