/**
 * Access policies API service
 */

import {BaseAPI} from './BaseAPI';
import type {AccessPolicy, CreateOptions, ListOptions, ResourceID} from '../types';
import {decodeAccessPolicy} from '../models/tokenizer';
import {readListData} from '../utils/json';
import {listParams} from '../utils/pagination';

const PATH = '/tokenizer/policies/access';

export class AccessPoliciesAPI extends BaseAPI {
  /**
   * Create an access policy
   */
  async create(policy: AccessPolicy, options?: CreateOptions): Promise<AccessPolicy> {
    return this.createOrAdopt(policy, options, async () =>
      decodeAccessPolicy(await this.httpPost(PATH, { access_policy: policy }))
    );
  }

  /**
   * Get the latest version of a policy by ID or name
   */
  async get(rid: ResourceID): Promise<AccessPolicy> {
    const json = rid.id !== undefined
      ? await this.httpGet(`${PATH}/${rid.id}`)
      : await this.httpGet(PATH, { params: { name: rid.name } });
    return decodeAccessPolicy(json);
  }

  /**
   * List access policies
   */
  async list(options?: ListOptions): Promise<AccessPolicy[]> {
    const json = await this.httpGet(PATH, { params: listParams(options) });
    return readListData(json, decodeAccessPolicy);
  }

  /**
   * Update a policy; the server bumps its version
   */
  async update(policy: AccessPolicy): Promise<AccessPolicy> {
    return decodeAccessPolicy(await this.httpPut(`${PATH}/${policy.id}`, { access_policy: policy }));
  }

  /**
   * Delete one version of a policy
   */
  async delete(id: string, version: number): Promise<boolean> {
    return this.httpDelete(`${PATH}/${id}`, { params: { policy_version: String(version) } });
  }
}
