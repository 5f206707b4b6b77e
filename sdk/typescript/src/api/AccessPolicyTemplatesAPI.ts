/**
 * Access policy templates API service
 */

import {BaseAPI} from './BaseAPI';
import type {AccessPolicyTemplate, CreateOptions, ListOptions, ResourceID} from '../types';
import {decodeAccessPolicyTemplate} from '../models/tokenizer';
import {readListData} from '../utils/json';
import {listParams} from '../utils/pagination';

const PATH = '/tokenizer/policies/accesstemplate';

export class AccessPolicyTemplatesAPI extends BaseAPI {
  /**
   * Create an access policy template
   */
  async create(
    template: AccessPolicyTemplate,
    options?: CreateOptions
  ): Promise<AccessPolicyTemplate> {
    return this.createOrAdopt(template, options, async () =>
      decodeAccessPolicyTemplate(await this.httpPost(PATH, { access_policy_template: template }))
    );
  }

  /**
   * Get the latest version of a template by ID or name
   */
  async get(rid: ResourceID): Promise<AccessPolicyTemplate> {
    const json = rid.id !== undefined
      ? await this.httpGet(`${PATH}/${rid.id}`)
      : await this.httpGet(PATH, { params: { name: rid.name } });
    return decodeAccessPolicyTemplate(json);
  }

  /**
   * List access policy templates
   */
  async list(options?: ListOptions): Promise<AccessPolicyTemplate[]> {
    const json = await this.httpGet(PATH, { params: listParams(options) });
    return readListData(json, decodeAccessPolicyTemplate);
  }

  /**
   * Update a template; the server stores it as a new version
   */
  async update(template: AccessPolicyTemplate): Promise<AccessPolicyTemplate> {
    const json = await this.httpPut(`${PATH}/${template.id}`, { access_policy_template: template });
    return decodeAccessPolicyTemplate(json);
  }

  /**
   * Delete one version of a template
   */
  async delete(id: string, version: number): Promise<boolean> {
    return this.httpDelete(`${PATH}/${id}`, { params: { template_version: String(version) } });
  }
}
