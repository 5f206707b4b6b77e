/**
 * Organizations API service
 */

import {BaseAPI} from './BaseAPI';
import type {CreateOptions, ListOptions, Organization} from '../types';
import {decodeOrganization} from '../models/authz';
import {readListData} from '../utils/json';
import {listParams} from '../utils/pagination';

export class OrganizationsAPI extends BaseAPI {
  /**
   * Create an organization
   */
  async create(organization: Organization, options?: CreateOptions): Promise<Organization> {
    return this.createOrAdopt(organization, options, async () =>
      decodeOrganization(await this.httpPost('/authz/organizations', organization))
    );
  }

  /**
   * Get organization by ID
   */
  async get(id: string): Promise<Organization> {
    return decodeOrganization(await this.httpGet(`/authz/organizations/${id}`));
  }

  /**
   * List organizations
   */
  async list(options?: ListOptions): Promise<Organization[]> {
    const json = await this.httpGet('/authz/organizations', { params: listParams(options) });
    return readListData(json, decodeOrganization);
  }

  /**
   * Update organization
   */
  async update(organization: Organization): Promise<Organization> {
    const json = await this.httpPut(`/authz/organizations/${organization.id}`, organization);
    return decodeOrganization(json);
  }

  /**
   * Delete organization
   */
  async delete(id: string): Promise<boolean> {
    return this.httpDelete(`/authz/organizations/${id}`);
  }
}
