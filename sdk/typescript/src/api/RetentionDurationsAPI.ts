/**
 * Soft-deleted retention durations API service
 *
 * Durations can be set on the tenant, on a purpose, or on one purpose of a
 * column. The server applies the most specific one: column, then purpose, then
 * tenant. Without any, soft-deleted values are not retained.
 */

import {BaseAPI} from './BaseAPI';
import type {
    ColumnRetentionDuration,
    ColumnRetentionDurationResponse,
    ColumnRetentionDurationsResponse,
} from '../types';
import {
    decodeColumnRetentionDurationResponse,
    decodeColumnRetentionDurationsResponse,
} from '../models/userstore';

const TENANT_PATH = '/userstore/config/softdeletedretentiondurations';

function purposePath(purposeId: string): string {
  return `/userstore/config/purposes/${purposeId}/softdeletedretentiondurations`;
}

function columnPath(columnId: string): string {
  return `/userstore/config/columns/${columnId}/softdeletedretentiondurations`;
}

export class RetentionDurationsAPI extends BaseAPI {
  // Tenant

  /**
   * Create the tenant default
   */
  async createOnTenant(duration: ColumnRetentionDuration): Promise<ColumnRetentionDurationResponse> {
    const json = await this.httpPost(TENANT_PATH, { retention_duration: duration });
    return decodeColumnRetentionDurationResponse(json);
  }

  /**
   * Get a tenant duration by ID
   */
  async getOnTenant(durationId: string): Promise<ColumnRetentionDurationResponse> {
    return decodeColumnRetentionDurationResponse(await this.httpGet(`${TENANT_PATH}/${durationId}`));
  }

  /**
   * Get the tenant duration, or the platform default when none is configured
   */
  async getDefaultOnTenant(): Promise<ColumnRetentionDurationResponse> {
    return decodeColumnRetentionDurationResponse(await this.httpGet(TENANT_PATH));
  }

  async updateOnTenant(
    durationId: string,
    duration: ColumnRetentionDuration
  ): Promise<ColumnRetentionDurationResponse> {
    const json = await this.httpPut(`${TENANT_PATH}/${durationId}`, { retention_duration: duration });
    return decodeColumnRetentionDurationResponse(json);
  }

  async deleteOnTenant(durationId: string): Promise<boolean> {
    return this.httpDelete(`${TENANT_PATH}/${durationId}`);
  }

  // Purpose

  /**
   * Create the default for every column purpose that includes this purpose
   */
  async createOnPurpose(
    purposeId: string,
    duration: ColumnRetentionDuration
  ): Promise<ColumnRetentionDurationResponse> {
    const json = await this.httpPost(purposePath(purposeId), { retention_duration: duration });
    return decodeColumnRetentionDurationResponse(json);
  }

  async getOnPurpose(purposeId: string, durationId: string): Promise<ColumnRetentionDurationResponse> {
    const json = await this.httpGet(`${purposePath(purposeId)}/${durationId}`);
    return decodeColumnRetentionDurationResponse(json);
  }

  /**
   * Get the purpose duration, falling back to the tenant's
   */
  async getDefaultOnPurpose(purposeId: string): Promise<ColumnRetentionDurationResponse> {
    return decodeColumnRetentionDurationResponse(await this.httpGet(purposePath(purposeId)));
  }

  async updateOnPurpose(
    purposeId: string,
    durationId: string,
    duration: ColumnRetentionDuration
  ): Promise<ColumnRetentionDurationResponse> {
    const json = await this.httpPut(`${purposePath(purposeId)}/${durationId}`, {
      retention_duration: duration,
    });
    return decodeColumnRetentionDurationResponse(json);
  }

  async deleteOnPurpose(purposeId: string, durationId: string): Promise<boolean> {
    return this.httpDelete(`${purposePath(purposeId)}/${durationId}`);
  }

  // Column

  async getOnColumn(columnId: string, durationId: string): Promise<ColumnRetentionDurationResponse> {
    const json = await this.httpGet(`${columnPath(columnId)}/${durationId}`);
    return decodeColumnRetentionDurationResponse(json);
  }

  /**
   * Effective duration for each purpose of the column
   */
  async getAllOnColumn(columnId: string): Promise<ColumnRetentionDurationsResponse> {
    return decodeColumnRetentionDurationsResponse(await this.httpGet(columnPath(columnId)));
  }

  async updateOnColumn(
    columnId: string,
    durationId: string,
    duration: ColumnRetentionDuration
  ): Promise<ColumnRetentionDurationResponse> {
    const json = await this.httpPut(`${columnPath(columnId)}/${durationId}`, {
      retention_duration: duration,
    });
    return decodeColumnRetentionDurationResponse(json);
  }

  /**
   * Add, change or remove durations for several purposes of a column at once
   */
  async updateAllOnColumn(
    columnId: string,
    durations: ColumnRetentionDuration[]
  ): Promise<ColumnRetentionDurationsResponse> {
    const json = await this.httpPost(columnPath(columnId), { retention_durations: durations });
    return decodeColumnRetentionDurationsResponse(json);
  }

  async deleteOnColumn(columnId: string, durationId: string): Promise<boolean> {
    return this.httpDelete(`${columnPath(columnId)}/${durationId}`);
  }
}
