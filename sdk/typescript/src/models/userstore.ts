/**
 * Userstore models: columns, purposes, accessors, mutators and retention durations
 */

import type {
    Accessor,
    Column,
    ColumnConstraints,
    ColumnField,
    ColumnInputConfig,
    ColumnOutputConfig,
    ColumnRetentionDuration,
    ColumnRetentionDurationResponse,
    ColumnRetentionDurationsResponse,
    ExecuteAccessorResponse,
    Mutator,
    Purpose,
    ResourceID,
    RetentionDuration,
    UserSelectorConfig,
} from '../types';
import {
    ColumnIndexType,
    DataLifeCycleState,
    DurationUnit,
    NIL_UUID,
} from '../constants';
import {DecodeError} from '../errors';
import {
    expectRecord,
    isRecord,
    JsonObject,
    readArray,
    readBoolean,
    readNumber,
    readOptionalBoolean,
    readOptionalString,
    readRecord,
    readString,
    toJsonObject,
} from '../utils/json';
import {decodeOptionalResourceID, decodeResourceID} from './common';

export function newColumn(
  fields: Pick<Column, 'name' | 'type'> & Partial<Column>
): Column {
  return {
    id: NIL_UUID,
    is_array: false,
    default_value: '',
    index_type: ColumnIndexType.NONE,
    ...fields,
  };
}

function decodeColumnField(raw: unknown): ColumnField {
  const obj = expectRecord(raw, 'column field');
  const field: ColumnField = {
    type: readString(obj, 'type'),
    name: readString(obj, 'name'),
  };
  const camelCaseName = readOptionalString(obj, 'camel_case_name');
  if (camelCaseName !== undefined) field.camel_case_name = camelCaseName;
  const structName = readOptionalString(obj, 'struct_name');
  if (structName !== undefined) field.struct_name = structName;
  const required = readOptionalBoolean(obj, 'required');
  if (required !== undefined) field.required = required;
  const ignore = readOptionalBoolean(obj, 'ignore_for_uniqueness');
  if (ignore !== undefined) field.ignore_for_uniqueness = ignore;
  return field;
}

function decodeColumnConstraints(raw: unknown): ColumnConstraints {
  const obj = expectRecord(raw, 'column constraints');
  return {
    immutable_required: readOptionalBoolean(obj, 'immutable_required') ?? false,
    unique_id_required: readOptionalBoolean(obj, 'unique_id_required') ?? false,
    unique_required: readOptionalBoolean(obj, 'unique_required') ?? false,
    fields: readArray(obj, 'fields', decodeColumnField),
  };
}

export function decodeColumn(raw: unknown): Column {
  const obj = expectRecord(raw, 'column');
  const column: Column = {
    id: readString(obj, 'id'),
    name: readString(obj, 'name'),
    type: readString(obj, 'type'),
    is_array: readBoolean(obj, 'is_array'),
    default_value: readOptionalString(obj, 'default_value') ?? '',
    index_type: readString(obj, 'index_type'),
  };
  if (isRecord(obj.constraints)) {
    column.constraints = decodeColumnConstraints(obj.constraints);
  }
  return column;
}

export function newPurpose(name: string, description = '', id = NIL_UUID): Purpose {
  return { id, name, description };
}

export function decodePurpose(raw: unknown): Purpose {
  const obj = expectRecord(raw, 'purpose');
  return {
    id: readString(obj, 'id'),
    name: readString(obj, 'name'),
    description: readOptionalString(obj, 'description') ?? '',
  };
}

export function selector(whereClause: string): UserSelectorConfig {
  return { where_clause: whereClause };
}

function decodeSelectorConfig(raw: unknown): UserSelectorConfig {
  return selector(readString(expectRecord(raw, 'selector config'), 'where_clause'));
}

function decodeColumnOutputConfig(raw: unknown): ColumnOutputConfig {
  const obj = expectRecord(raw, 'column output config');
  return {
    column: decodeResourceID(obj.column),
    transformer: decodeResourceID(obj.transformer),
  };
}

function decodeColumnInputConfig(raw: unknown): ColumnInputConfig {
  const obj = expectRecord(raw, 'column input config');
  return {
    column: decodeResourceID(obj.column),
    normalizer: decodeResourceID(obj.normalizer),
  };
}

export interface AccessorFields {
  name: string;
  description?: string;
  columns: ColumnOutputConfig[];
  access_policy: ResourceID;
  token_access_policy?: ResourceID;
  selector_config: UserSelectorConfig;
  purposes: ResourceID[];
  data_life_cycle_state?: DataLifeCycleState;
}

export function newAccessor(fields: AccessorFields): Accessor {
  return {
    id: NIL_UUID,
    description: '',
    version: 0,
    ...fields,
    columns: [...fields.columns],
    purposes: [...fields.purposes],
  };
}

export function decodeAccessor(raw: unknown): Accessor {
  const obj = expectRecord(raw, 'accessor');
  const accessor: Accessor = {
    id: readString(obj, 'id'),
    name: readString(obj, 'name'),
    description: readOptionalString(obj, 'description') ?? '',
    columns: readArray(obj, 'columns', decodeColumnOutputConfig),
    access_policy: decodeResourceID(obj.access_policy),
    selector_config: decodeSelectorConfig(obj.selector_config),
    purposes: readArray(obj, 'purposes', decodeResourceID),
    version: readNumber(obj, 'version'),
  };
  const tokenAccessPolicy = decodeOptionalResourceID(obj, 'token_access_policy');
  if (tokenAccessPolicy) {
    accessor.token_access_policy = tokenAccessPolicy;
  }
  const state = readOptionalString(obj, 'data_life_cycle_state');
  if (state) {
    accessor.data_life_cycle_state = state;
  }
  return accessor;
}

export interface MutatorFields {
  name: string;
  description?: string;
  columns: ColumnInputConfig[];
  access_policy: ResourceID;
  selector_config: UserSelectorConfig;
}

export function newMutator(fields: MutatorFields): Mutator {
  return {
    id: NIL_UUID,
    description: '',
    version: 0,
    ...fields,
    columns: [...fields.columns],
  };
}

export function decodeMutator(raw: unknown): Mutator {
  const obj = expectRecord(raw, 'mutator');
  return {
    id: readString(obj, 'id'),
    name: readString(obj, 'name'),
    description: readOptionalString(obj, 'description') ?? '',
    columns: readArray(obj, 'columns', decodeColumnInputConfig),
    access_policy: decodeResourceID(obj.access_policy),
    selector_config: decodeSelectorConfig(obj.selector_config),
    version: readNumber(obj, 'version'),
  };
}

export function decodeExecuteAccessorResponse(raw: unknown): ExecuteAccessorResponse {
  const obj = expectRecord(raw, 'accessor response');
  const response: ExecuteAccessorResponse = {
    data: readArray(obj, 'data', (row) => {
      if (typeof row !== 'string') {
        throw new DecodeError('expected accessor rows to be JSON strings');
      }
      return row;
    }),
  };
  const hasNext = readOptionalBoolean(obj, 'has_next');
  if (hasNext !== undefined) response.has_next = hasNext;
  const next = readOptionalString(obj, 'next');
  if (next !== undefined) response.next = next;
  const hasPrev = readOptionalBoolean(obj, 'has_prev');
  if (hasPrev !== undefined) response.has_prev = hasPrev;
  const prev = readOptionalString(obj, 'prev');
  if (prev !== undefined) response.prev = prev;
  return response;
}

/**
 * Decode the JSON-encoded rows of an accessor response
 */
export function parseAccessorRows(response: ExecuteAccessorResponse): JsonObject[] {
  return response.data.map((row) => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(row);
    } catch {
      throw new DecodeError(`accessor row is not valid JSON: ${row}`);
    }
    return toJsonObject(parsed);
  });
}

export function retentionDuration(unit: DurationUnit, duration: number): RetentionDuration {
  return { unit, duration };
}

function decodeRetentionDuration(raw: unknown): RetentionDuration {
  const obj = expectRecord(raw, 'retention duration');
  return {
    unit: readString(obj, 'unit'),
    duration: readNumber(obj, 'duration'),
  };
}

export interface ColumnRetentionDurationFields {
  duration_type: DataLifeCycleState;
  duration: RetentionDuration;
  column_id?: string;
  purpose_id?: string;
  use_default?: boolean;
}

/**
 * A retention duration to create. Leave column_id and purpose_id unset for the tenant default.
 */
export function newColumnRetentionDuration(
  fields: ColumnRetentionDurationFields
): ColumnRetentionDuration {
  return {
    id: NIL_UUID,
    column_id: NIL_UUID,
    purpose_id: NIL_UUID,
    use_default: false,
    version: 0,
    ...fields,
  };
}

export function decodeColumnRetentionDuration(raw: unknown): ColumnRetentionDuration {
  const obj = expectRecord(raw, 'column retention duration');
  return {
    duration_type: readString(obj, 'duration_type'),
    id: readString(obj, 'id'),
    column_id: readOptionalString(obj, 'column_id') ?? NIL_UUID,
    purpose_id: readOptionalString(obj, 'purpose_id') ?? NIL_UUID,
    duration: decodeRetentionDuration(obj.duration),
    use_default: readOptionalBoolean(obj, 'use_default') ?? false,
    default_duration: isRecord(obj.default_duration)
      ? decodeRetentionDuration(obj.default_duration)
      : null,
    purpose_name: readOptionalString(obj, 'purpose_name') ?? null,
    version: readNumber(obj, 'version'),
  };
}

export function decodeColumnRetentionDurationResponse(raw: unknown): ColumnRetentionDurationResponse {
  const obj = expectRecord(raw, 'retention duration response');
  return {
    max_duration: decodeRetentionDuration(readRecord(obj, 'max_duration')),
    retention_duration: decodeColumnRetentionDuration(obj.retention_duration),
  };
}

export function decodeColumnRetentionDurationsResponse(raw: unknown): ColumnRetentionDurationsResponse {
  const obj = expectRecord(raw, 'retention durations response');
  return {
    max_duration: decodeRetentionDuration(readRecord(obj, 'max_duration')),
    retention_durations: readArray(obj, 'retention_durations', decodeColumnRetentionDuration),
  };
}
