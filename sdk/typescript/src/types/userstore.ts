import type {ColumnIndexType, DataLifeCycleState, DataType, DurationUnit, OpenEnum} from '../constants';
import type {JsonValue} from '../utils/json';
import type {ResourceID} from './index';

export interface ColumnField {
  type: OpenEnum<DataType>;
  name: string;
  camel_case_name?: string;
  struct_name?: string;
  required?: boolean;
  ignore_for_uniqueness?: boolean;
}

export interface ColumnConstraints {
  immutable_required: boolean;
  unique_id_required: boolean;
  unique_required: boolean;
  fields: ColumnField[];
}

export interface Column {
  id: string;
  name: string;
  type: OpenEnum<DataType>;
  is_array: boolean;
  default_value: string;
  index_type: OpenEnum<ColumnIndexType>;
  constraints?: ColumnConstraints;
}

export interface Purpose {
  id: string;
  name: string;
  description: string;
}

export interface UserSelectorConfig {
  /** Parameterized filter, e.g. `{id} = ?` */
  where_clause: string;
}

export interface ColumnOutputConfig {
  column: ResourceID;
  transformer: ResourceID;
}

export interface ColumnInputConfig {
  column: ResourceID;
  normalizer: ResourceID;
}

export interface Accessor {
  id: string;
  name: string;
  description: string;
  columns: ColumnOutputConfig[];
  access_policy: ResourceID;
  token_access_policy?: ResourceID;
  selector_config: UserSelectorConfig;
  purposes: ResourceID[];
  data_life_cycle_state?: OpenEnum<DataLifeCycleState>;
  version: number;
}

export interface Mutator {
  id: string;
  name: string;
  description: string;
  columns: ColumnInputConfig[];
  access_policy: ResourceID;
  selector_config: UserSelectorConfig;
  version: number;
}

/**
 * Value written to one column by a mutator.
 */
export interface ColumnValue {
  value: unknown;
  purpose_additions?: ResourceID[];
  purpose_deletions?: ResourceID[];
}

export type RowData = Record<string, ColumnValue>;

export interface ExecuteAccessorResponse {
  /** One JSON-encoded object per selected row */
  data: string[];
  has_next?: boolean;
  next?: string;
  has_prev?: boolean;
  prev?: string;
}

/** Opaque acknowledgement from the server */
export type ExecuteMutatorResponse = JsonValue;

export interface RetentionDuration {
  unit: OpenEnum<DurationUnit>;
  duration: number;
}

export interface ColumnRetentionDuration {
  duration_type: OpenEnum<DataLifeCycleState>;
  id: string;
  column_id: string;
  purpose_id: string;
  duration: RetentionDuration;
  use_default: boolean;
  default_duration?: RetentionDuration | null;
  purpose_name?: string | null;
  version: number;
}

export interface ColumnRetentionDurationResponse {
  max_duration: RetentionDuration;
  retention_duration: ColumnRetentionDuration;
}

export interface ColumnRetentionDurationsResponse {
  max_duration: RetentionDuration;
  retention_durations: ColumnRetentionDuration[];
}
