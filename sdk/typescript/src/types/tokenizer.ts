import type {DataType, OpenEnum, PolicyType, TransformType} from '../constants';
import type {ResourceID} from './index';

export interface AccessPolicyTemplate {
  id: string;
  name: string;
  description: string;
  /** Policy source, e.g. `function policy(context, params) { ... }` */
  function: string;
  version: number;
}

export type AccessPolicyComponent =
  | { policy: ResourceID; template?: never; template_parameters?: never }
  | { template: ResourceID; template_parameters: string; policy?: never };

export interface AccessPolicy {
  id: string;
  name: string;
  description: string;
  policy_type: OpenEnum<PolicyType>;
  version: number;
  components: AccessPolicyComponent[];
}

export interface Transformer {
  id: string;
  name: string;
  description?: string;
  input_type: OpenEnum<DataType>;
  output_type: OpenEnum<DataType>;
  reuse_existing_token: boolean;
  transform_type: OpenEnum<TransformType>;
  function: string;
  parameters: string;
}

export interface Validator {
  id: string;
  name: string;
  function: string;
  parameters: string;
}

export interface ResolveTokenResponse {
  data: string;
  token?: string;
}

export interface InspectTokenResponse {
  id: string;
  token: string;
  created: string;
  updated: string;
  transformer: Transformer;
  access_policy: AccessPolicy;
}
