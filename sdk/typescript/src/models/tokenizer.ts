/**
 * Tokenizer models: access policies, templates, transformers and validators
 */

import type {
    AccessPolicy,
    AccessPolicyComponent,
    AccessPolicyTemplate,
    InspectTokenResponse,
    ResolveTokenResponse,
    ResourceID,
    Transformer,
    Validator,
} from '../types';
import {DataType, NIL_UUID, PolicyType, TransformType} from '../constants';
import {
    expectRecord,
    readArray,
    readBoolean,
    readNumber,
    readOptionalString,
    readString,
} from '../utils/json';
import {decodeOptionalResourceID, decodeResourceID} from './common';

export function newAccessPolicyTemplate(
  name: string,
  fn: string,
  description = ''
): AccessPolicyTemplate {
  return { id: NIL_UUID, name, description, function: fn, version: 0 };
}

export function decodeAccessPolicyTemplate(raw: unknown): AccessPolicyTemplate {
  const obj = expectRecord(raw, 'access policy template');
  return {
    id: readString(obj, 'id'),
    name: readString(obj, 'name'),
    description: readOptionalString(obj, 'description') ?? '',
    function: readString(obj, 'function'),
    version: readNumber(obj, 'version'),
  };
}

export function policyComponent(policy: ResourceID): AccessPolicyComponent {
  return { policy };
}

/**
 * Component that applies a template; parameters are a JSON-encoded string.
 */
export function templateComponent(template: ResourceID, parameters = '{}'): AccessPolicyComponent {
  return { template, template_parameters: parameters };
}

export function decodeAccessPolicyComponent(raw: unknown): AccessPolicyComponent {
  const obj = expectRecord(raw, 'access policy component');
  const policy = decodeOptionalResourceID(obj, 'policy');
  if (policy) {
    return { policy };
  }
  return {
    template: decodeResourceID(obj.template),
    template_parameters: readOptionalString(obj, 'template_parameters') ?? '',
  };
}

export interface AccessPolicyFields {
  name: string;
  description?: string;
  policy_type: PolicyType;
  components: AccessPolicyComponent[];
}

export function newAccessPolicy(fields: AccessPolicyFields): AccessPolicy {
  return {
    id: NIL_UUID,
    description: '',
    version: 0,
    ...fields,
    components: [...fields.components],
  };
}

export function decodeAccessPolicy(raw: unknown): AccessPolicy {
  const obj = expectRecord(raw, 'access policy');
  return {
    id: readString(obj, 'id'),
    name: readString(obj, 'name'),
    description: readOptionalString(obj, 'description') ?? '',
    policy_type: readString(obj, 'policy_type'),
    version: readNumber(obj, 'version'),
    components: readArray(obj, 'components', decodeAccessPolicyComponent),
  };
}

export interface TransformerFields {
  name: string;
  description?: string;
  input_type: DataType;
  output_type?: DataType;
  reuse_existing_token?: boolean;
  transform_type: TransformType;
  function: string;
  parameters?: string;
}

export function newTransformer(fields: TransformerFields): Transformer {
  return {
    id: NIL_UUID,
    reuse_existing_token: false,
    parameters: '',
    ...fields,
    output_type: fields.output_type ?? fields.input_type,
  };
}

export function decodeTransformer(raw: unknown): Transformer {
  const obj = expectRecord(raw, 'transformer');
  const transformer: Transformer = {
    id: readString(obj, 'id'),
    name: readString(obj, 'name'),
    input_type: readString(obj, 'input_type'),
    output_type: readString(obj, 'output_type'),
    reuse_existing_token: readBoolean(obj, 'reuse_existing_token'),
    transform_type: readString(obj, 'transform_type'),
    function: readString(obj, 'function'),
    parameters: readOptionalString(obj, 'parameters') ?? '',
  };
  const description = readOptionalString(obj, 'description');
  if (description !== undefined) {
    transformer.description = description;
  }
  return transformer;
}

export function newValidator(name: string, fn: string, parameters = ''): Validator {
  return { id: NIL_UUID, name, function: fn, parameters };
}

export function decodeValidator(raw: unknown): Validator {
  const obj = expectRecord(raw, 'validator');
  return {
    id: readString(obj, 'id'),
    name: readString(obj, 'name'),
    function: readString(obj, 'function'),
    parameters: readOptionalString(obj, 'parameters') ?? '',
  };
}

export function decodeResolveTokenResponse(raw: unknown): ResolveTokenResponse {
  const obj = expectRecord(raw, 'resolved token');
  const resolved: ResolveTokenResponse = {
    data: readOptionalString(obj, 'data') ?? '',
  };
  const token = readOptionalString(obj, 'token');
  if (token !== undefined) {
    resolved.token = token;
  }
  return resolved;
}

export function decodeInspectTokenResponse(raw: unknown): InspectTokenResponse {
  const obj = expectRecord(raw, 'token inspection');
  return {
    id: readString(obj, 'id'),
    token: readString(obj, 'token'),
    created: readString(obj, 'created'),
    updated: readString(obj, 'updated'),
    transformer: decodeTransformer(obj.transformer),
    access_policy: decodeAccessPolicy(obj.access_policy),
  };
}
