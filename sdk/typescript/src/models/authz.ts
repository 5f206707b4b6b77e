/**
 * AuthZ graph models
 */

import {v4 as uuidv4} from 'uuid';
import type {
    Attribute,
    AuthzObject,
    Edge,
    EdgeType,
    ObjectType,
    Organization,
} from '../types';
import {NIL_UUID} from '../constants';
import {
    expectRecord,
    readArray,
    readBoolean,
    readOptionalBoolean,
    readOptionalString,
    readString,
    JsonRecord,
} from '../utils/json';

interface Timestamps {
  created?: string;
  updated?: string;
  deleted?: string;
}

function readTimestamps(obj: JsonRecord): Timestamps {
  const stamps: Timestamps = {};
  const created = readOptionalString(obj, 'created');
  if (created !== undefined) stamps.created = created;
  const updated = readOptionalString(obj, 'updated');
  if (updated !== undefined) stamps.updated = updated;
  const deleted = readOptionalString(obj, 'deleted');
  if (deleted !== undefined) stamps.deleted = deleted;
  return stamps;
}

function withOrganization<T extends object>(record: T, obj: JsonRecord): T & { organization_id?: string } {
  const organizationId = readOptionalString(obj, 'organization_id');
  return organizationId !== undefined ? { ...record, organization_id: organizationId } : record;
}

/**
 * AuthZ ids are chosen by the caller; a fresh random id is used when none is given.
 */
export function newObjectType(typeName: string, id: string = uuidv4()): ObjectType {
  return { id, type_name: typeName };
}

export function decodeObjectType(raw: unknown): ObjectType {
  const obj = expectRecord(raw, 'object type');
  return withOrganization(
    {
      id: readString(obj, 'id'),
      type_name: readString(obj, 'type_name'),
      ...readTimestamps(obj),
    },
    obj
  );
}

export function newObject(typeId: string, alias?: string, id: string = uuidv4()): AuthzObject {
  return alias !== undefined ? { id, type_id: typeId, alias } : { id, type_id: typeId };
}

export function decodeObject(raw: unknown): AuthzObject {
  const obj = expectRecord(raw, 'object');
  return withOrganization(
    {
      id: readString(obj, 'id'),
      type_id: readString(obj, 'type_id'),
      alias: readOptionalString(obj, 'alias') ?? null,
      ...readTimestamps(obj),
    },
    obj
  );
}

export function attribute(
  name: string,
  flags: { direct?: boolean; inherit?: boolean; propagate?: boolean }
): Attribute {
  return {
    name,
    direct: flags.direct ?? false,
    inherit: flags.inherit ?? false,
    propagate: flags.propagate ?? false,
  };
}

function decodeAttribute(raw: unknown): Attribute {
  const obj = expectRecord(raw, 'attribute');
  return {
    name: readString(obj, 'name'),
    direct: readOptionalBoolean(obj, 'direct') ?? false,
    inherit: readOptionalBoolean(obj, 'inherit') ?? false,
    propagate: readOptionalBoolean(obj, 'propagate') ?? false,
  };
}

export interface EdgeTypeFields {
  type_name: string;
  source_object_type_id: string;
  target_object_type_id: string;
  attributes: Attribute[];
  id?: string;
}

export function newEdgeType(fields: EdgeTypeFields): EdgeType {
  return {
    ...fields,
    id: fields.id ?? uuidv4(),
    attributes: [...fields.attributes],
  };
}

export function decodeEdgeType(raw: unknown): EdgeType {
  const obj = expectRecord(raw, 'edge type');
  return withOrganization(
    {
      id: readString(obj, 'id'),
      type_name: readString(obj, 'type_name'),
      source_object_type_id: readString(obj, 'source_object_type_id'),
      target_object_type_id: readString(obj, 'target_object_type_id'),
      attributes: readArray(obj, 'attributes', decodeAttribute),
      ...readTimestamps(obj),
    },
    obj
  );
}

export function newEdge(
  edgeTypeId: string,
  sourceObjectId: string,
  targetObjectId: string,
  id: string = uuidv4()
): Edge {
  return {
    id,
    edge_type_id: edgeTypeId,
    source_object_id: sourceObjectId,
    target_object_id: targetObjectId,
  };
}

export function decodeEdge(raw: unknown): Edge {
  const obj = expectRecord(raw, 'edge');
  return {
    id: readString(obj, 'id'),
    edge_type_id: readString(obj, 'edge_type_id'),
    source_object_id: readString(obj, 'source_object_id'),
    target_object_id: readString(obj, 'target_object_id'),
    ...readTimestamps(obj),
  };
}

export function newOrganization(name: string, region = '', id: string = NIL_UUID): Organization {
  return { id, name, region };
}

export function decodeOrganization(raw: unknown): Organization {
  const obj = expectRecord(raw, 'organization');
  return {
    id: readString(obj, 'id'),
    name: readString(obj, 'name'),
    region: readOptionalString(obj, 'region') ?? '',
    ...readTimestamps(obj),
  };
}

/**
 * Result of an attribute check
 */
export function decodeHasAttribute(raw: unknown): boolean {
  return readBoolean(expectRecord(raw, 'attribute check'), 'has_attribute');
}
