/**
 * Resource references and shared decoders
 */

import type {ResourceID} from '../types';
import {NIL_UUID} from '../constants';
import {DecodeError} from '../errors';
import {expectRecord, JsonRecord, readOptionalString, readString} from '../utils/json';

export function resourceById(id: string): ResourceID {
  return { id };
}

export function resourceByName(name: string): ResourceID {
  return { name };
}

export function describeResourceID(rid: ResourceID): string {
  return rid.id !== undefined ? `ResourceID(${rid.id})` : `ResourceID(${rid.name})`;
}

/**
 * Servers send both handles; a non-nil id wins over the name.
 */
export function decodeResourceID(raw: unknown): ResourceID {
  const obj = expectRecord(raw, 'resource id');
  const id = readOptionalString(obj, 'id');
  const name = readOptionalString(obj, 'name');

  if (id && id !== NIL_UUID) {
    return { id };
  }
  if (name) {
    return { name };
  }
  if (id) {
    return { id };
  }
  throw new DecodeError('resource id has neither id nor name');
}

export function decodeOptionalResourceID(obj: JsonRecord, key: string): ResourceID | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  const rid = decodeResourceID(value);
  // an unset reference comes back as the nil id with no name
  if (rid.id === NIL_UUID) {
    return undefined;
  }
  return rid;
}

/**
 * Whether a record is the one a reference points at
 */
export function matchesResource(record: { id: string; name: string }, rid: ResourceID): boolean {
  return rid.id !== undefined ? record.id === rid.id : record.name === rid.name;
}
