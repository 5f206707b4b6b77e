import type {UserResponse} from '../types';
import {NIL_UUID} from '../constants';
import {expectRecord, readNumber, readOptionalString, readString, toJsonObject} from '../utils/json';

export function decodeUserResponse(raw: unknown): UserResponse {
  const obj = expectRecord(raw, 'user');
  return {
    id: readString(obj, 'id'),
    updated_at: readNumber(obj, 'updated_at'),
    profile: obj.profile === undefined || obj.profile === null ? {} : toJsonObject(obj.profile),
    organization_id: readOptionalString(obj, 'organization_id') ?? NIL_UUID,
  };
}
