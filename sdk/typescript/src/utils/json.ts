/**
 * JSON helpers for decoding API responses
 */

import {DecodeError} from '../errors';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function expectRecord(value: unknown, what: string): JsonRecord {
  if (!isRecord(value)) {
    throw new DecodeError(`expected ${what} to be an object`);
  }
  return value;
}

export function readString(obj: JsonRecord, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new DecodeError(`expected "${key}" to be a string`);
  }
  return value;
}

/**
 * Missing and null both read as undefined.
 */
export function readOptionalString(obj: JsonRecord, key: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new DecodeError(`expected "${key}" to be a string`);
  }
  return value;
}

export function readNumber(obj: JsonRecord, key: string): number {
  const value = obj[key];
  if (typeof value !== 'number') {
    throw new DecodeError(`expected "${key}" to be a number`);
  }
  return value;
}

export function readBoolean(obj: JsonRecord, key: string): boolean {
  const value = obj[key];
  if (typeof value !== 'boolean') {
    throw new DecodeError(`expected "${key}" to be a boolean`);
  }
  return value;
}

export function readOptionalBoolean(obj: JsonRecord, key: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new DecodeError(`expected "${key}" to be a boolean`);
  }
  return value;
}

export function readRecord(obj: JsonRecord, key: string): JsonRecord {
  return expectRecord(obj[key], `"${key}"`);
}

/**
 * Reads an array field and decodes each element. A null or missing array reads as empty.
 */
export function readArray<T>(
  obj: JsonRecord,
  key: string,
  decode: (item: unknown) => T
): T[] {
  const value = obj[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new DecodeError(`expected "${key}" to be an array`);
  }
  return value.map((item) => decode(item));
}

export function toJsonValue(value: unknown): JsonValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => toJsonValue(item));
  }
  if (isRecord(value)) {
    return toJsonObject(value);
  }
  throw new DecodeError(`unexpected ${typeof value} in JSON value`);
}

export function toJsonObject(value: unknown): JsonObject {
  const record = expectRecord(value, 'JSON value');
  const result: JsonObject = {};
  for (const [key, item] of Object.entries(record)) {
    if (item !== undefined) {
      result[key] = toJsonValue(item);
    }
  }
  return result;
}

/**
 * Reads the `data` array of a list response.
 */
export function readListData<T>(json: unknown, decode: (item: unknown) => T): T[] {
  return readArray(expectRecord(json, 'list response'), 'data', decode);
}
