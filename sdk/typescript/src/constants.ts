/**
 * Platform enumerations
 */

import {NIL} from 'uuid';

/** The all-zero UUID; marks an id the server has not assigned */
export const NIL_UUID: string = NIL;

/**
 * A known value or any other string the server sends back
 */
export type OpenEnum<T extends string> = T | (string & {});

export const DataType = {
  ADDRESS: 'address',
  BIRTHDATE: 'birthdate',
  BOOLEAN: 'boolean',
  COMPOSITE: 'composite',
  DATE: 'date',
  E164_PHONENUMBER: 'e164_phonenumber',
  EMAIL: 'email',
  INTEGER: 'integer',
  PHONENUMBER: 'phonenumber',
  SSN: 'ssn',
  STRING: 'string',
  TIMESTAMP: 'timestamp',
  UUID: 'uuid',
} as const;
export type DataType = (typeof DataType)[keyof typeof DataType];

export const ColumnIndexType = {
  NONE: 'none',
  INDEXED: 'indexed',
  UNIQUE: 'unique',
} as const;
export type ColumnIndexType = (typeof ColumnIndexType)[keyof typeof ColumnIndexType];

export const PolicyType = {
  COMPOSITE_AND: 'composite_and',
  COMPOSITE_OR: 'composite_or',
} as const;
export type PolicyType = (typeof PolicyType)[keyof typeof PolicyType];

export const TransformType = {
  PASSTHROUGH: 'passthrough',
  TRANSFORM: 'transform',
  TOKENIZE_BY_VALUE: 'tokenizebyvalue',
  TOKENIZE_BY_REFERENCE: 'tokenizebyreference',
} as const;
export type TransformType = (typeof TransformType)[keyof typeof TransformType];

export const DataLifeCycleState = {
  LIVE: 'live',
  SOFT_DELETED: 'softdeleted',
} as const;
export type DataLifeCycleState = (typeof DataLifeCycleState)[keyof typeof DataLifeCycleState];

export const DurationUnit = {
  INDEFINITE: 'indefinite',
  YEAR: 'year',
  MONTH: 'month',
  WEEK: 'week',
  DAY: 'day',
  HOUR: 'hour',
} as const;
export type DurationUnit = (typeof DurationUnit)[keyof typeof DurationUnit];

export const Region = {
  AWS_US_EAST_1: 'aws-us-east-1',
  AWS_US_WEST_2: 'aws-us-west-2',
  AWS_EU_WEST_1: 'aws-eu-west-1',
} as const;
export type Region = (typeof Region)[keyof typeof Region];

export const AuthnType = {
  PASSWORD: 'password',
} as const;
export type AuthnType = (typeof AuthnType)[keyof typeof AuthnType];
