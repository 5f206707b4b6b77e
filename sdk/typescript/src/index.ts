/**
 * Privacy Platform TypeScript SDK
 * Client for the AuthN, AuthZ, Userstore and Tokenizer APIs
 */

export { PlatformClient } from './client';
export type { Environment } from './client';

// Export types
export type * from './types';

// Export constants
export {
  NIL_UUID,
  DataType,
  ColumnIndexType,
  PolicyType,
  TransformType,
  DataLifeCycleState,
  DurationUnit,
  Region,
  AuthnType,
} from './constants';
export type { OpenEnum } from './constants';

export {
  AccessPolicyOpen,
  TransformerPassThrough,
  TransformerUUID,
  NormalizerOpen,
} from './policies';

// Export model helpers
export {
  resourceById,
  resourceByName,
  describeResourceID,
  matchesResource,
} from './models/common';
export {
  newColumn,
  newPurpose,
  selector,
  newAccessor,
  newMutator,
  parseAccessorRows,
  retentionDuration,
  newColumnRetentionDuration,
} from './models/userstore';
export type { AccessorFields, MutatorFields, ColumnRetentionDurationFields } from './models/userstore';
export {
  newAccessPolicyTemplate,
  policyComponent,
  templateComponent,
  newAccessPolicy,
  newTransformer,
  newValidator,
} from './models/tokenizer';
export type { AccessPolicyFields, TransformerFields } from './models/tokenizer';
export {
  newObjectType,
  newObject,
  attribute,
  newEdgeType,
  newEdge,
  newOrganization,
} from './models/authz';
export type { EdgeTypeFields } from './models/authz';

// Export errors
export {
  PlatformError,
  ConfigurationError,
  NetworkError,
  DecodeError,
  APIError,
  ValidationError,
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  ConflictError,
  RateLimitError,
  ServerError,
} from './errors';
export type { APIErrorDetails } from './errors';

// Export storage adapters
export { MemoryStorage } from './utils/storage';

// Export auth utilities
export { TokenManager } from './auth/TokenManager';
export { AuthService, encodeBasicCredentials } from './auth/AuthService';
export { jwtExpiryCheck, decodeJwtPayload } from './auth/freshness';
export type { TokenFreshnessCheck } from './auth/freshness';

// Export API services
export { UsersAPI } from './api/UsersAPI';
export { ColumnsAPI } from './api/ColumnsAPI';
export { PurposesAPI } from './api/PurposesAPI';
export { RetentionDurationsAPI } from './api/RetentionDurationsAPI';
export { AccessorsAPI } from './api/AccessorsAPI';
export { MutatorsAPI } from './api/MutatorsAPI';
export { CodegenAPI } from './api/CodegenAPI';
export { AccessPolicyTemplatesAPI } from './api/AccessPolicyTemplatesAPI';
export { AccessPoliciesAPI } from './api/AccessPoliciesAPI';
export { TransformersAPI } from './api/TransformersAPI';
export { ValidatorsAPI } from './api/ValidatorsAPI';
export { TokensAPI } from './api/TokensAPI';
export { ObjectTypesAPI } from './api/ObjectTypesAPI';
export { EdgeTypesAPI } from './api/EdgeTypesAPI';
export { ObjectsAPI } from './api/ObjectsAPI';
export { EdgesAPI } from './api/EdgesAPI';
export { OrganizationsAPI } from './api/OrganizationsAPI';
export { AuthzAPI } from './api/AuthzAPI';
