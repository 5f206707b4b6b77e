/**
 * Built-in platform resources every tenant ships with, referenced by name
 */

import type {ResourceID} from './types';

/** Access policy that always grants access */
export const AccessPolicyOpen: ResourceID = { name: 'AllowAll' };

/** Transformer that returns the stored value unchanged */
export const TransformerPassThrough: ResourceID = { name: 'PassthroughUnchangedData' };

/** Tokenizing transformer that issues a random UUID per value */
export const TransformerUUID: ResourceID = { name: 'UUID' };

/** Normalizer that stores input as given */
export const NormalizerOpen: ResourceID = { name: 'PassthroughUnchangedData' };
