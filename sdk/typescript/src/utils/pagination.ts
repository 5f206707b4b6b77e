import type {ListOptions, QueryValue} from '../types';

/** Paginated list API version the SDK speaks */
export const LIST_API_VERSION = '3';

/**
 * Query parameters for a list endpoint
 */
export function listParams(options: ListOptions = {}): Record<string, QueryValue> {
  const params: Record<string, QueryValue> = {};

  if (options.limit && options.limit > 0) {
    params.limit = options.limit;
  }
  if (options.startingAfter !== undefined) {
    params.starting_after = `id:${options.startingAfter}`;
  }
  params.version = LIST_API_VERSION;

  return params;
}
