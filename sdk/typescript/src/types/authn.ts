import type {JsonObject} from '../utils/json';

export interface UserResponse {
  id: string;
  /** Unix seconds */
  updated_at: number;
  profile: JsonObject;
  organization_id: string;
}

export interface ListUsersOptions {
  limit?: number;
  startingAfter?: string;
  /** Only users whose AuthN email matches */
  email?: string;
}
