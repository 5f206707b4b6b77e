/**
 * AuthZ checks API service
 */

import {BaseAPI} from './BaseAPI';
import {decodeHasAttribute} from '../models/authz';

export class AuthzAPI extends BaseAPI {
  /**
   * Whether the source object holds an attribute on the target object.
   * Attribute propagation along edges is evaluated by the server.
   */
  async checkAttribute(
    sourceObjectId: string,
    targetObjectId: string,
    attribute: string
  ): Promise<boolean> {
    const json = await this.httpGet('/authz/checkattribute', {
      params: {
        source_object_id: sourceObjectId,
        target_object_id: targetObjectId,
        attribute,
      },
    });
    return decodeHasAttribute(json);
  }
}
