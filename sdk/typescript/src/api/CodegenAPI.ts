/**
 * Generated userstore SDK download
 */

import {BaseAPI} from './BaseAPI';

export class CodegenAPI extends BaseAPI {
  /**
   * Source of a client generated for this tenant's userstore schema
   */
  async downloadUserstoreSDK(): Promise<string> {
    return this.httpDownload('/userstore/download/codegensdk.py');
  }
}
