/**
 * Shared setup for the sample programs
 */

import {PlatformClient, PlatformError, Region} from '../src';
import type {Environment} from '../src';

export class SampleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SampleError';
    Object.setPrototypeOf(this, SampleError.prototype);
  }
}

/**
 * Client for the tenant named by TENANT_URL, CLIENT_ID and CLIENT_SECRET.
 * DEV_ONLY_DISABLE_SSL_VERIFICATION=true turns off certificate checks for local tenants.
 */
export function sampleClient(env: Environment = process.env): PlatformClient {
  if (env.DEV_ONLY_DISABLE_SSL_VERIFICATION === 'true') {
    process.env.NODE_TLS_REJECT_UNAUTHORIZED = '0';
  }
  return PlatformClient.fromEnv(env);
}

export function sampleRegion(env: Environment = process.env): string {
  return env.UC_REGION || Region.AWS_US_WEST_2;
}

/**
 * Run a sample against the configured tenant; report failures and exit 1
 */
export async function runSample(run: (client: PlatformClient) => Promise<void>): Promise<void> {
  try {
    await run(sampleClient());
  } catch (error) {
    if (error instanceof PlatformError) {
      console.error(`Client Error: ${String(error)}`);
    } else if (error instanceof SampleError) {
      console.error(`Sample Error: ${error.message}`);
    } else {
      throw error;
    }
    process.exit(1);
  }
}
