/**
 * Main Privacy Platform client
 */

import type {PlatformConfig} from './types';
import {AuthService} from './auth/AuthService';
import {TokenManager} from './auth/TokenManager';
import {AccessPoliciesAPI} from './api/AccessPoliciesAPI';
import {AccessPolicyTemplatesAPI} from './api/AccessPolicyTemplatesAPI';
import {AccessorsAPI} from './api/AccessorsAPI';
import {AuthzAPI} from './api/AuthzAPI';
import {CodegenAPI} from './api/CodegenAPI';
import {ColumnsAPI} from './api/ColumnsAPI';
import {EdgesAPI} from './api/EdgesAPI';
import {EdgeTypesAPI} from './api/EdgeTypesAPI';
import {MutatorsAPI} from './api/MutatorsAPI';
import {ObjectsAPI} from './api/ObjectsAPI';
import {ObjectTypesAPI} from './api/ObjectTypesAPI';
import {OrganizationsAPI} from './api/OrganizationsAPI';
import {PurposesAPI} from './api/PurposesAPI';
import {RetentionDurationsAPI} from './api/RetentionDurationsAPI';
import {TokensAPI} from './api/TokensAPI';
import {TransformersAPI} from './api/TransformersAPI';
import {UsersAPI} from './api/UsersAPI';
import {ValidatorsAPI} from './api/ValidatorsAPI';
import {MemoryStorage} from './utils/storage';
import {DEFAULT_TIMEOUT} from './utils/http';
import {ConfigurationError} from './errors';

export type Environment = Record<string, string | undefined>;

function readEnv(env: Environment, name: string, description: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigurationError(`Missing environment variable '${name}': ${description}`);
  }
  return value;
}

export class PlatformClient {
  private config: PlatformConfig;
  private tokenManager: TokenManager;
  private authService: AuthService;

  // AuthN
  public readonly users: UsersAPI;

  // Userstore
  public readonly columns: ColumnsAPI;
  public readonly purposes: PurposesAPI;
  public readonly retentionDurations: RetentionDurationsAPI;
  public readonly accessors: AccessorsAPI;
  public readonly mutators: MutatorsAPI;
  public readonly codegen: CodegenAPI;

  // Tokenizer
  public readonly accessPolicyTemplates: AccessPolicyTemplatesAPI;
  public readonly accessPolicies: AccessPoliciesAPI;
  public readonly transformers: TransformersAPI;
  public readonly validators: ValidatorsAPI;
  public readonly tokens: TokensAPI;

  // AuthZ
  public readonly objectTypes: ObjectTypesAPI;
  public readonly edgeTypes: EdgeTypesAPI;
  public readonly objects: ObjectsAPI;
  public readonly edges: EdgesAPI;
  public readonly organizations: OrganizationsAPI;
  public readonly authz: AuthzAPI;

  constructor(config: PlatformConfig) {
    this.validateConfig(config);
    this.config = this.normalizeConfig(config);

    this.tokenManager = new TokenManager(
      this.config.storage || new MemoryStorage(),
      this.config.tokenFreshness
    );
    this.authService = new AuthService(this.config, this.tokenManager);

    this.users = new UsersAPI(this.config, this.tokenManager);

    this.columns = new ColumnsAPI(this.config, this.tokenManager);
    this.purposes = new PurposesAPI(this.config, this.tokenManager);
    this.retentionDurations = new RetentionDurationsAPI(this.config, this.tokenManager);
    this.accessors = new AccessorsAPI(this.config, this.tokenManager);
    this.mutators = new MutatorsAPI(this.config, this.tokenManager);
    this.codegen = new CodegenAPI(this.config, this.tokenManager);

    this.accessPolicyTemplates = new AccessPolicyTemplatesAPI(this.config, this.tokenManager);
    this.accessPolicies = new AccessPoliciesAPI(this.config, this.tokenManager);
    this.transformers = new TransformersAPI(this.config, this.tokenManager);
    this.validators = new ValidatorsAPI(this.config, this.tokenManager);
    this.tokens = new TokensAPI(this.config, this.tokenManager);

    this.objectTypes = new ObjectTypesAPI(this.config, this.tokenManager);
    this.edgeTypes = new EdgeTypesAPI(this.config, this.tokenManager);
    this.objects = new ObjectsAPI(this.config, this.tokenManager);
    this.edges = new EdgesAPI(this.config, this.tokenManager);
    this.organizations = new OrganizationsAPI(this.config, this.tokenManager);
    this.authz = new AuthzAPI(this.config, this.tokenManager);
  }

  /**
   * Build a client from TENANT_URL, CLIENT_ID and CLIENT_SECRET.
   * UC_SESSION_NAME, when set, labels the session.
   */
  static fromEnv(
    env: Environment = process.env,
    overrides: Partial<PlatformConfig> = {}
  ): PlatformClient {
    const config: PlatformConfig = {
      baseUrl: readEnv(env, 'TENANT_URL', 'tenant URL'),
      clientId: readEnv(env, 'CLIENT_ID', 'client ID'),
      clientSecret: readEnv(env, 'CLIENT_SECRET', 'client secret'),
      ...overrides,
    };
    const sessionName = env.UC_SESSION_NAME;
    if (sessionName && config.sessionName === undefined) {
      config.sessionName = sessionName;
    }
    return new PlatformClient(config);
  }

  /**
   * Validate configuration
   */
  private validateConfig(config: PlatformConfig): void {
    if (!config.baseUrl) {
      throw new ConfigurationError('baseUrl is required');
    }

    if (!config.clientId) {
      throw new ConfigurationError('clientId is required');
    }

    if (!config.clientSecret) {
      throw new ConfigurationError('clientSecret is required');
    }

    // Validate URL format
    try {
      new URL(config.baseUrl);
    } catch {
      throw new ConfigurationError('baseUrl must be a valid URL');
    }
  }

  /**
   * Normalize configuration
   */
  private normalizeConfig(config: PlatformConfig): PlatformConfig {
    return {
      ...config,
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
      timeout: config.timeout || DEFAULT_TIMEOUT,
    };
  }

  /**
   * Access token helpers
   */
  get auth() {
    return {
      /**
       * Current access token, acquiring one if needed
       */
      getAccessToken: async (): Promise<string> => {
        return await this.tokenManager.getAccessToken();
      },

      /**
       * Acquire a new access token now
       */
      refreshToken: async (): Promise<string> => {
        return await this.tokenManager.refresh();
      },

      /**
       * Drop the cached token so the next call acquires a new one
       */
      invalidateToken: async (): Promise<void> => {
        await this.authService.invalidateToken();
      },

      /**
       * Get token manager (for advanced usage)
       */
      getTokenManager: (): TokenManager => {
        return this.tokenManager;
      },
    };
  }

  /**
   * Get configuration
   */
  getConfig(): Readonly<PlatformConfig> {
    return { ...this.config };
  }
}
