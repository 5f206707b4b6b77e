import {runAuthzSample} from '../examples/authz-sample';
import {runSample, sampleClient, sampleRegion, SampleError} from '../examples/env';
import {runTokenizerSample} from '../examples/tokenizer-sample';
import {runUserstoreSample} from '../examples/userstore-sample';
import {ConfigurationError, PlatformClient} from '../src';
import {FakePlatform, RETENTION_PATH} from './helpers/fakePlatform';
import {testClient} from './helpers/http';

describe('sample programs', () => {
  let platform: FakePlatform;
  let client: PlatformClient;

  beforeEach(() => {
    platform = new FakePlatform();
    client = testClient(platform.fetch);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should run the authz sample and leave the graph empty', async () => {
    await runAuthzSample(client);

    expect(platform.count('/authz/objecttypes')).toBe(0);
    expect(platform.count('/authz/edgetypes')).toBe(0);
    expect(platform.count('/authz/objects')).toBe(0);
    expect(platform.count('/authz/edges')).toBe(0);
    expect(console.log).toHaveBeenCalledWith('authz sample completed');
  });

  it('should check view access along group and folder edges', async () => {
    await runAuthzSample(client);

    const checks = platform.requests.filter((request) => request.path === '/authz/checkattribute');
    expect(checks).toHaveLength(6);
    expect(checks.every((request) => request.query.get('attribute') === 'view')).toBe(true);
  });

  it('should run the authz sample twice against the same tenant', async () => {
    await runAuthzSample(client);
    await runAuthzSample(client);

    expect(platform.count('/authz/objecttypes')).toBe(0);
  });

  it('should run the tokenizer sample and clean up after itself', async () => {
    await runTokenizerSample(client);

    expect(platform.count('/tokenizer/policies/access')).toBe(1);
    expect(platform.count('/tokenizer/policies/accesstemplate')).toBe(0);
    expect(platform.count('/tokenizer/policies/transformation')).toBe(2);
    expect(console.log).toHaveBeenCalledWith('tokenizer sample completed');
  });

  it('should authenticate once per sample run', async () => {
    await runTokenizerSample(client);

    expect(platform.tokenRequests).toBe(1);
  });

  it('should version access policy updates', async () => {
    await runTokenizerSample(client);

    const deletes = platform.requests.filter(
      (request) => request.method === 'DELETE' && request.path.startsWith('/tokenizer/policies/access/')
    );
    expect(deletes.map((request) => request.query.get('policy_version'))).toEqual(['1', '0']);
  });

  describe('userstore sample', () => {
    beforeEach(() => {
      jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    it('should run and remove its accessors, mutators, users and retention durations', async () => {
      await runUserstoreSample(client, 'aws-us-west-2');

      expect(platform.count('/userstore/config/accessors')).toBe(0);
      expect(platform.count('/userstore/config/mutators')).toBe(0);
      expect(platform.count('/authn/users')).toBe(0);
      expect(platform.count(RETENTION_PATH)).toBe(0);
      expect(console.warn).not.toHaveBeenCalled();
    });

    it('should keep its columns, purposes and policies', async () => {
      await runUserstoreSample(client, 'aws-us-west-2');

      expect(console.log).toHaveBeenCalledWith('num columns: 4');
      expect(console.log).toHaveBeenCalledWith('num purposes: 3');
      expect(console.log).toHaveBeenCalledWith('num access policy templates: 1');
      expect(console.log).toHaveBeenCalledWith('num access policies: 2');
      expect(console.log).toHaveBeenCalledWith('num transformers: 5');
      expect(console.log).toHaveBeenCalledWith('num accessors: 0');
    });

    it('should resolve the reused phone token to the stored number', async () => {
      await runUserstoreSample(client, 'aws-us-west-2');

      const resolvedLog = jest
        .mocked(console.log)
        .mock.calls.find(([message]) => message === "user's phone token resolved");
      expect(JSON.parse(String(resolvedLog?.[1]))).toEqual([{ data: '123-456-7890', token: expect.any(String) }]);

      const accessorRuns = platform.requests.filter(
        (request) => request.method === 'POST' && request.path === '/userstore/api/accessors'
      );
      expect(accessorRuns).toHaveLength(5);
    });

    it('should select the user through the address and phone selector', async () => {
      await runUserstoreSample(client, 'aws-us-west-2');

      const securityLog = jest
        .mocked(console.log)
        .mock.calls.find(([message]) => message === "security context: user's details are");
      expect(JSON.parse(String(securityLog?.[1]))).toEqual([
        expect.objectContaining({ phone_number: '123-456-7890' }),
      ]);
    });

    it('should write retention durations at the column, tenant and purpose scopes', async () => {
      await runUserstoreSample(client, 'aws-us-west-2');

      const writes = platform.requests
        .filter((request) => request.method === 'POST' && request.path.endsWith('/softdeletedretentiondurations'))
        .map((request) => request.path.split('/')[3]);
      expect(writes).toEqual(['columns', 'softdeletedretentiondurations', 'purposes']);
    });
  });
});

describe('sample environment', () => {
  const env = {
    TENANT_URL: 'https://tenant.test',
    CLIENT_ID: 'test-client',
    CLIENT_SECRET: 'test-secret',
  };

  it('should default the region', () => {
    expect(sampleRegion({})).toBe('aws-us-west-2');
    expect(sampleRegion({ UC_REGION: 'aws-eu-west-1' })).toBe('aws-eu-west-1');
  });

  it('should build a client from the environment', () => {
    expect(sampleClient(env).getConfig().baseUrl).toBe('https://tenant.test');
  });

  it('should fail on missing credentials', () => {
    expect(() => sampleClient({ TENANT_URL: 'https://tenant.test' })).toThrow(ConfigurationError);
  });

  describe('runSample', () => {
    const saved = { ...process.env };

    beforeEach(() => {
      Object.assign(process.env, env);
      jest.spyOn(console, 'error').mockImplementation(() => undefined);
      jest.spyOn(process, 'exit').mockImplementation((code) => {
        throw new Error(`exit ${code}`);
      });
    });

    afterEach(() => {
      jest.restoreAllMocks();
      for (const key of Object.keys(env)) {
        if (saved[key] === undefined) {
          delete process.env[key];
        } else {
          process.env[key] = saved[key];
        }
      }
    });

    it('should report a failed check and exit 1', async () => {
      await expect(
        runSample(async () => {
          throw new SampleError('edge count changed');
        })
      ).rejects.toThrow('exit 1');

      expect(console.error).toHaveBeenCalledWith('Sample Error: edge count changed');
    });

    it('should report a client error and exit 1', async () => {
      await expect(
        runSample(async () => {
          throw new ConfigurationError('No token source configured');
        })
      ).rejects.toThrow('exit 1');

      expect(console.error).toHaveBeenCalledWith('Client Error: ConfigurationError: No token source configured');
    });

    it('should pass other errors through', async () => {
      await expect(
        runSample(async () => {
          throw new TypeError('bug');
        })
      ).rejects.toThrow(TypeError);

      expect(process.exit).not.toHaveBeenCalled();
    });

    it('should finish quietly when the sample succeeds', async () => {
      const run = jest.fn<Promise<void>, [PlatformClient]>().mockResolvedValue(undefined);

      await runSample(run);

      expect(run).toHaveBeenCalledWith(expect.any(PlatformClient));
      expect(process.exit).not.toHaveBeenCalled();
    });
  });
});
