import {AuthService, encodeBasicCredentials} from '../src/auth/AuthService';
import {decodeJwtPayload, jwtExpiryCheck} from '../src/auth/freshness';
import {TokenManager} from '../src/auth/TokenManager';
import {AuthenticationError, ConfigurationError, DecodeError} from '../src/errors';
import {MemoryStorage} from '../src/utils/storage';
import {
    BASE_URL,
    expiredJwt,
    FetchArgs,
    freshJwt,
    jsonResponse,
    makeJwt,
    requestHeaders,
    requestUrl,
    testClient,
    tokenResponse,
} from './helpers/http';

describe('jwtExpiryCheck', () => {
  const now = Date.UTC(2024, 0, 1);
  const nowSeconds = now / 1000;

  it('should accept a token that expires later', () => {
    expect(jwtExpiryCheck.isFresh(makeJwt(nowSeconds + 60), now)).toBe(true);
  });

  it('should accept a token that expires this second', () => {
    expect(jwtExpiryCheck.isFresh(makeJwt(nowSeconds), now)).toBe(true);
  });

  it('should reject an expired token', () => {
    expect(jwtExpiryCheck.isFresh(makeJwt(nowSeconds - 1), now)).toBe(false);
  });

  it('should reject a token that does not decode', () => {
    expect(jwtExpiryCheck.isFresh('not-a-jwt', now)).toBe(false);
  });
});

describe('decodeJwtPayload', () => {
  it('should return the claims', () => {
    expect(decodeJwtPayload(makeJwt(1700000000, 'svc'))).toEqual({ sub: 'svc', exp: 1700000000 });
  });

  it('should reject tokens without three parts', () => {
    expect(() => decodeJwtPayload('a.b')).toThrow('Invalid JWT format');
  });
});

describe('encodeBasicCredentials', () => {
  it('should base64 encode the URL-escaped id and secret', () => {
    expect(encodeBasicCredentials('test-client', 'test-secret')).toBe(
      Buffer.from('test-client:test-secret').toString('base64')
    );
    expect(encodeBasicCredentials('a b', 'c:d')).toBe(Buffer.from('a%20b:c%3Ad').toString('base64'));
  });

  it('should keep slashes and escape sub-delimiters', () => {
    expect(encodeBasicCredentials('team/svc', "x!'()*~")).toBe(
      Buffer.from('team/svc:x%21%27%28%29%2A~').toString('base64')
    );
  });
});

describe('AuthService', () => {
  it('should request a client credentials token', async () => {
    const fetchFn = jest.fn<Promise<Response>, FetchArgs>().mockResolvedValue(tokenResponse('test-token'));
    const manager = new TokenManager(new MemoryStorage());
    const service = new AuthService(
      { baseUrl: BASE_URL, clientId: 'test-client', clientSecret: 'test-secret', fetch: fetchFn },
      manager
    );

    const token = await service.fetchToken();

    expect(token).toEqual({ access_token: 'test-token', token_type: 'Bearer', id_token: undefined, expires_in: 3600 });
    const [input, init] = fetchFn.mock.calls[0];
    expect(requestUrl(input).toString()).toBe(`${BASE_URL}/oidc/token`);
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('grant_type=client_credentials');
    const headers = requestHeaders(init);
    expect(headers.get('Authorization')).toBe(`Basic ${encodeBasicCredentials('test-client', 'test-secret')}`);
    expect(headers.get('Content-Type')).toBe('application/x-www-form-urlencoded');
  });

  it('should raise an authentication error when credentials are rejected', async () => {
    const fetchFn = jest.fn<Promise<Response>, FetchArgs>().mockResolvedValue(
      jsonResponse({ error: 'invalid_client' }, 401)
    );
    const service = new AuthService(
      { baseUrl: BASE_URL, clientId: 'test-client', clientSecret: 'test-secret', fetch: fetchFn },
      new TokenManager()
    );

    await expect(service.fetchToken()).rejects.toThrow(AuthenticationError);
  });

  it('should reject a token response without an access token', async () => {
    const fetchFn = jest.fn<Promise<Response>, FetchArgs>().mockResolvedValue(jsonResponse({ token_type: 'Bearer' }));
    const service = new AuthService(
      { baseUrl: BASE_URL, clientId: 'test-client', clientSecret: 'test-secret', fetch: fetchFn },
      new TokenManager()
    );

    await expect(service.fetchToken()).rejects.toThrow(DecodeError);
  });
});

describe('MemoryStorage', () => {
  it('should store, replace and remove a value', () => {
    const storage = new MemoryStorage();

    storage.setItem('access_token', 'first');
    storage.setItem('access_token', 'second');
    expect(storage.getItem('access_token')).toBe('second');

    storage.removeItem('access_token');
    expect(storage.getItem('access_token')).toBeNull();
  });
});

describe('TokenManager', () => {
  it('should fail without a token source', async () => {
    await expect(new TokenManager().getAccessToken()).rejects.toThrow(ConfigurationError);
  });

  it('should reuse a fresh token', async () => {
    const source = jest.fn().mockResolvedValue({ access_token: freshJwt() });
    const manager = new TokenManager(new MemoryStorage(), undefined, source);

    const first = await manager.getAccessToken();
    const second = await manager.getAccessToken();

    expect(second).toBe(first);
    expect(source).toHaveBeenCalledTimes(1);
  });

  it('should acquire a new token once the cached one expired', async () => {
    const renewed = freshJwt('renewed');
    const source = jest
      .fn()
      .mockResolvedValueOnce({ access_token: expiredJwt() })
      .mockResolvedValueOnce({ access_token: renewed });
    const manager = new TokenManager(new MemoryStorage(), undefined, source);

    await manager.refresh();
    const token = await manager.getAccessToken();

    expect(token).toBe(renewed);
    expect(source).toHaveBeenCalledTimes(2);
  });

  it('should share one refresh between concurrent callers', async () => {
    let resolveToken: (value: { access_token: string }) => void = () => undefined;
    const source = jest.fn().mockImplementation(
      () => new Promise((resolve) => {
        resolveToken = resolve;
      })
    );
    const manager = new TokenManager(new MemoryStorage(), undefined, source);

    const pending = Promise.all([manager.getAccessToken(), manager.getAccessToken(), manager.refresh()]);
    await new Promise((resolve) => setImmediate(resolve));
    const token = freshJwt();
    resolveToken({ access_token: token });

    expect(await pending).toEqual([token, token, token]);
    expect(source).toHaveBeenCalledTimes(1);
  });

  it('should honour a custom freshness check', async () => {
    const source = jest.fn().mockResolvedValue({ access_token: 'opaque-token' });
    const manager = new TokenManager(new MemoryStorage(), { isFresh: () => true }, source);

    await manager.getAccessToken();
    await manager.getAccessToken();

    expect(source).toHaveBeenCalledTimes(1);
  });

  it('should forget the token on clear', async () => {
    const source = jest.fn().mockResolvedValue({ access_token: freshJwt() });
    const manager = new TokenManager(new MemoryStorage(), undefined, source);

    await manager.getAccessToken();
    await manager.clearToken();

    expect(await manager.hasToken()).toBe(false);
    await manager.getAccessToken();
    expect(source).toHaveBeenCalledTimes(2);
  });
});

describe('client token handling', () => {
  it('should acquire one token for several requests', async () => {
    const fetchFn = jest.fn<Promise<Response>, FetchArgs>(async (input) =>
      requestUrl(input).pathname === '/oidc/token' ? tokenResponse() : jsonResponse({ data: [] })
    );
    const client = testClient(fetchFn);

    await client.objects.list();
    await client.edges.list();

    const tokenCalls = fetchFn.mock.calls.filter(([input]) => requestUrl(input).pathname === '/oidc/token');
    expect(tokenCalls).toHaveLength(1);
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it('should acquire exactly one new token after expiry', async () => {
    const tokens = [expiredJwt(), freshJwt()];
    const fetchFn = jest.fn<Promise<Response>, FetchArgs>(async (input) =>
      requestUrl(input).pathname === '/oidc/token' ? tokenResponse(tokens.shift()) : jsonResponse({ data: [] })
    );
    const client = testClient(fetchFn);

    await client.objects.list();
    await client.objects.list();
    await client.objects.list();

    const tokenCalls = fetchFn.mock.calls.filter(([input]) => requestUrl(input).pathname === '/oidc/token');
    expect(tokenCalls).toHaveLength(2);
  });

  it('should send the bearer token on API calls', async () => {
    const token = freshJwt();
    const fetchFn = jest.fn<Promise<Response>, FetchArgs>(async (input) =>
      requestUrl(input).pathname === '/oidc/token' ? tokenResponse(token) : jsonResponse({ data: [] })
    );
    const client = testClient(fetchFn);

    await client.objects.list();

    const [, init] = fetchFn.mock.calls[1];
    expect(requestHeaders(init).get('Authorization')).toBe(`Bearer ${token}`);
  });

  it('should acquire a new token after invalidation', async () => {
    const fetchFn = jest.fn<Promise<Response>, FetchArgs>(async () => tokenResponse());
    const client = testClient(fetchFn);

    await client.auth.getAccessToken();
    await client.auth.invalidateToken();
    await client.auth.getAccessToken();

    expect(fetchFn).toHaveBeenCalledTimes(2);
  });
});
