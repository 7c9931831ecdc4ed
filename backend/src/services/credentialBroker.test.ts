import { describe, expect, it } from 'vitest';
import { createHttpStub, json } from '../testing/httpStub';
import type { StubHandler } from '../testing/httpStub';
import type { Credentials } from '../types/credentialContracts';
import { createTtlCache } from '../utils/cache';
import {
  ConfigurationError,
  MalformedResponseError,
  TransportError,
  UpstreamHttpError,
} from '../utils/errors';
import { CredentialBroker } from './credentialBroker';

const BASE_URL = 'https://credentials.test';

const squareTokens = (merchantId: string, token = 'test-token') =>
  json({ tokens: { oauth_token: token, merchantId, refreshToken: 'test-refresh' } });

const setup = (handler: StubHandler, baseUrl = BASE_URL) => {
  let now = 0;
  const { http, requests } = createHttpStub(handler);
  const broker = new CredentialBroker({
    http,
    baseUrl,
    cache: createTtlCache<Credentials>({ ttlSeconds: 1800, clock: () => now }),
  });

  return {
    broker,
    requests,
    advance: (ms: number) => {
      now += ms;
    },
  };
};

describe('CredentialBroker', () => {
  it('posts the merchant id to the square token endpoint and maps the response', async () => {
    const { broker, requests } = setup(() => squareTokens('M1'));

    const credentials = await broker.getCredentials('M1', 'square');

    expect(credentials).toEqual({
      provider: 'square',
      accessToken: 'test-token',
      merchantId: 'M1',
      refreshToken: 'test-refresh',
    });
    expect(requests).toHaveLength(1);
    expect(requests[0]?.method).toBe('POST');
    expect(requests[0]?.url).toBe('https://credentials.test/getMerchantTokens');
    expect(requests[0]?.body).toEqual({ merchantId: 'M1' });
  });

  it('reads clover credentials from their own endpoint', async () => {
    const { broker, requests } = setup(() =>
      json({ credentials: { accessToken: 'test-clover-token', merchantId: 'CM1' } }),
    );

    const credentials = await broker.getCredentials('CM1', 'clover');

    expect(credentials).toEqual({
      provider: 'clover',
      accessToken: 'test-clover-token',
      merchantId: 'CM1',
    });
    expect(requests[0]?.url).toBe('https://credentials.test/getCloverCredentials');
  });

  it('serves repeated requests from the cache while the ttl holds', async () => {
    const { broker, requests, advance } = setup(() => squareTokens('M1'));

    await broker.getCredentials('M1', 'square');
    advance(1_799_000);
    await broker.getCredentials('M1', 'square');

    expect(requests).toHaveLength(1);
  });

  it('fetches again once the cached entry has expired', async () => {
    let issued = 0;
    const { broker, requests, advance } = setup(() => {
      issued += 1;
      return squareTokens('M1', `test-token-${issued}`);
    });

    await broker.getCredentials('M1', 'square');
    advance(1_800_000);
    const refreshed = await broker.getCredentials('M1', 'square');

    expect(requests).toHaveLength(2);
    expect(refreshed.accessToken).toBe('test-token-2');
  });

  it('keys the cache by provider as well as merchant', async () => {
    const { broker, requests } = setup((request) =>
      request.url.endsWith('getMerchantTokens')
        ? squareTokens('M1')
        : json({ credentials: { accessToken: 'test-clover-token', merchantId: 'M1' } }),
    );

    await broker.getCredentials('M1', 'square');
    await broker.getCredentials('M1', 'clover');

    expect(requests).toHaveLength(2);
    expect(broker.cachedCount).toBe(2);
  });

  it('shares one request between concurrent misses for the same key', async () => {
    const { broker, requests } = setup(async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return squareTokens('M1');
    });

    const [first, second] = await Promise.all([
      broker.getCredentials('M1', 'square'),
      broker.getCredentials('M1', 'square'),
    ]);

    expect(requests).toHaveLength(1);
    expect(second).toBe(first);
  });

  it('fetches again after an entry is evicted', async () => {
    const { broker, requests } = setup(() => squareTokens('M1'));

    await broker.getCredentials('M1', 'square');
    broker.evict('M1', 'square');
    await broker.getCredentials('M1', 'square');

    expect(requests).toHaveLength(2);
  });

  it('leaves nothing cached when the refetch after expiry fails', async () => {
    let calls = 0;
    const { broker, requests, advance } = setup(() => {
      calls += 1;
      return calls === 1 ? squareTokens('M1') : json({ error: 'unavailable' }, 503);
    });

    await broker.getCredentials('M1', 'square');
    advance(1_800_000);

    await expect(broker.getCredentials('M1', 'square')).rejects.toMatchObject({ upstreamStatus: 503 });
    expect(broker.cachedCount).toBe(0);

    await expect(broker.getCredentials('M1', 'square')).rejects.toBeInstanceOf(UpstreamHttpError);
    expect(requests).toHaveLength(3);
  });

  it.each(['clear', 'evict'] as const)(
    'does not cache a response that arrives after %s',
    async (invalidation) => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = () => resolve();
      });
      const { broker, requests } = setup(async () => {
        await gate;
        return squareTokens('M1');
      });

      const pending = broker.getCredentials('M1', 'square');
      if (invalidation === 'clear') {
        broker.clear();
      } else {
        broker.evict('M1', 'square');
      }
      release();

      await expect(pending).resolves.toMatchObject({ accessToken: 'test-token' });
      expect(broker.cachedCount).toBe(0);

      await broker.getCredentials('M1', 'square');
      expect(requests).toHaveLength(2);
      expect(broker.cachedCount).toBe(1);
    },
  );

  it('reports non-200 responses with the upstream status and caches nothing', async () => {
    const { broker, requests } = setup(() => json({ error: 'boom' }, 500));

    const failure = broker.getCredentials('M1', 'square');
    await expect(failure).rejects.toBeInstanceOf(UpstreamHttpError);
    await expect(failure).rejects.toMatchObject({ upstreamStatus: 500, message: 'HTTP error: 500' });

    await expect(broker.getCredentials('M1', 'square')).rejects.toBeInstanceOf(UpstreamHttpError);
    expect(requests).toHaveLength(2);
    expect(broker.cachedCount).toBe(0);
  });

  it('treats a 201 as an upstream error', async () => {
    const { broker } = setup(() => ({ status: 201, body: {} }));

    await expect(broker.getCredentials('M1', 'square')).rejects.toMatchObject({
      name: 'UpstreamHttpError',
      upstreamStatus: 201,
    });
  });

  it('rejects responses with missing or null token fields', async () => {
    const { broker } = setup(() =>
      json({ tokens: { oauth_token: null, merchantId: 'M1', refreshToken: 'test-refresh' } }),
    );

    const failure = broker.getCredentials('M1', 'square');
    await expect(failure).rejects.toBeInstanceOf(MalformedResponseError);
    await expect(failure).rejects.toThrow('tokens.oauth_token must be a string');
  });

  it('rejects a body that is not JSON', async () => {
    const { broker } = setup(() => ({ status: 200, body: 'not json' }));

    await expect(broker.getCredentials('M1', 'clover')).rejects.toBeInstanceOf(
      MalformedResponseError,
    );
  });

  it('wraps transport failures', async () => {
    const { broker } = setup(() => ({ networkError: 'socket hang up' }));

    const failure = broker.getCredentials('M1', 'square');
    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toThrow('Network error: socket hang up');
  });

  it('fails with a configuration error when the endpoint cannot be built', async () => {
    const { broker, requests } = setup(() => squareTokens('M1'), 'not a url');

    await expect(broker.getCredentials('M1', 'square')).rejects.toBeInstanceOf(ConfigurationError);
    expect(requests).toHaveLength(0);
  });
});
