import type { AxiosInstance, AxiosResponse } from 'axios';
import { credentialConfig, providerConfig } from '../config/menu';
import {
  CloverCredentialResponseSchema,
  SquareTokenResponseSchema,
} from '../types/credentialContracts';
import type {
  CloverCredentials,
  Credentials,
  SquareCredentials,
} from '../types/credentialContracts';
import type { PosType } from '../types/shopContracts';
import { createTtlCache, systemClock } from '../utils/cache';
import type { Clock, TtlCache } from '../utils/cache';
import {
  ConfigurationError,
  MalformedResponseError,
  TransportError,
  UpstreamHttpError,
  describeError,
} from '../utils/errors';
import { createHttpClient } from '../utils/http';
import { credentialLogger } from '../utils/logger';
import type { ServiceLogger } from '../utils/logger';

export type CredentialEndpoints = Record<PosType, string>;

type CredentialBrokerOptions = {
  http: AxiosInstance;
  baseUrl: string;
  cache: TtlCache<Credentials>;
  endpoints?: CredentialEndpoints;
  logger?: ServiceLogger;
};

const DEFAULT_ENDPOINTS: CredentialEndpoints = {
  square: credentialConfig.squarePath,
  clover: credentialConfig.cloverPath,
};

const cacheKey = (merchantId: string, provider: PosType) => `${provider}:${merchantId}`;

const formatIssues = (issues: Array<{ message: string }>) =>
  issues.map((issue) => issue.message).join('; ');

export class CredentialBroker {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly cache: TtlCache<Credentials>;
  private readonly endpoints: CredentialEndpoints;
  private readonly log: ServiceLogger;
  private readonly inFlight = new Map<string, Promise<Credentials>>();
  private readonly keyGenerations = new Map<string, number>();
  private epoch = 0;

  constructor(options: CredentialBrokerOptions) {
    this.http = options.http;
    this.baseUrl = options.baseUrl;
    this.cache = options.cache;
    this.endpoints = options.endpoints ?? DEFAULT_ENDPOINTS;
    this.log = options.logger ?? credentialLogger;
  }

  getCredentials(merchantId: string, provider: 'square'): Promise<SquareCredentials>;
  getCredentials(merchantId: string, provider: 'clover'): Promise<CloverCredentials>;
  getCredentials(merchantId: string, provider: PosType): Promise<Credentials>;
  async getCredentials(merchantId: string, provider: PosType): Promise<Credentials> {
    const key = cacheKey(merchantId, provider);
    const cached = this.cache.get(key);
    if (cached) {
      this.log.debug({ merchantId, provider }, 'credential cache hit');
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const generation = this.generationOf(key);
    const request = this.fetchCredentials(merchantId, provider)
      .then((credentials) => {
        // An evict or clear issued while this request was in flight wins.
        if (this.generationOf(key) === generation) {
          this.cache.set(key, credentials);
          this.log.info({ merchantId, provider }, 'credentials fetched');
        } else {
          this.log.debug({ merchantId, provider }, 'credentials invalidated while in flight');
        }
        return credentials;
      })
      .finally(() => {
        if (this.inFlight.get(key) === request) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, request);
    return request;
  }

  evict(merchantId: string, provider: PosType): void {
    const key = cacheKey(merchantId, provider);
    this.keyGenerations.set(key, (this.keyGenerations.get(key) ?? 0) + 1);
    this.inFlight.delete(key);
    if (this.cache.delete(key)) {
      this.log.info({ merchantId, provider }, 'credentials evicted');
    }
  }

  clear(): void {
    this.epoch += 1;
    this.keyGenerations.clear();
    this.inFlight.clear();
    this.cache.clear();
  }

  get cachedCount(): number {
    return this.cache.size;
  }

  private generationOf(key: string): string {
    return `${this.epoch}:${this.keyGenerations.get(key) ?? 0}`;
  }

  private buildUrl(provider: PosType): string {
    const raw = `${this.baseUrl.replace(/\/+$/, '')}/${this.endpoints[provider]}`;
    let url: URL;
    try {
      url = new URL(raw);
    } catch (error) {
      throw new ConfigurationError(`Invalid credential endpoint "${raw}": ${describeError(error)}`);
    }

    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
      throw new ConfigurationError(`Invalid credential endpoint "${raw}": unsupported protocol`);
    }

    return url.toString();
  }

  private async fetchCredentials(merchantId: string, provider: PosType): Promise<Credentials> {
    const url = this.buildUrl(provider);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(
        url,
        { merchantId },
        { headers: { 'Content-Type': 'application/json' } },
      );
    } catch (error) {
      this.log.warn({ merchantId, provider, err: error }, 'credential request failed');
      throw new TransportError(`Network error: ${describeError(error)}`, error);
    }

    if (response.status !== 200) {
      this.log.warn({ merchantId, provider, status: response.status }, 'credential request rejected');
      throw new UpstreamHttpError(response.status);
    }

    return provider === 'square'
      ? this.decodeSquare(response.data)
      : this.decodeClover(response.data);
  }

  private decodeSquare(body: unknown): SquareCredentials {
    const parsed = SquareTokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedResponseError(
        `Decoding error: ${formatIssues(parsed.error.issues)}`,
        parsed.error.issues.map((issue) => issue.message),
      );
    }

    const { oauth_token, merchantId, refreshToken } = parsed.data.tokens;
    return { provider: 'square', accessToken: oauth_token, merchantId, refreshToken };
  }

  private decodeClover(body: unknown): CloverCredentials {
    const parsed = CloverCredentialResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedResponseError(
        `Decoding error: ${formatIssues(parsed.error.issues)}`,
        parsed.error.issues.map((issue) => issue.message),
      );
    }

    const { accessToken, merchantId } = parsed.data.credentials;
    return { provider: 'clover', accessToken, merchantId };
  }
}

type CreateCredentialBrokerOptions = {
  http?: AxiosInstance;
  clock?: Clock;
  logger?: ServiceLogger;
};

export const createCredentialBroker = (options: CreateCredentialBrokerOptions = {}) =>
  new CredentialBroker({
    http: options.http ?? createHttpClient({ timeoutMs: providerConfig.timeoutMs }),
    baseUrl: credentialConfig.baseUrl,
    cache: createTtlCache<Credentials>({
      ttlSeconds: credentialConfig.ttlSeconds,
      clock: options.clock ?? systemClock,
    }),
    logger: options.logger,
  });
