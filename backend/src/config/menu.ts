import { env } from './env';

export const menuConfig = {
  cacheDir: env.MENU_CACHE_DIR,
  cacheTtlSeconds: env.MENU_CACHE_TTL_SECONDS,
  refreshConcurrency: env.MENU_REFRESH_CONCURRENCY,
  cacheFilePrefix: 'menu_cache_',
} as const;

export const credentialConfig = {
  baseUrl: env.CREDENTIALS_BASE_URL,
  ttlSeconds: env.CREDENTIAL_TTL_SECONDS,
  squarePath: 'getMerchantTokens',
  cloverPath: 'getCloverCredentials',
} as const;

export const providerConfig = {
  squareBaseUrl: env.SQUARE_API_BASE_URL,
  cloverBaseUrl: env.CLOVER_API_BASE_URL,
  timeoutMs: env.HTTP_TIMEOUT_MS,
} as const;
