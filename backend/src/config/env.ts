import { z } from 'zod';

const urlFromEnv = (name: string) =>
  z
    .string()
    .trim()
    .url(`${name} must be an absolute URL`)
    .transform((value) => value.replace(/\/+$/, ''));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CREDENTIALS_BASE_URL: urlFromEnv('CREDENTIALS_BASE_URL').default(
    'https://us-central1-siplocal.cloudfunctions.net',
  ),
  SQUARE_API_BASE_URL: urlFromEnv('SQUARE_API_BASE_URL').default('https://connect.squareup.com/v2'),
  CLOVER_API_BASE_URL: urlFromEnv('CLOVER_API_BASE_URL').default('https://sandbox.dev.clover.com/v3'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  CREDENTIAL_TTL_SECONDS: z.coerce.number().int().positive().default(1800),
  MENU_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(1800),
  MENU_CACHE_DIR: z.string().min(1).default('.cache/menus'),
  MENU_REFRESH_CONCURRENCY: z.coerce.number().int().positive().default(2),
  SHOPS_FILE: z.string().min(1).default('backend/data/shops.json'),
  ORDERS_FILE: z.string().min(1).default('backend/data/orders.json'),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse({
  NODE_ENV: process.env.NODE_ENV,
  PORT: process.env.PORT,
  LOG_LEVEL: process.env.LOG_LEVEL,
  CREDENTIALS_BASE_URL: process.env.CREDENTIALS_BASE_URL,
  SQUARE_API_BASE_URL: process.env.SQUARE_API_BASE_URL,
  CLOVER_API_BASE_URL: process.env.CLOVER_API_BASE_URL,
  HTTP_TIMEOUT_MS: process.env.HTTP_TIMEOUT_MS,
  CREDENTIAL_TTL_SECONDS: process.env.CREDENTIAL_TTL_SECONDS,
  MENU_CACHE_TTL_SECONDS: process.env.MENU_CACHE_TTL_SECONDS,
  MENU_CACHE_DIR: process.env.MENU_CACHE_DIR,
  MENU_REFRESH_CONCURRENCY: process.env.MENU_REFRESH_CONCURRENCY,
  SHOPS_FILE: process.env.SHOPS_FILE,
  ORDERS_FILE: process.env.ORDERS_FILE,
});
