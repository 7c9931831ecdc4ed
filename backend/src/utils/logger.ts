import pino from 'pino';
import { env } from '../config/env';

export type ServiceLogger = {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
};

// Credentials travel through log context in a few places; keep the secrets out.
const REDACTED_PATHS = [
  'accessToken',
  'refreshToken',
  'oauth_token',
  '*.accessToken',
  '*.refreshToken',
  '*.oauth_token',
  'headers.authorization',
];

export const loggerOptions: pino.LoggerOptions = {
  level: env.LOG_LEVEL,
  redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
};

export const logger = pino(loggerOptions);

export const credentialLogger = logger.child({ module: 'credentials' });
export const menuLogger = logger.child({ module: 'menu-sync' });
export const orderLogger = logger.child({ module: 'orders' });
