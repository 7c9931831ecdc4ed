import { z } from 'zod';

const requiredField = (field: string) =>
  z.string({
    required_error: `${field} is required`,
    invalid_type_error: `${field} must be a string`,
  });

export const SquareTokenResponseSchema = z.object({
  tokens: z.object({
    oauth_token: requiredField('tokens.oauth_token'),
    merchantId: requiredField('tokens.merchantId'),
    refreshToken: requiredField('tokens.refreshToken'),
  }),
});

export const CloverCredentialResponseSchema = z.object({
  credentials: z.object({
    accessToken: requiredField('credentials.accessToken'),
    merchantId: requiredField('credentials.merchantId'),
  }),
});

export type SquareCredentials = {
  provider: 'square';
  accessToken: string;
  merchantId: string;
  refreshToken: string;
};

export type CloverCredentials = {
  provider: 'clover';
  accessToken: string;
  merchantId: string;
};

export type Credentials = SquareCredentials | CloverCredentials;
