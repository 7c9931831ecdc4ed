import type { AxiosInstance, AxiosResponse, Method } from 'axios';
import type { z } from 'zod';
import {
  AuthorizationError,
  MalformedResponseError,
  TransportError,
  UpstreamHttpError,
  describeError,
} from '../utils/errors';

export type ProviderRequest<T> = {
  label: string;
  method?: Method;
  path: string;
  accessToken: string;
  params?: Record<string, string>;
  body?: unknown;
  headers?: Record<string, string>;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
};

export type ErrorMessageExtractor = (body: unknown) => string | null;

export const encodePathSegment = (value: string) => encodeURIComponent(value);

const toIssues = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

export const sendProviderRequest = async <T>(
  http: AxiosInstance,
  request: ProviderRequest<T>,
  extractErrorMessage: ErrorMessageExtractor,
): Promise<T> => {
  let response: AxiosResponse<unknown>;
  try {
    response = await http.request<unknown>({
      method: request.method ?? 'GET',
      url: request.path,
      params: request.params,
      data: request.body,
      headers: {
        ...request.headers,
        Authorization: `Bearer ${request.accessToken}`,
        'Content-Type': 'application/json',
      },
    });
  } catch (error) {
    throw new TransportError(`${request.label} failed: ${describeError(error)}`, error);
  }

  const { status } = response;
  if (status === 401 || status === 403) {
    throw new AuthorizationError(status);
  }

  if (status < 200 || status >= 300) {
    const message = extractErrorMessage(response.data);
    throw new UpstreamHttpError(status, message ? `API Error: ${message}` : undefined);
  }

  const parsed = request.schema.safeParse(response.data);
  if (!parsed.success) {
    throw new MalformedResponseError(
      `${request.label} returned an unexpected payload`,
      toIssues(parsed.error),
    );
  }

  return parsed.data;
};

export const withCredentialRetry = async <C, T>(
  loadCredentials: () => Promise<C>,
  evictCredentials: () => void,
  call: (credentials: C) => Promise<T>,
): Promise<T> => {
  const credentials = await loadCredentials();
  try {
    return await call(credentials);
  } catch (error) {
    if (!(error instanceof AuthorizationError)) {
      throw error;
    }

    evictCredentials();
    const refreshed = await loadCredentials();
    return call(refreshed);
  }
};
