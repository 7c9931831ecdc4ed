export interface ServiceError extends Error {
  readonly statusCode: number;
}

export class ConfigurationError extends Error implements ServiceError {
  readonly name: string = 'ConfigurationError';
  readonly statusCode: number = 500;

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TransportError extends Error implements ServiceError {
  readonly name: string = 'TransportError';
  readonly statusCode: number = 502;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UpstreamHttpError extends Error implements ServiceError {
  readonly name: string = 'UpstreamHttpError';
  readonly statusCode: number = 502;
  readonly upstreamStatus: number;

  constructor(upstreamStatus: number, message = `HTTP error: ${upstreamStatus}`) {
    super(message);
    this.upstreamStatus = upstreamStatus;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AuthorizationError extends UpstreamHttpError {
  readonly name: string = 'AuthorizationError';

  constructor(upstreamStatus: number, message = `Authorization failed: ${upstreamStatus}`) {
    super(upstreamStatus, message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MalformedResponseError extends Error implements ServiceError {
  readonly name: string = 'MalformedResponseError';
  readonly statusCode: number = 502;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.issues = issues;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DataFileError extends Error implements ServiceError {
  readonly name: string = 'DataFileError';
  readonly statusCode: number = 500;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.issues = issues;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends Error implements ServiceError {
  readonly name: string = 'NotFoundError';
  readonly statusCode: number = 404;

  constructor(message = 'Resource not found') {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
