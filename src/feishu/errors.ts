/**
 * Feishu API Errors
 */

/** Code the platform returns when the tenant access token is no longer valid */
export const CREDENTIAL_INVALID_CODE = 99991663;

/**
 * The platform answered with a non-zero `code` in its envelope
 */
export class RequestError extends Error {
  readonly code: number;
  readonly msg: string;

  constructor(code: number, msg: string) {
    super(`${msg} (code=${code})`);
    this.name = 'RequestError';
    this.code = code;
    this.msg = msg;
  }
}

/**
 * The bearer token was rejected. A freshly fetched token resolves it.
 */
export class CredentialExpiredError extends RequestError {
  constructor(code: number, msg: string) {
    super(code, msg);
    this.name = 'CredentialExpiredError';
  }
}

/**
 * The response body was not a well-formed envelope, or its data lacked an expected field
 */
export class ProtocolError extends Error {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, options: { status?: number; body?: string } = {}) {
    super(options.status === undefined ? message : `${message} (status=${options.status})`);
    this.name = 'ProtocolError';
    this.status = options.status;
    if (options.body !== undefined) {
      this.body = options.body.length > 200 ? `${options.body.slice(0, 200)}...` : options.body;
    }
  }
}

/**
 * The HTTP exchange itself failed: network error, timeout, or a non-2xx raw download
 */
export class TransportError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.status = options.status;
  }
}

export function isCredentialExpired(error: unknown): error is CredentialExpiredError {
  return error instanceof CredentialExpiredError;
}
