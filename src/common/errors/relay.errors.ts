import { HttpException, HttpStatus } from '@nestjs/common';
import { truncate } from '../utils/truncate.util';

export interface RelayErrorBody {
  error: {
    message: string;
    type: string;
  };
}

/** Raised at startup when the accounts file yields nothing usable. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Base for failures surfaced to API callers. `penalizesAccount` decides
 * whether the leased account is released with an error, and `diagnostic`
 * is the short string recorded against it.
 */
export abstract class RelayError extends HttpException {
  readonly diagnostic: string;

  protected constructor(
    message: string,
    readonly type: string,
    status: HttpStatus,
    readonly penalizesAccount: boolean,
    diagnostic?: string,
  ) {
    super({ error: { message, type } } satisfies RelayErrorBody, status);
    this.message = message;
    this.diagnostic = truncate(diagnostic ?? message);
  }
}

export class InvalidRequestError extends RelayError {
  constructor(message: string) {
    super(message, 'invalid_request_error', HttpStatus.BAD_REQUEST, false);
  }
}

export class PoolExhaustedError extends RelayError {
  constructor() {
    super(
      'No available accounts',
      'service_unavailable',
      HttpStatus.SERVICE_UNAVAILABLE,
      false,
    );
  }
}

export class TokenRefreshError extends RelayError {
  constructor(message: string) {
    super(message, 'upstream_error', HttpStatus.BAD_GATEWAY, true);
  }
}

export class RateLimitedError extends RelayError {
  constructor() {
    super(
      'Server busy, please retry later',
      'rate_limit',
      HttpStatus.TOO_MANY_REQUESTS,
      true,
      'concurrent_limit',
    );
  }
}

export class InvalidModelError extends RelayError {
  constructor(model: string) {
    super(
      `Model '${model}' is not available on this endpoint`,
      'invalid_request_error',
      HttpStatus.BAD_REQUEST,
      false,
    );
  }
}

export class UpstreamError extends RelayError {
  constructor(message: string, diagnostic?: string) {
    super(message, 'upstream_error', HttpStatus.BAD_GATEWAY, true, diagnostic);
  }
}

export class UnexpectedResponseError extends RelayError {
  constructor(diagnostic: string) {
    super(
      'Unexpected response format',
      'upstream_error',
      HttpStatus.BAD_GATEWAY,
      true,
      diagnostic,
    );
  }
}
