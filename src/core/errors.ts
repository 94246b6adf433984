// src/core/errors.ts
import { isAxiosError } from 'axios';

export enum ErrorCode {
  NETWORK_ERROR = 'network_error',
  TIMEOUT = 'timeout',
  ABORTED = 'aborted',
  INVALID_INPUT = 'invalid_input',
  API_ERROR = 'api_error',
  BROWSER_FAILED = 'browser_failed',
  CONFIG_INVALID = 'config_invalid',
}

export class BoostError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BoostError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

/**
 * Normalise anything thrown by a fetch, an API call or a child process into a BoostError.
 * Axios failures with a response become API errors; those without one are transport errors.
 */
export function toBoostError(error: unknown, fallback: ErrorCode = ErrorCode.NETWORK_ERROR): BoostError {
  if (error instanceof BoostError) {
    return error;
  }

  if (isAxiosError(error)) {
    const url = error.config?.url;
    if (error.response) {
      return new BoostError(
        ErrorCode.API_ERROR,
        `HTTP ${error.response.status}${error.response.statusText ? ` ${error.response.statusText}` : ''}${url ? ` from ${url}` : ''}`,
        error.response.status >= 500 || error.response.status === 429,
        undefined,
        { url, status: error.response.status }
      );
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new BoostError(ErrorCode.TIMEOUT, `Request timed out${url ? `: ${url}` : ''}`, true, undefined, { url });
    }
    return new BoostError(ErrorCode.NETWORK_ERROR, error.message, true, undefined, { url });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new BoostError(fallback, message, fallback === ErrorCode.NETWORK_ERROR);
}

export function describeError(error: unknown): string {
  if (error instanceof BoostError) {
    return error.suggestion ? `${error.message} (${error.suggestion})` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
