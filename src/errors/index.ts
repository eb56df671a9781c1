import { QCSErrorCode } from './codes';
import type { HTTPResponse } from '../http/response';

export { QCSErrorCode };

export class QCSError extends Error {
  public readonly code: QCSErrorCode;
  public readonly details?: unknown;
  public readonly cause: Error | undefined;
  public readonly timestamp: Date;

  constructor(code: QCSErrorCode, message: string, details?: unknown, cause?: Error) {
    super(message);
    this.name = 'QCSError';
    this.code = code;
    this.details = details;
    this.cause = cause;
    this.timestamp = new Date();

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Convert error to JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * The client could not be configured from the given options and config file.
 */
export class ConfigurationError extends QCSError {
  constructor(
    message: string,
    details?: unknown,
    cause?: Error,
    code: QCSErrorCode = QCSErrorCode.INVALID_CONFIGURATION,
  ) {
    super(code, message, details, cause);
    this.name = 'ConfigurationError';
  }
}

export class BaseUrlNotFoundError extends ConfigurationError {
  constructor(message: string, details?: unknown) {
    super(message, details, undefined, QCSErrorCode.BASE_URL_NOT_FOUND);
    this.name = 'BaseUrlNotFoundError';
  }
}

/**
 * No HTTP response was obtained: connection refused, DNS failure, timeout or abort.
 */
export class TransportError extends QCSError {
  public readonly method: string;
  public readonly url: string;

  constructor(code: QCSErrorCode, message: string, method: string, url: string, cause?: Error) {
    super(code, message, { method, url }, cause);
    this.name = 'TransportError';
    this.method = method;
    this.url = url;
  }

  /**
   * Create a TransportError from whatever the underlying fetch threw
   */
  static fromNetworkError(error: unknown, method: string, url: string, timeout?: number): TransportError {
    const cause = error instanceof Error ? error : new Error(String(error));

    if (cause.name === 'AbortError' || cause.name === 'TimeoutError') {
      const message = timeout !== undefined ? `Request timed out after ${timeout}ms` : 'Request was aborted';
      return new TransportError(QCSErrorCode.TIMEOUT, message, method, url, cause);
    }

    return new TransportError(
      QCSErrorCode.NETWORK_ERROR,
      `Network error: ${cause.message}`,
      method,
      url,
      cause,
    );
  }
}

export class HTTPStatusError extends QCSError {
  public readonly status: number;
  public readonly response: HTTPResponse;

  constructor(response: HTTPResponse) {
    const kind = response.status < 500 ? 'Client Error' : 'Server Error';
    super(
      QCSErrorCode.HTTP_STATUS,
      `${response.status} ${kind}: ${response.statusText} for url: ${response.url}`,
      { status: response.status, body: response.body },
    );
    this.name = 'HTTPStatusError';
    this.status = response.status;
    this.response = response;
  }

  isClientError(): boolean {
    return this.status >= 400 && this.status < 500;
  }

  isServerError(): boolean {
    return this.status >= 500;
  }
}

export class BodyDecodeError extends QCSError {
  public readonly response: HTTPResponse;

  constructor(response: HTTPResponse, cause?: Error, message?: string) {
    super(
      QCSErrorCode.BODY_DECODE,
      message ?? `Response body from ${response.url} is not valid JSON`,
      { status: response.status, body: response.body },
      cause,
    );
    this.name = 'BodyDecodeError';
    this.response = response;
  }
}
