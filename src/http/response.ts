import { BodyDecodeError } from '../errors';

export interface HTTPResponseInit {
  status: number;
  statusText?: string;
  headers?: Record<string, string>;
  url: string;
  body?: string;
}

/**
 * A fully read HTTP response. The body is buffered as text so handlers can
 * inspect it synchronously and more than once.
 */
export class HTTPResponse {
  readonly status: number;
  readonly statusText: string;
  readonly headers: Record<string, string>;
  readonly url: string;
  readonly body: string;

  constructor(init: HTTPResponseInit) {
    this.status = init.status;
    this.statusText = init.statusText ?? '';
    this.url = init.url;
    this.body = init.body ?? '';

    // Header names are case-insensitive; store them lower-cased like fetch does
    this.headers = {};
    for (const [key, value] of Object.entries(init.headers ?? {})) {
      this.headers[key.toLowerCase()] = value;
    }
  }

  /**
   * True for any status below 400
   */
  get ok(): boolean {
    return this.status < 400;
  }

  text(): string {
    return this.body;
  }

  /**
   * Parse the body as JSON.
   *
   * @throws BodyDecodeError if the body is empty or malformed
   */
  json(): unknown {
    try {
      return JSON.parse(this.body);
    } catch (error) {
      throw new BodyDecodeError(this, error instanceof Error ? error : undefined);
    }
  }
}
