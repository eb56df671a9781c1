import { FetchTransport } from './http/transport';
import { HTTPResponse } from './http/response';
import { codeHandler, ResponseHandler } from './http/handlers';
import { HTTPMethod, RequestOptions, Transport } from './http/types';
import { ConfigAccessor, getConfig, readQCSSection } from './config';
import { BaseUrlNotFoundError, BodyDecodeError, QCSError } from './errors';
import { QCS_CONFIG_SECTION, QCS_TOKEN_PATH } from './constants';
import { LoginCredentials, tokenResponseSchema } from './types';
import { createLogger, Logger, LoggingConfig, QCSURLBuilder, utils } from './utils';

export interface QCSClientOptions {
  /** Base URL to use instead of the one built from the config file */
  url?: string;
  /** Source of the `qcs` config section; defaults to the YAML config file */
  config?: ConfigAccessor;
  transport?: Transport;
  http?: {
    timeout?: number;
    headers?: Record<string, string>;
  };
  logging?: LoggingConfig;
  logger?: Logger;
}

export interface QCSClientConfig<T> extends QCSClientOptions {
  responseHandler: ResponseHandler<T>;
}

/**
 * A client for the QCS REST API.
 *
 * Requests take endpoints relative to the base URL, which comes either from
 * the `url` option or from the `qcs` section of the config file:
 *
 * ```yaml
 * qcs:
 *   hostname: qcs.example.com
 *   port: 8443      # optional, scheme default otherwise
 *   https: true     # optional, defaults to false
 *   username: admin # optional
 *   password: pass  # optional
 * ```
 *
 * Every raw response is passed through the client's response handler, so
 * what a call resolves to depends on the handler: {@link echoHandler} and
 * {@link codeHandler} resolve to the {@link HTTPResponse}, {@link jsonHandler}
 * to the decoded body.
 *
 * An explicit `url`, given to the constructor or assigned later, is used
 * verbatim but must be an absolute http(s) URL; anything else throws
 * {@link ConfigurationError}.
 *
 * The constructor does no network I/O. Call {@link QCSClient.login} to
 * authenticate, or use {@link createQCSClient}, which does both.
 */
export class QCSClient<T> {
  public responseHandler: ResponseHandler<T>;

  private baseUrl: string;
  private authToken: string | null = null;
  private readonly transport: Transport;
  private readonly getConfig: ConfigAccessor;
  private readonly logger: Logger;

  constructor(config: QCSClientConfig<T>) {
    this.responseHandler = config.responseHandler;
    this.getConfig = config.config ?? getConfig;
    this.logger = config.logger ?? createLogger(config.logging);
    this.transport =
      config.transport ??
      new FetchTransport({
        timeout: config.http?.timeout,
        headers: config.http?.headers,
      });
    this.baseUrl = this.resolveBaseUrl(config.url);
  }

  get url(): string {
    return this.baseUrl;
  }

  /**
   * Point the client at a different server. The token is kept.
   */
  set url(value: string) {
    QCSURLBuilder.validate(value);
    this.baseUrl = value;
  }

  get token(): string | null {
    return this.authToken;
  }

  isAuthenticated(): boolean {
    return this.authToken !== null;
  }

  /**
   * Obtain a token from the server using the configured credentials.
   *
   * The login response is always status-checked and decoded, whatever the
   * client's response handler, so a failed login never goes unnoticed.
   * A failure leaves any previously held token in place.
   *
   * @returns the raw login response
   * @throws HTTPStatusError if the server rejects the credentials
   * @throws BodyDecodeError if the response carries no token
   */
  async login(): Promise<HTTPResponse> {
    const { username, password } = readQCSSection(this.getConfig());
    const credentials: LoginCredentials = { username, password };
    const url = QCSURLBuilder.join(this.baseUrl, QCS_TOKEN_PATH);

    const response = codeHandler(await this.send('POST', url, { json: credentials }));

    const parsed = tokenResponseSchema.safeParse(response.json());
    if (!parsed.success) {
      throw new BodyDecodeError(response, parsed.error, `Login response from ${url} has no token`);
    }

    this.authToken = parsed.data.token;
    this.logger.info('Logged in', { url, username });

    return response;
  }

  /**
   * Start sending unauthenticated requests. The server keeps no session, so
   * nothing is sent.
   */
  logout(): void {
    this.authToken = null;
    this.logger.debug('Logged out');
  }

  /**
   * Headers attached to every verb request at this moment
   */
  defaultHeaders(): Record<string, string> {
    if (this.authToken !== null) {
      return { Authorization: `Token ${this.authToken}` };
    }
    return {};
  }

  async get(endpoint: string, options?: RequestOptions): Promise<T> {
    return this.requestEndpoint('GET', endpoint, options);
  }

  async head(endpoint: string, options?: RequestOptions): Promise<T> {
    return this.requestEndpoint('HEAD', endpoint, options);
  }

  async options(endpoint: string, options?: RequestOptions): Promise<T> {
    return this.requestEndpoint('OPTIONS', endpoint, options);
  }

  async delete(endpoint: string, options?: RequestOptions): Promise<T> {
    return this.requestEndpoint('DELETE', endpoint, options);
  }

  async post(endpoint: string, payload: unknown, options?: RequestOptions): Promise<T> {
    return this.requestEndpoint('POST', endpoint, { ...options, json: payload });
  }

  async put(endpoint: string, payload: unknown, options?: RequestOptions): Promise<T> {
    return this.requestEndpoint('PUT', endpoint, { ...options, json: payload });
  }

  /**
   * Send a request to an absolute URL as given. No headers are added.
   */
  async request(method: HTTPMethod, url: string, options?: RequestOptions): Promise<T> {
    const response = await this.send(method, url, options);
    return this.responseHandler(response);
  }

  private async requestEndpoint(
    method: HTTPMethod,
    endpoint: string,
    options: RequestOptions = {},
  ): Promise<T> {
    // Token is read once, here; a later login/logout does not touch this request.
    const headers = utils.mergeHeaders(options.headers, this.defaultHeaders());
    return this.request(method, QCSURLBuilder.join(this.baseUrl, endpoint), {
      ...options,
      headers,
    });
  }

  private async send(method: HTTPMethod, url: string, options?: RequestOptions): Promise<HTTPResponse> {
    this.logger.debug('Request:', {
      method,
      url,
      headers: utils.sanitizeHeaders(options?.headers),
    });

    try {
      const response = await this.transport.send(method, url, options);
      this.logger.debug('Response:', { status: response.status, statusText: response.statusText });
      return response;
    } catch (error) {
      if (error instanceof QCSError) {
        this.logger.error('Error:', { code: error.code, message: error.message, details: error.details });
      } else {
        this.logger.error('Unexpected error:', error);
      }
      throw error;
    }
  }

  private resolveBaseUrl(url?: string): string {
    if (url) {
      QCSURLBuilder.validate(url);
      return url;
    }

    const settings = readQCSSection(this.getConfig());
    if (!settings.hostname) {
      throw new BaseUrlNotFoundError(
        `'${QCS_CONFIG_SECTION}' config section has no 'hostname' and no url was given`,
      );
    }

    const resolved = QCSURLBuilder.baseUrl({
      hostname: settings.hostname,
      port: settings.port,
      https: settings.https,
    });

    if (!resolved) {
      throw new BaseUrlNotFoundError(
        'No base url was given with the url option or found in the config file',
      );
    }

    return resolved;
  }
}

export interface CreateQCSClientOptions<T> extends QCSClientOptions {
  /** Defaults to {@link codeHandler} */
  responseHandler?: ResponseHandler<T>;
  /** Log in before resolving. Defaults to true. */
  authenticate?: boolean;
}

/**
 * Factory function to create a QCS client and, unless `authenticate` is
 * false, log it in. Rejects if the login fails.
 */
export function createQCSClient(
  options?: CreateQCSClientOptions<HTTPResponse>,
): Promise<QCSClient<HTTPResponse>>;
export function createQCSClient<T>(
  options: CreateQCSClientOptions<T> & { responseHandler: ResponseHandler<T> },
): Promise<QCSClient<T>>;
export async function createQCSClient<T>(
  options: CreateQCSClientOptions<T> = {},
): Promise<QCSClient<T> | QCSClient<HTTPResponse>> {
  const { responseHandler, authenticate = true } = options;

  const client =
    responseHandler !== undefined
      ? new QCSClient<T>({ ...options, responseHandler })
      : new QCSClient<HTTPResponse>({ ...options, responseHandler: codeHandler });

  if (authenticate) {
    await client.login();
  }

  return client;
}
