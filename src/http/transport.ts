import { FetchTransportConfig, HTTPMethod, RequestOptions, Transport } from './types';
import { HTTPResponse } from './response';
import { TransportError } from '../errors';
import { utils } from '../utils';

/**
 * Transport backed by the global fetch. It reports what the server said and
 * never turns a status code into an error; that is the response handler's job.
 */
export class FetchTransport implements Transport {
  private readonly config: Required<FetchTransportConfig>;

  constructor(config: FetchTransportConfig = {}) {
    this.config = {
      timeout: config.timeout ?? 30000,
      headers: config.headers ?? {},
    };
  }

  async send(method: HTTPMethod, url: string, options: RequestOptions = {}): Promise<HTTPResponse> {
    const abortController = new AbortController();
    const timeout = options.timeout ?? this.config.timeout;

    // Setup timeout
    const timeoutId = setTimeout(() => {
      abortController.abort();
    }, timeout);

    let fullURL = url;

    try {
      fullURL = this.buildURL(url, options.params);
      const headers = this.buildHeaders(options);
      const response = await fetch(fullURL, {
        method,
        headers,
        body: this.buildBody(method, options),
        // A caller signal does not replace the timeout
        signal: options.signal ? AbortSignal.any([options.signal, abortController.signal]) : abortController.signal,
      });

      return new HTTPResponse({
        status: response.status,
        statusText: response.statusText,
        headers: this.parseHeaders(response.headers),
        url: response.url || fullURL,
        body: await response.text(),
      });
    } catch (error) {
      throw TransportError.fromNetworkError(
        error,
        method,
        fullURL,
        abortController.signal.aborted ? timeout : undefined,
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private buildURL(url: string, params?: RequestOptions['params']): string {
    if (!params || Object.keys(params).length === 0) {
      return url;
    }

    const urlObj = new URL(url);
    Object.entries(params).forEach(([key, value]) => {
      urlObj.searchParams.append(key, String(value));
    });

    return urlObj.toString();
  }

  private buildHeaders(options: RequestOptions): Record<string, string> {
    const headers = utils.mergeHeaders({ Accept: 'application/json' }, this.config.headers, options.headers);

    if (options.json !== undefined && utils.findHeader(headers, 'content-type') === undefined) {
      headers['Content-Type'] = 'application/json';
    }

    return headers;
  }

  private buildBody(method: HTTPMethod, options: RequestOptions): string | undefined {
    // fetch rejects a body on these
    if (method === 'GET' || method === 'HEAD') return undefined;

    if (options.json !== undefined) {
      return JSON.stringify(options.json);
    }

    return options.data;
  }

  private parseHeaders(headers: Headers): Record<string, string> {
    const result: Record<string, string> = {};
    headers.forEach((value, key) => {
      result[key] = value;
    });
    return result;
  }
}
