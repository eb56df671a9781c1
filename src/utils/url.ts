import { ConfigurationError } from '../errors';
import { QCS_API_VERSION } from '../constants';

export interface ServerLocation {
  hostname: string;
  port?: string;
  https?: boolean;
}

export class QCSURLBuilder {
  /**
   * Build `scheme://host[:port]/api/v1/` for a server
   */
  static baseUrl(location: ServerLocation): string {
    const scheme = location.https ? 'https' : 'http';
    const netloc = location.port ? `${location.hostname}:${location.port}` : location.hostname;
    return `${scheme}://${netloc}/${QCS_API_VERSION}`;
  }

  /**
   * Resolve an endpoint against a base URL.
   *
   * Endpoints always land under the base path: `/widgets/` and `widgets/`
   * both resolve to `<base>/widgets/`. Absolute http(s) URLs are returned as is.
   */
  static join(baseUrl: string, endpoint: string): string {
    if (this.isAbsolute(endpoint)) {
      return endpoint;
    }

    const cleanBase = baseUrl.replace(/\/+$/, '');
    const cleanEndpoint = endpoint.replace(/^\/+/, '');

    if (cleanEndpoint.length === 0) {
      return `${cleanBase}/`;
    }

    return `${cleanBase}/${cleanEndpoint}`;
  }

  static isAbsolute(url: string): boolean {
    return /^https?:\/\//i.test(url);
  }

  /**
   * Check that a base URL is an absolute http(s) URL
   *
   * @throws ConfigurationError if it is not
   */
  static validate(url: string): void {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new ConfigurationError('Invalid base URL format', { url });
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new ConfigurationError('Base URL must use http or https', { url });
    }
  }
}
