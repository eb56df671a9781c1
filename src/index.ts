// Main exports for the QCS API client library

// Client
export { QCSClient, createQCSClient } from './client';
export type { QCSClientConfig, QCSClientOptions, CreateQCSClientOptions } from './client';

// Response handlers
export { echoHandler, codeHandler, jsonHandler, responseHandlers } from './http/handlers';
export type { ResponseHandler, ResponseHandlerName } from './http/handlers';

// Transport
export { HTTPResponse } from './http/response';
export type { HTTPResponseInit } from './http/response';
export { FetchTransport } from './http/transport';
export type { HTTPMethod, RequestOptions, Transport, FetchTransportConfig } from './http/types';

// Configuration
export { getConfig, resetConfig, loadConfigFile, readQCSSection, getConfigPath } from './config';
export type { ConfigAccessor, ConfigDocument, QCSSettings } from './config';
export { QCS_API_VERSION, QCS_TOKEN_PATH, QCS_CONFIG_SECTION } from './constants';

// Errors
export {
  QCSError,
  QCSErrorCode,
  ConfigurationError,
  BaseUrlNotFoundError,
  TransportError,
  HTTPStatusError,
  BodyDecodeError,
} from './errors';

// Utilities
export { QCSURLBuilder, createLogger } from './utils';
export type { Logger, LogLevel, LoggingConfig, ServerLocation } from './utils';
export type * from './types';

// Default export
import { createQCSClient } from './client';
export default createQCSClient;
