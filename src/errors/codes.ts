export enum QCSErrorCode {
  // Configuration
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  BASE_URL_NOT_FOUND = 'BASE_URL_NOT_FOUND',

  // Transport
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',

  // Response handling
  HTTP_STATUS = 'HTTP_STATUS',
  BODY_DECODE = 'BODY_DECODE',
}
