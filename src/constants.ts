/** Configuration namespace the client reads from */
export const QCS_CONFIG_SECTION = 'qcs';

/** Versioned API prefix every base URL ends with */
export const QCS_API_VERSION = 'api/v1/';

/** Token-issuing endpoint, relative to the base URL */
export const QCS_TOKEN_PATH = 'token/';

// Stock administrative account of a fresh server install
export const DEFAULT_USERNAME = 'admin';
export const DEFAULT_PASSWORD = 'pass';
