export * from './url';
export * from './logger';

const SENSITIVE_HEADERS = ['authorization', 'cookie', 'x-api-key'];

/**
 * Utility functions
 */
export const utils = {
  /**
   * Check for a non-null, non-array object
   */
  isPlainObject: (value: unknown): value is Record<string, unknown> => {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  },

  /**
   * Find a header name regardless of case
   */
  findHeader: (headers: Record<string, string>, name: string): string | undefined => {
    const lowerName = name.toLowerCase();
    return Object.keys(headers).find(key => key.toLowerCase() === lowerName);
  },

  /**
   * Merge header maps left to right. A later map replaces an earlier entry
   * with the same name in any letter case.
   */
  mergeHeaders: (...sources: Array<Record<string, string> | undefined>): Record<string, string> => {
    const merged: Record<string, string> = {};

    for (const source of sources) {
      if (!source) continue;
      for (const [key, value] of Object.entries(source)) {
        const existing = utils.findHeader(merged, key);
        if (existing !== undefined) {
          delete merged[existing];
        }
        merged[key] = value;
      }
    }

    return merged;
  },

  /**
   * Replace credential header values before headers reach a log line
   */
  sanitizeHeaders: (headers?: Record<string, string>): Record<string, string> => {
    if (!headers) return {};

    const sanitized = { ...headers };
    Object.keys(sanitized).forEach(key => {
      if (SENSITIVE_HEADERS.includes(key.toLowerCase())) {
        sanitized[key] = '[REDACTED]';
      }
    });

    return sanitized;
  },
};
