/**
 * A parsed configuration file: namespaced sections keyed by name.
 */
export type ConfigDocument = Record<string, unknown>;

/**
 * Anything that can hand the client a configuration document.
 */
export type ConfigAccessor = () => ConfigDocument;
