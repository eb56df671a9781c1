import * as fs from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError } from '../errors';
import { utils } from '../utils';
import { getConfigPath } from './paths';
import type { ConfigDocument } from './types';

export * from './paths';
export * from './schema';
export type { ConfigAccessor, ConfigDocument } from './types';

let cachedConfig: ConfigDocument | null = null;

/**
 * Read and parse a YAML config file. A missing file is an empty config.
 */
export function loadConfigFile(filePath: string): ConfigDocument {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Unable to read config file ${filePath}`,
      { filePath },
      error instanceof Error ? error : undefined,
    );
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Config file ${filePath} is not valid YAML`,
      { filePath },
      error instanceof Error ? error : undefined,
    );
  }

  if (parsed == null) {
    return {};
  }
  if (!utils.isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a mapping`, { filePath });
  }
  return parsed;
}

/**
 * The default config accessor. Loads the file once and caches the result.
 */
export function getConfig(): ConfigDocument {
  if (cachedConfig === null) {
    cachedConfig = loadConfigFile(getConfigPath());
  }
  return cachedConfig;
}

/**
 * Forget the cached config so the next getConfig() reads the file again.
 */
export function resetConfig(): void {
  cachedConfig = null;
}
