import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { DEFAULT_PASSWORD, DEFAULT_USERNAME, QCS_CONFIG_SECTION } from '../constants';
import { utils } from '../utils';
import type { ConfigDocument } from './types';

// YAML turns `key:` with no value into null, which reads as "not set"
const qcsSectionSchema = z
  .object({
    hostname: z.string().nullish(),
    port: z.union([z.string(), z.number().int().nonnegative()]).nullish(),
    https: z.boolean().nullish(),
    username: z.string().nullish(),
    password: z.string().nullish(),
  })
  .passthrough();

export interface QCSSettings {
  hostname?: string;
  port?: string;
  https: boolean;
  username: string;
  password: string;
}

/**
 * Validate the `qcs` section of a config document and fill in its defaults.
 */
export function readQCSSection(document: ConfigDocument): QCSSettings {
  const section = document[QCS_CONFIG_SECTION] ?? {};

  if (!utils.isPlainObject(section)) {
    throw new ConfigurationError(`'${QCS_CONFIG_SECTION}' config section must be a mapping`, {
      section,
    });
  }

  const result = qcsSectionSchema.safeParse(section);
  if (!result.success) {
    const keys = result.error.issues.map(issue => issue.path.join('.'));
    throw new ConfigurationError(
      `Invalid '${QCS_CONFIG_SECTION}' config section: ${keys.join(', ')}`,
      { issues: result.error.issues },
      result.error,
    );
  }

  const { hostname, port, https, username, password } = result.data;
  const settings: QCSSettings = {
    https: https ?? false,
    username: username ?? DEFAULT_USERNAME,
    password: password ?? DEFAULT_PASSWORD,
  };
  if (hostname != null && hostname !== '') {
    settings.hostname = hostname;
  }
  if (port != null && String(port) !== '') {
    settings.port = String(port);
  }
  return settings;
}
