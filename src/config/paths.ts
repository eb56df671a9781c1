/**
 * Config file discovery.
 */
import * as os from 'node:os';
import * as path from 'node:path';

export const CONFIG_PATH_ENV = 'QCS_CLIENT_CONFIG';

const CONFIG_DIR = 'qcs-client';
const CONFIG_FILENAME = 'config.yaml';

/**
 * Get the config directory, honouring XDG_CONFIG_HOME
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdgConfigHome = env.XDG_CONFIG_HOME;
  const base = xdgConfigHome != null && xdgConfigHome !== ''
    ? xdgConfigHome
    : path.join(os.homedir(), '.config');
  return path.join(base, CONFIG_DIR);
}

/**
 * Find which config file to use (precedence: $QCS_CLIENT_CONFIG > XDG location)
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const explicitPath = env[CONFIG_PATH_ENV];
  if (explicitPath != null && explicitPath !== '') {
    return explicitPath;
  }
  return path.join(getConfigDir(env), CONFIG_FILENAME);
}
