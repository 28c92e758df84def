import { isAbsolute, join } from 'node:path';

/**
 * Get the user's home directory (cross-platform).
 */
export function getHomeDir(): string {
  return process.env.HOME || process.env.USERPROFILE || '~';
}

/**
 * Application directory name used under the XDG cache and config roots
 */
export const APP_DIR = 'pkgward';

/**
 * Cached index filename (inside the cache directory)
 */
export const INDEX_FILE = 'index.json';

/**
 * Freshness token sidecar, paired with INDEX_FILE
 */
export const INDEX_TOKEN_FILE = `${INDEX_FILE}.etag`;

/**
 * Directory holding the last-reviewed template for each package
 */
export const TEMPLATES_DIR = 'templates';

/**
 * Settings filename (inside the config directory)
 */
export const SETTINGS_FILE = 'config.yaml';

export const DEFAULT_INDEX_URL = 'https://vup-linux.github.io/vup/index.json';

/**
 * Recipe location per package. `{category}` and `{name}` are substituted.
 */
export const DEFAULT_TEMPLATE_URL =
  'https://raw.githubusercontent.com/VUP-Linux/vup/main/vup/srcpkgs/{category}/{name}/template';

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

/**
 * Resolve the cache root, respecting XDG_CACHE_HOME when it is absolute.
 */
export function getCacheDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env.XDG_CACHE_HOME;
  if (xdg && isAbsolute(xdg)) {
    return join(xdg, APP_DIR);
  }
  return join(env.HOME || env.USERPROFILE || getHomeDir(), '.cache', APP_DIR);
}

/**
 * Resolve the settings file path. PKGWARD_CONFIG wins over XDG_CONFIG_HOME.
 */
export function getSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.PKGWARD_CONFIG) {
    return env.PKGWARD_CONFIG;
  }
  const xdg = env.XDG_CONFIG_HOME;
  if (xdg && isAbsolute(xdg)) {
    return join(xdg, APP_DIR, SETTINGS_FILE);
  }
  return join(env.HOME || env.USERPROFILE || getHomeDir(), '.config', APP_DIR, SETTINGS_FILE);
}
