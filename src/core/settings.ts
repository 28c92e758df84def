import { readFile } from 'node:fs/promises';
import { load } from 'js-yaml';
import {
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_INDEX_URL,
  DEFAULT_TEMPLATE_URL,
  getCacheDir,
  getSettingsPath,
} from '../constants.js';
import { SettingsFileSchema, type Settings, type SettingsFile } from '../models/settings.js';
import { SettingsError } from './errors.js';

/**
 * Read and validate the settings file.
 * @returns the parsed file, or an empty object when it does not exist
 * @throws SettingsError if the file is invalid YAML or fails validation
 */
export async function readSettingsFile(path: string): Promise<SettingsFile> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new SettingsError(
      `Failed to read settings at ${path}: ${error instanceof Error ? error.message : String(error)}`,
      path,
      { cause: error },
    );
  }

  let parsed: unknown;
  try {
    parsed = load(content);
  } catch (error) {
    throw new SettingsError(
      `Invalid YAML in ${path}: ${error instanceof Error ? error.message : String(error)}`,
      path,
      { cause: error },
    );
  }

  // An empty file is the same as no file
  if (parsed === undefined || parsed === null) {
    return {};
  }

  const result = SettingsFileSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.errors.map(
      (err) => `  - ${err.path.join('.') || '(root)'}: ${err.message}`,
    );
    throw new SettingsError(`${path} validation failed:\n${errors.join('\n')}`, path);
  }
  return result.data;
}

/**
 * Resolve effective settings: defaults, then the settings file, then
 * PKGWARD_INDEX_URL / PKGWARD_CACHE_DIR from the environment.
 */
export async function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  path: string = getSettingsPath(env),
): Promise<Settings> {
  const file = await readSettingsFile(path);

  return {
    indexUrl: env.PKGWARD_INDEX_URL || file.indexUrl || DEFAULT_INDEX_URL,
    templateUrl: file.templateUrl ?? DEFAULT_TEMPLATE_URL,
    cacheDir: env.PKGWARD_CACHE_DIR || file.cacheDir || getCacheDir(env),
    fetchTimeoutMs: file.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
    pager: file.pager ?? 'less',
    diffCommand: file.diffCommand ?? 'diff',
    useSudo: file.useSudo ?? true,
  };
}
