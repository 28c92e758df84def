import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { INDEX_FILE, INDEX_TOKEN_FILE, TEMPLATES_DIR } from '../constants.js';
import { decodeIndex } from '../utils/index-parser.js';
import { assertValidPackageName } from '../utils/package-name.js';
import type { PackageIndex } from '../models/package-index.js';
import { CorruptCacheError, IndexDecodeError, StorageUnavailableError } from './errors.js';

/**
 * Result of replacing the cached index
 */
export interface IndexWriteResult {
  /** Whether the freshness token now on disk matches the new index */
  tokenStored: boolean;
  /** Non-fatal problems (token sidecar could not be written or removed) */
  warnings: string[];
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Filesystem-backed cache holding the package index, its freshness token
 * and the last-reviewed template of every installed package.
 *
 * Layout under the root directory:
 *   index.json         serialized index, verbatim as fetched
 *   index.json.etag    freshness token paired with index.json
 *   templates/<name>   last-reviewed template text
 */
export class LocalStore {
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = rootDir;
  }

  get indexPath(): string {
    return join(this.rootDir, INDEX_FILE);
  }

  get tokenPath(): string {
    return join(this.rootDir, INDEX_TOKEN_FILE);
  }

  get templatesDir(): string {
    return join(this.rootDir, TEMPLATES_DIR);
  }

  templatePath(name: string): string {
    assertValidPackageName(name);
    return join(this.templatesDir, name);
  }

  /**
   * Create the cache directories.
   * @throws StorageUnavailableError when they cannot be created
   */
  async ensureReady(): Promise<void> {
    try {
      await mkdir(this.templatesDir, { recursive: true });
    } catch (error) {
      throw new StorageUnavailableError(
        `Failed to create cache directory ${this.rootDir}: ${describe(error)}`,
        this.rootDir,
        { cause: error },
      );
    }
  }

  async readIndex(): Promise<string | null> {
    return this.readText(this.indexPath);
  }

  /**
   * Read and decode the cached index.
   * @returns null when nothing is cached
   * @throws CorruptCacheError when the cached bytes do not decode
   */
  async loadIndex(): Promise<PackageIndex | null> {
    const text = await this.readIndex();
    if (text === null) {
      return null;
    }
    try {
      return decodeIndex(text);
    } catch (error) {
      if (error instanceof IndexDecodeError) {
        throw new CorruptCacheError(this.indexPath, error);
      }
      throw error;
    }
  }

  /**
   * Replace the cached index and its freshness token as a unit.
   *
   * The index is written to a temp file and renamed into place. The token
   * is best-effort: failures are returned as warnings. Without a new token
   * any old one is removed, since it was issued for different bytes.
   */
  async writeIndex(text: string, token?: string): Promise<IndexWriteResult> {
    await this.ensureReady();

    const tmpPath = `${this.indexPath}.tmp`;
    try {
      await writeFile(tmpPath, text, 'utf-8');
      await rename(tmpPath, this.indexPath);
    } catch (error) {
      await rm(tmpPath, { force: true }).catch(() => undefined);
      throw new StorageUnavailableError(
        `Failed to write cached index ${this.indexPath}: ${describe(error)}`,
        this.indexPath,
        { cause: error },
      );
    }

    const warnings: string[] = [];
    if (token) {
      try {
        await writeFile(this.tokenPath, token, 'utf-8');
        return { tokenStored: true, warnings };
      } catch (error) {
        warnings.push(`Failed to store index freshness token: ${describe(error)}`);
      }
    }

    try {
      await rm(this.tokenPath, { force: true });
    } catch (error) {
      warnings.push(`Failed to remove stale freshness token: ${describe(error)}`);
    }
    return { tokenStored: false, warnings };
  }

  /**
   * The stored freshness token, or null. A token without its paired index
   * file is never returned.
   */
  async readFreshnessToken(): Promise<string | null> {
    if (!existsSync(this.indexPath)) {
      return null;
    }
    const token = (await this.readText(this.tokenPath))?.trim();
    return token ? token : null;
  }

  async readTemplate(name: string): Promise<string | null> {
    return this.readText(this.templatePath(name));
  }

  async writeTemplate(name: string, text: string): Promise<void> {
    const path = this.templatePath(name);
    await this.ensureReady();
    try {
      await writeFile(path, text, 'utf-8');
    } catch (error) {
      throw new StorageUnavailableError(
        `Failed to write template cache ${path}: ${describe(error)}`,
        path,
        { cause: error },
      );
    }
  }

  private async readText(path: string): Promise<string | null> {
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new StorageUnavailableError(
        `Failed to read ${path}: ${describe(error)}`,
        path,
        { cause: error },
      );
    }
  }
}
