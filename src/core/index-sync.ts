import { decodeIndex } from '../utils/index-parser.js';
import type { PackageIndex } from '../models/package-index.js';
import { CorruptCacheError, IndexDecodeError, SyncUnavailableError } from './errors.js';
import type { LocalStore } from './local-store.js';
import { PackageDirectory } from './package-directory.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Where the returned index came from:
 * - cache:        cached copy used without touching the network
 * - not-modified: server confirmed the cached copy is current (304)
 * - network:      new payload fetched and written to the cache
 * - fallback:     network attempt failed; cached copy returned with a warning
 */
export type SyncSource = 'cache' | 'not-modified' | 'network' | 'fallback';

export interface SyncResult {
  directory: PackageDirectory;
  source: SyncSource;
  warnings: string[];
}

export interface SyncOptions {
  /** Go to the network even when a usable cache exists */
  forceRefresh?: boolean;
}

export interface IndexSynchronizerOptions {
  store: LocalStore;
  indexUrl: string;
  fetch?: FetchFn;
  timeoutMs?: number;
}

type CacheState =
  | { state: 'ok'; index: PackageIndex }
  | { state: 'missing' }
  | { state: 'corrupt'; error: CorruptCacheError };

type FetchOutcome =
  | { kind: 'not-modified' }
  | { kind: 'fetched'; text: string; token: string | null }
  | { kind: 'failed'; reason: string; error?: unknown };

/**
 * Keeps the cached package index fresh.
 *
 * A decodable cache is served directly unless a refresh is forced. Network
 * attempts are conditional on the stored freshness token. Failed attempts
 * (transport error, unexpected status, undecodable payload) fall back to
 * the cache and only fail when there is no usable cache at all.
 */
export class IndexSynchronizer {
  private readonly store: LocalStore;
  private readonly indexUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number | undefined;

  constructor(options: IndexSynchronizerOptions) {
    this.store = options.store;
    this.indexUrl = options.indexUrl;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs;
  }

  async sync(options: SyncOptions = {}): Promise<SyncResult> {
    const warnings: string[] = [];
    const cached = await this.readCache();

    if (cached.state === 'ok' && !options.forceRefresh) {
      return { directory: PackageDirectory.fromIndex(cached.index), source: 'cache', warnings };
    }
    if (cached.state === 'corrupt') {
      warnings.push(`${cached.error.message}. Fetching a fresh copy.`);
    }

    // Only validate against bytes we can actually fall back to
    const token = cached.state === 'ok' ? await this.store.readFreshnessToken() : null;
    const outcome = await this.fetchIndex(token);

    if (outcome.kind === 'not-modified') {
      const current = await this.readCache();
      if (current.state !== 'ok') {
        throw new SyncUnavailableError(
          `Server reported the index unchanged, but no usable cached copy exists at ${this.store.indexPath}`,
          this.indexUrl,
        );
      }
      return { directory: PackageDirectory.fromIndex(current.index), source: 'not-modified', warnings };
    }

    let failure: { reason: string; error?: unknown };
    if (outcome.kind === 'fetched') {
      try {
        const index = decodeIndex(outcome.text);
        const written = await this.store.writeIndex(outcome.text, outcome.token ?? undefined);
        warnings.push(...written.warnings);
        return { directory: PackageDirectory.fromIndex(index), source: 'network', warnings };
      } catch (error) {
        if (!(error instanceof IndexDecodeError)) {
          throw error;
        }
        failure = { reason: `invalid index payload: ${error.message}`, error };
      }
    } else {
      failure = outcome;
    }

    if (cached.state === 'ok') {
      warnings.push(`Failed to refresh index from ${this.indexUrl} (${failure.reason}); using cached index`);
      return { directory: PackageDirectory.fromIndex(cached.index), source: 'fallback', warnings };
    }

    throw new SyncUnavailableError(
      `Failed to fetch index from ${this.indexUrl} (${failure.reason}) and no usable cache is available`,
      this.indexUrl,
      { cause: failure.error },
    );
  }

  private async readCache(): Promise<CacheState> {
    try {
      const index = await this.store.loadIndex();
      return index ? { state: 'ok', index } : { state: 'missing' };
    } catch (error) {
      if (error instanceof CorruptCacheError) {
        return { state: 'corrupt', error };
      }
      throw error;
    }
  }

  private async fetchIndex(token: string | null): Promise<FetchOutcome> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (token) {
      headers['If-None-Match'] = token;
    }

    let response: Response;
    try {
      response = await this.fetchFn(this.indexUrl, {
        headers,
        ...(this.timeoutMs !== undefined && { signal: AbortSignal.timeout(this.timeoutMs) }),
      });
    } catch (error) {
      return { kind: 'failed', reason: describeFetchError(error, this.timeoutMs), error };
    }

    if (response.status === 304) {
      return { kind: 'not-modified' };
    }
    if (!response.ok) {
      return { kind: 'failed', reason: `HTTP ${response.status}` };
    }

    try {
      const text = await response.text();
      return { kind: 'fetched', text, token: response.headers.get('etag') };
    } catch (error) {
      return { kind: 'failed', reason: describeFetchError(error, this.timeoutMs), error };
    }
  }
}

export function describeFetchError(error: unknown, timeoutMs?: number): string {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return timeoutMs !== undefined ? `timed out after ${timeoutMs}ms` : 'request aborted';
  }
  return error instanceof Error ? error.message : String(error);
}
