import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { IndexSynchronizer, describeFetchError } from '../../../src/core/index-sync.js';
import { LocalStore } from '../../../src/core/local-store.js';
import { SyncUnavailableError } from '../../../src/core/errors.js';

const INDEX_URL = 'https://index.example.com/index.json';

const INDEX_V1 = JSON.stringify({
  foo: { category: 'utils', version: '1.0_1', repo_url: 'https://example.com/repo' },
});
const INDEX_V2 = JSON.stringify({
  foo: { category: 'utils', version: '1.1_1', repo_url: 'https://example.com/repo' },
  bar: { category: 'devel', version: '2.0_1', repo_url: 'https://example.com/repo' },
});

function stubFetch(...responses: Array<Response | Error>) {
  const queue = [...responses];
  return vi.fn(async (_input: string, _init?: RequestInit): Promise<Response> => {
    const next = queue.shift();
    if (next === undefined) {
      throw new Error('unexpected fetch');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });
}

function ok(body: string, etag?: string): Response {
  return new Response(body, {
    status: 200,
    headers: etag ? { etag } : {},
  });
}

function notModified(): Response {
  return new Response(null, { status: 304 });
}

describe('IndexSynchronizer', () => {
  let root: string;
  let store: LocalStore;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'pkgward-sync-test-'));
    store = new LocalStore(join(root, 'cache'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function synchronizer(fetch: ReturnType<typeof stubFetch>, timeoutMs?: number) {
    return new IndexSynchronizer({
      store,
      indexUrl: INDEX_URL,
      fetch,
      ...(timeoutMs !== undefined && { timeoutMs }),
    });
  }

  it('should fetch and cache the index on first use', async () => {
    const fetch = stubFetch(ok(INDEX_V1, '"etag-1"'));

    const result = await synchronizer(fetch).sync();

    expect(result.source).toBe('network');
    expect(result.warnings).toEqual([]);
    expect(result.directory.lookup('foo')?.version).toBe('1.0_1');
    expect(await readFile(store.indexPath, 'utf-8')).toBe(INDEX_V1);
    expect(await readFile(store.tokenPath, 'utf-8')).toBe('"etag-1"');
    expect(fetch.mock.calls[0]?.[1]?.headers).toEqual({ Accept: 'application/json' });
  });

  it('should serve a usable cache without touching the network', async () => {
    await store.writeIndex(INDEX_V1, '"etag-1"');
    const fetch = stubFetch();

    const result = await synchronizer(fetch).sync();

    expect(result.source).toBe('cache');
    expect(result.directory.names()).toEqual(['foo']);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('should make no network call on a second plain sync', async () => {
    const fetch = stubFetch(ok(INDEX_V1, '"etag-1"'));
    const sync = synchronizer(fetch);

    const first = await sync.sync();
    const second = await sync.sync();

    expect(first.source).toBe('network');
    expect(second.source).toBe('cache');
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(second.directory.lookup('foo')).toEqual(first.directory.lookup('foo'));
  });

  it('should send the stored token and keep the cache on 304', async () => {
    await store.writeIndex(INDEX_V1, '"etag-1"');
    const before = await stat(store.indexPath);
    const fetch = stubFetch(notModified());

    const result = await synchronizer(fetch).sync({ forceRefresh: true });

    expect(result.source).toBe('not-modified');
    expect(result.directory.lookup('foo')?.version).toBe('1.0_1');
    expect(fetch.mock.calls[0]?.[1]?.headers).toEqual({
      Accept: 'application/json',
      'If-None-Match': '"etag-1"',
    });
    expect(await readFile(store.indexPath, 'utf-8')).toBe(INDEX_V1);
    expect(await readFile(store.tokenPath, 'utf-8')).toBe('"etag-1"');
    expect((await stat(store.indexPath)).mtimeMs).toBe(before.mtimeMs);
  });

  it('should return the same directory for repeated syncs against an unchanged server', async () => {
    await store.writeIndex(INDEX_V1, '"etag-1"');
    const fetch = stubFetch(notModified(), notModified());
    const sync = synchronizer(fetch);

    const first = await sync.sync({ forceRefresh: true });
    const second = await sync.sync({ forceRefresh: true });

    expect(second.directory.names()).toEqual(first.directory.names());
    expect(second.directory.lookup('foo')).toEqual(first.directory.lookup('foo'));
  });

  it('should replace the cache and token when the server has a new index', async () => {
    await store.writeIndex(INDEX_V1, '"etag-1"');
    const fetch = stubFetch(ok(INDEX_V2, '"etag-2"'));

    const result = await synchronizer(fetch).sync({ forceRefresh: true });

    expect(result.source).toBe('network');
    expect(result.directory.names()).toEqual(['bar', 'foo']);
    expect(await readFile(store.indexPath, 'utf-8')).toBe(INDEX_V2);
    expect(await readFile(store.tokenPath, 'utf-8')).toBe('"etag-2"');
  });

  it('should drop the old token when the new response carries none', async () => {
    await store.writeIndex(INDEX_V1, '"etag-1"');
    const fetch = stubFetch(ok(INDEX_V2));

    await synchronizer(fetch).sync({ forceRefresh: true });

    expect(existsSync(store.tokenPath)).toBe(false);
  });

  it('should fall back to the cache when the network fails', async () => {
    await store.writeIndex(INDEX_V1, '"etag-1"');
    const fetch = stubFetch(new Error('connect ECONNREFUSED'));

    const result = await synchronizer(fetch).sync({ forceRefresh: true });

    expect(result.source).toBe('fallback');
    expect(result.directory.lookup('foo')?.version).toBe('1.0_1');
    expect(result.warnings).toEqual([
      `Failed to refresh index from ${INDEX_URL} (connect ECONNREFUSED); using cached index`,
    ]);
    expect(await readFile(store.indexPath, 'utf-8')).toBe(INDEX_V1);
    expect(await readFile(store.tokenPath, 'utf-8')).toBe('"etag-1"');
  });

  it('should fall back to the cache on an unexpected status', async () => {
    await store.writeIndex(INDEX_V1);
    const fetch = stubFetch(new Response('oops', { status: 500 }));

    const result = await synchronizer(fetch).sync({ forceRefresh: true });

    expect(result.source).toBe('fallback');
    expect(result.warnings).toEqual([
      `Failed to refresh index from ${INDEX_URL} (HTTP 500); using cached index`,
    ]);
  });

  it('should not overwrite the cache with an undecodable payload', async () => {
    await store.writeIndex(INDEX_V1, '"etag-1"');
    const fetch = stubFetch(ok('<html>maintenance</html>', '"etag-bad"'));

    const result = await synchronizer(fetch).sync({ forceRefresh: true });

    expect(result.source).toBe('fallback');
    expect(result.warnings[0]).toContain('invalid index payload');
    expect(await readFile(store.indexPath, 'utf-8')).toBe(INDEX_V1);
    expect(await readFile(store.tokenPath, 'utf-8')).toBe('"etag-1"');
  });

  it('should fail without creating files when there is no cache and no network', async () => {
    const fetch = stubFetch(new Error('getaddrinfo ENOTFOUND'));

    await expect(synchronizer(fetch).sync()).rejects.toThrow(
      `Failed to fetch index from ${INDEX_URL} (getaddrinfo ENOTFOUND) and no usable cache is available`,
    );
    expect(existsSync(store.indexPath)).toBe(false);
    expect(existsSync(store.tokenPath)).toBe(false);
  });

  it('should treat a corrupt cache as a miss and fetch without a token', async () => {
    await store.writeIndex(INDEX_V1, '"etag-1"');
    await writeFile(store.indexPath, '{"foo": ', 'utf-8');
    const fetch = stubFetch(ok(INDEX_V2, '"etag-2"'));

    const result = await synchronizer(fetch).sync();

    expect(result.source).toBe('network');
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatch(/^Cached index at .* is corrupt: .*\. Fetching a fresh copy\.$/s);
    expect(fetch.mock.calls[0]?.[1]?.headers).toEqual({ Accept: 'application/json' });
    expect(await readFile(store.indexPath, 'utf-8')).toBe(INDEX_V2);
  });

  it('should fail when the cache is corrupt and the network is down', async () => {
    await store.ensureReady();
    await writeFile(store.indexPath, 'not json', 'utf-8');
    const fetch = stubFetch(new Response('', { status: 503 }));

    await expect(synchronizer(fetch).sync()).rejects.toBeInstanceOf(SyncUnavailableError);
  });

  it('should fail on 304 when no usable cache exists', async () => {
    const fetch = stubFetch(notModified());

    await expect(synchronizer(fetch).sync()).rejects.toThrow(
      'Server reported the index unchanged, but no usable cached copy exists',
    );
  });

  it('should describe timeouts in the fallback warning', async () => {
    await store.writeIndex(INDEX_V1);
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    const fetch = stubFetch(timeout);

    const result = await synchronizer(fetch, 5).sync({ forceRefresh: true });

    expect(result.warnings).toEqual([
      `Failed to refresh index from ${INDEX_URL} (timed out after 5ms); using cached index`,
    ]);
    expect(fetch.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal);
  });
});

describe('describeFetchError', () => {
  it('should use the error message', () => {
    expect(describeFetchError(new Error('socket hang up'))).toBe('socket hang up');
  });

  it('should describe aborts without a timeout', () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    expect(describeFetchError(abort)).toBe('request aborted');
  });

  it('should stringify non-errors', () => {
    expect(describeFetchError('offline')).toBe('offline');
  });
});
