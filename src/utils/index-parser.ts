import {
  PackageIndexSchema,
  type PackageIndex,
  type PackageMetadata,
} from '../models/package-index.js';
import { IndexDecodeError } from '../core/errors.js';

/**
 * Decode an index payload. All-or-nothing: any malformed entry rejects the
 * whole payload, so a partially valid index never reaches the directory.
 *
 * @throws IndexDecodeError on invalid JSON, a non-object top level or a bad entry
 */
export function decodeIndex(text: string): PackageIndex {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new IndexDecodeError('Failed to parse index as JSON: invalid syntax');
  }

  if (json === null || typeof json !== 'object' || Array.isArray(json)) {
    throw new IndexDecodeError('Index must be a JSON object keyed by package name');
  }

  // zod's record parser drops this key instead of rejecting it
  if (Object.hasOwn(json, '__proto__')) {
    throw new IndexDecodeError("Index contains reserved package name '__proto__'");
  }

  const result = PackageIndexSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.errors.map(
      (err) => `${err.path.join('.')}: ${err.message}`,
    );
    throw new IndexDecodeError(
      `Index validation failed:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
      issues,
    );
  }

  const entries: Record<string, PackageMetadata> = Object.fromEntries(
    Object.entries(result.data).map(([name, metadata]) => [name, Object.freeze(metadata)]),
  );
  return Object.freeze(entries);
}
