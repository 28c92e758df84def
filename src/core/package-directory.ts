import type { PackageIndex, PackageMetadata } from '../models/package-index.js';

export type DirectoryEntry = readonly [name: string, metadata: PackageMetadata];

function byName(a: DirectoryEntry, b: DirectoryEntry): number {
  if (a[0] < b[0]) return -1;
  if (a[0] > b[0]) return 1;
  return 0;
}

/**
 * Immutable snapshot of a decoded index. A new synchronization produces a
 * new directory; there are no mutation methods.
 */
export class PackageDirectory {
  private readonly entries: ReadonlyMap<string, PackageMetadata>;

  private constructor(entries: ReadonlyMap<string, PackageMetadata>) {
    this.entries = entries;
  }

  static fromIndex(index: PackageIndex): PackageDirectory {
    return new PackageDirectory(new Map(Object.entries(index)));
  }

  static empty(): PackageDirectory {
    return new PackageDirectory(new Map());
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Entries whose name contains `query`, sorted by name.
   * An empty query matches every entry.
   */
  search(query: string): DirectoryEntry[] {
    const matches: DirectoryEntry[] = [];
    for (const [name, metadata] of this.entries) {
      if (name.includes(query)) {
        matches.push([name, metadata]);
      }
    }
    return matches.sort(byName);
  }

  lookup(name: string): PackageMetadata | undefined {
    return this.entries.get(name);
  }

  /** All package names, sorted */
  names(): string[] {
    return [...this.entries.keys()].sort();
  }
}
