import type { DirectoryEntry } from '../core/package-directory.js';
import type { OperationReport } from '../core/operations.js';

/**
 * Format search results as a fixed-width table.
 */
export function formatSearchResults(query: string, entries: DirectoryEntry[]): string[] {
  if (entries.length === 0) {
    return [`No results found for '${query}'`];
  }

  const lines = [
    `${'PACKAGE'.padEnd(20)} ${'VERSION'.padEnd(15)} ${'CATEGORY'.padEnd(20)}`.trimEnd(),
    '-'.repeat(55),
  ];
  for (const [name, info] of entries) {
    lines.push(`${name.padEnd(20)} ${info.version.padEnd(15)} ${info.category}`);
  }
  return lines;
}

/**
 * JSON-friendly search results
 */
export function buildSearchData(entries: DirectoryEntry[]) {
  return entries.map(([name, info]) => ({
    name,
    version: info.version,
    category: info.category,
    repoUrl: info.repoUrl,
  }));
}

/**
 * One summary line per package outcome, e.g. "✓ foo installed".
 */
export function formatReport(report: OperationReport): string[] {
  return report.outcomes.map((outcome) => {
    const mark = outcome.status === 'failed' ? '✗' : '✓';
    return `${mark} ${outcome.name} ${outcome.status}${outcome.error ? `: ${outcome.error}` : ''}`;
  });
}
