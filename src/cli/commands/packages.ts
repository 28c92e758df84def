import { command, flag, restPositionals, string } from 'cmd-ts';
import {
  installPackages,
  removePackages,
  searchPackages,
  syncIndex,
  upgradeAll,
  type OperationReport,
} from '../../core/operations.js';
import { XbpsPackageManager } from '../../core/package-manager.js';
import { loadSettings } from '../../core/settings.js';
import { buildDescription } from '../help.js';
import { installMeta, removeMeta, searchMeta, updateMeta } from '../metadata/packages.js';
import { isJsonMode, jsonOutput, jsonSuccess } from '../json-output.js';
import { createCliContext } from '../context.js';
import { failCommand } from '../fail.js';
import { buildSearchData, formatReport, formatSearchResults } from '../format.js';

const syncFlag = flag({
  long: 'sync',
  short: 'S',
  description: 'Force a refresh of the package index first',
});

const yesFlag = flag({
  long: 'yes',
  short: 'y',
  description: 'Skip template review and assume yes to prompts',
});

function finish(
  commandName: string,
  report: OperationReport,
  extra: Record<string, unknown> = {},
): void {
  if (isJsonMode()) {
    jsonOutput({ success: report.ok, command: commandName, data: { ...extra, ...report } });
  } else if (report.outcomes.length > 1) {
    console.log('');
    for (const line of formatReport(report)) {
      console.log(line);
    }
  }
  if (!report.ok) {
    process.exit(1);
  }
}

// =============================================================================
// search
// =============================================================================

export const searchCmd = command({
  name: searchMeta.command,
  description: buildDescription(searchMeta),
  args: {
    queries: restPositionals({
      type: string,
      displayName: 'query',
      description: 'Substring to look for in package names',
    }),
    sync: syncFlag,
  },
  handler: async ({ queries, sync }) => {
    try {
      if (queries.length === 0) {
        failCommand('search', new Error('search requires a query argument'));
      }
      const ctx = await createCliContext();
      const { directory } = await syncIndex(ctx.synchronizer, sync);

      const results = queries.map((query) => ({ query, entries: searchPackages(directory, query) }));

      if (isJsonMode()) {
        jsonSuccess(
          'search',
          results.map((r) => ({ query: r.query, results: buildSearchData(r.entries) })),
        );
        return;
      }

      results.forEach((r, i) => {
        if (i > 0) console.log('');
        if (results.length > 1) console.log(`Searching for '${r.query}':`);
        for (const line of formatSearchResults(r.query, r.entries)) {
          console.log(line);
        }
      });
    } catch (error) {
      failCommand('search', error);
    }
  },
});

// =============================================================================
// install
// =============================================================================

export const installCmd = command({
  name: installMeta.command,
  description: buildDescription(installMeta),
  args: {
    packages: restPositionals({ type: string, displayName: 'package', description: 'Packages to install' }),
    sync: syncFlag,
    yes: yesFlag,
  },
  handler: async ({ packages, sync, yes }) => {
    try {
      if (packages.length === 0) {
        failCommand('install', new Error('install requires at least one package name'));
      }
      const ctx = await createCliContext({ assumeYes: yes });
      const { directory } = await syncIndex(ctx.synchronizer, sync);
      const report = await installPackages(ctx.pipeline, directory, packages);
      finish('install', report);
    } catch (error) {
      failCommand('install', error);
    }
  },
});

// =============================================================================
// remove
// =============================================================================

export const removeCmd = command({
  name: removeMeta.command,
  description: buildDescription(removeMeta),
  args: {
    packages: restPositionals({ type: string, displayName: 'package', description: 'Packages to remove' }),
    yes: yesFlag,
  },
  handler: async ({ packages, yes }) => {
    try {
      if (packages.length === 0) {
        failCommand('remove', new Error('remove requires at least one package name'));
      }
      // Removal needs neither the index nor the template cache
      const settings = await loadSettings();
      const report = await removePackages(
        {
          packageManager: new XbpsPackageManager({
            useSudo: settings.useSudo,
            output: isJsonMode() ? 'stderr' : 'stdout',
          }),
          assumeYes: yes,
        },
        packages,
      );
      finish('remove', report);
    } catch (error) {
      failCommand('remove', error);
    }
  },
});

// =============================================================================
// update
// =============================================================================

export const updateCmd = command({
  name: updateMeta.command,
  description: buildDescription(updateMeta),
  args: {
    sync: syncFlag,
    yes: yesFlag,
  },
  handler: async ({ sync, yes }) => {
    try {
      const ctx = await createCliContext({ assumeYes: yes });
      const { directory } = await syncIndex(ctx.synchronizer, sync);
      const { candidates, ...report } = await upgradeAll(ctx.pipeline, directory);
      finish('update', report, {
        candidates: candidates.map((c) => ({
          name: c.name,
          installedVersion: c.installedVersion,
          availableVersion: c.availableVersion,
        })),
      });
    } catch (error) {
      failCommand('update', error);
    }
  },
});
