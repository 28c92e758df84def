import { log } from '../utils/log.js';
import {
  ExternalToolFailedError,
  InvalidPackageNameError,
  InvalidRepoUrlError,
  PackageNotFoundError,
  StorageUnavailableError,
  TemplateFetchFailedError,
} from './errors.js';
import type { IndexSynchronizer, SyncResult } from './index-sync.js';
import type { DirectoryEntry, PackageDirectory } from './package-directory.js';
import type { PackageManager, VersionOrder } from './package-manager.js';
import type { TemplateReviewEngine } from './template-review.js';
import { assertValidPackageName } from '../utils/package-name.js';
import type { PackageMetadata } from '../models/package-index.js';

/**
 * Collaborators needed by the install/remove/upgrade drivers
 */
export interface PipelineContext {
  reviewer: TemplateReviewEngine;
  packageManager: PackageManager;
  assumeYes?: boolean;
}

export type PackageStatus = 'installed' | 'upgraded' | 'removed' | 'aborted' | 'failed';

export interface PackageOutcome {
  name: string;
  status: PackageStatus;
  error?: string;
}

export interface OperationReport {
  outcomes: PackageOutcome[];
  /** True when no package failed (a declined review is not a failure) */
  ok: boolean;
  /** True when the batch stopped before processing every package */
  stopped: boolean;
}

export interface UpgradeCandidate {
  name: string;
  installedVersion: string;
  availableVersion: string;
  metadata: PackageMetadata;
}

const SOURCE_MESSAGES: Record<SyncResult['source'], string> = {
  cache: 'Using cached index',
  'not-modified': 'Index not modified (cached)',
  network: 'Index updated',
  fallback: 'Using cached index as fallback',
};

function buildReport(outcomes: PackageOutcome[], stopped: boolean): OperationReport {
  return {
    outcomes,
    ok: outcomes.every((o) => o.status !== 'failed'),
    stopped,
  };
}

function failed(name: string, error: Error): PackageOutcome {
  log.error(error.message);
  return { name, status: 'failed', error: error.message };
}

/**
 * Errors that end the current package but not necessarily the batch
 */
function isPackageError(error: unknown): error is Error {
  return (
    error instanceof PackageNotFoundError ||
    error instanceof TemplateFetchFailedError ||
    error instanceof InvalidPackageNameError ||
    error instanceof InvalidRepoUrlError ||
    error instanceof ExternalToolFailedError
  );
}

export async function syncIndex(
  synchronizer: IndexSynchronizer,
  forceRefresh: boolean,
): Promise<SyncResult> {
  if (forceRefresh) {
    log.info('Fetching index...');
  }
  const result = await synchronizer.sync({ forceRefresh });
  for (const warning of result.warnings) {
    log.warn(warning);
  }
  if (result.source !== 'cache') {
    log.info(SOURCE_MESSAGES[result.source]);
  }
  return result;
}

export function searchPackages(directory: PackageDirectory, query: string): DirectoryEntry[] {
  return directory.search(query);
}

/**
 * Review and install a single package. Returns 'aborted' when the user
 * declines; the cached template is only replaced after a successful install.
 */
async function reviewAndInstall(
  ctx: PipelineContext,
  name: string,
  metadata: PackageMetadata,
  update: boolean,
): Promise<PackageStatus> {
  log.info(`Found ${name} in category '${metadata.category}'`);
  log.info('Fetching template for review...');
  const review = await ctx.reviewer.review(name, metadata.category);

  if (!review.approved) {
    log.info(`Installation of ${name} aborted by user`);
    return 'aborted';
  }

  log.info(`${update ? 'Upgrading' : 'Installing'} ${name} from: ${metadata.repoUrl}`);
  await ctx.packageManager.install(name, metadata.repoUrl, {
    assumeYes: ctx.assumeYes ?? false,
    update,
  });

  try {
    await ctx.reviewer.commit(review);
  } catch (error) {
    if (!(error instanceof StorageUnavailableError)) {
      throw error;
    }
    log.warn(`${name} was installed, but its template could not be cached: ${error.message}`);
  }

  log.info(`Successfully ${update ? 'upgraded' : 'installed'} ${name}`);
  return update ? 'upgraded' : 'installed';
}

/**
 * Install packages one after another. A package that is missing from the
 * index or whose template cannot be fetched is reported and skipped; a
 * failing installer stops the batch.
 */
export async function installPackages(
  ctx: PipelineContext,
  directory: PackageDirectory,
  names: string[],
): Promise<OperationReport> {
  const outcomes: PackageOutcome[] = [];

  for (const name of names) {
    try {
      const metadata = directory.lookup(name);
      if (!metadata) {
        throw new PackageNotFoundError(name);
      }
      const status = await reviewAndInstall(ctx, name, metadata, false);
      outcomes.push({ name, status });
    } catch (error) {
      if (!isPackageError(error)) {
        throw error;
      }
      outcomes.push(failed(name, error));
      if (error instanceof ExternalToolFailedError) {
        return buildReport(outcomes, outcomes.length < names.length);
      }
    }
  }

  return buildReport(outcomes, false);
}

/**
 * Remove packages one after another; the first failure stops the batch.
 */
export async function removePackages(
  ctx: Pick<PipelineContext, 'packageManager' | 'assumeYes'>,
  names: string[],
): Promise<OperationReport> {
  const outcomes: PackageOutcome[] = [];

  for (const name of names) {
    try {
      assertValidPackageName(name);
      log.info(`Uninstalling ${name}...`);
      await ctx.packageManager.remove(name, { assumeYes: ctx.assumeYes ?? false });
      outcomes.push({ name, status: 'removed' });
    } catch (error) {
      if (!isPackageError(error)) {
        throw error;
      }
      outcomes.push(failed(name, error));
      return buildReport(outcomes, outcomes.length < names.length);
    }
  }

  return buildReport(outcomes, false);
}

/**
 * Installed packages known to the index whose index version is newer,
 * sorted by name. Packages whose versions cannot be compared are skipped.
 */
export async function planUpgrades(
  ctx: Pick<PipelineContext, 'packageManager'>,
  directory: PackageDirectory,
): Promise<UpgradeCandidate[]> {
  const installed = await ctx.packageManager.listInstalled();
  const candidates: UpgradeCandidate[] = [];

  for (const name of [...installed.keys()].sort()) {
    const installedVersion = installed.get(name);
    const metadata = directory.lookup(name);
    if (installedVersion === undefined || !metadata) continue;

    let order: VersionOrder;
    try {
      order = await ctx.packageManager.compareVersions(metadata.version, installedVersion);
    } catch (error) {
      if (!(error instanceof ExternalToolFailedError)) {
        throw error;
      }
      log.warn(`Skipping ${name}: could not compare versions (${error.message})`);
      continue;
    }
    if (order === 1) {
      candidates.push({ name, installedVersion, availableVersion: metadata.version, metadata });
    }
  }

  return candidates;
}

/**
 * Upgrade every outdated package. Each upgrade is reviewed like an
 * install; failures are reported per package and the batch continues.
 */
export async function upgradeAll(
  ctx: PipelineContext,
  directory: PackageDirectory,
): Promise<OperationReport & { candidates: UpgradeCandidate[] }> {
  log.info('Checking for updates...');
  const candidates = await planUpgrades(ctx, directory);

  if (candidates.length === 0) {
    log.info('All packages are up to date');
    return { ...buildReport([], false), candidates };
  }

  log.info(`${candidates.length} package(s) to upgrade:`);
  for (const c of candidates) {
    log.info(`  ${c.name}: ${c.installedVersion} -> ${c.availableVersion}`);
  }

  const outcomes: PackageOutcome[] = [];
  for (const candidate of candidates) {
    try {
      const status = await reviewAndInstall(ctx, candidate.name, candidate.metadata, true);
      outcomes.push({ name: candidate.name, status });
    } catch (error) {
      if (!isPackageError(error)) {
        throw error;
      }
      outcomes.push(failed(candidate.name, error));
    }
  }

  return { ...buildReport(outcomes, false), candidates };
}
