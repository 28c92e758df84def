import { LocalStore } from '../core/local-store.js';
import { IndexSynchronizer } from '../core/index-sync.js';
import type { PipelineContext } from '../core/operations.js';
import { XbpsPackageManager } from '../core/package-manager.js';
import { TerminalReviewPresenter } from '../core/review-presenter.js';
import { loadSettings } from '../core/settings.js';
import { TemplateReviewEngine } from '../core/template-review.js';
import type { Settings } from '../models/settings.js';
import { isJsonMode } from './json-output.js';
import { askConfirmation } from './prompts.js';

/**
 * Everything a command handler needs, wired from the user's settings
 */
export interface CliContext {
  settings: Settings;
  store: LocalStore;
  synchronizer: IndexSynchronizer;
  pipeline: PipelineContext;
}

export interface CliContextOptions {
  assumeYes?: boolean;
}

export async function createCliContext(options: CliContextOptions = {}): Promise<CliContext> {
  const settings = await loadSettings();
  const output = isJsonMode() ? 'stderr' : 'stdout';
  const store = new LocalStore(settings.cacheDir);
  await store.ensureReady();

  const synchronizer = new IndexSynchronizer({
    store,
    indexUrl: settings.indexUrl,
    timeoutMs: settings.fetchTimeoutMs,
  });

  const reviewer = new TemplateReviewEngine({
    store,
    templateUrl: settings.templateUrl,
    presenter: new TerminalReviewPresenter({
      pager: settings.pager,
      diffCommand: settings.diffCommand,
      output,
    }),
    prompt: askConfirmation,
    timeoutMs: settings.fetchTimeoutMs,
    assumeYes: options.assumeYes ?? false,
  });

  return {
    settings,
    store,
    synchronizer,
    pipeline: {
      reviewer,
      packageManager: new XbpsPackageManager({ useSudo: settings.useSudo, output }),
      assumeYes: options.assumeYes ?? false,
    },
  };
}
