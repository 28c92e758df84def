import { command, oneOf, positional } from 'cmd-ts';
import { syncIndex } from '../../core/operations.js';
import { IndexSynchronizer } from '../../core/index-sync.js';
import { LocalStore } from '../../core/local-store.js';
import { loadSettings } from '../../core/settings.js';
import { buildDescription } from '../help.js';
import { completionMeta, listPackagesMeta, syncMeta } from '../metadata/index.js';
import { isJsonMode, jsonSuccess } from '../json-output.js';
import { createCliContext } from '../context.js';
import { failCommand } from '../fail.js';
import { generateCompletion, SHELLS } from '../completion.js';

export const syncCmd = command({
  name: syncMeta.command,
  description: buildDescription(syncMeta),
  args: {},
  handler: async () => {
    try {
      const ctx = await createCliContext();
      const result = await syncIndex(ctx.synchronizer, true);

      if (isJsonMode()) {
        jsonSuccess('sync', {
          source: result.source,
          packages: result.directory.size,
          warnings: result.warnings,
        });
        return;
      }

      console.log(`${result.directory.size} packages available`);
    } catch (error) {
      failCommand('sync', error);
    }
  },
});

export const listPackagesCmd = command({
  name: listPackagesMeta.command,
  description: buildDescription(listPackagesMeta),
  args: {},
  handler: async () => {
    let names: string[];
    try {
      const settings = await loadSettings();
      const store = new LocalStore(settings.cacheDir);
      const synchronizer = new IndexSynchronizer({
        store,
        indexUrl: settings.indexUrl,
        timeoutMs: settings.fetchTimeoutMs,
      });
      const { directory } = await synchronizer.sync();
      names = directory.names();
    } catch {
      // Completion scripts call this; any failure means "no candidates"
      names = [];
    }

    if (isJsonMode()) {
      jsonSuccess('list-packages', names);
      return;
    }
    for (const name of names) {
      console.log(name);
    }
  },
});

export const completionCmd = command({
  name: completionMeta.command,
  description: buildDescription(completionMeta),
  args: {
    shell: positional({ type: oneOf([...SHELLS]), displayName: 'shell', description: 'bash, zsh or fish' }),
  },
  handler: ({ shell }) => {
    process.stdout.write(generateCompletion(shell));
  },
});
