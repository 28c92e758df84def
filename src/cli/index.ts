#!/usr/bin/env node

import { run } from 'cmd-ts';
import { conciseSubcommands } from './help.js';
import { installCmd, removeCmd, searchCmd, updateCmd } from './commands/packages.js';
import { completionCmd, listPackagesCmd, syncCmd } from './commands/index.js';
import { extractJsonFlag, setJsonMode } from './json-output.js';
import { readPackageVersion } from './package-json.js';
import { resolveImplicitInstall } from './implicit-install.js';

const app = conciseSubcommands({
  name: 'pkgward',
  description:
    'Review package templates before installing from XBPS repositories\n\n' +
    'Use --json for structured output. A bare package name is shorthand for `pkgward install`.',
  version: readPackageVersion(import.meta.url),
  cmds: {
    search: searchCmd,
    install: installCmd,
    remove: removeCmd,
    update: updateCmd,
    sync: syncCmd,
    'list-packages': listPackagesCmd,
    completion: completionCmd,
  },
});

const rawArgs = process.argv.slice(2);
const { args: argsNoJson, json } = extractJsonFlag(rawArgs);
setJsonMode(json);

await run(app, resolveImplicitInstall(argsNoJson));
