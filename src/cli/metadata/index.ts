import type { CommandMeta } from '../help.js';

export const syncMeta: CommandMeta = {
  command: 'sync',
  description: 'Refresh the cached package index',
  whenToUse: 'To fetch the latest index now instead of relying on the cached copy',
  examples: ['pkgward sync'],
  expectedOutput:
    'Whether the index was updated, unchanged, or served from cache after a failed fetch. Exit 1 if no index is available.',
};

export const listPackagesMeta: CommandMeta = {
  command: 'list-packages',
  description: 'Print every package name in the index, one per line',
  whenToUse: 'Used by shell completion scripts; never fetches unless nothing is cached',
  examples: ['pkgward list-packages'],
  expectedOutput: 'Package names sorted by name. Prints nothing if no index is available.',
};

export const completionMeta: CommandMeta = {
  command: 'completion',
  description: 'Generate a shell completion script',
  whenToUse: 'To enable tab completion of commands and package names',
  examples: [
    'pkgward completion bash > ~/.local/share/bash-completion/completions/pkgward',
    'pkgward completion fish > ~/.config/fish/completions/pkgward.fish',
    'source <(pkgward completion zsh)',
  ],
  expectedOutput: 'The completion script on stdout.',
};
