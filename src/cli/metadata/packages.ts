import type { CommandMeta } from '../help.js';

export const searchMeta: CommandMeta = {
  command: 'search',
  description: 'Search the package index by name',
  whenToUse: 'To find out whether a package is available and which version the index offers',
  examples: ['pkgward search editor', 'pkgward search code -S', 'pkgward search ""'],
  expectedOutput:
    'A PACKAGE / VERSION / CATEGORY table per query, sorted by name, or "No results found". Exit 1 if no index is available.',
};

export const installMeta: CommandMeta = {
  command: 'install',
  description: 'Review and install one or more packages',
  whenToUse:
    'To install packages from the index. Each template is shown (or diffed against the last reviewed copy) before installation',
  examples: ['pkgward install visual-studio-code', 'pkgward install -S ferdium', 'pkgward ferdium -y'],
  expectedOutput:
    'Review output, a confirmation prompt, then installer output per package. Exit 1 if any package failed.',
};

export const removeMeta: CommandMeta = {
  command: 'remove',
  description: 'Remove one or more installed packages',
  whenToUse: 'To uninstall packages through the system package manager',
  examples: ['pkgward remove ferdium', 'pkgward remove -y ferdium discord'],
  expectedOutput: 'Remover output per package. Stops and exits 1 at the first failure.',
};

export const updateMeta: CommandMeta = {
  command: 'update',
  description: 'Upgrade every installed package that has a newer version in the index',
  whenToUse: 'To bring installed packages up to date with the index',
  examples: ['pkgward update', 'pkgward update -S', 'pkgward update -y'],
  expectedOutput:
    'The list of outdated packages, then a review and upgrade per package. Exit 1 if any upgrade failed.',
};
