import { COMMAND_NAMES } from './completion.js';

const KNOWN_COMMANDS = new Set<string>(COMMAND_NAMES);

/**
 * `pkgward foo bar` means `pkgward install foo bar`. Flags and known
 * subcommands in the first position are left alone.
 */
export function resolveImplicitInstall(args: string[]): string[] {
  const first = args[0];
  if (first === undefined || first.startsWith('-') || KNOWN_COMMANDS.has(first)) {
    return args;
  }
  return ['install', ...args];
}
