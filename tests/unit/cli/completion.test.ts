import { describe, test, expect } from 'vitest';
import { generateCompletion } from '../../../src/cli/completion.js';

describe('generateCompletion', () => {
  test('bash completes commands and package names', () => {
    const script = generateCompletion('bash');
    expect(script).toContain(
      'compgen -W "search install remove update sync list-packages completion"',
    );
    expect(script).toContain('install|remove|search)');
    expect(script).toContain('$(pkgward list-packages 2>/dev/null)');
    expect(script.trimEnd().split('\n').pop()).toBe('complete -F _pkgward pkgward');
  });

  test('zsh registers a compdef function', () => {
    const script = generateCompletion('zsh');
    expect(script.split('\n')[0]).toBe('#compdef pkgward');
    expect(script).toContain('compadd -- bash zsh fish');
    expect(script.trimEnd().split('\n').pop()).toBe('compdef _pkgward pkgward');
  });

  test('fish completes package names for package commands', () => {
    const script = generateCompletion('fish');
    expect(script).toContain(
      'complete -c pkgward -n "__fish_seen_subcommand_from install remove search" -a "(pkgward list-packages)"',
    );
  });

  test('uses a safe function name for other binary names', () => {
    expect(generateCompletion('bash', 'pkg-ward')).toContain('_pkg_ward()');
  });
});
