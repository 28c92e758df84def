import { describe, test, expect } from 'vitest';
import { resolveImplicitInstall } from '../../../src/cli/implicit-install.js';

describe('resolveImplicitInstall', () => {
  test('treats bare package names as an install', () => {
    expect(resolveImplicitInstall(['foo', 'bar'])).toEqual(['install', 'foo', 'bar']);
  });

  test('leaves known commands alone', () => {
    expect(resolveImplicitInstall(['search', 'foo'])).toEqual(['search', 'foo']);
    expect(resolveImplicitInstall(['list-packages'])).toEqual(['list-packages']);
  });

  test('leaves flags and empty input alone', () => {
    expect(resolveImplicitInstall(['--version'])).toEqual(['--version']);
    expect(resolveImplicitInstall([])).toEqual([]);
  });
});
