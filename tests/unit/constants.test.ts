import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { getCacheDir, getSettingsPath } from '../../src/constants.js';

describe('getCacheDir', () => {
  it('should use XDG_CACHE_HOME when it is absolute', () => {
    expect(getCacheDir({ XDG_CACHE_HOME: '/var/cache/me', HOME: '/home/me' })).toBe(
      join('/var/cache/me', 'pkgward'),
    );
  });

  it('should ignore a relative XDG_CACHE_HOME', () => {
    expect(getCacheDir({ XDG_CACHE_HOME: 'cache', HOME: '/home/me' })).toBe(
      join('/home/me', '.cache', 'pkgward'),
    );
  });
});

describe('getSettingsPath', () => {
  it('should prefer PKGWARD_CONFIG', () => {
    expect(getSettingsPath({ PKGWARD_CONFIG: '/etc/pkgward.yaml', XDG_CONFIG_HOME: '/cfg' })).toBe(
      '/etc/pkgward.yaml',
    );
  });

  it('should fall back to XDG_CONFIG_HOME, then ~/.config', () => {
    expect(getSettingsPath({ XDG_CONFIG_HOME: '/cfg' })).toBe(join('/cfg', 'pkgward', 'config.yaml'));
    expect(getSettingsPath({ HOME: '/home/me' })).toBe(
      join('/home/me', '.config', 'pkgward', 'config.yaml'),
    );
  });
});
