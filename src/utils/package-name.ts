import { InvalidPackageNameError, InvalidRepoUrlError } from '../core/errors.js';

const PACKAGE_NAME_PATTERN = /^[A-Za-z0-9_.+-]+$/;

/**
 * Package names are used as file names in the template cache and as
 * arguments to the package manager.
 */
export function isValidPackageName(name: string): boolean {
  return (
    name.length > 0 &&
    !name.startsWith('.') &&
    !name.startsWith('-') &&
    !name.includes('..') &&
    PACKAGE_NAME_PATTERN.test(name)
  );
}

export function assertValidPackageName(name: string): void {
  if (!isValidPackageName(name)) {
    throw new InvalidPackageNameError(name);
  }
}

const UNSAFE_URL_CHARS = /[;|&$`'"\\\n\r<>(){}\s]/;

/**
 * Repository URLs come from the remote index and are handed to a privileged
 * process, so only plain http(s) URLs are accepted.
 */
export function isValidRepoUrl(url: string): boolean {
  if (!url.startsWith('https://') && !url.startsWith('http://')) {
    return false;
  }
  return !UNSAFE_URL_CHARS.test(url);
}

export function assertValidRepoUrl(url: string): void {
  if (!isValidRepoUrl(url)) {
    throw new InvalidRepoUrlError(url);
  }
}
