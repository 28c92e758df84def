/**
 * The cache directory cannot be created, read or written.
 * Fatal: the command aborts.
 */
export class StorageUnavailableError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StorageUnavailableError';
    this.path = path;
  }
}

/**
 * An index payload could not be decoded (bad JSON, wrong shape).
 */
export class IndexDecodeError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'IndexDecodeError';
    this.issues = issues;
  }
}

/**
 * Cached bytes exist but do not decode. Recoverable: treated as a cache miss.
 */
export class CorruptCacheError extends Error {
  readonly path: string;

  constructor(path: string, cause: IndexDecodeError) {
    super(`Cached index at ${path} is corrupt: ${cause.message}`, { cause });
    this.name = 'CorruptCacheError';
    this.path = path;
  }
}

/**
 * Neither the network nor the cache produced a usable index.
 */
export class SyncUnavailableError extends Error {
  readonly url: string;

  constructor(message: string, url: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SyncUnavailableError';
    this.url = url;
  }
}

/**
 * The recipe for a package could not be fetched for review.
 * Fatal for that package only.
 */
export class TemplateFetchFailedError extends Error {
  readonly packageName: string;
  readonly url: string;
  /** HTTP status, or undefined when the request never completed */
  readonly status: number | undefined;

  constructor(packageName: string, url: string, status?: number, options?: ErrorOptions) {
    const reason = status !== undefined ? `HTTP ${status}` : 'network error';
    super(`Failed to fetch template for ${packageName} from ${url} (${reason})`, options);
    this.name = 'TemplateFetchFailedError';
    this.packageName = packageName;
    this.url = url;
    this.status = status;
  }
}

/**
 * The delegated package-manager process reported failure.
 */
export class ExternalToolFailedError extends Error {
  readonly command: string;
  readonly exitCode: number | undefined;

  constructor(command: string, exitCode?: number, options?: ErrorOptions) {
    super(
      exitCode !== undefined
        ? `${command} failed with exit code ${exitCode}`
        : `${command} failed to start`,
      options,
    );
    this.name = 'ExternalToolFailedError';
    this.command = command;
    this.exitCode = exitCode;
  }
}

export class PackageNotFoundError extends Error {
  readonly packageName: string;

  constructor(packageName: string) {
    super(`Package '${packageName}' not found in the index`);
    this.name = 'PackageNotFoundError';
    this.packageName = packageName;
  }
}

/**
 * Package names double as cache file names, so anything that could escape
 * the templates directory is rejected.
 */
export class InvalidPackageNameError extends Error {
  readonly packageName: string;

  constructor(packageName: string) {
    super(`Invalid package name: '${packageName}'`);
    this.name = 'InvalidPackageNameError';
    this.packageName = packageName;
  }
}

export class InvalidRepoUrlError extends Error {
  readonly url: string;

  constructor(url: string) {
    super(`Refusing to use repository URL '${url}': expected a plain http(s) URL`);
    this.name = 'InvalidRepoUrlError';
    this.url = url;
  }
}

export class SettingsError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SettingsError';
    this.path = path;
  }
}
