import { execa } from 'execa';
import { assertValidPackageName, assertValidRepoUrl } from '../utils/package-name.js';
import { ExternalToolFailedError } from './errors.js';

export type VersionOrder = -1 | 0 | 1;

export interface InstallOptions {
  /** Pass the package manager's own non-interactive flag */
  assumeYes?: boolean;
  /** Upgrade an installed package instead of a plain install */
  update?: boolean;
}

export interface RemoveOptions {
  assumeYes?: boolean;
}

/**
 * System package manager capability. Implementations own process
 * invocation and exit-status interpretation.
 */
export interface PackageManager {
  /** @throws ExternalToolFailedError when the installer reports failure */
  install(name: string, repoUrl: string, options?: InstallOptions): Promise<void>;
  /** @throws ExternalToolFailedError when the remover reports failure */
  remove(name: string, options?: RemoveOptions): Promise<void>;
  /** Installed package name -> installed version */
  listInstalled(): Promise<Map<string, string>>;
  /** Three-way comparison using the package manager's version semantics */
  compareVersions(a: string, b: string): Promise<VersionOrder>;
}

/**
 * Parse `xbps-query -l` output.
 *
 * Each line is `<state> <name>-<version> <description...>`; the version
 * starts after the last dash of the second column. Lines that do not fit
 * are skipped.
 */
export function parseInstalledListing(stdout: string): Map<string, string> {
  const installed = new Map<string, string>();
  for (const line of stdout.split('\n')) {
    const pkgver = line.trim().split(/\s+/)[1];
    if (!pkgver) continue;

    const dash = pkgver.lastIndexOf('-');
    if (dash <= 0 || dash === pkgver.length - 1) continue;

    installed.set(pkgver.slice(0, dash), pkgver.slice(dash + 1));
  }
  return installed;
}

/**
 * Map an `xbps-uhelper cmpver` exit status to an ordering.
 * 0: equal, 1: first is newer, 255: first is older.
 */
export function cmpverExitToOrder(exitCode: number): VersionOrder | null {
  switch (exitCode) {
    case 0:
      return 0;
    case 1:
      return 1;
    case 255:
      return -1;
    default:
      return null;
  }
}

export interface XbpsOptions {
  /** Prefix install/remove with sudo (default true) */
  useSudo?: boolean;
  /** Send installer output to stderr instead of stdout */
  output?: 'stdout' | 'stderr';
}

/**
 * PackageManager backed by the XBPS command-line tools
 */
export class XbpsPackageManager implements PackageManager {
  private readonly useSudo: boolean;
  private readonly toStderr: boolean;

  constructor(options: XbpsOptions = {}) {
    this.useSudo = options.useSudo ?? true;
    this.toStderr = options.output === 'stderr';
  }

  async install(name: string, repoUrl: string, options: InstallOptions = {}): Promise<void> {
    assertValidPackageName(name);
    assertValidRepoUrl(repoUrl);

    const args = ['-R', repoUrl, options.update ? '-Su' : '-S'];
    if (options.assumeYes) args.push('-y');
    args.push(name);

    await this.runPrivileged('xbps-install', args);
  }

  async remove(name: string, options: RemoveOptions = {}): Promise<void> {
    assertValidPackageName(name);

    const args = ['-R'];
    if (options.assumeYes) args.push('-y');
    args.push(name);

    await this.runPrivileged('xbps-remove', args);
  }

  async listInstalled(): Promise<Map<string, string>> {
    const result = await execa('xbps-query', ['-l'], { reject: false });
    if (result.failed) {
      throw new ExternalToolFailedError('xbps-query -l', result.exitCode);
    }
    return parseInstalledListing(result.stdout);
  }

  async compareVersions(a: string, b: string): Promise<VersionOrder> {
    const result = await execa('xbps-uhelper', ['cmpver', a, b], { reject: false });
    const order = cmpverExitToOrder(result.exitCode);
    if (order === null) {
      throw new ExternalToolFailedError(`xbps-uhelper cmpver ${a} ${b}`, result.exitCode);
    }
    return order;
  }

  private async runPrivileged(tool: string, args: string[]): Promise<void> {
    const file = this.useSudo ? 'sudo' : tool;
    const argv = this.useSudo ? [tool, ...args] : args;
    const result = await execa(file, argv, {
      stdio: this.toStderr ? ['inherit', 2, 'inherit'] : 'inherit',
      reject: false,
    });
    if (result.failed) {
      throw new ExternalToolFailedError(`${file} ${argv.join(' ')}`, result.exitCode);
    }
  }
}
