import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import chalk from 'chalk';
import { createTwoFilesPatch } from 'diff';
import { execa } from 'execa';
import { withTempDir } from '../utils/temp-dir.js';

/**
 * Renders template review output. The review engine decides what to show;
 * the presenter decides how.
 */
export interface ReviewPresenter {
  /** First install: show the whole template */
  showFull(name: string, content: string): Promise<void>;
  /** Cached copy matches the remote template */
  showUnchanged(name: string): Promise<void>;
  /** Cached copy differs: show a unified diff */
  showDiff(name: string, previous: string, current: string): Promise<void>;
}

export interface TerminalPresenterOptions {
  pager?: string;
  diffCommand?: string;
  /** Where review output goes; stderr keeps stdout free for machine output */
  output?: 'stdout' | 'stderr';
  /** Line sink for headers and in-process fallbacks (defaults to the output stream) */
  write?: (line: string) => void;
}

const SEPARATOR = '-'.repeat(50);

/**
 * Colour a unified patch the way `diff --color` does.
 */
export function colorizePatch(patch: string): string {
  return patch
    .split('\n')
    .map((line) => {
      if (line.startsWith('+++') || line.startsWith('---')) return chalk.bold(line);
      if (line.startsWith('@@')) return chalk.cyan(line);
      if (line.startsWith('+')) return chalk.green(line);
      if (line.startsWith('-')) return chalk.red(line);
      return line;
    })
    .join('\n');
}

/**
 * Presenter backed by external tools: a pager for new templates and
 * `diff -u` for changed ones. Both get their input through temp files,
 * which are removed whether or not the tool succeeds. When a tool cannot
 * be started the output is rendered in process instead.
 */
export class TerminalReviewPresenter implements ReviewPresenter {
  private readonly pager: string;
  private readonly diffCommand: string;
  private readonly toStderr: boolean;
  private readonly write: (line: string) => void;

  constructor(options: TerminalPresenterOptions = {}) {
    this.pager = options.pager ?? 'less';
    this.diffCommand = options.diffCommand ?? 'diff';
    this.toStderr = options.output === 'stderr';
    this.write =
      options.write ??
      (this.toStderr ? (line: string) => console.error(line) : (line: string) => console.log(line));
  }

  async showFull(name: string, content: string): Promise<void> {
    this.write(`\nNew package ${name}. Review template:`);
    await withTempDir('review', async (dir) => {
      const path = join(dir, `${name}.template`);
      await writeFile(path, content, 'utf-8');
      const result = await execa(this.pager, [path], {
        stdio: this.toStderr ? ['inherit', 2, 'inherit'] : 'inherit',
        reject: false,
      });
      if (result.failed) {
        this.write(SEPARATOR);
        this.write(content);
        this.write(SEPARATOR);
      }
    });
  }

  async showUnchanged(name: string): Promise<void> {
    this.write(`Template for ${name} unchanged since last install.`);
  }

  async showDiff(name: string, previous: string, current: string): Promise<void> {
    this.write(`\nTemplate for ${name} has changed:`);
    this.write(SEPARATOR);
    await withTempDir('review', async (dir) => {
      const oldPath = join(dir, `${name}.old`);
      const newPath = join(dir, `${name}.new`);
      await writeFile(oldPath, previous, 'utf-8');
      await writeFile(newPath, current, 'utf-8');

      const result = await execa(
        this.diffCommand,
        ['-u', '--color=always', oldPath, newPath],
        { stdio: this.toStderr ? ['inherit', 2, 'inherit'] : 'inherit', reject: false },
      );
      // diff exits 1 when the inputs differ
      if (result.failed && result.exitCode !== 1) {
        const patch = createTwoFilesPatch(`${name}.old`, `${name}.new`, previous, current, '', '', {
          context: 3,
        });
        this.write(colorizePatch(patch));
      }
    });
    this.write(SEPARATOR);
  }
}
