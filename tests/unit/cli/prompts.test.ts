import { describe, test, expect, afterEach, vi } from 'vitest';
import { PassThrough } from 'node:stream';
import { setJsonMode } from '../../../src/cli/json-output.js';
import { readLine } from '../../../src/cli/prompts.js';

function capture() {
  const output = new PassThrough();
  const chunks: string[] = [];
  output.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));
  return { output, written: () => chunks.join('') };
}

describe('readLine', () => {
  test('writes the question and resolves with the first line', async () => {
    const input = new PassThrough();
    const { output, written } = capture();

    const answer = readLine('Proceed? [Y/n]', input, output);
    input.end('n\nignored\n');

    expect(await answer).toBe('n');
    expect(written()).toBe('Proceed? [Y/n] ');
  });

  test('resolves to an empty string for a bare newline', async () => {
    const input = new PassThrough();
    const answer = readLine('Proceed?', input, new PassThrough());
    input.end('\n');
    expect(await answer).toBe('');
  });

  test('resolves to null when input ends without a line', async () => {
    const input = new PassThrough();
    const answer = readLine('Proceed?', input, new PassThrough());
    input.end();
    expect(await answer).toBeNull();
  });
});

describe('readLine on a shared stream', () => {
  test('hands each prompt its own answer line', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    input.end('y\nyes\n');

    expect(await readLine('First?', input, output)).toBe('y');
    expect(await readLine('Second?', input, output)).toBe('yes');
    expect(await readLine('Third?', input, output)).toBeNull();
  });

  test('waits for answers that arrive after the question', async () => {
    const input = new PassThrough();
    const output = new PassThrough();

    const first = readLine('First?', input, output);
    input.write('n\n');
    expect(await first).toBe('n');

    const second = readLine('Second?', input, output);
    input.end('y\n');
    expect(await second).toBe('y');
  });
});

describe('readLine in JSON mode', () => {
  afterEach(() => {
    setJsonMode(false);
  });

  test('writes the question to stderr', async () => {
    setJsonMode(true);
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const stdout = vi.spyOn(process.stdout, 'write');
    const input = new PassThrough();

    const answer = readLine('Proceed? [Y/n]', input);
    input.end('y\n');

    expect(await answer).toBe('y');
    expect(stderr).toHaveBeenCalledWith('Proceed? [Y/n] ');
    expect(stdout).not.toHaveBeenCalledWith('Proceed? [Y/n] ');
    stderr.mockRestore();
    stdout.mockRestore();
  });
});
