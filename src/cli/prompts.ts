import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import * as p from '@clack/prompts';
import { cursor, erase } from 'sisteransi';
import { isJsonMode } from './json-output.js';

/**
 * Erase the cancelled prompt output from the terminal.
 *
 * When @clack/prompts renders a cancel state, it shows the prompt message
 * with the typed value crossed out. Moving the cursor up and erasing leaves
 * only our own "aborted" line behind.
 */
function eraseCancelledPrompt(lines = 2): void {
  process.stdout.write(cursor.move(0, -lines) + erase.down());
}

type TextOptions = Parameters<typeof p.text>[0];

/**
 * Wrapper around p.text that erases the strikethrough on cancel.
 */
export async function text(opts: TextOptions): Promise<string | symbol> {
  const result = await p.text(opts);
  if (p.isCancel(result)) {
    eraseCancelledPrompt();
  }
  return result;
}

/**
 * Lines read from a non-interactive stream, shared by every prompt so that
 * answers piped in ahead of time are handed out one per question.
 */
class LineQueue {
  private readonly lines: string[] = [];
  private readonly waiting: Array<(line: string | null) => void> = [];
  private readonly rl: Interface;
  private ended = false;

  constructor(input: Readable) {
    this.rl = createInterface({ input, terminal: false });
    this.rl.on('line', (line) => {
      const resolve = this.waiting.shift();
      if (resolve) {
        resolve(line);
      } else {
        this.lines.push(line);
      }
      if (this.waiting.length === 0) {
        // Don't hold the process open between questions
        this.rl.pause();
      }
    });
    this.rl.once('close', () => {
      this.ended = true;
      for (const resolve of this.waiting.splice(0)) {
        resolve(null);
      }
    });
  }

  next(): Promise<string | null> {
    const line = this.lines.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
      this.rl.resume();
    });
  }
}

const queues = new WeakMap<Readable, LineQueue>();

function queueFor(input: Readable): LineQueue {
  let queue = queues.get(input);
  if (!queue) {
    queue = new LineQueue(input);
    queues.set(input, queue);
  }
  return queue;
}

/**
 * Prompt text goes to stderr in JSON mode so stdout carries only the envelope.
 */
function promptOutput(): Writable {
  return isJsonMode() ? process.stderr : process.stdout;
}

/**
 * Ask a question on a non-interactive stream and take the next answer line.
 * Resolves to null once the stream has ended and no answers are left.
 */
export function readLine(
  message: string,
  input: Readable = process.stdin,
  output: Writable = promptOutput(),
): Promise<string | null> {
  output.write(`${message} `);
  return queueFor(input).next();
}

/**
 * Ask for confirmation and return the raw answer. Terminals get a clack
 * prompt; piped stdin (and JSON mode) read line by line. Cancelling counts
 * as no answer.
 */
export async function askConfirmation(message: string): Promise<string | null> {
  if (!process.stdin.isTTY || isJsonMode()) {
    return readLine(message);
  }
  const result = await text({ message, placeholder: 'Y', defaultValue: '' });
  if (p.isCancel(result)) {
    return null;
  }
  return result;
}
