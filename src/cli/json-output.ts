import { setQuiet } from '../utils/log.js';

let jsonMode = false;

export function isJsonMode(): boolean {
  return jsonMode;
}

/**
 * Switch JSON mode on or off. Progress logging is silenced in JSON mode so
 * stdout carries only the envelope.
 */
export function setJsonMode(value: boolean): void {
  jsonMode = value;
  setQuiet(value);
}

export interface JsonEnvelope<T = unknown> {
  success: boolean;
  command: string;
  data?: T;
  error?: string;
}

export function jsonOutput<T>(envelope: JsonEnvelope<T>): void {
  console.log(JSON.stringify(envelope, null, 2));
}

export function jsonSuccess<T>(command: string, data: T): void {
  jsonOutput({ success: true, command, data });
}

export function jsonFailure(command: string, error: unknown): void {
  jsonOutput({
    success: false,
    command,
    error: error instanceof Error ? error.message : String(error),
  });
}

/**
 * Strip --json from args so cmd-ts doesn't see it. Arguments after a
 * literal `--` are left untouched.
 */
export function extractJsonFlag(args: string[]): { args: string[]; json: boolean } {
  const end = args.indexOf('--');
  const head = end === -1 ? args : args.slice(0, end);
  const tail = end === -1 ? [] : args.slice(end);

  const kept = head.filter((arg) => arg !== '--json');
  if (kept.length === head.length) return { args, json: false };
  return { args: [...kept, ...tail], json: true };
}
