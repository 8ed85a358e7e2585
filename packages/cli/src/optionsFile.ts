import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ConfigurationError } from '@pointforge/points';

export type ReadTextFile = (path: string) => Promise<string>;

const defaultReadTextFile: ReadTextFile = (path) => readFile(path, 'utf8');

function isCommentLine(line: string): boolean {
  return line.startsWith('#') || line.startsWith('//');
}

/**
 * `--flag value` on one line becomes two arguments; `--flag=value` and plain values stay whole.
 */
export function splitOptionLine(line: string): string[] {
  if (!line.startsWith('-')) {
    return [line];
  }
  const whitespace = line.search(/\s/);
  const equals = line.indexOf('=');
  if (whitespace < 0 || (equals >= 0 && equals < whitespace)) {
    return [line];
  }
  return [line.slice(0, whitespace), line.slice(whitespace).trim()];
}

export function parseOptionsFileText(text: string): string[] {
  const args: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (line.length === 0 || isCommentLine(line)) {
      continue;
    }
    args.push(...splitOptionLine(line));
  }
  return args;
}

/**
 * Replaces every `@path` argument with the arguments listed in that file. Files may reference
 * other files; a file that includes itself, directly or not, is rejected.
 */
export async function expandOptionFiles(
  args: readonly string[],
  readTextFile: ReadTextFile = defaultReadTextFile,
  visiting: ReadonlySet<string> = new Set()
): Promise<string[]> {
  const expanded: string[] = [];
  for (const arg of args) {
    if (!arg.startsWith('@') || arg.length === 1) {
      expanded.push(arg);
      continue;
    }
    const path = resolve(arg.slice(1));
    if (visiting.has(path)) {
      throw new ConfigurationError(`Options file '${path}' includes itself`);
    }

    let text: string;
    try {
      text = await readTextFile(path);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Unable to read options file '${path}': ${reason}`);
    }
    const nested = await expandOptionFiles(parseOptionsFileText(text), readTextFile, new Set([...visiting, path]));
    expanded.push(...nested);
  }
  return expanded;
}
