/**
 * CLI helpers: line splitting, argument parsing, error handling.
 */

import { InvalidArgumentError } from 'commander';
import type { TaskId } from '@taskstack/core/types';
import * as out from './output.js';

/** Longest description kept; anything beyond is cut off */
export const MAX_DESCRIPTION_LENGTH = 255;

/**
 * Split an input line into words. Single or double quotes group words;
 * an unterminated quote runs to the end of the line.
 */
export function splitArgs(line: string): string[] {
  const args: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;
  let inWord = false;

  for (const ch of line) {
    if (quote) {
      if (ch === quote) quote = null;
      else current += ch;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        args.push(current);
        current = '';
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }
  if (inWord) args.push(current);
  return args;
}

/**
 * Parse a task id argument. Used as a commander argument parser, so a bad
 * value surfaces as a regular parse error.
 */
export function parseTaskId(raw: string): TaskId {
  if (!/^\d+$/.test(raw)) {
    throw new InvalidArgumentError(`Invalid task id: ${raw}`);
  }
  const id = Number(raw);
  if (id < 1 || !Number.isSafeInteger(id)) {
    throw new InvalidArgumentError(`Invalid task id: ${raw}`);
  }
  return id;
}

/**
 * Join description words and cap the length in characters (code points, so
 * a surrogate pair is never split). Returns null when nothing is left.
 */
export function normalizeDescription(words: readonly string[]): string | null {
  const description = words.join(' ').trim();
  if (description.length === 0) return null;
  return Array.from(description).slice(0, MAX_DESCRIPTION_LENGTH).join('');
}

/**
 * Run a command action, reporting any thrown error instead of letting it
 * end the session.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof Error) {
      out.error(err.message);
    } else {
      out.error(String(err));
    }
  }
}
