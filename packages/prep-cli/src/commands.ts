import fs from 'node:fs';
import { freqEncode, StorageError, type PrepareResult } from '@cipherprep/prep-core';

/**
 * Read all of stdin (fd 0 unless given)
 */
export function readInput(fd = 0): string {
  try {
    return fs.readFileSync(fd, 'utf8');
  } catch (err) {
    throw new StorageError('read', fd === 0 ? 'stdin' : `fd ${fd}`, err);
  }
}

/**
 * Rank-encode each line on its own; a trailing newline does not add an empty line
 */
export function encodeLines(input: string): string {
  if (input === '') return '';
  const lines = input.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.map(freqEncode).join('\n') + '\n';
}

export function formatSummary(result: PrepareResult, json: boolean): string {
  const summary = {
    mode: result.mode,
    splits: result.splits,
    skipped: result.skipped.map(s => ({ file: s.file, split: s.split, reason: s.reason })),
  };
  return json ? JSON.stringify(summary) : JSON.stringify(summary, null, 2);
}
