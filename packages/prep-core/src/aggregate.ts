import fs from 'node:fs';
import path from 'node:path';
import { StorageError } from './errors.js';
import { freqEncode } from './rank.js';
import { spaceChars } from './tokenize.js';
import type { CipherRecord } from './types.js';

/**
 * Paired .src/.tgt writer; line k of both files always comes from the k-th added record.
 */
export interface AggregateWriter {
  src: string;
  tgt: string;
  add: (record: CipherRecord) => void;
  lineCount: () => number;
  /** Idempotent, returns the number of lines written */
  close: () => number;
}

function openForWrite(file: string): number {
  try {
    return fs.openSync(file, 'w');
  } catch (err) {
    throw new StorageError('write', file, err);
  }
}

export function openAggregate(dir: string, prefix: string): AggregateWriter {
  const src = path.join(dir, `${prefix}.src`);
  const tgt = path.join(dir, `${prefix}.tgt`);

  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new StorageError('write', dir, err);
  }
  const srcFd = openForWrite(src);
  let tgtFd: number;
  try {
    tgtFd = openForWrite(tgt);
  } catch (err) {
    fs.closeSync(srcFd);
    throw err;
  }

  let lines = 0;
  let srcBytes = 0;
  let closed = false;

  const append = (fd: number, file: string, line: string) => {
    try {
      fs.appendFileSync(fd, line + '\n', 'utf8');
    } catch (err) {
      throw new StorageError('write', file, err);
    }
  };

  const add = (record: CipherRecord) => {
    if (closed) throw new StorageError('write', src, new Error('writer is closed'));
    // encode both sides before touching either file
    const srcLine = freqEncode(record.ciphertext);
    const tgtLine = spaceChars(record.plaintext);
    append(srcFd, src, srcLine);
    try {
      append(tgtFd, tgt, tgtLine);
    } catch (err) {
      // drop the unpaired .src line; the writer is unusable afterwards
      close();
      fs.truncateSync(src, srcBytes);
      throw err;
    }
    srcBytes += Buffer.byteLength(srcLine + '\n');
    lines++;
  };

  const close = () => {
    if (!closed) {
      closed = true;
      fs.closeSync(srcFd);
      fs.closeSync(tgtFd);
    }
    return lines;
  };

  return { src, tgt, add, lineCount: () => lines, close };
}
