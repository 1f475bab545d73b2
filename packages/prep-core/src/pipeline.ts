import fs from 'node:fs';
import path from 'node:path';
import { glob } from 'glob';
import { openAggregate } from './aggregate.js';
import { resolveConfig, type PairsConfig, type RecordFields, type SplitConfig } from './config.js';
import { NoInputFilesError, RecordParseError, RecordValidationError, StorageError } from './errors.js';
import * as log from './logger.js';
import { seededRandom, shuffle, type RandomSource } from './random.js';
import { readRecordFile } from './records.js';
import type { PrepareResult, SkippedRecord, SplitName, SplitStats } from './types.js';

/**
 * JSON files directly inside inputDir, sorted by name
 */
export function listInputFiles(inputDir: string): string[] {
  const dir = path.resolve(inputDir);
  let isDir = false;
  try {
    isDir = fs.statSync(dir).isDirectory();
  } catch (err) {
    throw new StorageError('read', dir, err);
  }
  if (!isDir) throw new StorageError('read', dir, new Error('not a directory'));

  return glob.sync('*.json', { cwd: dir, nodir: true, dot: true })
    .sort()
    .map(f => path.join(dir, f));
}

export function classifyFiles(files: string[], testPrefix: string): { train: string[]; test: string[] } {
  const train: string[] = [];
  const test: string[] = [];
  for (const f of files) {
    if (path.basename(f).startsWith(testPrefix)) test.push(f);
    else train.push(f);
  }
  return { train, test };
}

/**
 * Draw round(train * validRatio) training files into the validation split.
 * Selection is random; each split keeps the input order.
 */
export function assignSplits(
  files: string[],
  testPrefix: string,
  validRatio: number,
  rand: RandomSource
): Record<SplitName, string[]> {
  const { train, test } = classifyFiles(files, testPrefix);
  const validCount = Math.round(train.length * validRatio);
  const picked = new Set(shuffle(train, rand).slice(0, validCount));
  return {
    train: train.filter(f => !picked.has(f)),
    valid: train.filter(f => picked.has(f)),
    test,
  };
}

/**
 * Encode every file of one split into <dir>/<prefix>.src|.tgt.
 * Unparseable or incomplete records are skipped and reported; nothing is written for them.
 */
export function writeSplit(
  split: SplitName,
  files: string[],
  dir: string,
  prefix: string,
  fields: RecordFields,
  skipped: SkippedRecord[]
): SplitStats {
  const writer = openAggregate(path.resolve(dir), prefix);
  let skips = 0;
  try {
    for (const file of files) {
      try {
        writer.add(readRecordFile(file, fields));
      } catch (err) {
        if (!(err instanceof RecordParseError || err instanceof RecordValidationError)) throw err;
        const reason = err instanceof RecordParseError ? 'malformed-json' : 'invalid-record';
        skipped.push({ file, split, reason, message: err.message });
        skips++;
        log.warn(`Skipping ${file}`, { split, reason, detail: err.message });
      }
    }
  } finally {
    writer.close();
  }
  return { files: files.length, records: writer.lineCount(), skipped: skips, src: writer.src, tgt: writer.tgt };
}

function inputs(inputDir: string): string[] {
  const files = listInputFiles(inputDir);
  if (files.length === 0) throw new NoInputFilesError(path.resolve(inputDir));
  return files;
}

export function preparePairs(config: PairsConfig): PrepareResult {
  const t = log.timer('preparePairs');
  const { train, test } = classifyFiles(inputs(config.inputDir), config.testPrefix);
  log.info(`Training ciphers identified: ${train.length}`);
  log.info(`Testing ciphers identified: ${test.length}`);

  const skipped: SkippedRecord[] = [];
  const splits = {
    train: writeSplit('train', train, config.trainOut, config.prefix, config, skipped),
    test: writeSplit('test', test, config.testOut, config.prefix, config, skipped),
  };
  t.endWith({ records: splits.train.records + splits.test.records, skipped: skipped.length });
  return { mode: 'pairs', splits, skipped };
}

/**
 * @param rand - Defaults to a generator seeded from config.seed
 */
export function prepareSplit(config: SplitConfig, rand: RandomSource = seededRandom(config.seed)): PrepareResult {
  const t = log.timer('prepareSplit');
  const assigned = assignSplits(inputs(config.inputDir), config.testPrefix, config.validRatio, rand);
  log.info(`Split ciphers: ${assigned.train.length} train, ${assigned.valid.length} valid, ${assigned.test.length} test`, { seed: config.seed });

  const skipped: SkippedRecord[] = [];
  const splits: Record<SplitName, SplitStats> = {
    train: writeSplit('train', assigned.train, config.outDir, 'train', config, skipped),
    valid: writeSplit('valid', assigned.valid, config.outDir, 'valid', config, skipped),
    test: writeSplit('test', assigned.test, config.outDir, 'test', config, skipped),
  };
  t.endWith({ skipped: skipped.length });
  return { mode: 'split', splits, skipped };
}

/**
 * Validate a raw config and run the mode it names
 */
export function runPipeline(input: unknown, rand?: RandomSource): PrepareResult {
  const config = resolveConfig(input);
  return config.mode === 'pairs' ? preparePairs(config) : prepareSplit(config, rand);
}
