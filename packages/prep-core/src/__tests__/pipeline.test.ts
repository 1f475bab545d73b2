import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigError, NoInputFilesError, StorageError } from '../errors.js';
import { onLog, type LogEntry } from '../logger.js';
import { assignSplits, classifyFiles, listInputFiles, preparePairs, prepareSplit, runPipeline } from '../pipeline.js';
import { resolveConfig, type PairsConfig, type SplitConfig } from '../config.js';

let tmp: string;
let input: string;

function writeJson(name: string, value: unknown) {
  fs.writeFileSync(path.join(input, name), JSON.stringify(value));
}

function read(file: string) {
  return fs.readFileSync(file, 'utf8');
}

beforeEach(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'cipherprep-pipeline-'));
  input = path.join(tmp, 'in');
  fs.mkdirSync(input);
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'debug').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(tmp, { recursive: true, force: true });
});

describe('listInputFiles', () => {
  it('returns top-level JSON files sorted by name', () => {
    writeJson('b.json', {});
    writeJson('a.json', {});
    fs.writeFileSync(path.join(input, 'notes.txt'), 'x');
    fs.mkdirSync(path.join(input, 'nested'));
    fs.writeFileSync(path.join(input, 'nested', 'c.json'), '{}');
    expect(listInputFiles(input)).toEqual([path.join(input, 'a.json'), path.join(input, 'b.json')]);
  });

  it('includes dot-prefixed JSON files', () => {
    writeJson('.sample-1.json', {});
    writeJson('b.json', {});
    expect(listInputFiles(input)).toEqual([path.join(input, '.sample-1.json'), path.join(input, 'b.json')]);
  });

  it('throws StorageError for a missing directory', () => {
    expect(() => listInputFiles(path.join(tmp, 'nope'))).toThrow(StorageError);
  });
});

describe('classifyFiles', () => {
  it('routes files by the name prefix', () => {
    expect(classifyFiles(['/d/a.json', '/d/test-cipher-1.json', '/test-cipher-dir/b.json'], 'test-cipher-')).toEqual({
      train: ['/d/a.json', '/test-cipher-dir/b.json'],
      test: ['/d/test-cipher-1.json'],
    });
  });
});

describe('assignSplits', () => {
  it('draws the validation files with the injected source', () => {
    const files = ['/d/a.json', '/d/test-cipher-x.json', '/d/b.json'];
    expect(assignSplits(files, 'test-cipher-', 0.5, () => 0)).toEqual({
      train: ['/d/a.json'],
      valid: ['/d/b.json'],
      test: ['/d/test-cipher-x.json'],
    });
  });

  it('leaves valid empty for a zero ratio', () => {
    expect(assignSplits(['/d/a.json', '/d/b.json'], 'test-', 0, () => 0).valid).toEqual([]);
  });
});

describe('preparePairs', () => {
  function pairsConfig(): PairsConfig {
    const config = resolveConfig({
      mode: 'pairs',
      inputDir: input,
      trainOut: path.join(tmp, 'train'),
      testOut: path.join(tmp, 'test'),
    });
    if (config.mode !== 'pairs') throw new Error('expected pairs config');
    return config;
  }

  beforeEach(() => {
    writeJson('a.json', { ciphertext: '150 273 150 14 273 150', plaintext: 'hello' });
    writeJson('b.json', { ciphertext: '9 8 9 8', plaintext: 'hi there' });
    fs.writeFileSync(path.join(input, 'bad.json'), '{not json');
    writeJson('missing.json', { ciphertext: '1' });
    writeJson('test-cipher-1.json', { ciphertext: '5 5 5', plaintext: 'abc' });
  });

  it('writes aligned src/tgt files per split', () => {
    preparePairs(pairsConfig());
    expect(read(path.join(tmp, 'train', 'data.src'))).toBe('0 1 0 2 1 0\n0 1 0 1\n');
    expect(read(path.join(tmp, 'train', 'data.tgt'))).toBe('h e l l o\nh i   t h e r e\n');
    expect(read(path.join(tmp, 'test', 'data.src'))).toBe('0 0 0\n');
    expect(read(path.join(tmp, 'test', 'data.tgt'))).toBe('a b c\n');
  });

  it('reports counts and skipped records', () => {
    const result = preparePairs(pairsConfig());
    expect(result.splits.train).toEqual({
      files: 4,
      records: 2,
      skipped: 2,
      src: path.join(tmp, 'train', 'data.src'),
      tgt: path.join(tmp, 'train', 'data.tgt'),
    });
    expect(result.splits.test).toMatchObject({ files: 1, records: 1, skipped: 0 });
    expect(result.skipped.map(s => [path.basename(s.file), s.split, s.reason])).toEqual([
      ['bad.json', 'train', 'malformed-json'],
      ['missing.json', 'train', 'invalid-record'],
    ]);
  });

  it('logs a warning per skipped record', () => {
    const entries: LogEntry[] = [];
    const off = onLog(e => entries.push(e));
    try {
      preparePairs(pairsConfig());
    } finally {
      off();
    }
    const warnings = entries.filter(e => e.level === 'warn');
    expect(warnings.map(w => w.message)).toEqual([
      `Skipping ${path.join(input, 'bad.json')}`,
      `Skipping ${path.join(input, 'missing.json')}`,
    ]);
    expect(warnings[1].data).toMatchObject({ split: 'train', reason: 'invalid-record' });
  });

  it('writes an empty pair when a split has no files', () => {
    fs.rmSync(path.join(input, 'test-cipher-1.json'));
    const result = preparePairs(pairsConfig());
    expect(result.splits.test).toMatchObject({ files: 0, records: 0 });
    expect(read(path.join(tmp, 'test', 'data.src'))).toBe('');
    expect(read(path.join(tmp, 'test', 'data.tgt'))).toBe('');
  });
});

describe('prepareSplit', () => {
  function splitConfig(validRatio: number): SplitConfig {
    const config = resolveConfig({ mode: 'split', inputDir: input, outDir: path.join(tmp, 'bin'), validRatio });
    if (config.mode !== 'split') throw new Error('expected split config');
    return config;
  }

  beforeEach(() => {
    for (let i = 0; i < 10; i++) writeJson(`r${i}.json`, { ciphertext: `${i} ${i} x`, plaintext: `p${i}` });
    writeJson('test-cipher-a.json', { ciphertext: 'k', plaintext: 't' });
  });

  it('moves the drawn training files to valid', () => {
    const result = prepareSplit(splitConfig(0.2), () => 0);
    expect(result.splits.train).toMatchObject({ files: 8, records: 8 });
    expect(result.splits.valid).toMatchObject({ files: 2, records: 2 });
    expect(result.splits.test).toMatchObject({ files: 1, records: 1 });
    expect(read(path.join(tmp, 'bin', 'valid.src'))).toBe('0 0 1\n0 0 1\n');
    expect(read(path.join(tmp, 'bin', 'valid.tgt'))).toBe('p 1\np 2\n');
    expect(read(path.join(tmp, 'bin', 'train.tgt'))).toBe(['p 0', 'p 3', 'p 4', 'p 5', 'p 6', 'p 7', 'p 8', 'p 9', ''].join('\n'));
    expect(read(path.join(tmp, 'bin', 'test.tgt'))).toBe('t\n');
  });

  it('reproduces the same split for the same seed', () => {
    prepareSplit(splitConfig(0.3));
    const first = read(path.join(tmp, 'bin', 'valid.tgt'));
    prepareSplit(splitConfig(0.3));
    expect(read(path.join(tmp, 'bin', 'valid.tgt'))).toBe(first);
    expect(first.split('\n').filter(Boolean)).toHaveLength(3);
  });

  it('keeps every training file in exactly one split', () => {
    prepareSplit(splitConfig(0.3));
    const lines = (name: string) => read(path.join(tmp, 'bin', name)).split('\n').filter(Boolean);
    const all = [...lines('train.tgt'), ...lines('valid.tgt')].sort();
    expect(all).toEqual(Array.from({ length: 10 }, (_, i) => `p ${i}`));
  });
});

describe('runPipeline', () => {
  it('dispatches on mode', () => {
    writeJson('a.json', { ciphertext: '2 2 3', plaintext: 'ab' });
    const result = runPipeline({ mode: 'split', inputDir: input, outDir: path.join(tmp, 'bin'), validRatio: 0 });
    expect(result.mode).toBe('split');
    expect(read(path.join(tmp, 'bin', 'train.src'))).toBe('0 0 1\n');
  });

  it('throws NoInputFilesError when the directory has no JSON files', () => {
    fs.writeFileSync(path.join(input, 'readme.txt'), 'x');
    expect(() => runPipeline({ mode: 'pairs', inputDir: input, trainOut: path.join(tmp, 'train') })).toThrow(NoInputFilesError);
    expect(fs.existsSync(path.join(tmp, 'train'))).toBe(false);
  });

  it('refuses pairs output that would overwrite the training files', () => {
    writeJson('a.json', { ciphertext: '1', plaintext: 'train' });
    writeJson('test-cipher-1.json', { ciphertext: '2', plaintext: 'test' });
    const out = path.join(tmp, 'out');
    expect(() => runPipeline({ mode: 'pairs', inputDir: input, trainOut: out, testOut: out })).toThrow(ConfigError);
    expect(fs.existsSync(out)).toBe(false);
  });

  it('throws ConfigError before touching the file system', () => {
    expect(() => runPipeline({ mode: 'split', inputDir: input, outDir: path.join(tmp, 'bin'), validRatio: -1 })).toThrow(ConfigError);
    expect(fs.existsSync(path.join(tmp, 'bin'))).toBe(false);
  });
});
