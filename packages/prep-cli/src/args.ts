import { CipherPrepError } from '@cipherprep/prep-core';

export class UsageError extends CipherPrepError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** Unvalidated config; runPipeline applies defaults and checks ranges */
export type RawConfig = Record<string, string | number>;

export type Command =
  | { cmd: 'prepare' | 'split'; config: RawConfig; json: boolean }
  | { cmd: 'encode' }
  | { cmd: 'help' };

export const USAGE = `Usage:
  cipherprep prepare <input-dir> [options]
  cipherprep split <input-dir> [options]
  cipherprep encode < tokens.txt > ranks.txt

Common options:
  --test-prefix <p>       File name prefix marking test ciphers (default: test-cipher-)
  --cipher-field <key>    JSON key of the ciphertext (default: ciphertext)
  --plain-field <key>     JSON key of the plaintext (default: plaintext)
  --json                  Print the summary as compact JSON

Prepare options (separate train/test directories):
  --train-out <dir>       Training output directory (default: train)
  --test-out <dir>        Test output directory (default: test)
  --prefix <name>         Output file prefix (default: data)

Split options (one directory, random validation split):
  --out <dir>             Output directory (default: data-bin)
  --valid-ratio <r>       Share of training files moved to valid, 0-1 (default: 0.1)
  --seed <str>            Seed for the validation draw (default: cipherprep)`;

function takeValue(args: string[], i: number, flag: string): string {
  const v = args[i];
  if (v === undefined || v.startsWith('--')) throw new UsageError(`Missing value for ${flag}`);
  return v;
}

function parseRatio(v: string): number {
  const n = Number(v);
  if (v.trim() === '' || !Number.isFinite(n)) throw new UsageError(`Invalid --valid-ratio value: ${v}`);
  return n;
}

function parseRunArgs(mode: 'pairs' | 'split', args: string[]): { config: RawConfig; json: boolean } {
  const opts: RawConfig = {};
  const positional: string[] = [];
  let json = false;
  let i = 0;

  while (i < args.length) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      switch (arg) {
        case '--json':
          json = true;
          break;
        case '--test-prefix':
          opts.testPrefix = takeValue(args, ++i, arg);
          break;
        case '--cipher-field':
          opts.cipherField = takeValue(args, ++i, arg);
          break;
        case '--plain-field':
          opts.plainField = takeValue(args, ++i, arg);
          break;
        case '--train-out':
        case '--test-out':
        case '--prefix':
          if (mode !== 'pairs') throw new UsageError(`Unknown option: ${arg}`);
          opts[arg === '--prefix' ? 'prefix' : arg === '--train-out' ? 'trainOut' : 'testOut'] = takeValue(args, ++i, arg);
          break;
        case '--out':
        case '--seed':
          if (mode !== 'split') throw new UsageError(`Unknown option: ${arg}`);
          opts[arg === '--out' ? 'outDir' : 'seed'] = takeValue(args, ++i, arg);
          break;
        case '--valid-ratio':
          if (mode !== 'split') throw new UsageError(`Unknown option: ${arg}`);
          opts.validRatio = parseRatio(takeValue(args, ++i, arg));
          break;
        default:
          throw new UsageError(`Unknown option: ${arg}`);
      }
    } else {
      positional.push(arg);
    }
    i++;
  }

  if (positional.length !== 1) throw new UsageError('Expected exactly one <input-dir>');
  return { config: { ...opts, mode, inputDir: positional[0] }, json };
}

export function parseArgs(argv: string[]): Command {
  const cmd: string | undefined = argv[0];
  const args = argv.slice(1);
  switch (cmd) {
    case 'prepare':
      return { cmd, ...parseRunArgs('pairs', args) };
    case 'split':
      return { cmd, ...parseRunArgs('split', args) };
    case 'encode':
      if (args.length > 0) throw new UsageError(`Unexpected argument: ${args[0]}`);
      return { cmd };
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      return { cmd: 'help' };
    default:
      throw new UsageError(`Unknown command: ${cmd}`);
  }
}
