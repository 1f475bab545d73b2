#!/usr/bin/env -S npx tsx
import { CipherPrepError, log, runPipeline } from '@cipherprep/prep-core';
import { parseArgs, USAGE, UsageError } from './args.js';
import { encodeLines, formatSummary, readInput } from './commands.js';

function run(argv: string[]) {
  const command = parseArgs(argv);
  if (command.cmd === 'help') {
    console.log(USAGE);
    return;
  }
  if (command.cmd === 'encode') {
    process.stdout.write(encodeLines(readInput()));
    return;
  }
  const result = runPipeline(command.config);
  console.log(formatSummary(result, command.json));
}

try {
  run(process.argv.slice(2));
} catch (err) {
  if (err instanceof UsageError) {
    console.error(err.message);
    console.error(USAGE);
  } else if (err instanceof CipherPrepError) {
    log.error(err.message, { error: err.name });
  } else {
    throw err;
  }
  process.exitCode = 1;
}
