#!/usr/bin/env node
import { describeError } from '../shared/errors.js';
import { CliError } from './client.js';
import { runProbe } from './probe.js';

runProbe(process.argv.slice(2), { out: (line) => process.stdout.write(`${line}\n`) }).catch((error: unknown) => {
  process.stderr.write(`a2a-relay-probe error: ${describeError(error)}\n`);
  if (error instanceof CliError && error.hint) {
    process.stderr.write(`a2a-relay-probe hint: ${error.hint}\n`);
  }
  process.exit(1);
});
