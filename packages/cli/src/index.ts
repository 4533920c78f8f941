#!/usr/bin/env node
import { errorEnvelope, toCliError } from './errors.js';
import { createProgram } from './program.js';

async function run() {
  await createProgram().parseAsync(process.argv);
}

run().catch((error: unknown) => {
  const failure = toCliError(error);
  console.error(JSON.stringify(errorEnvelope(failure.code, failure.message, failure.details), null, 2));
  process.exit(failure.exitCode);
});
