#!/usr/bin/env node
import { runCli } from './cli';
import { toError } from '../common/errors';

runCli(process.argv.slice(2))
  .then((status) => {
    process.exitCode = status;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${toError(error).message}\n`);
    process.exitCode = 1;
  });
