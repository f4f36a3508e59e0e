#!/usr/bin/env node
import { runCli } from '../lib/cli';

runCli(process.argv.slice(2), { cwd: process.cwd() })
  .then(exitCode => {
    process.exitCode = exitCode;
  })
  .catch(e => {
    // eslint-disable-next-line no-console
    console.error(e);
    process.exitCode = 1;
  });
