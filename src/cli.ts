#!/usr/bin/env node
import { toErrorMessage } from './middleware/errors';
import { main } from './main';

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`probewatch: ${toErrorMessage(err)}`);
    process.exitCode = 1;
  },
);
