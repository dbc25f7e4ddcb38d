#!/usr/bin/env node
// src/bin.ts

import { main } from './cli/main.js';

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
