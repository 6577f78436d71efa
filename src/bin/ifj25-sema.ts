#!/usr/bin/env node

import { main } from '../cli';

main().then(code => {
  process.exitCode = code;
}).catch(error => {
  console.error(`Error: ${error instanceof Error ? error.message : error}`);
  process.exit(1);
});
