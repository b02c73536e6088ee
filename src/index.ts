#!/usr/bin/env node

import 'dotenv/config';

import { run } from './cli/run.js';

run(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
