#!/usr/bin/env node

import { program } from './cli.js';
import { errorMessage } from './errors/index.js';

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Error:', errorMessage(error));
  process.exit(1);
});
