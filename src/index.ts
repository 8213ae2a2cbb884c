#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import chalk from 'chalk';
import { createProgram } from './cli/index.js';
import { spinner } from './spinner.js';

// Handle uncaught errors gracefully
process.on('uncaughtException', (error) => {
  spinner.stop();
  console.error(chalk.red(`\nUncaught exception: ${error.message}`));
  if (process.env.DEBUG) {
    console.error(error.stack);
  }
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  spinner.stop();
  console.error(chalk.red(`\nUnhandled rejection: ${reason}`));
  process.exit(1);
});

await createProgram().parseAsync(process.argv);
