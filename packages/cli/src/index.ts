#!/usr/bin/env node

/**
 * @clockwork/cli - Main CLI entry point for Clockwork.
 * Collects commits and huddles into task lists and renders the
 * editable time-entry report.
 */

import { CommanderError } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '@clockwork/core';
import { createProgram } from './program.js';

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // Help and version output end up here as well
      process.exitCode = error.exitCode;
      return;
    }
    console.error(chalk.red(`\nError: ${errorMessage(error)}`));
    process.exitCode = 1;
  }
}

void main();
