#!/usr/bin/env node

/**
 * rulelens CLI
 *
 * Usage:
 *   rulelens search -q 'trojan !"test rule"' --action alert --sort sid
 *   rulelens show 2100498
 *   rulelens stats
 *   rulelens transform create -f transforms/tag-ftp.yaml
 *   rulelens transform dry-run transform-1a2b3c4d
 */

import 'dotenv/config';

import chalk from 'chalk';
import { CommanderError } from 'commander';

import { createProgram } from './program.js';
import { ValidationError } from '@/utils/errors.js';

const program = createProgram();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (err) {
    if (err instanceof CommanderError) {
      // Help and version output are not failures; commander already
      // printed its own message for usage errors.
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        return;
      }
      process.exit(err.exitCode);
    }

    console.error('');
    console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
    if (err instanceof ValidationError && err.issues.length > 1) {
      for (const issue of err.issues) {
        console.error(chalk.gray(`  - ${issue}`));
      }
    }
    console.error('');
    console.error(chalk.gray('Run "rulelens --help" for usage information.'));
    console.error('');
    process.exit(1);
  }
}

void main();
