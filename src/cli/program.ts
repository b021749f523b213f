/**
 * Builds the rulelens commander program.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { z } from 'zod';

import { registerSearchCommand } from './commands/search.js';
import { registerShowCommand } from './commands/show.js';
import { registerStatsCommand } from './commands/stats.js';
import { registerTransformCommand } from './commands/transform.js';
import { openRuleLens, type OpenRuleLens } from './context.js';

const PackageSchema = z.object({ version: z.string() });

function readVersion(): string {
  const path = fileURLToPath(new URL('../../package.json', import.meta.url));
  return PackageSchema.parse(JSON.parse(readFileSync(path, 'utf-8'))).version;
}

export function createProgram(open: OpenRuleLens = openRuleLens): Command {
  const program = new Command();

  program
    .name('rulelens')
    .description('Browse, search and transform Suricata rule sets')
    .version(readVersion())
    .exitOverride();

  registerSearchCommand(program, open);
  registerShowCommand(program, open);
  registerStatsCommand(program, open);
  registerTransformCommand(program, open);

  return program;
}
