/**
 * Shared CLI option helpers for rulelens commands.
 *
 * Option parsers for commander, input file loading, and the colored
 * message printers used across all commands.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { extname, resolve } from 'node:path';
import { InvalidArgumentError, type Command } from 'commander';
import chalk from 'chalk';
import YAML from 'yaml';

import { SORT_KEYS, type SortKey, type SortOrder } from '@/types/rule.js';
import { ValidationError } from '@/utils/errors.js';

// ---------------------------------------------------------------------------
// Option registration helpers
// ---------------------------------------------------------------------------

export function addJsonOption(cmd: Command): Command {
  return cmd.option('--json', 'Print machine-readable JSON');
}

export function addExamplesOption(cmd: Command): Command {
  return cmd.option('--examples <n>', 'Number of example matches to show', parseInteger);
}

// ---------------------------------------------------------------------------
// Argument parsers
// ---------------------------------------------------------------------------

/**
 * Accumulate a repeatable, comma-separated option into a list.
 *
 * @example --action alert,drop --action pass => ['alert', 'drop', 'pass']
 */
export function collectList(value: string, previous: string[] = []): string[] {
  const items = value
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
  return [...previous, ...items];
}

/**
 * Accumulate repeatable `key=value` metadata filters.
 *
 * @example --meta signature_severity=Major --meta signature_severity=Minor
 */
export function collectMeta(
  value: string,
  previous: Record<string, string[]> = {},
): Record<string, string[]> {
  const eq = value.indexOf('=');
  if (eq <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${value}".`);
  }
  const key = value.substring(0, eq).trim();
  const values = collectList(value.substring(eq + 1));
  return { ...previous, [key]: [...(previous[key] ?? []), ...values] };
}

export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return Number.parseInt(value, 10);
}

export function parseSortKey(value: string): SortKey {
  const key = SORT_KEYS.find(k => k === value.toLowerCase());
  if (!key) {
    throw new InvalidArgumentError(`Unknown sort key "${value}". Valid keys: ${SORT_KEYS.join(', ')}`);
  }
  return key;
}

export function parseSortOrder(value: string): SortOrder {
  const order = value.toLowerCase();
  if (order !== 'asc' && order !== 'desc') {
    throw new InvalidArgumentError(`Sort order must be "asc" or "desc", got "${value}".`);
  }
  return order;
}

/**
 * Parse `true`/`false` style flags for the `--enabled` filter.
 */
export function parseBooleanList(values: readonly string[]): boolean[] {
  return values.map(v => {
    const lower = v.toLowerCase();
    if (['true', 'yes', '1', 'enabled'].includes(lower)) return true;
    if (['false', 'no', '0', 'disabled'].includes(lower)) return false;
    throw new InvalidArgumentError(`Expected true or false, got "${v}".`);
  });
}

/**
 * Option parser for repeatable boolean lists such as `--enabled true,no`.
 */
export function collectBooleans(value: string, previous: boolean[] = []): boolean[] {
  return [...previous, ...parseBooleanList(collectList(value))];
}

// ---------------------------------------------------------------------------
// Input files
// ---------------------------------------------------------------------------

/**
 * Read a JSON or YAML document. Files ending in .json are parsed as JSON,
 * everything else as YAML (which also accepts JSON).
 *
 * @throws ValidationError if the file is missing or cannot be parsed.
 */
export async function readDocument(path: string): Promise<unknown> {
  const resolved = resolve(path);
  if (!existsSync(resolved)) {
    throw new ValidationError(`Input file does not exist: ${resolved}`);
  }

  const content = await readFile(resolved, 'utf-8');
  try {
    return extname(resolved).toLowerCase() === '.json' ? JSON.parse(content) : YAML.parse(content);
  } catch (err) {
    throw new ValidationError(
      `Could not parse ${resolved}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function printHeader(title: string): void {
  console.log('');
  console.log(chalk.bold.cyan(`  rulelens — ${title}`));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log('');
}

export function printInfo(message: string): void {
  console.log(chalk.cyan(`  ${message}`));
}

export function printSuccess(message: string): void {
  console.log(chalk.green(`  ${message}`));
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ${message}`));
}
