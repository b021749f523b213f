/**
 * Opens the rule set for a CLI command.
 */

import chalk from 'chalk';
import ora from 'ora';

import { loadConfig } from '@/config.js';
import { createRuleLens, type RuleLens } from '@/rulelens.js';
import type { RuleSnapshot } from '@/loading/rule-store.js';
import { setLogLevel } from '@/utils/logger.js';

export type OpenRuleLens = () => RuleLens;

export interface CommandOptionsBase {
  json?: boolean;
}

/**
 * Build a RuleLens from the environment (`.env` is already loaded by the
 * entry point).
 */
export function openRuleLens(): RuleLens {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  return createRuleLens(config);
}

/**
 * Load the current snapshot behind a spinner. With `json` set the spinner
 * is silent and informational logging is suppressed so stdout stays
 * parseable.
 */
export async function loadSnapshot(lens: RuleLens, json = false): Promise<RuleSnapshot> {
  if (json && (lens.config.logLevel === 'debug' || lens.config.logLevel === 'info')) {
    setLogLevel('warn');
  }

  const spinner = ora({ text: 'Loading rules...', isSilent: json }).start();
  try {
    const snapshot = await lens.rules.snapshot();
    spinner.succeed(chalk.green(`Loaded ${snapshot.rules.length} rules (snapshot v${snapshot.version})`));
    return snapshot;
  } catch (err) {
    spinner.fail(chalk.red('Failed to load rules'));
    throw err;
  }
}
