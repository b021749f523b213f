/**
 * Stats command: Aggregate counts over the loaded rule set.
 */

import type { Command } from 'commander';

import { computeRuleStats } from '@/search/stats.js';
import { formatStats } from '@/reporting/rule-reporter.js';
import { loadSnapshot, openRuleLens, type CommandOptionsBase, type OpenRuleLens } from '../context.js';
import { addJsonOption, parseInteger, printHeader, printJson } from '../options.js';

interface StatsOptions extends CommandOptionsBase {
  top?: number;
}

export function registerStatsCommand(program: Command, open: OpenRuleLens = openRuleLens): void {
  const cmd = program
    .command('stats')
    .description('Show rule statistics')
    .option('--top <n>', 'Entries to show per breakdown', parseInteger, 10);

  addJsonOption(cmd).action(async (options: StatsOptions) => {
    const lens = open();
    if (!options.json) printHeader('Rule Statistics');

    const snapshot = await loadSnapshot(lens, options.json);
    const stats = computeRuleStats(snapshot.rules);

    if (options.json) {
      printJson(stats);
      return;
    }

    console.log('');
    console.log(formatStats(stats, options.top));
    console.log('');
  });
}
