/**
 * Show command: Print one rule by SID.
 */

import type { Command } from 'commander';

import { formatRuleDetail } from '@/reporting/rule-reporter.js';
import { loadSnapshot, openRuleLens, type CommandOptionsBase, type OpenRuleLens } from '../context.js';
import { addJsonOption, parseInteger, printJson } from '../options.js';

export function registerShowCommand(program: Command, open: OpenRuleLens = openRuleLens): void {
  const cmd = program
    .command('show')
    .description('Show a single rule')
    .argument('<sid>', 'Rule SID', parseInteger);

  addJsonOption(cmd).action(async (sid: number, options: CommandOptionsBase) => {
    const lens = open();
    await loadSnapshot(lens, options.json);
    const rule = await lens.rules.getRule(sid);

    if (options.json) {
      printJson(rule);
      return;
    }

    console.log('');
    console.log(formatRuleDetail(rule));
    console.log('');
  });
}
