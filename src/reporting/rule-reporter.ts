/**
 * Terminal output for rule search results, single rules and statistics.
 */

import chalk from 'chalk';

import type { CountMap, Rule, RulePage, RuleStats } from '@/types/rule.js';
import { rankCounts } from '@/search/stats.js';
import { truncate } from './match-reporter.js';

const MSG_WIDTH = 80;

function colorAction(action: Rule['action']): string {
  const label = action.padEnd(6);
  switch (action) {
    case 'alert':
      return chalk.yellow(label);
    case 'drop':
    case 'reject':
      return chalk.red(label);
    case 'pass':
      return chalk.green(label);
  }
}

/**
 * One line per rule: SID, action, protocol, message, then source/category.
 * Disabled rules are dimmed.
 */
export function formatRuleLine(rule: Rule): string {
  const origin = [rule.source, rule.category].filter(Boolean).join(' / ');
  const line =
    `  ${String(rule.sid).padEnd(10)} ${colorAction(rule.action)} ${rule.protocol.padEnd(6)} ` +
    `${truncate(rule.msg || '(no message)', MSG_WIDTH)}` +
    (origin ? chalk.gray(`  [${origin}]`) : '');
  return rule.enabled ? line : chalk.dim(`${line} (disabled)`);
}

export function formatRulePage(page: RulePage): string {
  if (page.total === 0) {
    return chalk.yellow('  No rules matched.');
  }

  const first = (page.page - 1) * page.pageSize + 1;
  const last = first + page.rules.length - 1;
  const lines: string[] = [];

  if (page.rules.length === 0) {
    lines.push(chalk.yellow(`  Page ${page.page} is past the end of ${page.total} result(s).`));
  } else {
    lines.push(chalk.cyan(`  Showing ${first}-${last} of ${page.total} (page ${page.page})`));
    lines.push('');
    lines.push(...page.rules.map(formatRuleLine));
  }

  return lines.join('\n');
}

export function formatRuleDetail(rule: Rule): string {
  const rows: [string, string][] = [
    ['SID', String(rule.sid)],
    ['Message', rule.msg || '(no message)'],
    ['Action', rule.action],
    ['Protocol', rule.protocol],
    ['Header', `${rule.srcIp} ${rule.srcPort} ${rule.direction} ${rule.dstIp} ${rule.dstPort}`],
    ['Classtype', rule.classtype ?? 'N/A'],
    ['Priority', rule.priority === undefined ? 'N/A' : String(rule.priority)],
    ['Revision', rule.rev === undefined ? 'N/A' : String(rule.rev)],
    ['Category', rule.category ?? 'N/A'],
    ['Source', rule.sourceFile ? `${rule.source ?? 'N/A'} (${rule.sourceFile})` : rule.source ?? 'N/A'],
    ['Enabled', rule.enabled ? 'yes' : 'no'],
  ];

  const lines = rows.map(([label, value]) => `  ${chalk.cyan(label.padEnd(10))} ${value}`);

  if (rule.references.length > 0) {
    lines.push(`  ${chalk.cyan('References')}`);
    lines.push(...rule.references.map(r => `    - ${r}`));
  }

  const metadata = Object.entries(rule.metadata);
  if (metadata.length > 0) {
    lines.push(`  ${chalk.cyan('Metadata')}`);
    lines.push(...metadata.map(([key, value]) => `    ${key}: ${value}`));
  }

  lines.push('');
  lines.push(chalk.gray(`  ${rule.raw}`));
  return lines.join('\n');
}

function formatCounts(title: string, counts: CountMap, limit: number): string[] {
  const ranked = rankCounts(counts);
  const lines = [chalk.bold(`  ${title}`)];
  for (const [key, count] of ranked.slice(0, limit)) {
    lines.push(`    ${key.padEnd(40)} ${String(count).padStart(7)}`);
  }
  if (ranked.length > limit) {
    lines.push(chalk.gray(`    … ${ranked.length - limit} more`));
  }
  return lines;
}

/**
 * Format aggregate statistics, showing the `limit` largest entries of each
 * breakdown.
 */
export function formatStats(stats: RuleStats, limit = 10): string {
  const lines: string[] = [chalk.cyan(`  Total rules: ${stats.totalRules}`), ''];

  const sections: [string, CountMap][] = [
    ['Actions', stats.actions],
    ['Protocols', stats.protocols],
    ['Sources', stats.sources],
    ['Categories', stats.categories],
    ['Classtypes', stats.classtypes],
    ['Priorities', stats.priorities],
    ['Enabled', stats.enabledStatus],
  ];

  for (const [title, counts] of sections) {
    lines.push(...formatCounts(title, counts, limit), '');
  }

  for (const key of Object.keys(stats.metadata).sort()) {
    lines.push(...formatCounts(`metadata.${key}`, stats.metadata[key], limit), '');
  }

  return lines.join('\n').trimEnd();
}
