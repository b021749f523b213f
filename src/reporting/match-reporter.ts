/**
 * Terminal renderer for dry-run match reports.
 *
 * Draws a box with the match totals, the per-source/category/action
 * breakdowns and the example matches, using box-drawing characters and
 * chalk colors.
 */

import chalk from 'chalk';

import type { MatchReport } from '@/types/transform.js';
import { rankCounts } from '@/search/stats.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Fixed width of the box interior (between the box edges). */
const BOX_WIDTH = 64;

/** Breakdown entries shown per section before collapsing the rest. */
const MAX_BREAKDOWN_ROWS = 8;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Format a match report as a colorized terminal box.
 */
export function formatMatchReport(report: MatchReport): string {
  const lines: string[] = [];

  lines.push(chalk.cyan(`╔${''.padStart(BOX_WIDTH, '═')}╗`));
  lines.push(formatCenteredLine(report.transformName ? `Dry run: ${report.transformName}` : 'Dry run'));
  if (report.transformId) {
    lines.push(formatLine(`Transform: ${report.transformId}`));
  }
  lines.push(separator());

  const rate = report.totalRules > 0 ? (report.totalMatched / report.totalRules) * 100 : 0;
  lines.push(
    formatLineRaw(
      `  Matched: ${chalk.bold(String(report.totalMatched))} of ${report.totalRules} rules (${rate.toFixed(1)}%)`,
    ),
  );

  const sections: [string, Record<string, number>][] = [
    ['BY SOURCE', report.breakdownBySource],
    ['BY CATEGORY', report.breakdownByCategory],
    ['BY ACTION', report.breakdownByAction],
  ];

  for (const [title, counts] of sections) {
    if (Object.keys(counts).length === 0) continue;
    lines.push(separator());
    lines.push(formatSectionHeader(title));
    const ranked = rankCounts(counts);
    for (const [key, count] of ranked.slice(0, MAX_BREAKDOWN_ROWS)) {
      lines.push(formatLine(`  ${truncate(key, BOX_WIDTH - 14).padEnd(BOX_WIDTH - 12)}${String(count).padStart(6)}`));
    }
    if (ranked.length > MAX_BREAKDOWN_ROWS) {
      lines.push(formatLineRaw(chalk.gray(`  … ${ranked.length - MAX_BREAKDOWN_ROWS} more`)));
    }
  }

  if (report.exampleMatches.length > 0) {
    lines.push(separator());
    lines.push(formatSectionHeader('EXAMPLE MATCHES'));
    for (const example of report.exampleMatches) {
      const sid = String(example.sid).padEnd(10);
      lines.push(formatLine(`  ${sid}${truncate(example.msg || '(no message)', BOX_WIDTH - 14)}`));
    }
  }

  if (report.warnings.length > 0) {
    lines.push(separator());
    lines.push(formatSectionHeader('WARNINGS'));
    for (const warning of report.warnings) {
      lines.push(formatLineRaw(chalk.yellow(`  ${truncate(warning, BOX_WIDTH - 4)}`)));
    }
  }

  lines.push(chalk.cyan(`╚${''.padStart(BOX_WIDTH, '═')}╝`));
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Formatting helpers
// ---------------------------------------------------------------------------

function separator(): string {
  return chalk.cyan(`╠${''.padStart(BOX_WIDTH, '═')}╣`);
}

export function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.substring(0, max - 1)}…`;
}

function formatLine(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${padded} ${chalk.cyan('║')}`;
}

/**
 * Pad a line that contains chalk-colored segments by its visible length.
 */
function formatLineRaw(text: string): string {
  const visibleLen = stripAnsi(text).length;
  const padding = ' '.repeat(Math.max(0, BOX_WIDTH - 2 - visibleLen));
  return `${chalk.cyan('║')} ${text}${padding} ${chalk.cyan('║')}`;
}

function formatCenteredLine(text: string): string {
  const content = truncate(text, BOX_WIDTH - 2);
  const totalPadding = BOX_WIDTH - 2 - content.length;
  const leftPad = Math.floor(totalPadding / 2);
  const padded = ' '.repeat(leftPad) + content + ' '.repeat(totalPadding - leftPad);
  return `${chalk.cyan('║')} ${chalk.bold.white(padded)} ${chalk.cyan('║')}`;
}

function formatSectionHeader(text: string): string {
  return `${chalk.cyan('║')} ${chalk.cyan.bold(text.padEnd(BOX_WIDTH - 2))} ${chalk.cyan('║')}`;
}

function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
