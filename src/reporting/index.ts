/**
 * Terminal formatters for rule pages, rule details, statistics and
 * dry-run reports.
 */

export { formatMatchReport, truncate } from './match-reporter.js';
export { formatRuleDetail, formatRuleLine, formatRulePage, formatStats } from './rule-reporter.js';
