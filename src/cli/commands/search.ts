/**
 * Search command: Filter, sort and page through the loaded rules.
 *
 * `-q` takes the standard query language (terms, "quoted phrases",
 * !exclusions) matched against message, SID and tags; `-r` applies the
 * same language to the full rule text.
 */

import type { Command } from 'commander';

import type { RuleFilters, RuleQuery, SortKey, SortOrder } from '@/types/rule.js';
import { filterRules } from '@/search/rule-filter.js';
import { formatRulePage } from '@/reporting/rule-reporter.js';
import { loadSnapshot, openRuleLens, type OpenRuleLens } from '../context.js';
import {
  addJsonOption,
  collectBooleans,
  collectList,
  collectMeta,
  parseInteger,
  parseSortKey,
  parseSortOrder,
  printHeader,
  printJson,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SearchOptions {
  query?: string;
  raw?: string;
  action?: string[];
  protocol?: string[];
  classtype?: string[];
  source?: string[];
  category?: string[];
  priority?: string[];
  enabled?: boolean[];
  sid?: number;
  meta?: Record<string, string[]>;
  sort?: SortKey;
  order?: SortOrder;
  page?: number;
  pageSize?: number;
  json?: boolean;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerSearchCommand(program: Command, open: OpenRuleLens = openRuleLens): void {
  const cmd = program
    .command('search')
    .description('Search and filter rules')
    .option('-q, --query <query>', 'Search message, SID and tags')
    .option('-r, --raw <query>', 'Search the full rule text')
    .option('--action <list>', 'Filter by action (repeatable, comma-separated)', collectList)
    .option('--protocol <list>', 'Filter by protocol', collectList)
    .option('--classtype <list>', 'Filter by classtype', collectList)
    .option('--source <list>', 'Filter by source', collectList)
    .option('--category <list>', 'Filter by category', collectList)
    .option('--priority <list>', 'Filter by priority', collectList)
    .option('--enabled <list>', 'Filter by enabled state (true/false)', collectBooleans)
    .option('--sid <sid>', 'Only the rule with this SID', parseInteger)
    .option('--meta <key=value>', 'Filter by metadata value (repeatable)', collectMeta)
    .option('--sort <key>', 'Sort key', parseSortKey)
    .option('--order <order>', 'Sort order: asc, desc', parseSortOrder)
    .option('--page <n>', 'Page number (1-indexed)', parseInteger)
    .option('--page-size <n>', 'Rules per page', parseInteger);

  addJsonOption(cmd).action(async (options: SearchOptions) => {
    await runSearch(options, open);
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

/**
 * Translate CLI options into a RuleQuery.
 */
export function buildRuleQuery(options: SearchOptions, defaultPageSize: number): RuleQuery {
  const filters: RuleFilters = {
    action: options.action,
    protocol: options.protocol,
    classtype: options.classtype,
    source: options.source,
    category: options.category,
    priority: options.priority,
    enabled: options.enabled,
    sid: options.sid,
    metadata: options.meta,
  };

  return {
    search: options.query,
    rawSearch: options.raw,
    filters,
    sort: { by: options.sort, order: options.order },
    page: options.page ?? 1,
    pageSize: options.pageSize ?? defaultPageSize,
  };
}

async function runSearch(options: SearchOptions, open: OpenRuleLens): Promise<void> {
  const lens = open();
  const query = buildRuleQuery(options, lens.config.pageSize);

  if (!options.json) printHeader('Rule Search');

  const snapshot = await loadSnapshot(lens, options.json);
  const page = filterRules(snapshot.rules, query);

  if (options.json) {
    printJson(page);
    return;
  }

  console.log('');
  console.log(formatRulePage(page));
  console.log('');
}
