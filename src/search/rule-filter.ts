/**
 * Rule filter pipeline: search, structured filters, sort, paginate.
 *
 * Order of operations:
 *   1. standard search over message, SID and tags
 *   2. raw search over the full rule text
 *   3. structured filters (OR within a field, AND across fields)
 *   4. sort with a SID-ascending tie-break
 *   5. slice out the requested 1-indexed page
 *
 * Pure and synchronous: the input rules are never mutated.
 */

import type { Rule, RuleFilters, RulePage, RuleQuery, SortKey, SortOrder } from '@/types/rule.js';
import { UNSET } from '@/types/rule.js';
import { parseQuery } from './query-parser.js';
import { createTextMatcher, rawSearchFields, standardSearchFields } from './text-matcher.js';
import { ValidationError } from '@/utils/errors.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 1000;

const UNSET_KEY = UNSET.toLowerCase();

type RulePredicate = (rule: Rule) => boolean;

// ---------------------------------------------------------------------------
// Structured filters
// ---------------------------------------------------------------------------

/**
 * Membership test for one multi-select filter. An empty selection accepts
 * every rule.
 */
function membership(selected: string[] | undefined, accessor: (rule: Rule) => string | undefined): RulePredicate | null {
  if (!selected || selected.length === 0) return null;
  const wanted = new Set(selected.map(v => v.toLowerCase()));

  return (rule) => {
    const value = accessor(rule);
    if (value === undefined || value === '') return wanted.has(UNSET_KEY);
    return wanted.has(value.toLowerCase());
  };
}

function buildFilterPredicates(filters: RuleFilters): RulePredicate[] {
  const predicates: (RulePredicate | null)[] = [
    membership(filters.action, r => r.action),
    membership(filters.protocol, r => r.protocol),
    membership(filters.classtype, r => r.classtype),
    membership(filters.source, r => r.source),
    membership(filters.category, r => r.category),
    membership(filters.priority, r => (r.priority === undefined ? undefined : String(r.priority))),
  ];

  const { enabled, sid, metadata } = filters;
  if (enabled && enabled.length > 0) {
    predicates.push(r => enabled.includes(r.enabled));
  }
  if (sid !== undefined) {
    predicates.push(r => r.sid === sid);
  }
  for (const [key, values] of Object.entries(metadata ?? {})) {
    predicates.push(membership(values, r => (Object.hasOwn(r.metadata, key) ? r.metadata[key] : undefined)));
  }

  return predicates.filter((p): p is RulePredicate => p !== null);
}

// ---------------------------------------------------------------------------
// Sorting
// ---------------------------------------------------------------------------

const NUMERIC_SORT_KEYS: Partial<Record<SortKey, (rule: Rule) => number | undefined>> = {
  sid: r => r.sid,
  priority: r => r.priority,
  rev: r => r.rev,
};

const TEXT_SORT_KEYS: Partial<Record<SortKey, (rule: Rule) => string | undefined>> = {
  msg: r => r.msg,
  action: r => r.action,
  protocol: r => r.protocol,
  source: r => r.source,
  category: r => r.category,
  classtype: r => r.classtype,
  severity: r => r.metadata.signature_severity,
};

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Build a comparator for the sort key. Rules without a numeric value sort
 * after those with one in either direction; ties break on SID ascending.
 */
export function buildComparator(by: SortKey, order: SortOrder): (a: Rule, b: Rule) => number {
  const direction = order === 'desc' ? -1 : 1;
  const numeric = NUMERIC_SORT_KEYS[by];
  const text = TEXT_SORT_KEYS[by];

  const primary = (a: Rule, b: Rule): number => {
    if (numeric) {
      const x = numeric(a);
      const y = numeric(b);
      if (x === undefined || y === undefined) {
        if (x === y) return 0;
        return x === undefined ? 1 : -1;
      }
      return (x - y) * direction;
    }
    if (text) {
      return compareText((text(a) ?? '').toLowerCase(), (text(b) ?? '').toLowerCase()) * direction;
    }
    return 0;
  };

  return (a, b) => primary(a, b) || a.sid - b.sid;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Select rules matching every filter without sorting or paging.
 */
export function selectRules(rules: readonly Rule[], query: Pick<RuleQuery, 'search' | 'rawSearch' | 'filters'>): Rule[] {
  const standard = createTextMatcher(parseQuery(query.search ?? ''));
  const raw = createTextMatcher(parseQuery(query.rawSearch ?? ''));
  const predicates = buildFilterPredicates(query.filters ?? {});

  return rules.filter(rule =>
    standard(standardSearchFields(rule)) &&
    raw(rawSearchFields(rule)) &&
    predicates.every(p => p(rule)),
  );
}

/**
 * Run the full pipeline and return one page of results.
 *
 * @throws ValidationError if `page` or `pageSize` is out of range.
 */
export function filterRules(rules: readonly Rule[], query: RuleQuery = {}): RulePage {
  const page = query.page ?? 1;
  const pageSize = query.pageSize ?? DEFAULT_PAGE_SIZE;

  if (!Number.isInteger(page) || page < 1) {
    throw new ValidationError(`page must be a positive integer. Got: ${page}`);
  }
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw new ValidationError(`pageSize must be an integer between 1 and ${MAX_PAGE_SIZE}. Got: ${pageSize}`);
  }

  const selected = selectRules(rules, query);
  selected.sort(buildComparator(query.sort?.by ?? 'msg', query.sort?.order ?? 'asc'));

  const start = (page - 1) * pageSize;

  return {
    rules: selected.slice(start, start + pageSize),
    total: selected.length,
    page,
    pageSize,
  };
}
