/**
 * Rule record types shared by the parser, the search pipeline and the
 * transform engine.
 */

// --- Suricata rule ---

export const RULE_ACTIONS = ['alert', 'drop', 'reject', 'pass'] as const;

export type RuleAction = (typeof RULE_ACTIONS)[number];

export type RuleDirection = '->' | '<>' | '<-';

export interface RuleOption {
  keyword: string;
  value?: string;
}

/**
 * One parsed Suricata signature. Every field except `source`, `sourceFile`
 * and `enabled` is derived from `raw`.
 */
export interface Rule {
  sid: number;
  action: RuleAction;
  protocol: string;
  srcIp: string;
  srcPort: string;
  direction: string;
  dstIp: string;
  dstPort: string;
  msg: string;
  classtype?: string;
  priority?: number;
  rev?: number;
  references: string[];
  metadata: Record<string, string>;
  options: RuleOption[];
  tags: string[];
  category?: string;
  source?: string;
  sourceFile?: string;
  enabled: boolean;
  raw: string;
}

export function isRuleAction(value: string): value is RuleAction {
  return RULE_ACTIONS.some(a => a === value);
}

// --- Search ---

export type QueryTermKind = 'literal' | 'phrase';

export interface QueryTerm {
  text: string;
  kind: QueryTermKind;
}

export interface ParsedQuery {
  /** Positive terms, OR'd together. Empty means "match everything". */
  requiredAny: QueryTerm[];
  /** Negated terms. A match must avoid all of them. */
  forbidden: QueryTerm[];
}

export const SORT_KEYS = [
  'sid',
  'msg',
  'priority',
  'rev',
  'action',
  'protocol',
  'source',
  'category',
  'classtype',
  'severity',
] as const;

export type SortKey = (typeof SORT_KEYS)[number];

export type SortOrder = 'asc' | 'desc';

export interface SortSpec {
  by: SortKey;
  order: SortOrder;
}

/**
 * Structured filters. Multi-value fields are OR'd within a field and AND'd
 * across fields. The value `"(unset)"` selects rules with no value.
 */
export interface RuleFilters {
  action?: string[];
  protocol?: string[];
  classtype?: string[];
  source?: string[];
  category?: string[];
  priority?: string[];
  enabled?: boolean[];
  sid?: number;
  metadata?: Record<string, string[]>;
}

export interface RuleQuery {
  search?: string;
  rawSearch?: string;
  filters?: RuleFilters;
  sort?: Partial<SortSpec>;
  page?: number;
  pageSize?: number;
}

export interface RulePage {
  rules: Rule[];
  total: number;
  page: number;
  pageSize: number;
}

// --- Statistics ---

export type CountMap = Record<string, number>;

export interface RuleStats {
  totalRules: number;
  actions: CountMap;
  protocols: CountMap;
  classtypes: CountMap;
  sources: CountMap;
  categories: CountMap;
  priorities: CountMap;
  enabledStatus: CountMap;
  metadata: Record<string, CountMap>;
}

/** Placeholder key for empty or missing values in breakdowns and filters. */
export const UNSET = '(unset)';
