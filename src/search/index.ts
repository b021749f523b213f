export { parseQuery, isEmptyQuery, formatQuery } from './query-parser.js';
export {
  buildHaystack,
  createTextMatcher,
  matchesQuery,
  rawSearchFields,
  standardSearchFields,
} from './text-matcher.js';
export type { SearchField, TextMatcher } from './text-matcher.js';
export {
  filterRules,
  selectRules,
  buildComparator,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
} from './rule-filter.js';
export { computeRuleStats, rankCounts } from './stats.js';
