export type * from './rule.js';
export type * from './transform.js';
export type * from './config.js';
export { RULE_ACTIONS, SORT_KEYS, UNSET, isRuleAction } from './rule.js';
export { CRITERIA_OPERATORS, TRANSFORM_ACTION_TYPES } from './transform.js';
