/**
 * RuleLens: search, filter and transform Suricata rule sets.
 */

export * from '@/types/index.js';
export * from '@/search/index.js';
export * from '@/transforms/index.js';
export { parseRuleLine, parseRuleFile, renderRule, extractCategory, parseMetadata, extractTags } from '@/parsing/rule-parser.js';
export type { ParseContext } from '@/parsing/rule-parser.js';
export { loadSourcesConfig, parseSourcesConfig, loadRulesFromSources, collectRuleFiles } from '@/loading/sources.js';
export { RuleStore, buildSnapshot } from '@/loading/rule-store.js';
export type { RuleSnapshot, RuleStoreOptions } from '@/loading/rule-store.js';
export { loadConfig } from '@/config.js';
export { createRuleLens } from '@/rulelens.js';
export type { RuleLens } from '@/rulelens.js';
export { ValidationError, PatternError, NotFoundError } from '@/utils/errors.js';
export { createLogger, setLogLevel } from '@/utils/logger.js';
export type { Logger, LogLevel } from '@/utils/logger.js';
export * from '@/reporting/index.js';
