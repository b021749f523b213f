/**
 * Transform matching and dry-run reporting.
 *
 * A rule matches a criteria set when every criterion matches (AND). The
 * result does not depend on criterion order; evaluation stops at the first
 * failing criterion.
 */

import type { Rule } from '@/types/rule.js';
import type { CriteriaSet, ExampleMatch, MatchReport, Transform } from '@/types/transform.js';
import { compileCriterion, type CompiledCriterion } from './criterion-evaluator.js';
import { criteriaList } from './schema.js';
import type { PatternError } from '@/utils/errors.js';
import { Tally } from '@/utils/counts.js';

export const DEFAULT_EXAMPLE_LIMIT = 10;

export interface ReportOptions {
  /** Maximum number of example matches to include. Default: 10. */
  exampleLimit?: number;
}

// ---------------------------------------------------------------------------
// CriteriaMatcher
// ---------------------------------------------------------------------------

/**
 * A criteria set compiled once for evaluation against many rules.
 */
export class CriteriaMatcher {
  private readonly compiled: CompiledCriterion[];

  constructor(criteria: CriteriaSet) {
    this.compiled = criteriaList(criteria).map(compileCriterion);
  }

  /** Regex criteria that failed to compile, one entry per criterion. */
  get patternErrors(): PatternError[] {
    return this.compiled
      .map(c => c.patternError)
      .filter((e): e is PatternError => e !== null);
  }

  matches(rule: Rule): boolean {
    return this.compiled.every(c => c.matches(rule));
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function matchCriteria(rule: Rule, criteria: CriteriaSet): boolean {
  return new CriteriaMatcher(criteria).matches(rule);
}

export function evaluateTransform(rule: Rule, transform: Transform): boolean {
  return matchCriteria(rule, transform.criteria);
}

function isTransform(target: CriteriaSet | Transform): target is Transform {
  return 'id' in target;
}

/**
 * Evaluate a transform (or an ad-hoc criteria set) against a rule set
 * without modifying anything.
 *
 * Breakdowns count matched rules only. Example matches keep rule-set order.
 */
export function buildReport(
  rules: readonly Rule[],
  target: CriteriaSet | Transform,
  options: ReportOptions = {},
): MatchReport {
  const { exampleLimit = DEFAULT_EXAMPLE_LIMIT } = options;
  const criteria = isTransform(target) ? target.criteria : target;
  const matcher = new CriteriaMatcher(criteria);

  const bySource = new Tally();
  const byCategory = new Tally();
  const byAction = new Tally();
  const exampleMatches: ExampleMatch[] = [];
  let totalMatched = 0;

  for (const rule of rules) {
    if (!matcher.matches(rule)) continue;

    totalMatched++;
    bySource.add(rule.source);
    byCategory.add(rule.category);
    byAction.add(rule.action);

    if (exampleMatches.length < exampleLimit) {
      exampleMatches.push({
        sid: rule.sid,
        msg: rule.msg,
        source: rule.source,
        category: rule.category,
      });
    }
  }

  return {
    ...(isTransform(target) ? { transformId: target.id, transformName: target.name } : {}),
    totalRules: rules.length,
    totalMatched,
    breakdownBySource: bySource.toCountMap(),
    breakdownByCategory: byCategory.toCountMap(),
    breakdownByAction: byAction.toCountMap(),
    exampleMatches,
    warnings: matcher.patternErrors.map(e => e.message),
  };
}
