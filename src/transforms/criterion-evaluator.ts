/**
 * Evaluates a single field-based criterion against a rule.
 *
 * Criteria are compiled once (field accessor resolved, comparison values
 * case-folded, regex built) and then applied to any number of rules.
 */

import type { Rule } from '@/types/rule.js';
import type { Criterion } from '@/types/transform.js';
import { resolveField, type FieldAccessor } from './fields.js';
import { PatternError, ValidationError, errorMessage } from '@/utils/errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type ValuePredicate = (value: string | undefined) => boolean;

export interface CompiledCriterion {
  criterion: Criterion;
  /** Set when the regex failed to compile; the criterion then never matches. */
  patternError: PatternError | null;
  matches: (rule: Rule) => boolean;
}

// ---------------------------------------------------------------------------
// Compilation
// ---------------------------------------------------------------------------

const NEVER: ValuePredicate = () => false;

function toNumber(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

function buildPredicate(criterion: Criterion): { predicate: ValuePredicate; patternError: PatternError | null } {
  const fold = criterion.caseSensitive
    ? (s: string) => s
    : (s: string) => s.toLowerCase();

  switch (criterion.operator) {
    case 'contains': {
      const needle = fold(criterion.value);
      return { predicate: (v) => fold(v ?? '').includes(needle), patternError: null };
    }
    case 'exact_match': {
      const expected = fold(criterion.value);
      return { predicate: (v) => fold(v ?? '') === expected, patternError: null };
    }
    case 'regex': {
      let pattern: RegExp;
      try {
        pattern = new RegExp(criterion.value, criterion.caseSensitive ? '' : 'i');
      } catch (err) {
        return {
          predicate: NEVER,
          patternError: new PatternError(criterion.field, criterion.value, errorMessage(err)),
        };
      }
      return { predicate: (v) => pattern.test(v ?? ''), patternError: null };
    }
    case 'in_list':
    case 'not_in_list': {
      const candidates = new Set(criterion.value.map(fold));
      const negate = criterion.operator === 'not_in_list';
      return { predicate: (v) => candidates.has(fold(v ?? '')) !== negate, patternError: null };
    }
    case 'greater_than':
    case 'less_than': {
      const threshold = toNumber(criterion.value);
      if (threshold === null) return { predicate: NEVER, patternError: null };
      const greater = criterion.operator === 'greater_than';
      return {
        predicate: (v) => {
          const n = toNumber(v);
          if (n === null) return false;
          return greater ? n > threshold : n < threshold;
        },
        patternError: null,
      };
    }
    case 'exists':
      return { predicate: (v) => v !== undefined, patternError: null };
    case 'not_exists':
      return { predicate: (v) => v === undefined, patternError: null };
  }
}

/**
 * Compile a criterion for repeated evaluation.
 *
 * @throws ValidationError if the field is not one of the allowed fields.
 */
export function compileCriterion(criterion: Criterion): CompiledCriterion {
  const accessor: FieldAccessor | null = resolveField(criterion.field);
  if (!accessor) {
    throw new ValidationError(`Unknown criteria field "${criterion.field}"`);
  }

  const { predicate, patternError } = buildPredicate(criterion);

  return {
    criterion,
    patternError,
    matches: (rule) => predicate(accessor(rule)),
  };
}

/**
 * Check whether one rule satisfies one criterion. A malformed regex makes
 * the criterion match nothing.
 *
 * Expects a criterion that came out of `validateCriteria` or
 * `validateTransformInput`; a hand-built criterion naming an unknown field
 * throws ValidationError. Compile once with `compileCriterion` to evaluate
 * many rules.
 */
export function evaluateCriterion(rule: Rule, criterion: Criterion): boolean {
  return compileCriterion(criterion).matches(rule);
}
