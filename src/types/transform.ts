/**
 * Transform types: match criteria, actions, persisted transforms and
 * dry-run reports.
 */

import type { CountMap } from './rule.js';

// --- Criteria ---

export const CRITERIA_OPERATORS = [
  'contains',
  'exact_match',
  'regex',
  'in_list',
  'not_in_list',
  'greater_than',
  'less_than',
  'exists',
  'not_exists',
] as const;

export type CriteriaOperator = (typeof CRITERIA_OPERATORS)[number];

export type ValueOperator = 'contains' | 'exact_match' | 'regex' | 'greater_than' | 'less_than';
export type ListOperator = 'in_list' | 'not_in_list';
export type PresenceOperator = 'exists' | 'not_exists';

interface CriterionBase {
  /** Field identifier, e.g. `msg` or `metadata.signature_severity`. */
  field: string;
  caseSensitive: boolean;
}

export interface ValueCriterion extends CriterionBase {
  operator: ValueOperator;
  value: string;
}

export interface ListCriterion extends CriterionBase {
  operator: ListOperator;
  value: string[];
}

export interface PresenceCriterion extends CriterionBase {
  operator: PresenceOperator;
}

export type Criterion = ValueCriterion | ListCriterion | PresenceCriterion;

/** One criterion, or several combined with AND. */
export type CriteriaSet =
  | { kind: 'single'; criterion: Criterion }
  | { kind: 'all'; criteria: Criterion[] };

// --- Actions ---

export const TRANSFORM_ACTION_TYPES = [
  'add_metadata',
  'modify_metadata',
  'update_priority',
  'add_reference',
  'add_tag',
] as const;

export type TransformActionType = (typeof TRANSFORM_ACTION_TYPES)[number];

export interface TransformAction {
  actionType: TransformActionType;
  key?: string;
  value: string;
}

// --- Transforms ---

export interface TransformInput {
  name: string;
  description?: string;
  enabled: boolean;
  criteria: CriteriaSet;
  actions: TransformAction[];
}

export interface Transform extends TransformInput {
  id: string;
  createdAt: string;
  updatedAt: string;
}

// --- Dry-run reports ---

export interface ExampleMatch {
  sid: number;
  msg: string;
  source?: string;
  category?: string;
}

export interface MatchReport {
  transformId?: string;
  transformName?: string;
  totalRules: number;
  totalMatched: number;
  breakdownBySource: CountMap;
  breakdownByCategory: CountMap;
  breakdownByAction: CountMap;
  exampleMatches: ExampleMatch[];
  /** One entry per regex criterion whose pattern failed to compile. */
  warnings: string[];
}
