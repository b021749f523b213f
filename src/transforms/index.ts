export { FIELD_ACCESSORS, PLAIN_FIELDS, isAllowedField, resolveField } from './fields.js';
export type { FieldAccessor, PlainField } from './fields.js';
export { compileCriterion, evaluateCriterion } from './criterion-evaluator.js';
export type { CompiledCriterion } from './criterion-evaluator.js';
export {
  CriteriaMatcher,
  DEFAULT_EXAMPLE_LIMIT,
  buildReport,
  evaluateTransform,
  matchCriteria,
} from './transform-matcher.js';
export type { ReportOptions } from './transform-matcher.js';
export {
  CriteriaSetSchema,
  StoredTransformSchema,
  TransformInputSchema,
  criteriaList,
  criteriaToDocument,
  parseStoredTransform,
  transformToDocument,
  validateCriteria,
  validateTransformInput,
} from './schema.js';
export { applyActions, applyEnabledTransforms, applyTransform } from './actions.js';
export { TransformRepository, generateTransformId } from './repository.js';
