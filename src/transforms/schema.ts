/**
 * Zod schemas for transform definitions.
 *
 * Accepts the JSON/YAML shape users write (criteria as one object or an
 * array, `case_sensitive`/`caseSensitive`, `action_type`/`actionType`) and
 * produces the typed model with criteria as a tagged variant. Every
 * structural problem is a ValidationError raised here, before any rule is
 * evaluated.
 */

import { z } from 'zod';
import {
  CRITERIA_OPERATORS,
  TRANSFORM_ACTION_TYPES,
  type CriteriaSet,
  type Criterion,
  type Transform,
  type TransformAction,
  type TransformInput,
} from '@/types/transform.js';
import { isAllowedField, PLAIN_FIELDS } from './fields.js';
import { ValidationError } from '@/utils/errors.js';

// ---------------------------------------------------------------------------
// Criteria
// ---------------------------------------------------------------------------

const ScalarSchema = z.union([z.string(), z.number()]).transform(String);

const CriterionInputSchema = z
  .object({
    field: z.string().min(1, 'field is required'),
    operator: z.enum(CRITERIA_OPERATORS),
    value: z.union([ScalarSchema, z.array(ScalarSchema)]).nullish(),
    caseSensitive: z.boolean().optional(),
    case_sensitive: z.boolean().optional(),
  })
  .transform((input, ctx): Criterion => {
    const caseSensitive = input.caseSensitive ?? input.case_sensitive ?? false;
    const { field, operator, value } = input;

    if (!isAllowedField(field)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['field'],
        message: `unknown field "${field}" (allowed: ${PLAIN_FIELDS.join(', ')}, metadata.<key>)`,
      });
      return z.NEVER;
    }

    switch (operator) {
      case 'exists':
      case 'not_exists':
        return { field, operator, caseSensitive };

      case 'in_list':
      case 'not_in_list':
        if (!Array.isArray(value) || value.length === 0) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['value'],
            message: `${operator} requires a non-empty list of values`,
          });
          return z.NEVER;
        }
        return { field, operator, value, caseSensitive };

      default: {
        if (value === null || value === undefined || Array.isArray(value)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['value'],
            message: `${operator} requires a single value`,
          });
          return z.NEVER;
        }
        if ((operator === 'contains' || operator === 'regex') && value === '') {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['value'],
            message: `${operator} requires a non-empty value`,
          });
          return z.NEVER;
        }
        if ((operator === 'greater_than' || operator === 'less_than') && !Number.isFinite(Number(value))) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['value'],
            message: `${operator} requires a numeric value`,
          });
          return z.NEVER;
        }
        return { field, operator, value, caseSensitive };
      }
    }
  });

const CriterionListSchema = z.array(CriterionInputSchema).min(1, 'at least one criterion is required');

/** One criterion object, or a non-empty list of them. */
export const CriteriaSetSchema = z.unknown().transform((input, ctx): CriteriaSet => {
  const result = Array.isArray(input)
    ? CriterionListSchema.safeParse(input)
    : CriterionInputSchema.safeParse(input);

  if (!result.success) {
    for (const issue of result.error.issues) ctx.addIssue(issue);
    return z.NEVER;
  }

  const parsed = result.data;
  return Array.isArray(parsed)
    ? { kind: 'all', criteria: parsed }
    : { kind: 'single', criterion: parsed };
});

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

const METADATA_KEY = /^[A-Za-z0-9_.-]+$/;

const ActionInputSchema = z
  .object({
    actionType: z.enum(TRANSFORM_ACTION_TYPES).optional(),
    action_type: z.enum(TRANSFORM_ACTION_TYPES).optional(),
    key: z.string().nullish(),
    value: ScalarSchema,
  })
  .transform((input, ctx): TransformAction => {
    const actionType = input.actionType ?? input.action_type;
    if (!actionType) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['action_type'], message: 'action_type is required' });
      return z.NEVER;
    }

    const value = input.value.trim();
    const key = input.key ?? undefined;

    if (actionType === 'add_metadata' || actionType === 'modify_metadata') {
      if (!key || !METADATA_KEY.test(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['key'],
          message: `${actionType} requires a metadata key of letters, digits, "_", "." or "-"`,
        });
        return z.NEVER;
      }
      if (value === '' || /[,;]/.test(value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['value'],
          message: `${actionType} requires a value without "," or ";"`,
        });
        return z.NEVER;
      }
      return { actionType, key, value };
    }

    if (actionType === 'update_priority' && !/^\d+$/.test(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['value'], message: 'update_priority requires an integer value' });
      return z.NEVER;
    }

    if (actionType === 'add_reference' && (!/^[^,;]+,[^;]+$/.test(value))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['value'], message: 'add_reference requires a "type,value" reference' });
      return z.NEVER;
    }

    if (actionType === 'add_tag' && value === '') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['value'], message: 'add_tag requires a non-empty tag' });
      return z.NEVER;
    }

    return key === undefined ? { actionType, value } : { actionType, key, value };
  });

// ---------------------------------------------------------------------------
// Transforms
// ---------------------------------------------------------------------------

export const TransformInputSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  description: z.string().optional(),
  enabled: z.boolean().default(true),
  criteria: CriteriaSetSchema,
  actions: z.array(ActionInputSchema).default([]),
});

export const StoredTransformSchema = TransformInputSchema.extend({
  id: z.string().min(1),
  createdAt: z.string(),
  updatedAt: z.string(),
});

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validate a criteria definition (one criterion or a list).
 *
 * @throws ValidationError
 */
export function validateCriteria(input: unknown): CriteriaSet {
  const result = CriteriaSetSchema.safeParse(input);
  if (!result.success) throw ValidationError.fromZod(result.error, 'criteria');
  return result.data;
}

/**
 * Validate a transform definition as submitted by a user.
 *
 * @throws ValidationError
 */
export function validateTransformInput(input: unknown): TransformInput {
  const result = TransformInputSchema.safeParse(input);
  if (!result.success) throw ValidationError.fromZod(result.error, 'transform');
  return result.data;
}

/**
 * Validate a persisted transform document.
 *
 * @throws ValidationError
 */
export function parseStoredTransform(input: unknown): Transform {
  const result = StoredTransformSchema.safeParse(input);
  if (!result.success) throw ValidationError.fromZod(result.error, 'stored transform');
  return result.data;
}

/** Flatten a criteria set back to its document form (object or array). */
export function criteriaToDocument(criteria: CriteriaSet): Criterion | Criterion[] {
  return criteria.kind === 'single' ? criteria.criterion : criteria.criteria;
}

/** The JSON document persisted for a transform. */
export function transformToDocument(transform: Transform): Record<string, unknown> {
  return {
    id: transform.id,
    name: transform.name,
    ...(transform.description !== undefined ? { description: transform.description } : {}),
    enabled: transform.enabled,
    criteria: criteriaToDocument(transform.criteria),
    actions: transform.actions,
    createdAt: transform.createdAt,
    updatedAt: transform.updatedAt,
  };
}

/** List the criteria of a set in evaluation order. */
export function criteriaList(criteria: CriteriaSet): Criterion[] {
  return criteria.kind === 'single' ? [criteria.criterion] : criteria.criteria;
}
