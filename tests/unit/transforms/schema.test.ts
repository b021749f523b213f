/**
 * Unit tests for transform validation.
 */

import { describe, it, expect } from 'vitest';
import {
  criteriaList,
  parseStoredTransform,
  transformToDocument,
  validateCriteria,
  validateTransformInput,
} from '@/transforms/schema.js';
import { ValidationError } from '@/utils/errors.js';

function expectValidationError(fn: () => unknown, fragment: string): void {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(ValidationError);
  expect(caught instanceof ValidationError ? caught.message : '').toContain(fragment);
}

const validInput = {
  name: 'Tag FTP rules',
  criteria: [
    { field: 'msg', operator: 'contains', value: 'ftp' },
    { field: 'protocol', operator: 'exact_match', value: 'tcp', case_sensitive: true },
  ],
  actions: [{ action_type: 'add_metadata', key: 'team', value: 'netops' }],
};

describe('validateCriteria', () => {
  it('accepts a single criterion object', () => {
    expect(validateCriteria({ field: 'sid', operator: 'exact_match', value: 2100498 })).toEqual({
      kind: 'single',
      criterion: { field: 'sid', operator: 'exact_match', value: '2100498', caseSensitive: false },
    });
  });

  it('accepts a list of criteria', () => {
    const set = validateCriteria(validInput.criteria);
    expect(set.kind).toBe('all');
    expect(criteriaList(set)).toEqual([
      { field: 'msg', operator: 'contains', value: 'ftp', caseSensitive: false },
      { field: 'protocol', operator: 'exact_match', value: 'tcp', caseSensitive: true },
    ]);
  });

  it('accepts caseSensitive as well as case_sensitive', () => {
    const set = validateCriteria({ field: 'msg', operator: 'contains', value: 'x', caseSensitive: true });
    expect(criteriaList(set)[0].caseSensitive).toBe(true);
  });

  it('accepts presence operators without a value', () => {
    expect(criteriaList(validateCriteria({ field: 'classtype', operator: 'exists' }))).toEqual([
      { field: 'classtype', operator: 'exists', caseSensitive: false },
    ]);
  });

  it('rejects an unknown field', () => {
    expectValidationError(
      () => validateCriteria({ field: 'payload', operator: 'contains', value: 'x' }),
      'unknown field "payload"',
    );
  });

  it('rejects an unknown operator', () => {
    expectValidationError(
      () => validateCriteria({ field: 'msg', operator: 'startswith', value: 'x' }),
      'operator',
    );
  });

  it('rejects an empty in_list', () => {
    expectValidationError(
      () => validateCriteria({ field: 'action', operator: 'in_list', value: [] }),
      'in_list requires a non-empty list of values',
    );
  });

  it('rejects a missing value', () => {
    expectValidationError(
      () => validateCriteria({ field: 'msg', operator: 'contains' }),
      'contains requires a single value',
    );
  });

  it('rejects an empty contains value', () => {
    expectValidationError(
      () => validateCriteria({ field: 'msg', operator: 'contains', value: '' }),
      'contains requires a non-empty value',
    );
  });

  it('rejects a non-numeric threshold', () => {
    expectValidationError(
      () => validateCriteria({ field: 'priority', operator: 'less_than', value: 'high' }),
      'less_than requires a numeric value',
    );
  });

  it('rejects an empty criteria list', () => {
    expectValidationError(() => validateCriteria([]), 'at least one criterion is required');
  });

  it('keeps a malformed regex for the matcher to report', () => {
    const set = validateCriteria({ field: 'msg', operator: 'regex', value: '(' });
    expect(criteriaList(set)[0]).toEqual({ field: 'msg', operator: 'regex', value: '(', caseSensitive: false });
  });
});

describe('validateTransformInput', () => {
  it('applies defaults', () => {
    const input = validateTransformInput({
      name: 'Minimal',
      criteria: { field: 'action', operator: 'exact_match', value: 'alert' },
    });
    expect(input.enabled).toBe(true);
    expect(input.actions).toEqual([]);
  });

  it('normalizes actions', () => {
    const input = validateTransformInput(validInput);
    expect(input.actions).toEqual([{ actionType: 'add_metadata', key: 'team', value: 'netops' }]);
  });

  it('requires a name', () => {
    expectValidationError(
      () => validateTransformInput({ ...validInput, name: '  ' }),
      'name: name is required',
    );
  });

  it('rejects a metadata action without a key', () => {
    expectValidationError(
      () => validateTransformInput({ ...validInput, actions: [{ action_type: 'add_metadata', value: 'x' }] }),
      'add_metadata requires a metadata key',
    );
  });

  it('rejects metadata values that would break the option', () => {
    expectValidationError(
      () => validateTransformInput({
        ...validInput,
        actions: [{ action_type: 'modify_metadata', key: 'team', value: 'a;b' }],
      }),
      'modify_metadata requires a value without "," or ";"',
    );
  });

  it('requires an integer priority', () => {
    expectValidationError(
      () => validateTransformInput({ ...validInput, actions: [{ action_type: 'update_priority', value: 'high' }] }),
      'update_priority requires an integer value',
    );
  });

  it('requires a typed reference', () => {
    expectValidationError(
      () => validateTransformInput({ ...validInput, actions: [{ action_type: 'add_reference', value: 'example.com' }] }),
      'add_reference requires a "type,value" reference',
    );
  });

  it('collects every issue', () => {
    let caught: unknown;
    try {
      validateTransformInput({ name: '', criteria: [] });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught instanceof ValidationError ? caught.issues.length : 0).toBe(2);
  });
});

describe('stored transforms', () => {
  it('round-trips through the stored document', () => {
    const input = validateTransformInput({ ...validInput, description: 'FTP rules' });
    const transform = {
      ...input,
      id: 'transform-12345678',
      createdAt: '2024-03-01T10:00:00.000Z',
      updatedAt: '2024-03-02T10:00:00.000Z',
    };
    const document = JSON.parse(JSON.stringify(transformToDocument(transform)));
    expect(parseStoredTransform(document)).toEqual(transform);
  });

  it('writes a single criterion as an object', () => {
    const input = validateTransformInput({
      name: 'One',
      criteria: { field: 'action', operator: 'exact_match', value: 'drop' },
    });
    const doc = transformToDocument({ ...input, id: 't1', createdAt: 'x', updatedAt: 'x' });
    expect(doc.criteria).toEqual({ field: 'action', operator: 'exact_match', value: 'drop', caseSensitive: false });
    expect(doc).not.toHaveProperty('description');
  });

  it('rejects a document without an id', () => {
    expectValidationError(
      () => parseStoredTransform({ ...validInput, createdAt: 'x', updatedAt: 'x' }),
      'Invalid stored transform',
    );
  });
});
