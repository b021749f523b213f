/**
 * Unit tests for the error classes.
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { NotFoundError, PatternError, ValidationError, errorMessage } from '@/utils/errors.js';

describe('ValidationError', () => {
  it('converts zod issues with their paths', () => {
    const result = z.object({ name: z.string(), count: z.number().min(1) }).safeParse({ count: 0 });
    expect(result.success).toBe(false);
    if (result.success) return;

    const err = ValidationError.fromZod(result.error, 'widget');
    expect(err.name).toBe('ValidationError');
    expect(err.issues).toEqual(['name: Required', 'count: Number must be greater than or equal to 1']);
    expect(err.message).toBe('Invalid widget: name: Required; count: Number must be greater than or equal to 1');
  });

  it('uses the message as the only issue by default', () => {
    expect(new ValidationError('bad page').issues).toEqual(['bad page']);
  });
});

describe('PatternError', () => {
  it('names the field and pattern', () => {
    const err = new PatternError('msg', '(', 'Unterminated group');
    expect(err.message).toBe('Invalid regex for field "msg": /(/ (Unterminated group)');
  });
});

describe('NotFoundError', () => {
  it('describes rules and transforms', () => {
    expect(new NotFoundError('rule', 42).message).toBe('Rule with SID 42 not found');
    expect(new NotFoundError('transform', 'transform-1').message).toBe('Transform transform-1 not found');
  });
});

describe('errorMessage', () => {
  it('handles errors and other values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
