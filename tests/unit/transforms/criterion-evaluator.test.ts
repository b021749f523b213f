/**
 * Unit tests for the criterion evaluator.
 */

import { describe, it, expect } from 'vitest';
import { compileCriterion, evaluateCriterion } from '@/transforms/criterion-evaluator.js';
import type { Rule } from '@/types/rule.js';
import type { Criterion } from '@/types/transform.js';
import { PatternError, ValidationError } from '@/utils/errors.js';

// ---------------------------------------------------------------------------
// Fixture Builders
// ---------------------------------------------------------------------------

function makeRule(overrides: Partial<Rule> = {}): Rule {
  return {
    sid: 2100498,
    action: 'alert',
    protocol: 'tcp',
    srcIp: '$HOME_NET',
    srcPort: 'any',
    direction: '->',
    dstIp: '$EXTERNAL_NET',
    dstPort: '21',
    msg: 'Malicious FTP Activity',
    classtype: 'misc-activity',
    priority: 2,
    rev: 7,
    references: ['url,example.com/ftp'],
    metadata: { signature_severity: 'Major', flag: '' },
    options: [],
    tags: ['malicious', 'activity'],
    category: 'MALICIOUS',
    source: 'et-open',
    enabled: true,
    raw: 'alert tcp $HOME_NET any -> $EXTERNAL_NET 21 (msg:"Malicious FTP Activity"; sid:2100498; rev:7;)',
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('evaluateCriterion', () => {
  const rule = makeRule();

  describe('contains', () => {
    it('matches case-insensitively by default', () => {
      const c: Criterion = { field: 'msg', operator: 'contains', value: 'FTP', caseSensitive: false };
      expect(evaluateCriterion(rule, c)).toBe(true);
    });

    it('respects case_sensitive', () => {
      const c: Criterion = { field: 'msg', operator: 'contains', value: 'ftp', caseSensitive: true };
      expect(evaluateCriterion(rule, c)).toBe(false);
    });

    it('treats a missing metadata key as empty text', () => {
      const c: Criterion = { field: 'metadata.deployment', operator: 'contains', value: 'x', caseSensitive: false };
      expect(evaluateCriterion(rule, c)).toBe(false);
    });
  });

  describe('exact_match', () => {
    it('requires full equality', () => {
      const full: Criterion = { field: 'protocol', operator: 'exact_match', value: 'TCP', caseSensitive: false };
      const partial: Criterion = { field: 'protocol', operator: 'exact_match', value: 'tc', caseSensitive: false };
      expect(evaluateCriterion(rule, full)).toBe(true);
      expect(evaluateCriterion(rule, partial)).toBe(false);
    });

    it('compares numeric fields as text', () => {
      const c: Criterion = { field: 'sid', operator: 'exact_match', value: '2100498', caseSensitive: false };
      expect(evaluateCriterion(rule, c)).toBe(true);
    });

    it('looks up metadata keys', () => {
      const c: Criterion = { field: 'metadata.signature_severity', operator: 'exact_match', value: 'major', caseSensitive: false };
      expect(evaluateCriterion(rule, c)).toBe(true);
    });

    it('matches an empty value against a missing field', () => {
      const c: Criterion = { field: 'metadata.missing', operator: 'exact_match', value: '', caseSensitive: false };
      expect(evaluateCriterion(rule, c)).toBe(true);
    });
  });

  describe('regex', () => {
    it('is case-insensitive unless requested otherwise', () => {
      const insensitive: Criterion = { field: 'msg', operator: 'regex', value: '^malicious\\s+ftp', caseSensitive: false };
      const sensitive: Criterion = { field: 'msg', operator: 'regex', value: '^malicious', caseSensitive: true };
      expect(evaluateCriterion(rule, insensitive)).toBe(true);
      expect(evaluateCriterion(rule, sensitive)).toBe(false);
    });

    it('gives the same answer on repeated evaluation', () => {
      const compiled = compileCriterion({ field: 'msg', operator: 'regex', value: 'ftp', caseSensitive: false });
      expect(compiled.matches(rule)).toBe(true);
      expect(compiled.matches(rule)).toBe(true);
    });

    it('turns a malformed pattern into a criterion that matches nothing', () => {
      const compiled = compileCriterion({ field: 'msg', operator: 'regex', value: '([a-z', caseSensitive: false });
      expect(compiled.matches(rule)).toBe(false);
      expect(compiled.patternError).toBeInstanceOf(PatternError);
      expect(compiled.patternError?.field).toBe('msg');
      expect(compiled.patternError?.pattern).toBe('([a-z');
    });

    it('does not throw for a malformed pattern', () => {
      const c: Criterion = { field: 'msg', operator: 'regex', value: '*', caseSensitive: false };
      expect(() => evaluateCriterion(rule, c)).not.toThrow();
      expect(evaluateCriterion(rule, c)).toBe(false);
    });
  });

  describe('in_list and not_in_list', () => {
    it('matches any candidate under the case rule', () => {
      const c: Criterion = { field: 'action', operator: 'in_list', value: ['DROP', 'ALERT'], caseSensitive: false };
      expect(evaluateCriterion(rule, c)).toBe(true);
      expect(evaluateCriterion(rule, { ...c, caseSensitive: true })).toBe(false);
    });

    it('negates membership', () => {
      const c: Criterion = { field: 'source', operator: 'not_in_list', value: ['local', 'custom'], caseSensitive: false };
      expect(evaluateCriterion(rule, c)).toBe(true);
      expect(evaluateCriterion(makeRule({ source: 'local' }), c)).toBe(false);
    });
  });

  describe('greater_than and less_than', () => {
    it('compares numerically', () => {
      const gt: Criterion = { field: 'rev', operator: 'greater_than', value: '5', caseSensitive: false };
      const lt: Criterion = { field: 'priority', operator: 'less_than', value: '2', caseSensitive: false };
      expect(evaluateCriterion(rule, gt)).toBe(true);
      expect(evaluateCriterion(rule, lt)).toBe(false);
    });

    it('does not match a missing or non-numeric value', () => {
      const c: Criterion = { field: 'priority', operator: 'greater_than', value: '0', caseSensitive: false };
      expect(evaluateCriterion(makeRule({ priority: undefined }), c)).toBe(false);
      const text: Criterion = { field: 'msg', operator: 'greater_than', value: '0', caseSensitive: false };
      expect(evaluateCriterion(rule, text)).toBe(false);
    });
  });

  describe('exists and not_exists', () => {
    it('checks presence of a value', () => {
      expect(evaluateCriterion(rule, { field: 'classtype', operator: 'exists', caseSensitive: false })).toBe(true);
      expect(evaluateCriterion(rule, { field: 'metadata.deployment', operator: 'not_exists', caseSensitive: false })).toBe(true);
      expect(evaluateCriterion(rule, { field: 'metadata.flag', operator: 'exists', caseSensitive: false })).toBe(true);
      expect(evaluateCriterion(makeRule({ references: [] }), { field: 'reference', operator: 'exists', caseSensitive: false })).toBe(false);
    });
  });
});

describe('compileCriterion', () => {
  it('rejects a field outside the allowed table', () => {
    expect(() =>
      compileCriterion({ field: 'payload', operator: 'contains', value: 'x', caseSensitive: false }),
    ).toThrow(ValidationError);
  });

  it('rejects a metadata key with illegal characters', () => {
    expect(() =>
      compileCriterion({ field: 'metadata.bad key', operator: 'contains', value: 'x', caseSensitive: false }),
    ).toThrow(ValidationError);
  });

  it('keeps the original criterion', () => {
    const c: Criterion = { field: 'tags', operator: 'contains', value: 'activity', caseSensitive: false };
    const compiled = compileCriterion(c);
    expect(compiled.criterion).toBe(c);
    expect(compiled.patternError).toBeNull();
    expect(compiled.matches(makeRule())).toBe(true);
  });
});
