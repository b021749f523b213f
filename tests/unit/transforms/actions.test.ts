/**
 * Unit tests for transform actions.
 */

import { describe, it, expect } from 'vitest';
import { applyActions, applyEnabledTransforms, applyTransform } from '@/transforms/actions.js';
import { parseRuleLine } from '@/parsing/rule-parser.js';
import type { Rule } from '@/types/rule.js';
import type { Transform, TransformAction } from '@/types/transform.js';

// ---------------------------------------------------------------------------
// Fixture Builders
// ---------------------------------------------------------------------------

const FTP_LINE =
  'alert tcp $HOME_NET any -> $EXTERNAL_NET 21 (msg:"ET POLICY FTP login"; flow:established,to_server; ' +
  'classtype:misc-activity; sid:2100001; rev:2; metadata:signature_severity Minor;)';

const DNS_LINE =
  'alert dns $HOME_NET any -> any any (msg:"LOCAL DNS lookup"; dns.query; content:"test.invalid"; sid:9000004; rev:1;)';

function parse(line: string): Rule {
  const rule = parseRuleLine(line, { source: 'et-open', sourceFile: 'emerging-policy.rules' });
  if (!rule) throw new Error(`fixture did not parse: ${line}`);
  return rule;
}

function makeTransform(actions: TransformAction[], overrides: Partial<Transform> = {}): Transform {
  return {
    id: 'transform-ftp00001',
    name: 'FTP review',
    enabled: true,
    criteria: { kind: 'single', criterion: { field: 'msg', operator: 'contains', value: 'ftp', caseSensitive: false } },
    actions,
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('applyActions', () => {
  it('appends to the existing metadata option', () => {
    const rule = applyActions(parse(FTP_LINE), [{ actionType: 'add_metadata', key: 'team', value: 'netops' }]);
    expect(rule.metadata).toEqual({ signature_severity: 'Minor', team: 'netops' });
    expect(rule.raw).toBe(
      'alert tcp $HOME_NET any -> $EXTERNAL_NET 21 (msg:"ET POLICY FTP login"; flow:established,to_server; ' +
      'classtype:misc-activity; sid:2100001; rev:2; metadata:signature_severity Minor, team netops;)',
    );
  });

  it('adds a metadata option before sid when the rule has none', () => {
    const rule = applyActions(parse(DNS_LINE), [{ actionType: 'add_metadata', key: 'team', value: 'dns' }]);
    expect(rule.metadata).toEqual({ team: 'dns' });
    expect(rule.raw).toBe(
      'alert dns $HOME_NET any -> any any (msg:"LOCAL DNS lookup"; dns.query; content:"test.invalid"; ' +
      'metadata:team dns; sid:9000004; rev:1;)',
    );
  });

  it('does not overwrite an existing key with add_metadata', () => {
    const rule = applyActions(parse(FTP_LINE), [
      { actionType: 'add_metadata', key: 'signature_severity', value: 'Critical' },
    ]);
    expect(rule.metadata.signature_severity).toBe('Minor');
  });

  it('replaces an existing key with modify_metadata', () => {
    const rule = applyActions(parse(FTP_LINE), [
      { actionType: 'modify_metadata', key: 'signature_severity', value: 'Major' },
    ]);
    expect(rule.metadata).toEqual({ signature_severity: 'Major' });
  });

  it('leaves rules without the key alone with modify_metadata', () => {
    const original = parse(FTP_LINE);
    const rule = applyActions(original, [{ actionType: 'modify_metadata', key: 'team', value: 'x' }]);
    expect(rule.raw).toBe(original.raw);
    expect(rule.metadata).toEqual(original.metadata);
  });

  it('sets the priority', () => {
    const rule = applyActions(parse(FTP_LINE), [{ actionType: 'update_priority', value: '1' }]);
    expect(rule.priority).toBe(1);
    expect(rule.raw).toContain('classtype:misc-activity; priority:1; sid:2100001;');

    const again = applyActions(rule, [{ actionType: 'update_priority', value: '3' }]);
    expect(again.priority).toBe(3);
    expect(again.options.filter(o => o.keyword === 'priority')).toEqual([{ keyword: 'priority', value: '3' }]);
  });

  it('adds a reference once', () => {
    const action: TransformAction = { actionType: 'add_reference', value: 'url,example.com/ftp' };
    const rule = applyActions(parse(FTP_LINE), [action]);
    expect(rule.references).toEqual(['url,example.com/ftp']);
    expect(applyActions(rule, [action]).references).toEqual(['url,example.com/ftp']);
  });

  it('adds lower-cased tags without duplicates', () => {
    const rule = applyActions(parse(FTP_LINE), [
      { actionType: 'add_tag', value: 'Review' },
      { actionType: 'add_tag', value: 'login' },
    ]);
    expect(rule.tags).toEqual(['policy', 'login', 'review']);
  });

  it('keeps source, file and enabled state', () => {
    const disabled = parse(`# ${FTP_LINE}`);
    const rule = applyActions(disabled, [{ actionType: 'update_priority', value: '2' }]);
    expect(rule.enabled).toBe(false);
    expect(rule.source).toBe('et-open');
    expect(rule.sourceFile).toBe('emerging-policy.rules');
  });

  it('does not mutate the input rule', () => {
    const original = parse(FTP_LINE);
    const before = JSON.stringify(original);
    applyActions(original, [
      { actionType: 'add_metadata', key: 'team', value: 'netops' },
      { actionType: 'update_priority', value: '1' },
    ]);
    expect(JSON.stringify(original)).toBe(before);
  });

  it('returns the same rule when there are no actions', () => {
    const rule = parse(FTP_LINE);
    expect(applyActions(rule, [])).toBe(rule);
  });
});

describe('applyTransform', () => {
  it('only changes matching rules', () => {
    const transform = makeTransform([{ actionType: 'add_tag', value: 'ftp-review' }]);
    const ftp = parse(FTP_LINE);
    const dns = parse(DNS_LINE);
    expect(applyTransform(ftp, transform).tags).toContain('ftp-review');
    expect(applyTransform(dns, transform)).toBe(dns);
  });
});

describe('applyEnabledTransforms', () => {
  it('applies enabled transforms in order', () => {
    const rules = [parse(FTP_LINE), parse(DNS_LINE)];
    const result = applyEnabledTransforms(rules, [
      makeTransform([{ actionType: 'add_metadata', key: 'team', value: 'netops' }]),
      makeTransform([{ actionType: 'modify_metadata', key: 'team', value: 'secops' }], { id: 'transform-ftp00002' }),
    ]);
    expect(result[0].metadata.team).toBe('secops');
    expect(result[1]).toBe(rules[1]);
  });

  it('skips disabled transforms', () => {
    const rules = [parse(FTP_LINE)];
    const result = applyEnabledTransforms(rules, [
      makeTransform([{ actionType: 'update_priority', value: '1' }], { enabled: false }),
    ]);
    expect(result[0]).toBe(rules[0]);
  });

  it('returns a new array', () => {
    const rules = [parse(DNS_LINE)];
    const result = applyEnabledTransforms(rules, []);
    expect(result).toEqual(rules);
    expect(result).not.toBe(rules);
  });
});
