/**
 * Unit tests for shared CLI options.
 *
 * Tests: collectList, collectMeta, parseInteger, parseSortKey,
 * parseSortOrder, parseBooleanList, collectBooleans, readDocument
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InvalidArgumentError } from 'commander';

import {
  collectBooleans,
  collectList,
  collectMeta,
  parseBooleanList,
  parseInteger,
  parseSortKey,
  parseSortOrder,
  readDocument,
} from '@/cli/options.js';
import { ValidationError } from '@/utils/errors.js';

describe('collectList', () => {
  it('splits comma-separated values and accumulates repeats', () => {
    expect(collectList('alert, drop')).toEqual(['alert', 'drop']);
    expect(collectList('pass', ['alert', 'drop'])).toEqual(['alert', 'drop', 'pass']);
  });

  it('drops empty entries', () => {
    expect(collectList(',tcp,,')).toEqual(['tcp']);
  });
});

describe('collectMeta', () => {
  it('groups values by key', () => {
    const first = collectMeta('signature_severity=Major');
    expect(collectMeta('signature_severity=Minor,Critical', first)).toEqual({
      signature_severity: ['Major', 'Minor', 'Critical'],
    });
  });

  it('rejects values without a key', () => {
    expect(() => collectMeta('Major')).toThrow(InvalidArgumentError);
    expect(() => collectMeta('=Major')).toThrow(InvalidArgumentError);
  });
});

describe('parseInteger', () => {
  it('parses integers', () => {
    expect(parseInteger('42')).toBe(42);
    expect(parseInteger('-1')).toBe(-1);
  });

  it('rejects anything else', () => {
    expect(() => parseInteger('4.5')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('ten')).toThrow(InvalidArgumentError);
  });
});

describe('parseSortKey and parseSortOrder', () => {
  it('accepts known keys case-insensitively', () => {
    expect(parseSortKey('SID')).toBe('sid');
    expect(parseSortKey('severity')).toBe('severity');
    expect(() => parseSortKey('payload')).toThrow('Unknown sort key "payload"');
  });

  it('accepts asc and desc', () => {
    expect(parseSortOrder('DESC')).toBe('desc');
    expect(() => parseSortOrder('down')).toThrow(InvalidArgumentError);
  });
});

describe('parseBooleanList', () => {
  it('maps flag words to booleans', () => {
    expect(parseBooleanList(['true', 'no', 'Disabled'])).toEqual([true, false, false]);
    expect(() => parseBooleanList(['maybe'])).toThrow(InvalidArgumentError);
  });
});

describe('collectBooleans', () => {
  it('accumulates repeated flags', () => {
    expect(collectBooleans('yes,0', collectBooleans('enabled'))).toEqual([true, true, false]);
  });

  it('rejects unknown words while options are parsed', () => {
    expect(() => collectBooleans('maybe')).toThrow('Expected true or false, got "maybe".');
  });
});

describe('readDocument', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'rulelens-cli-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads JSON files', async () => {
    const path = join(dir, 'transform.json');
    await writeFile(path, '{"name": "x", "enabled": false}', 'utf-8');
    expect(await readDocument(path)).toEqual({ name: 'x', enabled: false });
  });

  it('reads YAML files', async () => {
    const path = join(dir, 'transform.yaml');
    await writeFile(path, 'name: x\ncriteria:\n  field: msg\n  operator: contains\n  value: ftp\n', 'utf-8');
    expect(await readDocument(path)).toEqual({
      name: 'x',
      criteria: { field: 'msg', operator: 'contains', value: 'ftp' },
    });
  });

  it('fails for a missing file', async () => {
    await expect(readDocument(join(dir, 'missing.yaml'))).rejects.toBeInstanceOf(ValidationError);
  });

  it('fails for invalid JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ broken', 'utf-8');
    await expect(readDocument(path)).rejects.toThrow('Could not parse');
  });
});
