/**
 * Applies transform actions to matching rules.
 *
 * Actions edit the rule's option list; the rule text is then re-rendered
 * and re-parsed so every derived field (metadata, priority, references)
 * comes from the updated text. Input rules are never mutated.
 */

import type { Rule, RuleOption } from '@/types/rule.js';
import type { Transform, TransformAction } from '@/types/transform.js';
import { parseRuleLine, renderRule } from '@/parsing/rule-parser.js';
import { CriteriaMatcher } from './transform-matcher.js';
import { createLogger } from '@/utils/logger.js';

const log = createLogger('transform-actions');

// ---------------------------------------------------------------------------
// Option editing helpers
// ---------------------------------------------------------------------------

/** Insert an option just before `sid`, or at the end if there is none. */
function insertBeforeSid(options: RuleOption[], option: RuleOption): void {
  const sidIndex = options.findIndex(o => o.keyword === 'sid');
  if (sidIndex === -1) {
    options.push(option);
  } else {
    options.splice(sidIndex, 0, option);
  }
}

function metadataKey(entry: string): string {
  const trimmed = entry.trim();
  const space = trimmed.search(/\s/);
  return space === -1 ? trimmed : trimmed.substring(0, space);
}

function hasMetadataKey(options: RuleOption[], key: string): boolean {
  return options.some(o =>
    o.keyword === 'metadata' &&
    (o.value ?? '').split(',').some(entry => metadataKey(entry) === key),
  );
}

function addMetadata(options: RuleOption[], key: string, value: string): void {
  if (hasMetadataKey(options, key)) return;

  const entry = `${key} ${value}`;
  const existing = options.filter(o => o.keyword === 'metadata' && o.value);
  const last = existing[existing.length - 1];
  if (last) {
    last.value = `${last.value}, ${entry}`;
  } else {
    insertBeforeSid(options, { keyword: 'metadata', value: entry });
  }
}

function modifyMetadata(options: RuleOption[], key: string, value: string): void {
  for (const option of options) {
    if (option.keyword !== 'metadata' || !option.value) continue;
    option.value = option.value
      .split(',')
      .map(entry => entry.trim())
      .filter(entry => entry.length > 0)
      .map(entry => (metadataKey(entry) === key ? `${key} ${value}` : entry))
      .join(', ');
  }
}

function updatePriority(options: RuleOption[], value: string): void {
  const existing = options.find(o => o.keyword === 'priority');
  if (existing) {
    existing.value = value;
  } else {
    insertBeforeSid(options, { keyword: 'priority', value });
  }
}

function addReference(options: RuleOption[], value: string): void {
  if (options.some(o => o.keyword === 'reference' && o.value === value)) return;
  insertBeforeSid(options, { keyword: 'reference', value });
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Apply a list of actions to a rule unconditionally.
 */
export function applyActions(rule: Rule, actions: readonly TransformAction[]): Rule {
  if (actions.length === 0) return rule;

  const options = rule.options.map(o => ({ ...o }));
  const addedTags: string[] = [];

  for (const action of actions) {
    switch (action.actionType) {
      case 'add_metadata':
        if (action.key) addMetadata(options, action.key, action.value);
        break;
      case 'modify_metadata':
        if (action.key) modifyMetadata(options, action.key, action.value);
        break;
      case 'update_priority':
        updatePriority(options, action.value);
        break;
      case 'add_reference':
        addReference(options, action.value);
        break;
      case 'add_tag':
        addedTags.push(action.value.toLowerCase());
        break;
    }
  }

  const raw = renderRule({ raw: rule.raw, options });
  const reparsed = parseRuleLine(raw, { source: rule.source, sourceFile: rule.sourceFile });
  if (!reparsed) {
    log.warn(`Transform produced unparsable text for SID ${rule.sid}; keeping original rule`);
    return rule;
  }

  return {
    ...reparsed,
    enabled: rule.enabled,
    tags: [...new Set([...reparsed.tags, ...rule.tags, ...addedTags])],
  };
}

/**
 * Apply a transform to a rule if its criteria match; otherwise return the
 * rule unchanged.
 */
export function applyTransform(rule: Rule, transform: Transform): Rule {
  const matcher = new CriteriaMatcher(transform.criteria);
  return matcher.matches(rule) ? applyActions(rule, transform.actions) : rule;
}

/**
 * Apply every enabled transform, in order, to a rule set. Used when rules
 * are loaded or reloaded.
 */
export function applyEnabledTransforms(rules: readonly Rule[], transforms: readonly Transform[]): Rule[] {
  let result = [...rules];

  for (const transform of transforms) {
    if (!transform.enabled) continue;

    const matcher = new CriteriaMatcher(transform.criteria);
    for (const error of matcher.patternErrors) {
      log.warn(`Transform "${transform.name}" (${transform.id}): ${error.message}`);
    }

    let applied = 0;
    result = result.map(rule => {
      if (!matcher.matches(rule)) return rule;
      applied++;
      return applyActions(rule, transform.actions);
    });
    log.info(`Applied transform "${transform.name}" to ${applied} rule(s)`);
  }

  return result;
}
