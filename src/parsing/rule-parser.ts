/**
 * Suricata rule text parser.
 *
 * Turns one line of a `.rules` file into a Rule record:
 *
 *   action protocol src_ip src_port direction dst_ip dst_port (opt:val; opt; ...)
 *
 * Lines commented out with a leading `#` that still hold a rule are parsed
 * as disabled rules. Plain comments, blank lines and lines that do not parse
 * yield `null`.
 */

import type { Rule, RuleAction, RuleOption } from '@/types/rule.js';
import { isRuleAction } from '@/types/rule.js';
import { createLogger } from '@/utils/logger.js';

const log = createLogger('rule-parser');

export interface ParseContext {
  source?: string;
  sourceFile?: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Commented-out rules start with one of these keywords after the `#`. */
const DISABLED_RULE_PREFIX = /^(alert|drop|reject\w*|pass)\s/i;

const CATEGORY_PATTERN = /^(?:ET(?:PRO)?\s+)?([A-Z][A-Z0-9._\s]+?)(?:\s|:)/i;

const TAG_MIN_LENGTH = 4;

// ---------------------------------------------------------------------------
// Tokenizing helpers
// ---------------------------------------------------------------------------

/**
 * Split the rule header on whitespace, keeping bracketed groups such as
 * `[10.0.0.0/8, 192.168.0.0/16]` together.
 */
function splitHeader(header: string): string[] {
  const parts: string[] = [];
  let current = '';
  let depth = 0;

  for (const ch of header) {
    if (ch === '[') depth++;
    if (ch === ']') depth = Math.max(0, depth - 1);

    if (/\s/.test(ch) && depth === 0) {
      if (current) parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  if (current) parts.push(current);
  return parts;
}

/**
 * Split the options block on `;`, ignoring semicolons inside double quotes
 * or escaped with a backslash.
 */
export function splitOptions(block: string): RuleOption[] {
  const segments: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < block.length; i++) {
    const ch = block[i];
    if (ch === '\\' && i + 1 < block.length) {
      current += ch + block[i + 1];
      i++;
      continue;
    }
    if (ch === '"') inQuotes = !inQuotes;
    if (ch === ';' && !inQuotes) {
      segments.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  segments.push(current);

  return segments
    .map(s => s.trim())
    .filter(s => s.length > 0)
    .map(segment => {
      const colon = segment.indexOf(':');
      if (colon === -1) return { keyword: segment };
      return {
        keyword: segment.substring(0, colon).trim(),
        value: segment.substring(colon + 1).trim(),
      };
    });
}

function unquote(value: string): string {
  let text = value.trim();
  if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
    text = text.substring(1, text.length - 1);
  }
  return text.replace(/\\(["\\;])/g, '$1');
}

function toInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\s*-?\d+\s*$/.test(value)) return undefined;
  return Number.parseInt(value, 10);
}

// ---------------------------------------------------------------------------
// Field derivation
// ---------------------------------------------------------------------------

/**
 * Extract a category from the message prefix, e.g. "ET MALWARE ..." -> MALWARE.
 */
export function extractCategory(msg: string): string | undefined {
  const match = msg.match(CATEGORY_PATTERN);
  if (!match) return undefined;
  return match[1].trim().toUpperCase().replace(/\s+/g, '_');
}

/**
 * Parse a metadata option value ("key value, key value") into a map.
 * Later keys overwrite earlier ones.
 */
export function parseMetadata(value: string, into: Record<string, string> = {}): Record<string, string> {
  for (const entry of value.split(',')) {
    const pair = entry.trim();
    if (!pair) continue;
    const space = pair.search(/\s/);
    if (space === -1) {
      into[pair] = '';
    } else {
      into[pair.substring(0, space)] = pair.substring(space + 1).trim();
    }
  }
  return into;
}

/** Lower-cased words of four or more characters from the message. */
export function extractTags(msg: string): string[] {
  const words = msg.match(/\b\w+\b/g) ?? [];
  const tags: string[] = [];
  for (const word of words) {
    const tag = word.toLowerCase();
    if (tag.length >= TAG_MIN_LENGTH && !tags.includes(tag)) tags.push(tag);
  }
  return tags;
}

function normalizeAction(keyword: string): RuleAction {
  const lower = keyword.toLowerCase();
  if (isRuleAction(lower)) return lower;
  // rejectsrc, rejectdst, rejectboth
  if (lower.startsWith('reject')) return 'reject';
  return 'alert';
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parse one line of rule text.
 *
 * @returns The rule, or `null` for blank lines, comments and unparsable text.
 */
export function parseRuleLine(line: string, context: ParseContext = {}): Rule | null {
  let text = line.trim();
  if (!text) return null;

  let enabled = true;
  if (text.startsWith('#')) {
    const uncommented = text.replace(/^#+/, '').trim();
    if (!DISABLED_RULE_PREFIX.test(uncommented)) return null;
    enabled = false;
    text = uncommented;
  }

  const parenOpen = text.indexOf('(');
  const parenClose = text.lastIndexOf(')');
  if (parenOpen === -1 || parenClose <= parenOpen) {
    log.debug('Skipping rule without options block', { line: text });
    return null;
  }

  const header = splitHeader(text.substring(0, parenOpen));
  if (header.length !== 7) {
    log.debug(`Skipping rule with ${header.length}-part header`, { line: text });
    return null;
  }
  const [action, protocol, srcIp, srcPort, direction, dstIp, dstPort] = header;

  const options = splitOptions(text.substring(parenOpen + 1, parenClose));
  const valueOf = (keyword: string): string | undefined =>
    options.find(o => o.keyword === keyword)?.value;
  const valuesOf = (keyword: string): string[] =>
    options
      .filter(o => o.keyword === keyword && o.value !== undefined)
      .map(o => o.value ?? '');

  const sid = toInteger(valueOf('sid'));
  if (sid === undefined) {
    log.debug('Skipping rule without integer sid', { line: text });
    return null;
  }

  const msgValue = valueOf('msg');
  const msg = msgValue === undefined ? '' : unquote(msgValue);

  const metadata: Record<string, string> = {};
  for (const value of valuesOf('metadata')) {
    parseMetadata(value, metadata);
  }

  const classtype = valueOf('classtype');

  return {
    sid,
    action: normalizeAction(action),
    protocol: protocol.toLowerCase(),
    srcIp,
    srcPort,
    direction,
    dstIp,
    dstPort,
    msg,
    classtype: classtype ? classtype : undefined,
    priority: toInteger(valueOf('priority')),
    rev: toInteger(valueOf('rev')),
    references: valuesOf('reference'),
    metadata,
    options,
    tags: extractTags(msg),
    category: extractCategory(msg),
    source: context.source,
    sourceFile: context.sourceFile,
    enabled,
    raw: text,
  };
}

/**
 * Parse every rule in the text of a `.rules` file. Unparsable lines are
 * skipped.
 */
export function parseRuleFile(content: string, context: ParseContext = {}): Rule[] {
  const rules: Rule[] = [];
  for (const line of content.split(/\r?\n/)) {
    const rule = parseRuleLine(line, context);
    if (rule) rules.push(rule);
  }
  return rules;
}

/**
 * Recompose the rule text from the original header and the current options.
 *
 * Format:
 *   <header> (opt1:val1; opt2; ...;)
 */
export function renderRule(rule: Pick<Rule, 'raw' | 'options'>): string {
  const header = rule.raw.substring(0, rule.raw.indexOf('(')).trim();

  const optionStrings = rule.options.map(opt => {
    if (opt.value !== undefined) {
      return `${opt.keyword}:${opt.value};`;
    }
    return `${opt.keyword};`;
  });

  return `${header} (${optionStrings.join(' ')})`;
}
