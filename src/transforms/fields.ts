/**
 * Closed table of rule fields that transform criteria may reference.
 *
 * Plain identifiers map to an accessor; `metadata.<key>` looks the key up
 * in the rule's metadata. Accessors return `undefined` when the rule has no
 * value for the field.
 */

import type { Rule } from '@/types/rule.js';

export type FieldAccessor = (rule: Rule) => string | undefined;

const joinList = (values: string[]): string | undefined =>
  values.length > 0 ? values.join(', ') : undefined;

const optionalNumber = (value: number | undefined): string | undefined =>
  value === undefined ? undefined : String(value);

const optionalText = (value: string | undefined): string | undefined =>
  value === undefined || value === '' ? undefined : value;

export const PLAIN_FIELDS = [
  'sid',
  'msg',
  'action',
  'protocol',
  'classtype',
  'category',
  'source',
  'source_file',
  'priority',
  'rev',
  'src_ip',
  'src_port',
  'direction',
  'dst_ip',
  'dst_port',
  'raw',
  'reference',
  'tags',
  'enabled',
] as const;

export type PlainField = (typeof PLAIN_FIELDS)[number];

export const FIELD_ACCESSORS: Record<PlainField, FieldAccessor> = {
  sid: (rule) => String(rule.sid),
  msg: (rule) => optionalText(rule.msg),
  action: (rule) => rule.action,
  protocol: (rule) => rule.protocol,
  classtype: (rule) => optionalText(rule.classtype),
  category: (rule) => optionalText(rule.category),
  source: (rule) => optionalText(rule.source),
  source_file: (rule) => optionalText(rule.sourceFile),
  priority: (rule) => optionalNumber(rule.priority),
  rev: (rule) => optionalNumber(rule.rev),
  src_ip: (rule) => rule.srcIp,
  src_port: (rule) => rule.srcPort,
  direction: (rule) => rule.direction,
  dst_ip: (rule) => rule.dstIp,
  dst_port: (rule) => rule.dstPort,
  raw: (rule) => rule.raw,
  reference: (rule) => joinList(rule.references),
  tags: (rule) => joinList(rule.tags),
  enabled: (rule) => String(rule.enabled),
};

const METADATA_PREFIX = 'metadata.';
const METADATA_KEY_PATTERN = /^[A-Za-z0-9_.-]+$/;

function isPlainField(field: string): field is PlainField {
  return PLAIN_FIELDS.some(f => f === field);
}

export function isAllowedField(field: string): boolean {
  if (isPlainField(field)) return true;
  if (!field.startsWith(METADATA_PREFIX)) return false;
  return METADATA_KEY_PATTERN.test(field.substring(METADATA_PREFIX.length));
}

/**
 * Resolve a field identifier to its accessor, or `null` if the identifier
 * is not in the table.
 */
export function resolveField(field: string): FieldAccessor | null {
  if (isPlainField(field)) return FIELD_ACCESSORS[field];
  if (!isAllowedField(field)) return null;

  const key = field.substring(METADATA_PREFIX.length);
  return (rule) =>
    Object.prototype.hasOwnProperty.call(rule.metadata, key) ? rule.metadata[key] : undefined;
}
