/**
 * Evaluates a parsed query against the searchable text of one record.
 *
 * The fields are joined with newlines into a single haystack, so a term
 * never matches across a field boundary. Matching is case-insensitive.
 */

import type { ParsedQuery, Rule } from '@/types/rule.js';

export type SearchField = string | number | undefined;

export type TextMatcher = (fields: readonly SearchField[]) => boolean;

export function buildHaystack(fields: readonly SearchField[]): string {
  return fields
    .filter((f): f is string | number => f !== undefined)
    .map(String)
    .join('\n')
    .toLowerCase();
}

/**
 * Compile a query into a reusable matcher. Terms are lower-cased once.
 */
export function createTextMatcher(query: ParsedQuery): TextMatcher {
  const required = query.requiredAny.map(t => t.text.toLowerCase());
  const forbidden = query.forbidden.map(t => t.text.toLowerCase());

  if (required.length === 0 && forbidden.length === 0) {
    return () => true;
  }

  return (fields) => {
    const haystack = buildHaystack(fields);
    if (required.length > 0 && !required.some(term => haystack.includes(term))) {
      return false;
    }
    return !forbidden.some(term => haystack.includes(term));
  };
}

export function matchesQuery(query: ParsedQuery, fields: readonly SearchField[]): boolean {
  return createTextMatcher(query)(fields);
}

/** Fields searched by the standard search bar: message, SID and tags. */
export function standardSearchFields(rule: Rule): SearchField[] {
  return [rule.msg, rule.sid, rule.tags.join(' ')];
}

/** Fields searched by the raw search bar: the full rule text. */
export function rawSearchFields(rule: Rule): SearchField[] {
  return [rule.raw];
}
