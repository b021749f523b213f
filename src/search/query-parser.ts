/**
 * Free-text query language for the rule search bars.
 *
 * Syntax:
 *   alert drop          either term (OR)
 *   "ET MALWARE"        phrase, matched as one substring
 *   !trojan  !"ET INFO" forbidden term / phrase (all must be absent)
 *   \!important         literal term starting with "!"
 *
 * Parsing never fails: unterminated quotes run to the end of the input and
 * stray punctuation is taken literally.
 */

import type { ParsedQuery, QueryTerm } from '@/types/rule.js';

const QUOTE = '"';
const BANG = '!';
const BACKSLASH = '\\';

function isWhitespace(ch: string): boolean {
  return /\s/.test(ch);
}

function addTerm(terms: QueryTerm[], term: QueryTerm): void {
  if (!terms.some(t => t.kind === term.kind && t.text === term.text)) {
    terms.push(term);
  }
}

/**
 * Tokenize a raw search string into OR'd required terms and AND'd forbidden
 * terms. Empty or whitespace-only input yields an empty query.
 */
export function parseQuery(input: string): ParsedQuery {
  const requiredAny: QueryTerm[] = [];
  const forbidden: QueryTerm[] = [];
  const n = input.length;
  let i = 0;

  while (i < n) {
    while (i < n && isWhitespace(input[i])) i++;
    if (i >= n) break;

    let negated = false;
    let prefix = '';
    if (input[i] === BACKSLASH && input[i + 1] === BANG) {
      prefix = BANG;
      i += 2;
    } else if (input[i] === BANG) {
      negated = true;
      i += 1;
    }

    let term: QueryTerm;
    if (i < n && input[i] === QUOTE) {
      const close = input.indexOf(QUOTE, i + 1);
      const end = close === -1 ? n : close;
      term = { text: prefix + input.slice(i + 1, end), kind: 'phrase' };
      i = close === -1 ? n : close + 1;
    } else {
      const start = i;
      while (i < n && !isWhitespace(input[i])) i++;
      term = { text: prefix + input.slice(start, i), kind: 'literal' };
    }

    // Lone "!" and empty phrases carry no term.
    if (term.text.trim().length === 0) continue;

    addTerm(negated ? forbidden : requiredAny, term);
  }

  return { requiredAny, forbidden };
}

export function isEmptyQuery(query: ParsedQuery): boolean {
  return query.requiredAny.length === 0 && query.forbidden.length === 0;
}

/**
 * Render a parsed query back to query syntax. Useful for echoing the
 * effective search in CLI output.
 */
export function formatQuery(query: ParsedQuery): string {
  const render = (term: QueryTerm): string => {
    if (term.kind === 'phrase') return `"${term.text}"`;
    return term.text.startsWith(BANG) ? `${BACKSLASH}${term.text}` : term.text;
  };

  return [
    ...query.requiredAny.map(render),
    ...query.forbidden.map(t => `${BANG}${render(t)}`),
  ].join(' ');
}
