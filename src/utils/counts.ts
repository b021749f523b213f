/**
 * Counting by field value.
 *
 * Keys are arbitrary rule text, so counts live in a Map and only become a
 * plain object on output.
 */

import type { CountMap } from '@/types/rule.js';
import { UNSET } from '@/types/rule.js';

export class Tally {
  private readonly counts = new Map<string, number>();

  /** Count one value; absent or empty values count under `(unset)`. */
  add(value: string | number | undefined): void {
    const key = value === undefined || value === '' ? UNSET : String(value);
    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
  }

  toCountMap(): CountMap {
    return Object.fromEntries(this.counts);
  }
}
