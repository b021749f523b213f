/**
 * Versioned, read-only snapshots of the active rule set.
 *
 * A reload builds a complete new snapshot and then replaces the single
 * `current` reference. Callers that captured the previous snapshot keep a
 * consistent view of it.
 */

import type { Rule } from '@/types/rule.js';
import type { Transform } from '@/types/transform.js';
import { applyEnabledTransforms } from '@/transforms/actions.js';
import { NotFoundError } from '@/utils/errors.js';
import { createLogger } from '@/utils/logger.js';

const log = createLogger('rule-store');

export interface RuleSnapshot {
  readonly version: number;
  readonly loadedAt: string;
  readonly rules: readonly Rule[];
  readonly bySid: ReadonlyMap<number, Rule>;
}

export interface RuleStoreOptions {
  loadRules: () => Promise<Rule[]>;
  /** Enabled transforms from this list are applied on every load. */
  loadTransforms?: () => Promise<Transform[]>;
  now?: () => Date;
}

/**
 * Build a snapshot, keeping the first rule for each SID.
 */
export function buildSnapshot(rules: readonly Rule[], version: number, loadedAt: string): RuleSnapshot {
  const bySid = new Map<number, Rule>();
  const unique: Rule[] = [];
  const duplicates: number[] = [];

  for (const rule of rules) {
    if (bySid.has(rule.sid)) {
      duplicates.push(rule.sid);
      continue;
    }
    bySid.set(rule.sid, rule);
    unique.push(rule);
  }

  if (duplicates.length > 0) {
    log.warn(`Dropped ${duplicates.length} rule(s) with duplicate SIDs`, duplicates.slice(0, 20));
  }

  return Object.freeze({
    version,
    loadedAt,
    rules: Object.freeze(unique),
    bySid,
  });
}

export class RuleStore {
  private current: RuleSnapshot | null = null;
  private pending: Promise<RuleSnapshot> | null = null;
  private readonly now: () => Date;

  constructor(private readonly options: RuleStoreOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * The current snapshot, loading it on first use.
   */
  async snapshot(): Promise<RuleSnapshot> {
    return this.current ?? this.reload();
  }

  /**
   * Load rules and transforms and swap in a new snapshot. Concurrent calls
   * share one load.
   */
  reload(): Promise<RuleSnapshot> {
    this.pending ??= this.load().finally(() => {
      this.pending = null;
    });
    return this.pending;
  }

  private async load(): Promise<RuleSnapshot> {
    const started = Date.now();
    const loaded = await this.options.loadRules();
    const transforms = this.options.loadTransforms ? await this.options.loadTransforms() : [];
    const rules = applyEnabledTransforms(loaded, transforms);

    const next = buildSnapshot(rules, (this.current?.version ?? 0) + 1, this.now().toISOString());
    this.current = next;

    const enabled = next.rules.filter(r => r.enabled).length;
    log.info(
      `Snapshot v${next.version}: ${next.rules.length} rules (${enabled} enabled, ` +
      `${next.rules.length - enabled} disabled) in ${Date.now() - started}ms`,
    );
    return next;
  }

  /**
   * @throws NotFoundError
   */
  async getRule(sid: number): Promise<Rule> {
    const rule = (await this.snapshot()).bySid.get(sid);
    if (!rule) throw new NotFoundError('rule', sid);
    return rule;
  }
}
