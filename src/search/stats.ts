/**
 * Aggregate counts over a rule set for filter pickers and summaries.
 */

import type { CountMap, Rule, RuleStats } from '@/types/rule.js';
import { Tally } from '@/utils/counts.js';

export function computeRuleStats(rules: readonly Rule[]): RuleStats {
  const actions = new Tally();
  const protocols = new Tally();
  const classtypes = new Tally();
  const sources = new Tally();
  const categories = new Tally();
  const priorities = new Tally();
  const enabledStatus = new Tally();
  const metadata = new Map<string, Tally>();

  for (const rule of rules) {
    actions.add(rule.action);
    protocols.add(rule.protocol);
    classtypes.add(rule.classtype);
    sources.add(rule.source);
    categories.add(rule.category);
    priorities.add(rule.priority);
    enabledStatus.add(String(rule.enabled));

    for (const [key, value] of Object.entries(rule.metadata)) {
      let tally = metadata.get(key);
      if (!tally) {
        tally = new Tally();
        metadata.set(key, tally);
      }
      tally.add(value);
    }
  }

  return {
    totalRules: rules.length,
    actions: actions.toCountMap(),
    protocols: protocols.toCountMap(),
    classtypes: classtypes.toCountMap(),
    sources: sources.toCountMap(),
    categories: categories.toCountMap(),
    priorities: priorities.toCountMap(),
    enabledStatus: enabledStatus.toCountMap(),
    metadata: Object.fromEntries([...metadata].map(([key, tally]) => [key, tally.toCountMap()])),
  };
}

/**
 * Sort a count map by descending count, then key.
 */
export function rankCounts(counts: CountMap): [string, number][] {
  return Object.entries(counts).sort(([ka, a], [kb, b]) => b - a || (ka < kb ? -1 : ka > kb ? 1 : 0));
}
