/**
 * Wires the rule store and the transform repository together from a
 * configuration.
 */

import type { RuleLensConfig } from '@/types/config.js';
import { RuleStore } from '@/loading/rule-store.js';
import { loadRulesFromSources, loadSourcesConfig } from '@/loading/sources.js';
import { TransformRepository } from '@/transforms/repository.js';

export interface RuleLens {
  config: RuleLensConfig;
  rules: RuleStore;
  transforms: TransformRepository;
}

export function createRuleLens(config: RuleLensConfig): RuleLens {
  const transforms = new TransformRepository(config.transformsDir);

  const rules = new RuleStore({
    loadRules: async () => {
      const sources = await loadSourcesConfig(config.sourcesFile);
      return loadRulesFromSources(sources, { dataDir: config.dataDir });
    },
    loadTransforms: () => transforms.listEnabled(),
  });

  return { config, rules, transforms };
}
