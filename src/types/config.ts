/**
 * Configuration types for RuleLens.
 */

import type { LogLevel } from '@/utils/logger.js';

export interface RuleLensConfig {
  /** Path to the rules.yaml source list. */
  sourcesFile: string;
  /** Root data directory; URL sources are read from `<dataDir>/rules/<name>/`. */
  dataDir: string;
  transformsDir: string;
  pageSize: number;
  exampleLimit: number;
  logLevel: LogLevel;
}

export type RuleSourceType = 'url' | 'directory' | 'file';

export interface RuleSourceConfig {
  name: string;
  type: RuleSourceType;
  description: string;
  enabled: boolean;
  url?: string;
  path?: string;
  excludeSubdirs: boolean;
}
