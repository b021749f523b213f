/**
 * Environment-driven configuration.
 *
 *   RULELENS_SOURCES         path to rules.yaml            (./rules.yaml)
 *   RULELENS_DATA_DIR        data directory                (./data)
 *   RULELENS_TRANSFORMS_DIR  transform store               (<data>/transforms)
 *   RULELENS_PAGE_SIZE       default search page size      (50)
 *   RULELENS_EXAMPLE_LIMIT   dry-run example matches       (10)
 *   LOG_LEVEL                debug | info | warn | error   (info)
 */

import { join, resolve } from 'node:path';
import { z } from 'zod';

import type { RuleLensConfig } from '@/types/config.js';
import { LOG_LEVELS } from '@/utils/logger.js';
import { MAX_PAGE_SIZE } from '@/search/rule-filter.js';
import { ValidationError } from '@/utils/errors.js';

const EnvSchema = z.object({
  RULELENS_SOURCES: z.string().default('rules.yaml'),
  RULELENS_DATA_DIR: z.string().default('data'),
  RULELENS_TRANSFORMS_DIR: z.string().optional(),
  RULELENS_PAGE_SIZE: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(50),
  RULELENS_EXAMPLE_LIMIT: z.coerce.number().int().min(0).default(10),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

/**
 * Build the configuration from environment variables. Relative paths are
 * resolved against `cwd`.
 *
 * @throws ValidationError
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): RuleLensConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) throw ValidationError.fromZod(result.error, 'configuration');

  const vars = result.data;
  const dataDir = resolve(cwd, vars.RULELENS_DATA_DIR);

  return {
    sourcesFile: resolve(cwd, vars.RULELENS_SOURCES),
    dataDir,
    transformsDir: vars.RULELENS_TRANSFORMS_DIR
      ? resolve(cwd, vars.RULELENS_TRANSFORMS_DIR)
      : join(dataDir, 'transforms'),
    pageSize: vars.RULELENS_PAGE_SIZE,
    exampleLimit: vars.RULELENS_EXAMPLE_LIMIT,
    logLevel: vars.LOG_LEVEL,
  };
}
