/**
 * Rule sources defined in rules.yaml.
 *
 * Sources of type `directory` and `file` are read from their `path`.
 * Sources of type `url` are read from `<dataDir>/rules/<name>/`, where an
 * external downloader leaves the extracted archive; nothing is fetched here.
 */

import { existsSync } from 'node:fs';
import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, dirname, isAbsolute, join, resolve } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

import type { Rule } from '@/types/rule.js';
import type { RuleSourceConfig } from '@/types/config.js';
import { parseRuleFile } from '@/parsing/rule-parser.js';
import { ValidationError, errorMessage } from '@/utils/errors.js';
import { createLogger } from '@/utils/logger.js';

const log = createLogger('rule-sources');

const RULES_EXTENSION = '.rules';

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const SourceSchema = z
  .object({
    name: z.string().regex(/^[A-Za-z0-9_.-]+$/, 'name may only contain letters, digits, "_", "." and "-"'),
    type: z.enum(['url', 'directory', 'file']),
    description: z.string().default(''),
    enabled: z.boolean().default(true),
    url: z.string().optional(),
    path: z.string().optional(),
    exclude_subdirs: z.boolean().default(false),
  })
  .superRefine((source, ctx) => {
    if (source.type === 'url' && !source.url) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: 'url sources require a url' });
    }
    if (source.type !== 'url' && !source.path) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['path'], message: `${source.type} sources require a path` });
    }
  });

const RulesFileSchema = z.object({
  sources: z.array(SourceSchema).default([]),
});

// ---------------------------------------------------------------------------
// Config loading
// ---------------------------------------------------------------------------

/**
 * Parse the text of a rules.yaml file. Relative source paths resolve
 * against `baseDir`.
 *
 * @throws ValidationError
 */
export function parseSourcesConfig(content: string, baseDir: string): RuleSourceConfig[] {
  let document: unknown;
  try {
    document = YAML.parse(content) ?? {};
  } catch (err) {
    throw new ValidationError(`Invalid rules.yaml: ${errorMessage(err)}`);
  }

  const result = RulesFileSchema.safeParse(document);
  if (!result.success) throw ValidationError.fromZod(result.error, 'rules.yaml');

  return result.data.sources.map(source => ({
    name: source.name,
    type: source.type,
    description: source.description,
    enabled: source.enabled,
    url: source.url,
    path: source.path === undefined || isAbsolute(source.path) ? source.path : resolve(baseDir, source.path),
    excludeSubdirs: source.exclude_subdirs,
  }));
}

/**
 * Load the source list. A missing file yields no sources.
 */
export async function loadSourcesConfig(configPath: string): Promise<RuleSourceConfig[]> {
  if (!existsSync(configPath)) {
    log.warn(`Sources file not found: ${configPath}`);
    return [];
  }
  const content = await readFile(configPath, 'utf-8');
  return parseSourcesConfig(content, dirname(resolve(configPath)));
}

// ---------------------------------------------------------------------------
// Rule files
// ---------------------------------------------------------------------------

/**
 * Collect `.rules` files under a directory, sorted by path.
 */
export async function collectRuleFiles(dirPath: string, excludeSubdirs = false): Promise<string[]> {
  const files: string[] = [];

  const walk = async (current: string): Promise<void> => {
    const entries = await readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = join(current, entry.name);
      if (entry.isDirectory()) {
        if (!excludeSubdirs) await walk(fullPath);
      } else if (entry.isFile() && entry.name.endsWith(RULES_EXTENSION)) {
        files.push(fullPath);
      }
    }
  };

  await walk(dirPath);
  return files.sort();
}

async function sourceFiles(source: RuleSourceConfig, dataDir: string): Promise<string[]> {
  const location = source.type === 'url' ? join(dataDir, 'rules', source.name) : source.path;
  if (!location || !existsSync(location)) {
    throw new Error(`Path not found: ${location ?? '(none)'}`);
  }

  const info = await stat(location);
  if (info.isFile()) return [location];
  return collectRuleFiles(location, source.excludeSubdirs);
}

export interface LoadSourcesOptions {
  /** Root data directory; URL sources read from `<dataDir>/rules/<name>/`. */
  dataDir: string;
}

/**
 * Parse the rules of every enabled source, in source order. A source that
 * cannot be read is logged and skipped.
 */
export async function loadRulesFromSources(
  sources: readonly RuleSourceConfig[],
  options: LoadSourcesOptions,
): Promise<Rule[]> {
  const rules: Rule[] = [];

  for (const source of sources) {
    if (!source.enabled) {
      log.debug(`Skipping disabled source ${source.name}`);
      continue;
    }

    try {
      const files = await sourceFiles(source, options.dataDir);
      let count = 0;
      for (const file of files) {
        const content = await readFile(file, 'utf-8');
        const parsed = parseRuleFile(content, { source: source.name, sourceFile: basename(file) });
        rules.push(...parsed);
        count += parsed.length;
      }
      log.info(`Loaded ${count} rules from ${files.length} file(s) in source ${source.name}`);
    } catch (err) {
      log.error(`Could not load source ${source.name}: ${errorMessage(err)}`);
    }
  }

  return rules;
}
