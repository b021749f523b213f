/**
 * Transform command group: Manage stored transforms and preview their
 * effect on the loaded rules.
 *
 *   rulelens transform list
 *   rulelens transform show <id>
 *   rulelens transform create -f transform.yaml
 *   rulelens transform update <id> -f transform.yaml
 *   rulelens transform enable|disable|delete <id>
 *   rulelens transform dry-run <id> [--examples 5]
 *   rulelens transform test -f criteria.yaml
 */

import type { Command } from 'commander';
import chalk from 'chalk';

import type { CriteriaSet, Criterion, Transform } from '@/types/transform.js';
import type { RuleLens } from '@/rulelens.js';
import { buildReport } from '@/transforms/transform-matcher.js';
import { criteriaList, transformToDocument, validateCriteria } from '@/transforms/schema.js';
import { formatMatchReport } from '@/reporting/match-reporter.js';
import { loadSnapshot, openRuleLens, type CommandOptionsBase, type OpenRuleLens } from '../context.js';
import {
  addExamplesOption,
  addJsonOption,
  printHeader,
  printInfo,
  printJson,
  printSuccess,
  printWarning,
  readDocument,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface FileOptions extends CommandOptionsBase {
  file: string;
}

interface ReportCommandOptions extends CommandOptionsBase {
  examples?: number;
}

interface TestOptions extends ReportCommandOptions {
  file: string;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerTransformCommand(program: Command, open: OpenRuleLens = openRuleLens): void {
  const transform = program
    .command('transform')
    .description('Manage and preview rule transforms');

  addJsonOption(transform.command('list').description('List stored transforms'))
    .action(async (options: CommandOptionsBase) => {
      const transforms = await open().transforms.list();
      if (options.json) {
        printJson(transforms.map(transformToDocument));
        return;
      }
      printTransformList(transforms);
    });

  addJsonOption(
    transform.command('show').description('Show a stored transform').argument('<id>', 'Transform id'),
  ).action(async (id: string, options: CommandOptionsBase) => {
    const stored = await open().transforms.get(id);
    if (options.json) {
      printJson(transformToDocument(stored));
      return;
    }
    printTransformDetail(stored);
  });

  addJsonOption(
    transform
      .command('create')
      .description('Create a transform from a JSON or YAML file')
      .requiredOption('-f, --file <path>', 'Transform definition file'),
  ).action(async (options: FileOptions) => {
    const created = await open().transforms.create(await readDocument(options.file));
    if (options.json) {
      printJson(transformToDocument(created));
      return;
    }
    printSuccess(`Created transform ${created.id} ("${created.name}")`);
  });

  addJsonOption(
    transform
      .command('update')
      .description('Replace a transform definition from a JSON or YAML file')
      .argument('<id>', 'Transform id')
      .requiredOption('-f, --file <path>', 'Transform definition file'),
  ).action(async (id: string, options: FileOptions) => {
    const updated = await open().transforms.update(id, await readDocument(options.file));
    if (options.json) {
      printJson(transformToDocument(updated));
      return;
    }
    printSuccess(`Updated transform ${updated.id} ("${updated.name}")`);
  });

  transform
    .command('enable')
    .description('Enable a transform')
    .argument('<id>', 'Transform id')
    .action(async (id: string) => {
      const updated = await open().transforms.setEnabled(id, true);
      printSuccess(`Enabled transform ${updated.id}`);
    });

  transform
    .command('disable')
    .description('Disable a transform')
    .argument('<id>', 'Transform id')
    .action(async (id: string) => {
      const updated = await open().transforms.setEnabled(id, false);
      printSuccess(`Disabled transform ${updated.id}`);
    });

  transform
    .command('delete')
    .description('Delete a transform')
    .argument('<id>', 'Transform id')
    .action(async (id: string) => {
      await open().transforms.delete(id);
      printSuccess(`Deleted transform ${id}`);
    });

  addJsonOption(
    addExamplesOption(
      transform
        .command('dry-run')
        .description('Report which rules a stored transform matches')
        .argument('<id>', 'Transform id'),
    ),
  ).action(async (id: string, options: ReportCommandOptions) => {
    const lens = open();
    const stored = await lens.transforms.get(id);
    await runReport(lens, stored, options);
  });

  addJsonOption(
    addExamplesOption(
      transform
        .command('test')
        .description('Report which rules ad-hoc criteria match')
        .requiredOption('-f, --file <path>', 'Criteria (or transform) definition file'),
    ),
  ).action(async (options: TestOptions) => {
    const doc = await readDocument(options.file);
    const criteria = validateCriteria(
      typeof doc === 'object' && doc !== null && !Array.isArray(doc) && 'criteria' in doc ? doc.criteria : doc,
    );
    await runReport(open(), criteria, options);
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

async function runReport(
  lens: RuleLens,
  target: CriteriaSet | Transform,
  options: ReportCommandOptions,
): Promise<void> {
  if (!options.json) printHeader('Transform Dry Run');

  const snapshot = await loadSnapshot(lens, options.json);
  const report = buildReport(snapshot.rules, target, {
    exampleLimit: options.examples ?? lens.config.exampleLimit,
  });

  if (options.json) {
    printJson(report);
    return;
  }

  console.log('');
  console.log(formatMatchReport(report));
  console.log('');
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export function describeCriterion(criterion: Criterion): string {
  const sensitivity = criterion.caseSensitive ? ' (case-sensitive)' : '';
  switch (criterion.operator) {
    case 'exists':
    case 'not_exists':
      return `${criterion.field} ${criterion.operator}`;
    case 'in_list':
    case 'not_in_list':
      return `${criterion.field} ${criterion.operator} [${criterion.value.join(', ')}]${sensitivity}`;
    default:
      return `${criterion.field} ${criterion.operator} "${criterion.value}"${sensitivity}`;
  }
}

function printTransformList(transforms: Transform[]): void {
  printHeader('Transforms');

  if (transforms.length === 0) {
    printWarning('No transforms stored.');
    return;
  }

  for (const t of transforms) {
    const state = t.enabled ? chalk.green('enabled ') : chalk.gray('disabled');
    const counts = chalk.gray(
      `(${criteriaList(t.criteria).length} criteria, ${t.actions.length} action(s))`,
    );
    console.log(`  ${t.id.padEnd(20)} ${state}  ${t.name} ${counts}`);
  }
  console.log('');
  printInfo(`${transforms.length} transform(s)`);
}

function printTransformDetail(t: Transform): void {
  printHeader(`Transform ${t.id}`);
  console.log(`  ${chalk.cyan('Name'.padEnd(12))} ${t.name}`);
  if (t.description) {
    console.log(`  ${chalk.cyan('Description'.padEnd(12))} ${t.description}`);
  }
  console.log(`  ${chalk.cyan('Enabled'.padEnd(12))} ${t.enabled ? 'yes' : 'no'}`);
  console.log(`  ${chalk.cyan('Updated'.padEnd(12))} ${t.updatedAt}`);
  console.log('');
  console.log(chalk.bold('  Criteria (all must match)'));
  for (const criterion of criteriaList(t.criteria)) {
    console.log(`    - ${describeCriterion(criterion)}`);
  }
  console.log('');
  console.log(chalk.bold('  Actions'));
  if (t.actions.length === 0) {
    console.log(chalk.gray('    (none)'));
  }
  for (const action of t.actions) {
    const key = action.key ? `${action.key} ` : '';
    console.log(`    - ${action.actionType} ${key}${action.value}`);
  }
  console.log('');
}
