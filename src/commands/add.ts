import { readFile } from 'node:fs/promises';
import { relative } from 'node:path';

import { logger } from '../ui/logger.js';
import { confirmPrompt } from '../ui/prompts.js';
import { errorMessage } from '../utils/errors.js';
import { applyBatch } from '../core/mutation-applier.js';
import type { FileApplyResult } from '../core/mutation-applier.js';
import { toLookup } from '../core/location-recorder.js';
import type { LocationLookup } from '../core/location-recorder.js';
import { planFieldValue } from '../core/mutation-planner.js';
import type { Edit, PlanResult } from '../core/mutation-planner.js';
import { matchesServiceFilter } from '../core/scanner.js';
import { runScan } from './shared.js';
import type { CommonOptions } from './shared.js';

export interface AddOptions extends CommonOptions {
  service: string;
  field?: string;
  dryRun?: boolean;
  yes?: boolean;
}

export interface AddSummary {
  plans: PlanResult[];
  results: FileApplyResult[];
}

/**
 * Adds `value` to a comma-separated field of every service matching the filter,
 * in every scanned file. Existing members are left alone.
 */
export async function addCommand(path: string, value: string, options: AddOptions): Promise<AddSummary> {
  const scan = await runScan(path, options, 'yaml', {
    keyBy: 'path',
    overrides: options.field ? { profileField: options.field } : {},
  });
  if (!scan) return { plans: [], results: [] };

  const { aggregator, settings, dir } = scan;
  const field = settings.profileField;
  const display = (file: string): string => relative(dir, file) || file;

  const plans: PlanResult[] = [];
  for (const file of aggregator.files()) {
    const services = aggregator.servicesIn(file).filter((service) => matchesServiceFilter(service, options.service));
    if (services.length === 0) continue;

    let lines: string[];
    try {
      lines = (await readFile(file, 'utf-8')).split('\n');
    } catch (error) {
      logger.warn(`Skipped ${display(file)}: ${errorMessage(error)}`);
      continue;
    }

    for (const service of services) {
      const target = { file, service };
      // a service repeated in one file gets a plan per block
      const lookups: LocationLookup[] = aggregator.locations.occurrences(file, service).map(toLookup);
      for (const lookup of lookups.length > 0 ? lookups : [aggregator.locations.lookup(file, service)]) {
        const plan = planFieldValue(lines, target, lookup, {
          field,
          value,
          indentStep: settings.indentStep,
        });
        plans.push(plan);
        reportPlan(plan, display(file), field, value);
      }
    }
  }

  if (plans.length === 0) {
    logger.warn(`No services matching '${options.service}'`);
    return { plans, results: [] };
  }

  const edits: Edit[] = [];
  for (const plan of plans) {
    if (plan.status === 'planned') edits.push(plan.edit);
  }
  if (edits.length === 0) {
    logger.success('Nothing to change');
    return { plans, results: [] };
  }

  if (!options.dryRun && !options.yes && process.stdout.isTTY) {
    const proceed = await confirmPrompt(`Apply ${edits.length} edit(s)?`, true);
    if (!proceed) {
      logger.info('No files were changed.');
      return { plans, results: [] };
    }
  }

  const results = await applyBatch(edits, { dryRun: options.dryRun });
  for (const result of results) {
    reportResult(result, display(result.file));
  }
  if (options.dryRun) {
    logger.info('Dry run: no files were written.');
  }

  return { plans, results };
}

function reportPlan(plan: PlanResult, file: string, field: string, value: string): void {
  const where = `${file} › ${plan.target.service}`;
  switch (plan.status) {
    case 'not-found':
      logger.warn(`${where}: service block not found`);
      break;
    case 'already-present':
      logger.dim(`${where}: ${field} already contains ${value} (line ${plan.line + 1})`);
      break;
    case 'planned':
      logger.info(
        plan.edit.action === 'update'
          ? `${where}: append ${value} to ${field} (line ${plan.edit.line + 1})`
          : `${where}: add ${field}: ${value} after line ${plan.edit.line + 1}`,
      );
      break;
  }
}

function reportResult(result: FileApplyResult, file: string): void {
  if (result.status === 'failed') {
    logger.error(`Could not update ${file}: ${result.error}`);
    return;
  }

  if (result.status === 'dry-run') {
    const before = result.before.split('\n');
    logger.dim(file);
    for (const edit of [...result.edits].reverse()) {
      if (edit.action === 'update') {
        logger.lineChange(edit.line + 1, before[edit.line].replace(/\r$/, ''), edit.text);
      } else {
        logger.lineChange(edit.line + 2, null, edit.text);
      }
    }
  } else if (result.status === 'written') {
    logger.fileModified(file);
  }
}
