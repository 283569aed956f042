import { logger } from '../ui/logger.js';
import { matchesServiceFilter } from '../core/scanner.js';
import type { ScanAggregator } from '../core/fact-extractor.js';
import { emitReport, runScan } from './shared.js';
import type { CommonOptions, OutputOptions } from './shared.js';

export interface OptionsCommandOptions extends CommonOptions, OutputOptions {
  service?: string;
  field?: string;
  listServices?: boolean;
}

export interface OptionRow {
  file: string;
  service: string;
  option: string;
}

export interface OptionsResult {
  rows: OptionRow[];
  distinct: string[];
}

export async function optionsCommand(path: string, options: OptionsCommandOptions): Promise<OptionsResult> {
  const scan = await runScan(path, options, 'yaml', {
    overrides: options.field ? { optionsField: options.field } : {},
  });
  if (!scan) return { rows: [], distinct: [] };

  if (options.listServices) {
    printServices(scan.aggregator);
    return { rows: [], distinct: [] };
  }

  const { aggregator } = scan;
  const field = scan.settings.optionsField;

  const rows: OptionRow[] = [];
  for (const record of aggregator.records()) {
    if (!matchesServiceFilter(record.service, options.service)) continue;
    for (const option of record.options) {
      rows.push({ file: record.file, service: record.service, option });
    }
  }

  // without a filter every collected option is in the report
  const distinct = options.service
    ? [...new Set(rows.map((row) => row.option))].sort()
    : [...aggregator.distinctOptions].sort();

  const filterText = options.service ? ` (filter: '${options.service}')` : '';
  if (rows.length === 0) {
    logger.success(`No ${field} found in services${filterText}`);
    logger.info(`Files scanned: ${scan.files.length}`);
    return { rows, distinct };
  }

  await emitReport(
    {
      title: `${field} in services${filterText}`,
      headers: ['file', 'service', field],
      rows: rows.map((row) => [row.file, row.service, row.option]),
    },
    options,
  );

  if (!options.quiet) {
    logger.header(`Distinct ${field} values`);
    for (const option of distinct) logger.plain(`  ${option}`);
  }

  const services = new Set(rows.map((row) => `${row.file}\0${row.service}`)).size;
  logger.info(
    `Files scanned: ${scan.files.length}, services with ${field}: ${services}, distinct values: ${distinct.length}`,
  );

  return { rows, distinct };
}

function printServices(aggregator: ScanAggregator): void {
  const files = aggregator.files().filter((file) => aggregator.servicesIn(file).length > 0);
  if (files.length === 0) {
    logger.warn('No services found');
    return;
  }

  logger.header('Services by file');
  let total = 0;
  for (const file of files) {
    const services = aggregator.servicesIn(file);
    total += services.length;
    logger.plain(`${file}:`);
    for (const service of services) logger.plain(`  - ${service}`);
  }
  logger.info(`Services found: ${total}`);
}
