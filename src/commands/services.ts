import { logger } from '../ui/logger.js';
import { writeReportFile } from '../utils/fs.js';
import { UsageError } from '../utils/errors.js';
import { matchesServiceFilter } from '../core/scanner.js';
import type { ScanAggregator } from '../core/fact-extractor.js';
import { renderCsv } from '../report/csv.js';
import { renderTextTable } from '../report/text.js';
import { runScan } from './shared.js';
import type { CommonOptions } from './shared.js';

export type SummaryMode = 'services' | 'files';
export type CsvMode = 'services' | 'files' | 'summary';

export const SUMMARY_MODES: readonly SummaryMode[] = ['services', 'files'];
export const CSV_MODES: readonly CsvMode[] = ['services', 'files', 'summary'];

export interface ServicesOptions extends CommonOptions {
  service?: string;
  file?: string;
  summary?: SummaryMode;
  output?: string;
  csvMode?: CsvMode;
}

export async function servicesCommand(path: string, options: ServicesOptions): Promise<void> {
  if (!options.service && !options.file && !options.summary) {
    throw new UsageError('Specify one of --service <name>, --file <label> or --summary <services|files>');
  }

  const scan = await runScan(path, options, 'yaml');
  if (!scan) return;
  const { aggregator } = scan;

  if (options.file) {
    printServicesInFile(aggregator, options.file);
  } else if (options.summary) {
    printSummary(aggregator, options.summary);
  } else {
    printFilesWithService(aggregator, options.service ?? '');
  }

  logger.info(`Files scanned: ${scan.files.length}`);

  if (options.output) {
    const mode = options.csvMode ?? (options.summary === 'services' ? 'summary' : 'services');
    await writeReportFile(options.output, renderCsvExport(aggregator, mode, options.service));
    logger.success(`Data saved: ${options.output}`);
  }
}

/** Services with their file count, most widely deployed first. */
export function serviceCounts(aggregator: ScanAggregator): [string, number][] {
  return [...aggregator.filesByService()]
    .map(([service, files]): [string, number] => [service, files.length])
    .sort(([a, countA], [b, countB]) => countB - countA || a.localeCompare(b));
}

export function fileCounts(aggregator: ScanAggregator): [string, number][] {
  return aggregator
    .files()
    .map((file): [string, number] => [file, aggregator.servicesIn(file).length])
    .sort(([a, countA], [b, countB]) => countB - countA || a.localeCompare(b));
}

export function renderCsvExport(aggregator: ScanAggregator, mode: CsvMode, filter?: string): string {
  switch (mode) {
    case 'services': {
      const rows: string[][] = [];
      for (const [service, files] of aggregator.filesByService()) {
        if (!matchesServiceFilter(service, filter)) continue;
        for (const file of files) rows.push([service, file]);
      }
      return renderCsv(['service', 'file'], rows);
    }
    case 'files': {
      const rows: string[][] = [];
      for (const file of [...aggregator.files()].sort()) {
        for (const service of aggregator.servicesIn(file)) {
          if (matchesServiceFilter(service, filter)) rows.push([file, service]);
        }
      }
      return renderCsv(['file', 'service'], rows);
    }
    case 'summary':
      return renderCsv(
        ['service', 'file_count'],
        serviceCounts(aggregator).map(([service, count]) => [service, String(count)]),
      );
  }
}

function printFilesWithService(aggregator: ScanAggregator, filter: string): void {
  const matched = [...aggregator.filesByService()].filter(([service]) => matchesServiceFilter(service, filter));
  if (matched.length === 0) {
    logger.warn(`No services matching '${filter}'`);
    return;
  }

  logger.header(`Files with services matching '${filter}'`);
  for (const [service, files] of matched) {
    logger.plain(`${service} (${files.length} file(s))`);
    for (const file of files) logger.plain(`  • ${file}`);
  }
}

function printServicesInFile(aggregator: ScanAggregator, file: string): void {
  if (!aggregator.files().includes(file)) {
    logger.warn(`File '${file}' not found`);
    const available = [...aggregator.files()].sort().slice(0, 10);
    if (available.length > 0) {
      logger.dim(`Available: ${available.join(', ')}`);
    }
    return;
  }

  logger.header(`Services in ${file}`);
  for (const location of aggregator.locations.forFile(file)) {
    logger.plain(`  • ${location.service} (lines ${location.lineStart + 1}-${location.lineEnd + 1})`);
  }
  logger.info(`Services: ${aggregator.servicesIn(file).length}`);
}

function printSummary(aggregator: ScanAggregator, mode: SummaryMode): void {
  const counts = mode === 'services' ? serviceCounts(aggregator) : fileCounts(aggregator);
  if (counts.length === 0) {
    logger.warn(mode === 'services' ? 'No services found' : 'No files found');
    return;
  }

  const headers = mode === 'services' ? ['service', 'files'] : ['file', 'services'];
  logger.header(mode === 'services' ? 'Services summary' : 'Files summary');
  logger.plain(renderTextTable(headers, counts.map(([name, count]) => [name, String(count)])).trimEnd());
  logger.info(
    `Distinct services: ${aggregator.filesByService().size}, files: ${aggregator.files().length}`,
  );
}
