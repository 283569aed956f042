import { relative } from 'node:path';

import { logger } from '../ui/logger.js';
import { withSpinner } from '../ui/spinner.js';
import { writeReportFile } from '../utils/fs.js';
import { loadScanSettings } from '../core/config.js';
import type { ScanSettings } from '../core/config.js';
import { resolveScanDirectory, selectFiles } from '../core/file-selector.js';
import type { FilePattern } from '../core/file-selector.js';
import { scanFiles } from '../core/scanner.js';
import type { ScanOptions, ScanResult } from '../core/scanner.js';
import { renderReport } from '../report/index.js';
import type { Report, ReportFormat } from '../report/index.js';

export interface CommonOptions {
  config?: string;
  pattern?: FilePattern;
  quiet?: boolean;
}

export interface OutputOptions {
  output?: string;
  format?: ReportFormat;
  quiet?: boolean;
}

export interface RunScanOptions extends ScanOptions {
  /** Settings that win over the config file, from command-line flags. */
  overrides?: Partial<ScanSettings>;
}

export interface PreparedScan extends ScanResult {
  dir: string;
  settings: ScanSettings;
}

/**
 * Validates the directory, loads settings and scans the matching files.
 * Returns null, after a warning, when no file matches.
 */
export async function runScan(
  path: string,
  options: CommonOptions,
  defaultPattern: FilePattern,
  scanOptions: RunScanOptions = {},
): Promise<PreparedScan | null> {
  const dir = await resolveScanDirectory(path);
  const settings = { ...(await loadScanSettings(dir, options.config)), ...scanOptions.overrides };
  const pattern = options.pattern ?? defaultPattern;

  const files = await selectFiles(dir, pattern);
  if (files.length === 0) {
    logger.warn(
      pattern === 'prod'
        ? `No prod*.yml files found in ${dir}`
        : `No .yml/.yaml files found in ${dir}`,
    );
    return null;
  }

  const result = await withSpinner(
    `Scanning ${files.length} file(s) in ${relative(process.cwd(), dir) || '.'}`,
    () => scanFiles(files, settings, scanOptions),
    options.quiet,
  );

  for (const failure of result.failures) {
    logger.warn(`Skipped ${failure.file.path}: ${failure.error}`);
  }

  return { ...result, dir, settings };
}

/** Prints the report unless quiet, and writes it when an output file is given. */
export async function emitReport(report: Report, options: OutputOptions): Promise<void> {
  if (!options.quiet) {
    logger.plain(renderReport(report, 'txt').trimEnd());
  }

  if (options.output) {
    await writeReportFile(options.output, renderReport(report, options.format ?? 'txt'));
    logger.success(`Report saved: ${options.output}`);
  }
}
