import { readFile } from 'node:fs/promises';

import { errorMessage } from '../utils/errors.js';
import { ScanAggregator, extractFacts } from './fact-extractor.js';
import { selectFiles } from './file-selector.js';
import type { FilePattern, SelectedFile } from './file-selector.js';
import type { ScanSettings } from './config.js';

export interface ScanFailure {
  file: SelectedFile;
  error: string;
}

export interface ScanResult {
  files: SelectedFile[];
  failures: ScanFailure[];
  aggregator: ScanAggregator;
}

export function matchesServiceFilter(service: string, filter?: string): boolean {
  if (!filter) return true;
  return service.toLowerCase().includes(filter.toLowerCase());
}

export interface ScanOptions {
  /** Key facts by report label (default) or by absolute path, which edits need. */
  keyBy?: 'label' | 'path';
}

/**
 * Scans `files` one after another into a single aggregator. A file that cannot
 * be read is recorded as a failure and the scan moves on.
 */
export async function scanFiles(
  files: SelectedFile[],
  settings: ScanSettings,
  options: ScanOptions = {},
): Promise<ScanResult> {
  const aggregator = new ScanAggregator();
  const failures: ScanFailure[] = [];

  for (const file of files) {
    let text: string;
    try {
      text = await readFile(file.path, 'utf-8');
    } catch (error) {
      failures.push({ file, error: errorMessage(error) });
      continue;
    }
    extractFacts(options.keyBy === 'path' ? file.path : file.label, text, settings, aggregator);
  }

  return { files, failures, aggregator };
}

export async function scanDirectory(
  dir: string,
  pattern: FilePattern,
  settings: ScanSettings,
  options: ScanOptions = {},
): Promise<ScanResult> {
  return scanFiles(await selectFiles(dir, pattern), settings, options);
}
