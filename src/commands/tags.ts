import { logger } from '../ui/logger.js';
import { isCustomTag } from '../core/custom-tag.js';
import { matchesServiceFilter } from '../core/scanner.js';
import type { Report } from '../report/index.js';
import { emitReport, runScan } from './shared.js';
import type { CommonOptions, OutputOptions } from './shared.js';

export interface TagsOptions extends CommonOptions, OutputOptions {
  all?: boolean;
  service?: string;
  brief?: boolean;
  grouped?: boolean;
}

export interface TagRow {
  file: string;
  service: string;
  tag: string;
  line: number;
}

export async function tagsCommand(path: string, options: TagsOptions): Promise<TagRow[]> {
  const scan = await runScan(path, options, 'prod');
  if (!scan) return [];

  const { aggregator, settings } = scan;
  const rows: TagRow[] = [];
  for (const record of aggregator.records()) {
    if (!matchesServiceFilter(record.service, options.service)) continue;
    for (const tag of record.tags) {
      if (!options.all && !isCustomTag(tag.value, settings.genericTags)) continue;
      rows.push({ file: record.file, service: record.service, tag: tag.value, line: tag.line });
    }
  }

  const kind = options.all ? 'Tags' : 'Custom tags';
  if (rows.length === 0) {
    logger.success(`${kind} not found`);
  } else if (options.grouped && !options.quiet) {
    printGrouped(rows);
  }

  if (rows.length > 0) {
    await emitReport(toReport(kind, rows, options.brief), {
      ...options,
      quiet: options.quiet || options.grouped,
    });
  }

  const filesWithTags = new Set(rows.map((row) => row.file)).size;
  logger.info(
    `Files scanned: ${scan.files.length}, with ${kind.toLowerCase()}: ${filesWithTags}, ` +
      `occurrences: ${rows.length}, distinct: ${new Set(rows.map((row) => row.tag)).size}`,
  );

  return rows;
}

function toReport(kind: string, rows: TagRow[], brief = false): Report {
  return {
    title: `${kind} by service`,
    headers: brief ? ['file', 'service', 'tag'] : ['file', 'service', 'tag', 'line'],
    rows: rows.map((row) =>
      brief ? [row.file, row.service, row.tag] : [row.file, row.service, row.tag, String(row.line)],
    ),
  };
}

function printGrouped(rows: TagRow[]): void {
  const byFile = new Map<string, TagRow[]>();
  for (const row of rows) {
    byFile.set(row.file, [...(byFile.get(row.file) ?? []), row]);
  }
  for (const [file, fileRows] of byFile) {
    logger.plain(`path: ${file}`);
    for (const row of fileRows) {
      logger.plain(`  service: ${row.service}`);
      logger.plain(`  tag: ${row.tag}`);
    }
    logger.plain('');
  }
}
