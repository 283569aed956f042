import { classifyLine } from './line-classifier.js';
import { IndentTracker } from './indent-tracker.js';
import type { TrackerEvent } from './indent-tracker.js';
import { LocationRecorder } from './location-recorder.js';
import type { ScanSettings } from './config.js';

export interface TagOccurrence {
  /** 1-based line number, as reported to users. */
  line: number;
  value: string;
}

export interface ServiceRecord {
  file: string;
  service: string;
  /** Indent of the first header seen for this service. */
  indent: number;
  tags: TagOccurrence[];
  options: string[];
  /** Value of an explicit `name:` field inside the block; the last one wins. */
  declaredName?: string;
}

/**
 * Process-scoped collector shared by every file of one scan. Append-only while
 * scanning, read-only afterwards.
 */
export class ScanAggregator {
  readonly locations = new LocationRecorder();
  readonly distinctTags = new Set<string>();
  readonly distinctOptions = new Set<string>();

  private readonly recordsByKey = new Map<string, ServiceRecord>();
  private readonly servicesByFile = new Map<string, Set<string>>();

  /** Registers a file even when it turns out to hold no services. */
  addFile(file: string): void {
    if (!this.servicesByFile.has(file)) {
      this.servicesByFile.set(file, new Set());
    }
  }

  recordFor(file: string, service: string, indent: number): ServiceRecord {
    const key = `${file}\0${service}`;
    let record = this.recordsByKey.get(key);
    if (!record) {
      record = { file, service, indent, tags: [], options: [] };
      this.recordsByKey.set(key, record);
    }
    this.addFile(file);
    this.servicesByFile.get(file)?.add(service);
    return record;
  }

  get(file: string, service: string): ServiceRecord | undefined {
    return this.recordsByKey.get(`${file}\0${service}`);
  }

  /** Records in scan order: files as scanned, services as first seen. */
  records(): ServiceRecord[] {
    return [...this.recordsByKey.values()];
  }

  files(): string[] {
    return [...this.servicesByFile.keys()];
  }

  servicesIn(file: string): string[] {
    return [...(this.servicesByFile.get(file) ?? [])].sort();
  }

  /** Every distinct service name mapped to the sorted files that define it. */
  filesByService(): Map<string, string[]> {
    const result = new Map<string, string[]>();
    for (const [file, services] of this.servicesByFile) {
      for (const service of services) {
        const files = result.get(service) ?? [];
        files.push(file);
        result.set(service, files);
      }
    }
    for (const files of result.values()) files.sort();
    return new Map([...result.entries()].sort(([a], [b]) => a.localeCompare(b)));
  }
}

/**
 * Splits an option list on whitespace. Quoted substrings stay in one token and
 * lose their quotes; an unterminated quote runs to the end of the value.
 */
export function tokenizeOptions(value: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let quote: string | null = null;

  for (let index = 0; index < value.length; index++) {
    const char = value[index];
    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }
    if ((char === '"' || char === "'") && opensQuote(value, index, current)) {
      quote = char;
    } else if (/\s/.test(char)) {
      if (current) tokens.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  if (current) tokens.push(current);
  return tokens;
}

// Inside a token a quote only opens when its partner ends a token, so `it's` stays literal.
function opensQuote(value: string, index: number, current: string): boolean {
  if (current === '') return true;
  const close = value.indexOf(value[index], index + 1);
  return close !== -1 && (close + 1 === value.length || /\s/.test(value[close + 1]));
}

/**
 * Scans one file's text and adds what it finds to the aggregator. Returns the
 * records of the services found in this file.
 */
export function extractFacts(
  file: string,
  text: string,
  settings: ScanSettings,
  aggregator: ScanAggregator,
): ServiceRecord[] {
  const tracker = new IndentTracker(settings);
  const touched = new Map<string, ServiceRecord>();
  aggregator.addFile(file);

  const handle = (event: TrackerEvent): void => {
    switch (event.type) {
      case 'service-open': {
        const record = aggregator.recordFor(file, event.service, event.indent);
        touched.set(event.service, record);
        break;
      }
      case 'service-close':
        aggregator.locations.record({
          file,
          service: event.service,
          lineStart: event.lineStart,
          lineEnd: event.lineEnd,
          indent: event.indent,
          inline: event.inline,
        });
        break;
      case 'declared-name': {
        const record = touched.get(event.service);
        if (record) record.declaredName = event.name;
        break;
      }
      case 'field':
        recordField(event, touched.get(event.service), settings, aggregator);
        break;
      default:
        break;
    }
  };

  text.split('\n').forEach((raw, index) => {
    tracker.feed(index, classifyLine(raw, settings)).forEach(handle);
  });
  tracker.finish().forEach(handle);

  return [...touched.values()];
}

function recordField(
  event: Extract<TrackerEvent, { type: 'field' }>,
  record: ServiceRecord | undefined,
  settings: ScanSettings,
  aggregator: ScanAggregator,
): void {
  if (!record) return;

  if (event.key === settings.tagField) {
    record.tags.push({ line: event.line + 1, value: event.value });
    aggregator.distinctTags.add(event.value);
  } else if (event.key === settings.optionsField) {
    const options = tokenizeOptions(event.value);
    record.options.push(...options);
    for (const option of options) aggregator.distinctOptions.add(option);
  }
}
