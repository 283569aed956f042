import { classifyLine, isContentLine } from './line-classifier.js';
import type { ClassifiedLine, Vocabulary } from './line-classifier.js';

/** A block nested inside a service body, keyed by the indent of its header. */
export interface BlockContext {
  indent: number;
  name: string;
}

interface OpenService {
  name: string;
  lineStart: number;
  indent: number;
  /** Smallest indent of a body line. */
  bodyIndent: number;
  lastContent: number;
}

type TrackerState =
  | { mode: 'outside' }
  | { mode: 'inside'; rootIndent: number; service: OpenService | null; stack: BlockContext[] };

export type TrackerEvent =
  | { type: 'root-enter'; line: number; indent: number }
  | { type: 'root-exit'; line: number }
  | { type: 'service-open'; service: string; line: number; indent: number }
  | {
      type: 'service-close';
      service: string;
      lineStart: number;
      lineEnd: number;
      indent: number;
      inline: boolean;
    }
  | { type: 'declared-name'; service: string; name: string; line: number }
  | { type: 'field'; service: string; key: string; value: string; line: number };

export interface TrackerSettings extends Vocabulary {
  rootBlock: string;
}

/**
 * Rebuilds the service hierarchy of a file from indentation alone. Lines are fed
 * top to bottom; every call returns the events the line caused. Line numbers in
 * events are 0-based indexes into the file's line sequence.
 */
export class IndentTracker {
  private state: TrackerState = { mode: 'outside' };

  constructor(private readonly settings: TrackerSettings) {}

  feed(index: number, line: ClassifiedLine): TrackerEvent[] {
    if (!isContentLine(line)) return [];

    const events: TrackerEvent[] = [];

    if (this.state.mode === 'inside' && line.indent <= this.state.rootIndent && !line.listItem) {
      this.closeService(events);
      events.push({ type: 'root-exit', line: index });
      this.state = { mode: 'outside' };
    }

    if (this.state.mode === 'outside') {
      if (line.kind === 'header' && line.name === this.settings.rootBlock && !line.listItem) {
        this.state = { mode: 'inside', rootIndent: line.indent, service: null, stack: [] };
        events.push({ type: 'root-enter', line: index, indent: line.indent });
      }
      return events;
    }

    // list items at the root's own indent cannot open a service
    if (line.indent <= this.state.rootIndent) return events;

    const service = this.state.service;
    const bodyLine =
      service !== null &&
      (line.indent >= service.bodyIndent || (line.kind === 'header' && line.excluded));

    if (service && bodyLine) {
      this.consumeBodyLine(index, line, service, events);
      return events;
    }

    if (opensService(line, service !== null)) {
      this.closeService(events);
      const name = line.kind === 'header' || line.kind === 'name-field' ? line.name : '';
      // a plain `name:` line shares its indent with the rest of the block
      const inline = line.kind === 'name-field' && !line.listItem;
      this.state.service = {
        name,
        lineStart: index,
        indent: line.indent,
        bodyIndent: inline ? line.indent : line.indent + 1,
        lastContent: index,
      };
      this.state.stack = [];
      events.push({ type: 'service-open', service: name, line: index, indent: line.indent });
      return events;
    }

    // a sibling of the service that is not itself a service ends the block
    this.closeService(events);
    return events;
  }

  /** Closes the block still open at end of input. */
  finish(): TrackerEvent[] {
    const events: TrackerEvent[] = [];
    this.closeService(events);
    return events;
  }

  private consumeBodyLine(
    index: number,
    line: ClassifiedLine,
    service: OpenService,
    events: TrackerEvent[],
  ): void {
    if (this.state.mode !== 'inside') return;

    service.lastContent = index;
    const stack = this.state.stack;
    while (stack.length > 0 && stack[stack.length - 1].indent >= line.indent) {
      stack.pop();
    }
    const direct = stack.length === 0;

    switch (line.kind) {
      case 'header':
        stack.push({ indent: line.indent, name: line.name });
        break;
      case 'name-field':
        if (direct && !line.listItem) {
          events.push({ type: 'declared-name', service: service.name, name: line.name, line: index });
        }
        break;
      case 'scalar':
        if (direct) {
          events.push({ type: 'field', service: service.name, key: line.key, value: line.value, line: index });
        }
        break;
      default:
        break;
    }
  }

  private closeService(events: TrackerEvent[]): void {
    if (this.state.mode !== 'inside' || !this.state.service) return;
    const { name, lineStart, lastContent, indent, bodyIndent } = this.state.service;
    events.push({
      type: 'service-close',
      service: name,
      lineStart,
      lineEnd: lastContent,
      indent,
      inline: bodyIndent === indent,
    });
    this.state.service = null;
    this.state.stack = [];
  }
}

function opensService(line: ClassifiedLine, serviceOpen: boolean): boolean {
  if (line.kind === 'header') return !line.excluded;
  if (line.kind === 'name-field') return line.listItem || !serviceOpen;
  return false;
}

/** Runs a tracker over whole text and returns every event in order. */
export function trackText(text: string, settings: TrackerSettings): TrackerEvent[] {
  const tracker = new IndentTracker(settings);
  const lines = text.split('\n');
  const events: TrackerEvent[] = [];
  lines.forEach((raw, index) => {
    events.push(...tracker.feed(index, classifyLine(raw, settings)));
  });
  events.push(...tracker.finish());
  return events;
}
