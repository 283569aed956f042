import { indentWidth } from './line-classifier.js';
import type { LocationLookup } from './location-recorder.js';

export type EditAction = 'update' | 'insert-after';

/** A single-line change to one file. `line` is a 0-based index. */
export interface Edit {
  file: string;
  line: number;
  action: EditAction;
  text: string;
}

export interface MutationTarget {
  file: string;
  service: string;
}

export interface FieldValueRequest {
  field: string;
  value: string;
  /** Columns added to the header's indent when the block has no body to copy from. */
  indentStep?: number;
}

export type PlanResult =
  | { status: 'not-found'; target: MutationTarget }
  | { status: 'already-present'; target: MutationTarget; line: number }
  | { status: 'planned'; target: MutationTarget; edit: Edit };

const WRAPPERS: ReadonlyArray<readonly [string, string]> = [
  ['"', '"'],
  ["'", "'"],
  ['[', ']'],
];

function escapeKey(key: string): string {
  return key.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function withoutCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

function isContent(line: string): boolean {
  const trimmed = line.trim();
  return trimmed !== '' && !trimmed.startsWith('#');
}

interface ListValue {
  open: string;
  close: string;
  inner: string;
}

function unwrap(raw: string): ListValue {
  for (const [open, close] of WRAPPERS) {
    if (raw.length >= 2 && raw.startsWith(open) && raw.endsWith(close)) {
      return { open, close, inner: raw.slice(1, -1) };
    }
  }
  return { open: '', close: '', inner: raw };
}

export function parseListValue(raw: string): string[] {
  return unwrap(raw.trim())
    .inner.split(',')
    .map((item) => item.trim().replace(/^["']|["']$/g, ''))
    .filter((item) => item.length > 0);
}

/** Appends `value` to a comma-separated value, keeping its wrapping and separator style. */
export function appendListValue(raw: string, value: string): string {
  const { open, close, inner } = unwrap(raw.trim());
  const kept = inner.replace(/[\s,]+$/, '');
  if (!kept) return `${open}${value}${close}`;
  const separator = inner.includes(', ') ? ', ' : ',';
  return `${open}${kept}${separator}${value}${close}`;
}

/**
 * Plans adding `value` to the comma-separated `field` of one service block.
 * Looks only inside the block's recorded range and never touches the file.
 */
export function planFieldValue(
  lines: readonly string[],
  target: MutationTarget,
  lookup: LocationLookup,
  request: FieldValueRequest,
): PlanResult {
  if (!lookup.found) return { status: 'not-found', target };

  const { location } = lookup;
  const pattern = new RegExp(`^(\\s*(?:-\\s*)?${escapeKey(request.field)}\\s*:[ \\t]*)(.*?)(\\s+#.*)?$`);

  let bodyIndent: number | null = null;
  for (let index = location.lineStart + 1; index <= location.lineEnd && index < lines.length; index++) {
    const line = withoutCarriageReturn(lines[index]);
    if (!isContent(line)) continue;

    const indent = indentWidth(line);
    bodyIndent ??= indent;
    if (indent !== bodyIndent) continue;

    const match = pattern.exec(line);
    if (!match) continue;

    const [, prefix, rawValue, comment = ''] = match;
    const spacer = rawValue === '' && !/\s$/.test(prefix) ? ' ' : '';
    if (parseListValue(rawValue).includes(request.value)) {
      return { status: 'already-present', target, line: index };
    }
    return {
      status: 'planned',
      target,
      edit: {
        file: target.file,
        line: index,
        action: 'update',
        text: `${prefix}${spacer}${appendListValue(rawValue, request.value)}${comment}`,
      },
    };
  }

  // an empty block takes the sibling indent of its `name:` line, or one step below its header
  const fallback = location.inline ? location.indent : location.indent + (request.indentStep ?? 2);
  const indent = bodyIndent ?? fallback;
  return {
    status: 'planned',
    target,
    edit: {
      file: target.file,
      line: location.lineStart,
      action: 'insert-after',
      text: `${' '.repeat(indent)}${request.field}: ${request.value}`,
    },
  };
}
