export type LineKind = 'blank' | 'comment' | 'name-field' | 'header' | 'scalar' | 'unrecognized';

interface LineBase {
  text: string;
  /** Count of leading whitespace characters. */
  indent: number;
  /** True when the key sits behind a `- ` list marker. */
  listItem: boolean;
}

export type ClassifiedLine =
  | (LineBase & { kind: 'blank' })
  | (LineBase & { kind: 'comment' })
  | (LineBase & { kind: 'name-field'; name: string })
  | (LineBase & { kind: 'header'; name: string; excluded: boolean })
  | (LineBase & { kind: 'scalar'; key: string; value: string })
  | (LineBase & { kind: 'unrecognized' });

/**
 * Words that decide how header lines are read: the key that declares a service's
 * name explicitly, and the structural keys that never name a service.
 */
export interface Vocabulary {
  nameField: string;
  excludedKeys: ReadonlySet<string>;
}

const COMMENT_MARKER = '#';

// "key:" with nothing after the colon, optionally behind a list marker
const HEADER_PATTERN = /^(\s*)(-\s*)?([A-Za-z0-9_-]+):\s*$/;

// "key: value"; keys may be dotted (spring.profiles.active)
const SCALAR_PATTERN = /^(\s*)(-\s*)?([A-Za-z0-9_.-]+)\s*:\s*(.+)$/;

const nameFieldPatterns = new Map<string, RegExp>();

function nameFieldPattern(field: string): RegExp {
  let pattern = nameFieldPatterns.get(field);
  if (!pattern) {
    const key = field.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    pattern = new RegExp(`^(\\s*)(-\\s*)?${key}:\\s*(["']?)([A-Za-z0-9_-]+)\\3\\s*$`);
    nameFieldPatterns.set(field, pattern);
  }
  return pattern;
}

export function indentWidth(text: string): number {
  return text.length - text.trimStart().length;
}

/** Removes one pair of matching surrounding quotes. */
export function stripQuotes(value: string): string {
  if (value.length >= 2) {
    const quote = value[0];
    if ((quote === '"' || quote === "'") && value.endsWith(quote)) {
      return value.slice(1, -1);
    }
  }
  return value;
}

export function classifyLine(text: string, vocabulary: Vocabulary): ClassifiedLine {
  // CRLF files keep their \r on the raw text; patterns see the line without it
  const body = text.endsWith('\r') ? text.slice(0, -1) : text;
  const indent = indentWidth(body);
  const trimmed = body.trim();

  if (!trimmed) {
    return { kind: 'blank', text, indent, listItem: false };
  }
  if (trimmed.startsWith(COMMENT_MARKER)) {
    return { kind: 'comment', text, indent, listItem: false };
  }

  const nameMatch = nameFieldPattern(vocabulary.nameField).exec(body);
  if (nameMatch) {
    return { kind: 'name-field', text, indent, listItem: nameMatch[2] !== undefined, name: nameMatch[4] };
  }

  const headerMatch = HEADER_PATTERN.exec(body);
  if (headerMatch) {
    const name = headerMatch[3];
    return {
      kind: 'header',
      text,
      indent,
      listItem: headerMatch[2] !== undefined,
      name,
      excluded: vocabulary.excludedKeys.has(name),
    };
  }

  const scalarMatch = SCALAR_PATTERN.exec(body);
  if (scalarMatch) {
    return {
      kind: 'scalar',
      text,
      indent,
      listItem: scalarMatch[2] !== undefined,
      key: scalarMatch[3],
      value: stripQuotes(scalarMatch[4].trim()),
    };
  }

  return { kind: 'unrecognized', text, indent, listItem: trimmed.startsWith('-') };
}

export function isContentLine(line: ClassifiedLine): boolean {
  return line.kind !== 'blank' && line.kind !== 'comment';
}
