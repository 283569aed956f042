import { readFile } from 'node:fs/promises';

import { writeFileAtomic } from '../utils/fs.js';
import { MutationTargetError, errorMessage } from '../utils/errors.js';
import type { Edit } from './mutation-planner.js';

export interface ApplyOptions {
  dryRun?: boolean;
}

export type FileApplyResult =
  | {
      file: string;
      status: 'written' | 'dry-run' | 'unchanged';
      /** Edits in the order they were applied. */
      edits: Edit[];
      before: string;
      after: string;
    }
  | { file: string; status: 'failed'; edits: Edit[]; error: string };

/**
 * Orders edits bottom-up so that applying one never shifts the line index of
 * another. Edits on the same line run in reverse plan order, which leaves
 * several inserts after one line in plan order.
 */
export function orderEdits(edits: readonly Edit[]): Edit[] {
  return edits
    .map((edit, position) => ({ edit, position }))
    .sort((a, b) => b.edit.line - a.edit.line || b.position - a.position)
    .map(({ edit }) => edit);
}

export function applyEditsToLines(lines: readonly string[], edits: readonly Edit[]): string[] {
  const result = [...lines];

  for (const edit of orderEdits(edits)) {
    if (edit.line < 0 || edit.line >= result.length) {
      throw new MutationTargetError(edit.file, edit.line);
    }
    const anchor = result[edit.line];
    const eol = anchor.endsWith('\r') ? '\r' : '';

    if (edit.action === 'update') {
      result[edit.line] = edit.text + eol;
    } else {
      result.splice(edit.line + 1, 0, edit.text + eol);
    }
  }

  return result;
}

/** Applies edits to whole text. Zero edits return the text untouched. */
export function applyEditsToText(text: string, edits: readonly Edit[]): string {
  if (edits.length === 0) return text;
  return applyEditsToLines(text.split('\n'), edits).join('\n');
}

/**
 * Reads a file once, applies its edits in memory, and unless `dryRun` is set
 * writes the result back atomically. Failures come back as a result.
 */
export async function applyFileEdits(
  file: string,
  edits: readonly Edit[],
  options: ApplyOptions = {},
): Promise<FileApplyResult> {
  const ordered = orderEdits(edits);
  try {
    const before = await readFile(file, 'utf-8');
    const after = applyEditsToText(before, ordered);

    if (after === before) {
      return { file, status: 'unchanged', edits: ordered, before, after };
    }
    if (options.dryRun) {
      return { file, status: 'dry-run', edits: ordered, before, after };
    }

    await writeFileAtomic(file, after);
    return { file, status: 'written', edits: ordered, before, after };
  } catch (error) {
    return { file, status: 'failed', edits: ordered, error: errorMessage(error) };
  }
}

/** Applies edits grouped by file, one file at a time in lexicographic order. */
export async function applyBatch(edits: readonly Edit[], options: ApplyOptions = {}): Promise<FileApplyResult[]> {
  const byFile = new Map<string, Edit[]>();
  for (const edit of edits) {
    const list = byFile.get(edit.file) ?? [];
    list.push(edit);
    byFile.set(edit.file, list);
  }

  const results: FileApplyResult[] = [];
  for (const file of [...byFile.keys()].sort()) {
    results.push(await applyFileEdits(file, byFile.get(file) ?? [], options));
  }
  return results;
}
