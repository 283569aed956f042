/** Left-aligned columns separated by two spaces, with a dashed rule under the header. */
export function renderTextTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length)),
  );
  const format = (row: readonly string[]): string =>
    row
      .map((value, column) => value.padEnd(widths[column]))
      .join('  ')
      .trimEnd();

  return [format(headers), widths.map((width) => '-'.repeat(width)).join('  '), ...rows.map(format)].join('\n') + '\n';
}
