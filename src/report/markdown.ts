function cell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

export function renderMarkdownTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const lines = [
    `| ${headers.map(cell).join(' | ')} |`,
    `| ${headers.map(() => '---').join(' | ')} |`,
    ...rows.map((row) => `| ${row.map(cell).join(' | ')} |`),
  ];
  return lines.join('\n') + '\n';
}

export function renderMarkdown(
  title: string,
  headers: readonly string[],
  rows: readonly (readonly string[])[],
): string {
  return `# ${title}\n\n${renderMarkdownTable(headers, rows)}`;
}
