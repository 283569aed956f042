import { renderCsv } from './csv.js';
import { renderMarkdown } from './markdown.js';
import { renderTextTable } from './text.js';

export type ReportFormat = 'txt' | 'csv' | 'md';

export const REPORT_FORMATS: readonly ReportFormat[] = ['txt', 'csv', 'md'];

export interface Report {
  title: string;
  headers: string[];
  rows: string[][];
}

export function renderReport(report: Report, format: ReportFormat): string {
  switch (format) {
    case 'csv':
      return renderCsv(report.headers, report.rows);
    case 'md':
      return renderMarkdown(report.title, report.headers, report.rows);
    case 'txt':
      return `${report.title}\n\n${renderTextTable(report.headers, report.rows)}`;
  }
}
