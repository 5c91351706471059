import type { PaperRecord } from '../types/paper';

export const EXPORT_COLUMNS = ['id', 'title', 'year', 'categories', 'abstract', 'download_status'] as const;
export type ExportColumn = typeof EXPORT_COLUMNS[number];

export const EXPORT_FILENAME = 'alcu_papers_metadata.csv';
export const EXPORT_MIME_TYPE = 'text/csv';

export type ResultRow = Record<ExportColumn, string>;

export interface ResultTable {
  columns: readonly ExportColumn[];
  rows: ResultRow[];
}

export function buildResultTable(records: readonly PaperRecord[]): ResultTable {
  return {
    columns: EXPORT_COLUMNS,
    rows: records.map(record => ({
      id: record.id,
      title: record.title,
      year: record.year.toString(),
      categories: record.categories.join(', '),
      abstract: record.abstract,
      download_status: record.downloadStatus
    }))
  };
}

/** Quote a field only when it holds a delimiter, quote or line break */
function escapeField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Generate the CSV export: header row, one line per record, trailing newline */
export function toDelimitedText(table: ResultTable): string {
  const lines = [
    table.columns.join(','),
    ...table.rows.map(row => table.columns.map(column => escapeField(row[column])).join(','))
  ];
  return `${lines.join('\n')}\n`;
}

/** Split CSV text into records of fields, honouring quoted delimiters and line breaks */
function splitRecords(text: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"' && text[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      fields.push(current);
      current = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      fields.push(current);
      records.push(fields);
      fields = [];
      current = '';
    } else {
      current += ch;
    }
  }

  if (current !== '' || fields.length > 0) {
    fields.push(current);
    records.push(fields);
  }

  return records;
}

/** Parse CSV text into row objects keyed by the header */
export function parseDelimitedText(text: string): Record<string, string>[] {
  const [header, ...records] = splitRecords(text);
  if (!header) return [];

  return records.map(fields =>
    Object.fromEntries(header.map((name, i) => [name, fields[i] ?? '']))
  );
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** Render the table as HTML. Pure: the table is not modified. */
export function renderTable(table: ResultTable): string {
  const head = table.columns.map(column => `<th>${escapeHtml(column)}</th>`).join('');
  const body = table.rows
    .map(row => `<tr>${table.columns.map(column => `<td>${escapeHtml(row[column])}</td>`).join('')}</tr>`)
    .join('');

  return `<table class="results"><thead><tr>${head}</tr></thead><tbody>${body}</tbody></table>`;
}
