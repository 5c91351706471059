import { describe, expect, it } from 'vitest';
import type { PaperRecord } from '../types';
import { buildResultTable, parseDelimitedText, renderTable, toDelimitedText } from './result-table';

const records: PaperRecord[] = [
  {
    id: '2403.01234v1',
    title: 'Laser welding, Al-Cu',
    year: 2024,
    categories: ['cond-mat.mtrl-sci', 'physics.app-ph'],
    abstract: 'Uses a "keyhole" mode.',
    pdfUrl: 'http://arxiv.org/pdf/2403.01234v1',
    downloadStatus: 'Downloaded (12.5 KB)'
  },
  {
    id: '2201.05678v2',
    title: 'Plain title',
    year: 2022,
    categories: ['physics.app-ph'],
    abstract: 'Line one\nline two',
    downloadStatus: 'No PDF URL'
  }
];

describe('buildResultTable', () => {
  it('keeps the export columns and joins categories', () => {
    const table = buildResultTable(records);

    expect(table.columns).toEqual(['id', 'title', 'year', 'categories', 'abstract', 'download_status']);
    expect(table.rows[0]).toEqual({
      id: '2403.01234v1',
      title: 'Laser welding, Al-Cu',
      year: '2024',
      categories: 'cond-mat.mtrl-sci, physics.app-ph',
      abstract: 'Uses a "keyhole" mode.',
      download_status: 'Downloaded (12.5 KB)'
    });
  });
});

describe('toDelimitedText', () => {
  it('quotes only fields that need it', () => {
    expect(toDelimitedText(buildResultTable(records))).toBe(
      'id,title,year,categories,abstract,download_status\n'
      + '2403.01234v1,"Laser welding, Al-Cu",2024,"cond-mat.mtrl-sci, physics.app-ph","Uses a ""keyhole"" mode.",Downloaded (12.5 KB)\n'
      + '2201.05678v2,Plain title,2022,physics.app-ph,"Line one\nline two",No PDF URL\n'
    );
  });

  it('writes only the header for an empty table', () => {
    expect(toDelimitedText(buildResultTable([]))).toBe('id,title,year,categories,abstract,download_status\n');
  });
});

describe('parseDelimitedText', () => {
  it('reads back the rows that were exported', () => {
    const table = buildResultTable(records);
    const rows = parseDelimitedText(toDelimitedText(table));

    expect(rows).toEqual(table.rows);
    expect(new Set(rows.map(row => row.id))).toEqual(new Set(table.rows.map(row => row.id)));
  });

  it('accepts CRLF line endings', () => {
    expect(parseDelimitedText('id,title\r\na1,"x, y"\r\n')).toEqual([{ id: 'a1', title: 'x, y' }]);
  });

  it('returns no rows for a header-only export', () => {
    expect(parseDelimitedText('id,title\n')).toEqual([]);
    expect(parseDelimitedText('')).toEqual([]);
  });
});

describe('renderTable', () => {
  it('escapes cell content', () => {
    const table = buildResultTable([{
      id: 'x1',
      title: 'A <b> & "C"',
      year: 2020,
      categories: ['physics.optics'],
      abstract: "it's",
      downloadStatus: 'No PDF URL'
    }]);

    expect(renderTable(table)).toBe(
      '<table class="results"><thead><tr>'
      + '<th>id</th><th>title</th><th>year</th><th>categories</th><th>abstract</th><th>download_status</th>'
      + '</tr></thead><tbody><tr>'
      + '<td>x1</td><td>A &lt;b&gt; &amp; &quot;C&quot;</td><td>2020</td><td>physics.optics</td><td>it&#39;s</td><td>No PDF URL</td>'
      + '</tr></tbody></table>'
    );
  });

  it('does not modify the table', () => {
    const table = buildResultTable(records);
    const before = structuredClone(table);

    renderTable(table);

    expect(table).toEqual(before);
  });
});
