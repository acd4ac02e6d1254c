import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as XLSX from 'xlsx';
import { parseTabularFile } from '../lib/fileParser.js';

const CSV = [
  'sample_date, site ,water_temp.C,ph',
  '2020-01-15,1,4.5,7.1',
  '2020-07-01,2.0,,7.3',
  '',
].join('\n');

function workbookBuffer(sheets: Array<[string, Record<string, string | number>[]]>): Buffer {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of sheets) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(rows), name);
  }
  return Buffer.from(XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));
}

describe('parseTabularFile', () => {
  it('parses CSV, trims headers and derives year, month and season', () => {
    const table = parseTabularFile(Buffer.from(CSV), 'samples.csv');

    expect(table.columns).toEqual(['sample_date', 'site', 'water_temp.C', 'ph', 'year', 'month', 'season']);
    expect(table.toJSON().rows).toEqual([
      {
        sample_date: '2020-01-15T00:00:00.000Z',
        site: '1',
        'water_temp.C': 4.5,
        ph: 7.1,
        year: 2020,
        month: 1,
        season: 'Winter',
      },
      {
        sample_date: '2020-07-01T00:00:00.000Z',
        site: '2.0',
        'water_temp.C': null,
        ph: 7.3,
        year: 2020,
        month: 7,
        season: 'Summer',
      },
    ]);
  });

  it('keeps year, month and season columns the file already has', () => {
    const csv = 'sample_date,site,year,month,season\n2020-01-15,1,1999,6,Spring\n';
    const table = parseTabularFile(Buffer.from(csv), 'samples.csv');
    expect(table.columns).toEqual(['sample_date', 'site', 'year', 'month', 'season']);
    expect(table.rows[0]).toMatchObject({ year: 1999, month: 6, season: 'Spring' });
  });

  it('reads the FieldData sheet of a workbook', () => {
    const buffer = workbookBuffer([
      ['Notes', [{ note: 'ignore me' }]],
      ['FieldData', [{ site: 3, year: 2001, month: 4, ph: 7.5 }]],
    ]);
    const table = parseTabularFile(buffer, 'water.xlsx');
    expect(table.columns).toEqual(['site', 'year', 'month', 'ph']);
    expect(table.rows).toEqual([{ site: '3', year: 2001, month: 4, ph: 7.5 }]);
  });

  it('falls back to the first sheet', () => {
    const buffer = workbookBuffer([['Sheet1', [{ site: 5, ph: 6.9 }]]]);
    const table = parseTabularFile(buffer, 'water.xlsx');
    expect(table.rows).toEqual([{ site: '5', ph: 6.9 }]);
  });

  it('rejects other file types', () => {
    expect(() => parseTabularFile(Buffer.from('x'), 'notes.txt')).toThrow(
      'Unsupported file format. Please upload CSV or Excel files.'
    );
  });
});

describe('parseTabularFile east of UTC', () => {
  const originalTz = process.env.TZ;

  beforeAll(() => {
    process.env.TZ = 'Asia/Tokyo';
  });

  afterAll(() => {
    if (originalTz === undefined) {
      delete process.env.TZ;
    } else {
      process.env.TZ = originalTz;
    }
  });

  it('keeps the calendar day of an Excel date cell', () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ['sample_date', 'site'],
      [43831, 1],
    ]);
    sheet['A2'] = { t: 'n', v: 43831, z: 'yyyy-mm-dd' };
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, 'FieldData');
    const buffer = Buffer.from(XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));

    const table = parseTabularFile(buffer, 'water.xlsx');
    expect(table.toJSON().rows).toEqual([
      { sample_date: '2020-01-01T00:00:00.000Z', site: '1', year: 2020, month: 1, season: 'Winter' },
    ]);
  });

  it('keeps the calendar day of a month/day/year CSV date', () => {
    const table = parseTabularFile(Buffer.from('sample_date,site\n1/1/2020,1\n'), 'samples.csv');
    expect(table.toJSON().rows).toEqual([
      { sample_date: '2020-01-01T00:00:00.000Z', site: '1', year: 2020, month: 1, season: 'Winter' },
    ]);
  });
});
