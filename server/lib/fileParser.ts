import { parse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import { DataTable, type CellValue } from './dataTable.js';
import type { Season } from './agents/lexicon.js';

export const DEFAULT_SHEET = 'FieldData';

const NUMERIC_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

// Month (1-12) to season, meteorological seasons
const SEASON_BY_MONTH: Record<number, Season> = {
  12: 'Winter',
  1: 'Winter',
  2: 'Winter',
  3: 'Spring',
  4: 'Spring',
  5: 'Spring',
  6: 'Summer',
  7: 'Summer',
  8: 'Summer',
  9: 'Fall',
  10: 'Fall',
  11: 'Fall',
};

type RawRecord = Record<string, unknown>;

/**
 * Parse a CSV or Excel upload into a normalized sample table.
 * Excel files are read from `sheetName`, or from the first sheet when it is absent.
 */
export function parseTabularFile(buffer: Buffer, filename: string, sheetName: string = DEFAULT_SHEET): DataTable {
  const ext = filename.split('.').pop()?.toLowerCase();

  let records: RawRecord[];
  if (ext === 'csv') {
    records = parseCsv(buffer);
  } else if (ext === 'xlsx' || ext === 'xls') {
    records = parseExcel(buffer, sheetName);
  } else {
    throw new Error('Unsupported file format. Please upload CSV or Excel files.');
  }

  return normalizeRecords(records);
}

function parseCsv(buffer: Buffer): RawRecord[] {
  const content = buffer.toString('utf-8');
  const parsed: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    bom: true,
  });
  return toRawRecords(parsed);
}

function parseExcel(buffer: Buffer, sheetName: string): RawRecord[] {
  // Date cells stay as serial numbers; parseDate turns them into calendar dates
  const workbook = XLSX.read(buffer, { type: 'buffer' });
  const target = workbook.SheetNames.includes(sheetName) ? sheetName : workbook.SheetNames[0];
  if (target === undefined) {
    throw new Error('Workbook contains no sheets');
  }
  if (target !== sheetName) {
    console.warn(`⚠️ Sheet '${sheetName}' not found, using '${target}'`);
  }
  const worksheet = workbook.Sheets[target];
  return XLSX.utils.sheet_to_json<RawRecord>(worksheet, { defval: null });
}

function toRawRecords(parsed: unknown): RawRecord[] {
  if (!Array.isArray(parsed)) return [];
  const records: RawRecord[] = [];
  for (const item of parsed) {
    if (typeof item === 'object' && item !== null) {
      const entries: [string, unknown][] = Object.entries(item);
      records.push(Object.fromEntries(entries));
    }
  }
  return records;
}

/**
 * Normalizes column names and cell values, then derives year/month/season
 * from sample_date when the file does not carry them.
 */
export function normalizeRecords(records: RawRecord[]): DataTable {
  const columns: string[] = [];
  const rows = records.map(record => {
    const row: Record<string, CellValue> = {};
    for (const [rawKey, rawValue] of Object.entries(record)) {
      const key = rawKey.trim();
      if (key === '') continue;
      if (!columns.includes(key)) columns.push(key);
      row[key] = normalizeCell(key, rawValue);
    }
    return row;
  });

  const derived = ['year', 'month', 'season'].filter(col => !columns.includes(col));
  if (columns.includes('sample_date') && derived.length > 0) {
    for (const row of rows) {
      const date = row['sample_date'];
      const year = date instanceof Date ? date.getUTCFullYear() : null;
      const month = date instanceof Date ? date.getUTCMonth() + 1 : null;
      if (derived.includes('year')) row['year'] = year;
      if (derived.includes('month')) row['month'] = month;
      if (derived.includes('season')) row['season'] = month === null ? null : SEASON_BY_MONTH[month];
    }
    columns.push(...derived);
  }

  return new DataTable(columns, rows);
}

function normalizeCell(column: string, value: unknown): CellValue {
  if (value === null || value === undefined) return null;

  if (column === 'sample_date') {
    return parseDate(value);
  }
  if (column === 'site') {
    const text = String(value).trim();
    return text === '' ? null : text;
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'number') {
    return Number.isNaN(value) ? null : value;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }

  const text = String(value).trim();
  if (text === '') return null;
  return NUMERIC_PATTERN.test(text) ? Number(text) : text;
}

const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Sample dates are calendar days, held as UTC midnight so the derived
 * year/month/season do not depend on the server's time zone.
 */
function parseDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'number') {
    return fromExcelSerial(value);
  }
  if (typeof value !== 'string') return null;

  const text = value.trim();
  if (text === '') return null;

  const iso = text.match(ISO_DATE_PREFIX);
  if (iso) {
    return new Date(Date.UTC(parseInt(iso[1], 10), parseInt(iso[2], 10) - 1, parseInt(iso[3], 10)));
  }

  // Other formats ("1/1/2020", "Jan 1 2020") parse in local time
  const date = new Date(text);
  if (Number.isNaN(date.getTime())) return null;
  return new Date(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()));
}

function fromExcelSerial(serial: number): Date | null {
  if (!Number.isFinite(serial)) return null;
  const code: { y: number; m: number; d: number } | null = XLSX.SSF.parse_date_code(serial);
  if (!code) return null;
  return new Date(Date.UTC(code.y, code.m - 1, code.d));
}
