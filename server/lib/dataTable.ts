import { ComputationError } from './errors.js';

export type CellValue = string | number | Date | null;
export type Row = Readonly<Record<string, CellValue>>;
export type GroupKey = string | number;

export interface TableGroup {
  key: GroupKey;
  table: DataTable;
}

export interface SerializedTable {
  columns: string[];
  rows: Record<string, string | number | null>[];
}

// Helper to clean numeric values (strip %, commas, etc.)
export function toNumber(value: CellValue | undefined): number | null {
  if (value === null || value === undefined || value === '') return null;
  if (typeof value === 'number') return Number.isNaN(value) ? null : value;
  if (value instanceof Date) return null;
  const cleaned = value.replace(/[%,]/g, '').trim();
  if (cleaned === '') return null;
  const parsed = Number(cleaned);
  return Number.isNaN(parsed) ? null : parsed;
}

function compareKeys(a: GroupKey, b: GroupKey): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function toGroupKey(value: CellValue | undefined): GroupKey | null {
  if (value === null || value === undefined || value === '') return null;
  if (typeof value === 'number') return Number.isNaN(value) ? null : value;
  if (value instanceof Date) return value.toISOString();
  return value;
}

/**
 * Immutable snapshot of tabular data.
 * Every operation returns a new table; rows are never modified in place.
 */
export class DataTable {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];

  constructor(columns: readonly string[], rows: readonly Row[]) {
    this.columns = Object.freeze([...columns]);
    this.rows = Object.freeze(rows.map(row => Object.freeze({ ...row })));
  }

  /**
   * Build a table from plain records. Column order follows first appearance.
   */
  static fromRecords(records: Record<string, CellValue>[], columns?: string[]): DataTable {
    if (columns) {
      return new DataTable(columns, records);
    }
    const seen: string[] = [];
    for (const record of records) {
      for (const key of Object.keys(record)) {
        if (!seen.includes(key)) seen.push(key);
      }
    }
    return new DataTable(seen, records);
  }

  get length(): number {
    return this.rows.length;
  }

  hasColumn(name: string): boolean {
    return this.columns.includes(name);
  }

  requireColumn(name: string): void {
    if (!this.hasColumn(name)) {
      throw new ComputationError(`Column '${name}' not found`);
    }
  }

  filter(predicate: (row: Row) => boolean): DataTable {
    return new DataTable(this.columns, this.rows.filter(predicate));
  }

  /**
   * Keep rows whose value in `column` equals `value`. Throws if the column is missing.
   */
  where(column: string, value: CellValue): DataTable {
    this.requireColumn(column);
    return this.filter(row => row[column] === value);
  }

  /**
   * Keep rows whose numeric value in `column` lies in [min, max].
   */
  whereBetween(column: string, min: number, max: number): DataTable {
    this.requireColumn(column);
    return this.filter(row => {
      const value = toNumber(row[column]);
      return value !== null && value >= min && value <= max;
    });
  }

  select(columns: readonly string[]): DataTable {
    columns.forEach(col => this.requireColumn(col));
    const rows = this.rows.map(row => {
      const projected: Record<string, CellValue> = {};
      for (const col of columns) projected[col] = row[col] ?? null;
      return projected;
    });
    return new DataTable(columns, rows);
  }

  head(n: number): DataTable {
    return new DataTable(this.columns, this.rows.slice(0, n));
  }

  tail(n: number): DataTable {
    return new DataTable(this.columns, this.rows.slice(Math.max(0, this.rows.length - n)));
  }

  values(column: string): CellValue[] {
    this.requireColumn(column);
    return this.rows.map(row => row[column] ?? null);
  }

  /**
   * Numeric values of a column with missing entries dropped.
   */
  numbers(column: string): number[] {
    const result: number[] = [];
    for (const value of this.values(column)) {
      const num = toNumber(value);
      if (num !== null) result.push(num);
    }
    return result;
  }

  /**
   * Distinct non-missing values of a column, sorted.
   */
  unique(column: string): GroupKey[] {
    const keys = new Set<GroupKey>();
    for (const value of this.values(column)) {
      const key = toGroupKey(value);
      if (key !== null) keys.add(key);
    }
    return [...keys].sort(compareKeys);
  }

  /**
   * Split rows by the value of `column`. Rows with a missing key are dropped
   * and groups come back sorted by key.
   */
  groupBy(column: string): TableGroup[] {
    this.requireColumn(column);
    const buckets = new Map<GroupKey, Row[]>();
    for (const row of this.rows) {
      const key = toGroupKey(row[column]);
      if (key === null) continue;
      const bucket = buckets.get(key);
      if (bucket) {
        bucket.push(row);
      } else {
        buckets.set(key, [row]);
      }
    }
    return [...buckets.entries()]
      .sort((a, b) => compareKeys(a[0], b[0]))
      .map(([key, rows]) => ({ key, table: new DataTable(this.columns, rows) }));
  }

  /**
   * Stable sort on a numeric column; missing values go last.
   */
  sortBy(column: string, descending = false): DataTable {
    this.requireColumn(column);
    const indexed = this.rows.map((row, index) => ({ row, index, value: toNumber(row[column]) }));
    indexed.sort((a, b) => {
      if (a.value === null && b.value === null) return a.index - b.index;
      if (a.value === null) return 1;
      if (b.value === null) return -1;
      const diff = descending ? b.value - a.value : a.value - b.value;
      return diff !== 0 ? diff : a.index - b.index;
    });
    return new DataTable(this.columns, indexed.map(item => item.row));
  }

  toJSON(): SerializedTable {
    return {
      columns: [...this.columns],
      rows: this.rows.map(row => {
        const out: Record<string, string | number | null> = {};
        for (const col of this.columns) {
          const value = row[col] ?? null;
          if (value instanceof Date) {
            out[col] = value.toISOString();
          } else if (typeof value === 'number' && !Number.isFinite(value)) {
            out[col] = null;
          } else {
            out[col] = value;
          }
        }
        return out;
      }),
    };
  }
}
