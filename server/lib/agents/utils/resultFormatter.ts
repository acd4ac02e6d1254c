/**
 * Result Formatter
 * Shared helpers for explanation text and result-table shaping
 */

import { type CellValue, DataTable } from '../../dataTable.js';

export function formatNumber(value: number, digits: number = 2): string {
  return value.toFixed(digits);
}

/**
 * " with a, b" suffix for applied filters, empty when nothing was filtered
 */
export function formatFilterSuffix(filters: string[]): string {
  return filters.length > 0 ? ` with ${filters.join(', ')}` : '';
}

/**
 * Keep only the display columns the live table actually has, in the given order
 */
export function presentColumns(table: DataTable, columns: readonly string[]): string[] {
  return columns.filter(col => table.hasColumn(col));
}

export function projectColumns(table: DataTable, columns: readonly string[]): DataTable {
  return table.select(presentColumns(table, columns));
}

/**
 * Single-column table from a list of values
 */
export function columnTable(column: string, values: readonly CellValue[]): DataTable {
  return new DataTable([column], values.map(value => ({ [column]: value })));
}

/**
 * Table from rows given as positional arrays
 */
export function tableFromArrays(columns: string[], rows: CellValue[][]): DataTable {
  return new DataTable(
    columns,
    rows.map(values => {
      const row: Record<string, CellValue> = {};
      columns.forEach((col, i) => {
        row[col] = values[i] ?? null;
      });
      return row;
    })
  );
}
