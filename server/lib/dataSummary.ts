import type { DataTable } from './dataTable.js';
import type { DataSummary } from '../../shared/schema.js';

/**
 * Overview of the loaded samples: counts, date span and years present
 */
export function summarizeTable(table: DataTable): DataSummary {
  let start: Date | null = null;
  let end: Date | null = null;
  if (table.hasColumn('sample_date')) {
    for (const value of table.values('sample_date')) {
      if (!(value instanceof Date)) continue;
      if (start === null || value < start) start = value;
      if (end === null || value > end) end = value;
    }
  }

  const years = table.hasColumn('year')
    ? table.unique('year').filter((year): year is number => typeof year === 'number')
    : [];

  return {
    totalSamples: table.length,
    totalSites: table.hasColumn('site') ? table.unique('site').length : 0,
    dateRange: {
      start: start ? start.toISOString().slice(0, 10) : null,
      end: end ? end.toISOString().slice(0, 10) : null,
    },
    yearsCovered: years,
    columnCount: table.columns.length,
    columns: [...table.columns],
  };
}
