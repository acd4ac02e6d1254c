import { type DataTable, toNumber } from './dataTable.js';

export type CorrelationStrength =
  | 'strong positive correlation'
  | 'moderate positive correlation'
  | 'weak/no correlation'
  | 'moderate negative correlation'
  | 'strong negative correlation';

export interface CorrelationMatrix {
  columns: string[];
  values: number[][];
}

export function pearsonCorrelation(x: number[], y: number[]): number {
  const n = Math.min(x.length, y.length);
  if (n < 2) return NaN;

  let sumX = 0;
  let sumY = 0;
  for (let i = 0; i < n; i++) {
    sumX += x[i];
    sumY += y[i];
  }
  const meanX = sumX / n;
  const meanY = sumY / n;

  let sumXY = 0;
  let sumX2 = 0;
  let sumY2 = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - meanX;
    const dy = y[i] - meanY;
    sumXY += dx * dy;
    sumX2 += dx * dx;
    sumY2 += dy * dy;
  }

  const denominator = Math.sqrt(sumX2 * sumY2);
  return denominator === 0 ? NaN : sumXY / denominator;
}

/**
 * Pearson correlation of two columns using pairwise deletion of missing values
 */
export function correlateColumns(table: DataTable, first: string, second: string): number {
  const firstValues = table.values(first);
  const secondValues = table.values(second);
  const x: number[] = [];
  const y: number[] = [];
  for (let i = 0; i < firstValues.length; i++) {
    const xv = toNumber(firstValues[i]);
    const yv = toNumber(secondValues[i]);
    if (xv !== null && yv !== null) {
      x.push(xv);
      y.push(yv);
    }
  }
  return pearsonCorrelation(x, y);
}

export function correlationMatrix(table: DataTable, columns: string[]): CorrelationMatrix {
  const values = columns.map((rowCol, i) =>
    columns.map((col, j) => {
      if (i === j) {
        return Number.isNaN(correlateColumns(table, col, col)) ? NaN : 1;
      }
      return correlateColumns(table, rowCol, col);
    })
  );
  return { columns, values };
}

/**
 * Qualitative band for a correlation coefficient
 */
export function classifyCorrelation(value: number): CorrelationStrength {
  if (value > 0.7) return 'strong positive correlation';
  if (value > 0.3) return 'moderate positive correlation';
  if (value > -0.3) return 'weak/no correlation';
  if (value > -0.7) return 'moderate negative correlation';
  return 'strong negative correlation';
}
