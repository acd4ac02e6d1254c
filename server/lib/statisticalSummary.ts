import type { DataTable } from './dataTable.js';
import { ComputationError } from './errors.js';
import type { AggregationVerb } from './agents/lexicon.js';

/**
 * Descriptive statistics for one numeric column
 */
export interface ColumnStats {
  column: string;
  count: number;
  mean: number;
  stdDev: number;
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
}

/**
 * Period statistics used by comparison and trend answers
 */
export interface RangeStats {
  mean: number;
  min: number;
  max: number;
  count: number;
}

export const DESCRIBE_LABELS = ['count', 'mean', 'std', 'min', '25%', '50%', '75%', 'max'] as const;

export function mean(values: number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

export function minimum(values: number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((a, b) => (b < a ? b : a));
}

export function maximum(values: number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((a, b) => (b > a ? b : a));
}

/**
 * Sample standard deviation (n - 1 denominator)
 */
export function standardDeviation(values: number[]): number {
  if (values.length < 2) return NaN;
  const avg = mean(values);
  const variance = values.reduce((acc, val) => acc + Math.pow(val - avg, 2), 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Quantile with linear interpolation between closest ranks
 */
export function quantile(values: number[], q: number): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  if (lower === upper) return sorted[lower];
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

/**
 * Apply an aggregation verb to a series with missing values already dropped
 */
export function aggregate(values: number[], verb: AggregationVerb): number {
  switch (verb) {
    case 'mean':
      return mean(values);
    case 'max':
      return maximum(values);
    case 'min':
      return minimum(values);
    case 'sum':
      return values.reduce((a, b) => a + b, 0);
    case 'count':
      return values.length;
  }
}

export function rangeStats(values: number[]): RangeStats {
  return {
    mean: mean(values),
    min: minimum(values),
    max: maximum(values),
    count: values.length,
  };
}

export function describeValues(values: number[], column: string): ColumnStats {
  return {
    column,
    count: values.length,
    mean: mean(values),
    stdDev: standardDeviation(values),
    min: minimum(values),
    q1: quantile(values, 0.25),
    median: quantile(values, 0.5),
    q3: quantile(values, 0.75),
    max: maximum(values),
  };
}

/**
 * Describe each of the given columns. Throws when there is nothing to describe.
 */
export function describeColumns(table: DataTable, columns: readonly string[]): ColumnStats[] {
  if (columns.length === 0) {
    throw new ComputationError('Cannot describe a table with no numeric columns');
  }
  return columns.map(col => describeValues(table.numbers(col), col));
}

/**
 * Stats in the fixed describe order (count, mean, std, min, 25%, 50%, 75%, max)
 */
export function describeOrder(stats: ColumnStats): number[] {
  return [stats.count, stats.mean, stats.stdDev, stats.min, stats.q1, stats.median, stats.q3, stats.max];
}
