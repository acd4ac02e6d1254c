import { BaseHandler, type HandlerContext, type HandlerResult } from './baseHandler.js';
import { formatNumber, tableFromArrays } from '../utils/resultFormatter.js';
import { WATER_TEMPERATURE } from '../lexicon.js';
import { rangeStats } from '../../statisticalSummary.js';
import type { CellValue } from '../../dataTable.js';

const TREND_TRIGGERS = ['trend', 'over time', 'change'];

/**
 * Trend Handler
 * Handles queries like "temperature trend over time"
 */
export class TrendHandler extends BaseHandler {
  readonly name = 'trend';

  canHandle(question: string): boolean {
    return this.containsAny(question, TREND_TRIGGERS);
  }

  handle(context: HandlerContext): HandlerResult {
    const { table } = context;
    const param = this.resolveParameter(context) ?? WATER_TEMPERATURE;
    table.requireColumn(param);

    const yearly = table.groupBy('year').map(group => ({
      year: group.key,
      stats: rangeStats(group.table.numbers(param)),
    }));

    const result = tableFromArrays(
      ['Year', 'Mean', 'Min', 'Max', 'Sample Count'],
      yearly.map((entry): CellValue[] => [
        entry.year,
        entry.stats.mean,
        entry.stats.min,
        entry.stats.max,
        entry.stats.count,
      ])
    );

    if (yearly.length <= 1) {
      return this.matched(`Yearly statistics for ${param}:`, result);
    }

    const first = yearly[0];
    const last = yearly[yearly.length - 1];
    const change = last.stats.mean - first.stats.mean;
    const changePct = first.stats.mean !== 0 ? (change / first.stats.mean) * 100 : 0;
    const direction = change > 0 ? 'increased' : 'decreased';

    return this.matched(
      `Trend of ${param} over time: ${direction} by ${formatNumber(Math.abs(change))} ` +
        `(${formatNumber(Math.abs(changePct), 1)}%) from ${first.year} to ${last.year}`,
      result
    );
  }
}
