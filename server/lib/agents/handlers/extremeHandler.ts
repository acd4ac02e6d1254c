import { BaseHandler, type HandlerContext, type HandlerResult } from './baseHandler.js';
import {
  extractExtremeDirection,
  extractMonth,
  extractSeason,
  extractYearRange,
  monthName,
} from '../utils/entityExtractor.js';
import { formatFilterSuffix, formatNumber, tableFromArrays } from '../utils/resultFormatter.js';
import { mean } from '../../statisticalSummary.js';
import { ComputationError } from '../../errors.js';
import type { CellValue } from '../../dataTable.js';

/**
 * Extreme Handler
 * Handles queries like "coldest january water temperature from 1981 to 1995":
 * averages the parameter per year and reports the lowest or highest year.
 */
export class ExtremeHandler extends BaseHandler {
  readonly name = 'extreme';

  canHandle(question: string): boolean {
    return extractExtremeDirection(question) !== null;
  }

  handle(context: HandlerContext): HandlerResult {
    const { question } = context;
    const direction = extractExtremeDirection(question);
    if (!direction) return this.abstain();

    const param = this.resolveParameter(context);
    if (!param) return this.abstain();

    const month = extractMonth(question);
    const yearRange = extractYearRange(question);
    const season = extractSeason(question);

    let filtered = context.table;
    const filterDesc: string[] = [];

    if (month) {
      filtered = filtered.where('month', month);
      filterDesc.push(`month = ${monthName(month)}`);
    }

    if (season) {
      filtered = filtered.where('season', season);
      filterDesc.push(`season = ${season}`);
    }

    if (yearRange) {
      filtered = filtered.whereBetween('year', yearRange.start, yearRange.end);
      filterDesc.push(`years ${yearRange.start}-${yearRange.end}`);
    }

    if (filtered.length === 0) {
      return this.noData('No data found matching your criteria.');
    }

    const yearly = filtered.groupBy('year').map(group => ({
      year: group.key,
      value: mean(group.table.numbers(param)),
    }));

    const candidates = yearly.filter(entry => !Number.isNaN(entry.value));
    if (candidates.length === 0) {
      throw new ComputationError(`No ${param} values to rank by year`);
    }

    // First occurrence wins on ties
    let extreme = candidates[0];
    for (const entry of candidates) {
      if (direction === 'min' ? entry.value < extreme.value : entry.value > extreme.value) {
        extreme = entry;
      }
    }

    const valueColumn = `Avg ${param}`;
    const result = tableFromArrays(
      ['Year', valueColumn],
      yearly.map((entry): CellValue[] => [entry.year, entry.value])
    ).sortBy(valueColumn);

    const extremeWord = direction === 'min' ? 'lowest' : 'highest';
    const explanation =
      `The ${extremeWord} average ${param}${formatFilterSuffix(filterDesc)} ` +
      `was in ${extreme.year} with a value of ${formatNumber(extreme.value)}.`;

    return this.matched(explanation, result);
  }
}
