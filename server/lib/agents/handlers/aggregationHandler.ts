import { BaseHandler, type HandlerContext, type HandlerResult } from './baseHandler.js';
import { capitalize, extractAggregation, hasAggregationKeyword } from '../utils/entityExtractor.js';
import { formatNumber, tableFromArrays } from '../utils/resultFormatter.js';
import { aggregate } from '../../statisticalSummary.js';
import type { CellValue } from '../../dataTable.js';

type GroupColumn = 'year' | 'month' | 'season' | 'site';

// Checked in order; the first cue present decides the grouping
const GROUPING_CUES: ReadonlyArray<readonly [GroupColumn, readonly string[]]> = [
  ['year', ['by year', 'per year', 'yearly']],
  ['month', ['by month', 'per month', 'monthly']],
  ['season', ['by season', 'per season', 'seasonal']],
  ['site', ['by site', 'per site']],
];

/**
 * Aggregation Handler
 * Handles queries like "average dissolved oxygen by year"
 */
export class AggregationHandler extends BaseHandler {
  readonly name = 'aggregation';

  canHandle(question: string): boolean {
    return hasAggregationKeyword(question);
  }

  handle(context: HandlerContext): HandlerResult {
    const { question, table } = context;
    const param = this.resolveParameter(context);
    if (!param) return this.abstain();

    const verb = extractAggregation(question);
    const groupColumn = this.detectGrouping(question);

    if (!groupColumn) {
      const value = aggregate(table.numbers(param), verb);
      const result = tableFromArrays([param, 'Aggregation'], [[value, verb]]);
      return this.matched(`The ${verb} ${param} across all data is ${formatNumber(value)}`, result);
    }

    const rows = table
      .groupBy(groupColumn)
      .map((group): CellValue[] => [group.key, aggregate(group.table.numbers(param), verb)]);
    const result = tableFromArrays([capitalize(groupColumn), `${capitalize(verb)} ${param}`], rows);

    return this.matched(`${capitalize(verb)} ${param} grouped by ${groupColumn}:`, result);
  }

  private detectGrouping(question: string): GroupColumn | null {
    for (const [column, cues] of GROUPING_CUES) {
      if (this.containsAny(question, cues)) {
        return column;
      }
    }
    return null;
  }
}
