import { BaseHandler, type HandlerContext, type HandlerResult } from './baseHandler.js';
import { extractMonth, extractYearRange, monthName } from '../utils/entityExtractor.js';
import { projectColumns } from '../utils/resultFormatter.js';
import { DISSOLVED_OXYGEN, ECOLI, PH, WATER_TEMPERATURE } from '../lexicon.js';

const TIME_DISPLAY_COLUMNS = ['sample_date', 'site', WATER_TEMPERATURE, DISSOLVED_OXYGEN, PH, ECOLI];
const MAX_ROWS = 30;

/**
 * Time Range Handler
 * Handles queries like "data from 2020" or "samples in january 2019"
 */
export class TimeRangeHandler extends BaseHandler {
  readonly name = 'timeRange';

  canHandle(question: string): boolean {
    return extractYearRange(question) !== null || extractMonth(question) !== null;
  }

  handle(context: HandlerContext): HandlerResult {
    const { question } = context;
    const yearRange = extractYearRange(question);
    const month = extractMonth(question);
    if (!yearRange && !month) return this.abstain();

    let filtered = context.table;
    const filterDesc: string[] = [];

    if (yearRange) {
      if (yearRange.start === yearRange.end) {
        filtered = filtered.where('year', yearRange.start);
        filterDesc.push(`year ${yearRange.start}`);
      } else {
        filtered = filtered.whereBetween('year', yearRange.start, yearRange.end);
        filterDesc.push(`years ${yearRange.start}-${yearRange.end}`);
      }
    }

    if (month) {
      filtered = filtered.where('month', month);
      filterDesc.push(monthName(month));
    }

    const description = filterDesc.join(', ');
    if (filtered.length === 0) {
      return this.noData(`No data found for ${description}.`);
    }

    const result = projectColumns(filtered, TIME_DISPLAY_COLUMNS).head(MAX_ROWS);
    return this.matched(
      `Data for ${description} (${filtered.length} samples, showing first ${MAX_ROWS}):`,
      result
    );
  }
}
