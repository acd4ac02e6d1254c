import { BaseHandler, type HandlerContext, type HandlerResult } from './baseHandler.js';
import { capitalize, extractSeasons, lookupMonth } from '../utils/entityExtractor.js';
import { tableFromArrays } from '../utils/resultFormatter.js';
import { PARAMETER_ALIASES, SEASON_NAMES, WATER_TEMPERATURE } from '../lexicon.js';
import { rangeStats } from '../../statisticalSummary.js';
import { type CellValue, DataTable } from '../../dataTable.js';

const COMPARISON_TRIGGERS = ['compare', ' vs ', 'versus', 'between'];
const MONTH_YEAR_PATTERN = /(\w+)\s+(\d{4})/g;

interface Period {
  month: number;
  year: number;
  label: string;
}

/**
 * Comparison Handler
 * Handles queries like "compare summer vs winter temperature" or
 * "compare january 2026 and november 2023"
 */
export class ComparisonHandler extends BaseHandler {
  readonly name = 'comparison';

  canHandle(question: string): boolean {
    return this.containsAny(question, COMPARISON_TRIGGERS);
  }

  handle(context: HandlerContext): HandlerResult {
    const { question, table } = context;
    const param = this.resolveComparisonParameter(context);

    const periods = this.extractPeriods(question);
    if (periods) {
      return this.comparePeriods(table, param, periods);
    }

    const seasonsFound = extractSeasons(question);
    if (seasonsFound.length >= 2) {
      const subset = table.filter(row => {
        const season = row['season'];
        return typeof season === 'string' && seasonsFound.some(s => s === season);
      });
      return this.matched(
        `Comparison of ${param} between ${seasonsFound.join(' and ')}:`,
        this.seasonStats(subset, param)
      );
    }

    if (question.includes('season') || this.containsAny(question, SEASON_NAMES)) {
      return this.matched(`Comparison of ${param} across all seasons:`, this.seasonStats(table, param));
    }

    return this.abstain();
  }

  /**
   * First alias whose column exists; water temperature when none is mentioned
   */
  private resolveComparisonParameter(context: HandlerContext): string {
    const fromAlias = PARAMETER_ALIASES.find(
      ([alias, column]) => context.question.includes(alias) && context.table.hasColumn(column)
    );
    return fromAlias ? fromAlias[1] : WATER_TEMPERATURE;
  }

  /**
   * Two "<month> <year>" periods, or null when the first two word-year pairs are not both months
   */
  private extractPeriods(question: string): [Period, Period] | null {
    const matches = [...question.matchAll(MONTH_YEAR_PATTERN)];
    if (matches.length < 2) return null;

    const periods: Period[] = [];
    for (const match of matches.slice(0, 2)) {
      const month = lookupMonth(match[1]);
      if (month) {
        periods.push({ month, year: parseInt(match[2], 10), label: `${capitalize(match[1])} ${match[2]}` });
      }
    }

    if (periods.length !== 2) return null;
    return [periods[0], periods[1]];
  }

  private comparePeriods(table: DataTable, param: string, periods: [Period, Period]): HandlerResult {
    const rows: CellValue[][] = [];
    for (const period of periods) {
      const periodRows = table.where('month', period.month).where('year', period.year);
      if (periodRows.length === 0) continue;
      const stats = rangeStats(periodRows.numbers(param));
      rows.push([period.label, stats.mean, stats.min, stats.max, stats.count]);
    }

    if (rows.length === 0) {
      return this.noData('No data found for the specified time periods.');
    }

    return this.matched(
      `Comparison of ${param} between ${periods[0].label} and ${periods[1].label}:`,
      tableFromArrays(['Period', 'Mean', 'Min', 'Max', 'Count'], rows)
    );
  }

  private seasonStats(table: DataTable, param: string): DataTable {
    table.requireColumn(param);
    const rows = table.groupBy('season').map((group): CellValue[] => {
      const stats = rangeStats(group.table.numbers(param));
      return [group.key, stats.mean, stats.min, stats.max, stats.count];
    });
    return tableFromArrays(['season', 'mean', 'min', 'max', 'count'], rows);
  }
}
