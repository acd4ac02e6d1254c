import { BaseHandler, type HandlerContext, type HandlerResult } from './baseHandler.js';
import { tableFromArrays } from '../utils/resultFormatter.js';
import { KEY_PARAMETERS } from '../lexicon.js';
import { DESCRIBE_LABELS, describeColumns, describeOrder, describeValues } from '../../statisticalSummary.js';
import type { CellValue } from '../../dataTable.js';

const SUMMARY_TRIGGERS = ['summary', 'describe', 'statistics', 'stats'];

/**
 * Summary Handler
 * Handles queries like "describe ph" or "stats for the dataset"
 */
export class SummaryHandler extends BaseHandler {
  readonly name = 'summary';

  canHandle(question: string): boolean {
    return this.containsAny(question, SUMMARY_TRIGGERS);
  }

  handle(context: HandlerContext): HandlerResult {
    const { table } = context;
    const param = this.resolveParameter(context);

    if (param) {
      const stats = describeOrder(describeValues(table.numbers(param), param));
      const rows = DESCRIBE_LABELS.map((label, i): CellValue[] => [label, stats[i]]);
      return this.matched(`Summary statistics for ${param}:`, tableFromArrays(['Statistic', param], rows));
    }

    const columns = KEY_PARAMETERS.filter(col => table.hasColumn(col));
    const rows = describeColumns(table, columns).map((stats): CellValue[] => [
      stats.column,
      ...describeOrder(stats),
    ]);
    return this.matched(
      'Summary statistics for key water quality parameters:',
      tableFromArrays(['Parameter', 'Count', 'Mean', 'Std', 'Min', '25%', '50%', '75%', 'Max'], rows)
    );
  }
}
