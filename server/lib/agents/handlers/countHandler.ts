import { BaseHandler, type HandlerContext, type HandlerResult } from './baseHandler.js';
import { tableFromArrays } from '../utils/resultFormatter.js';
import { type CellValue, DataTable } from '../../dataTable.js';

const COUNT_TRIGGERS = ['how many', 'count', 'number of'];

/**
 * Count Handler
 * Handles queries like "how many samples per site"
 */
export class CountHandler extends BaseHandler {
  readonly name = 'count';

  canHandle(question: string): boolean {
    return this.containsAny(question, COUNT_TRIGGERS);
  }

  handle(context: HandlerContext): HandlerResult {
    const { question, table } = context;

    if (question.includes('site')) {
      return this.matched('Number of samples per site:', this.countBy(table, 'site').sortBy('sample_count', true));
    }
    if (question.includes('year')) {
      return this.matched('Number of samples per year:', this.countBy(table, 'year'));
    }
    if (question.includes('month')) {
      return this.matched('Number of samples per month:', this.countBy(table, 'month'));
    }

    const total = table.length;
    return this.matched(
      `Total number of samples in the dataset: ${total}`,
      tableFromArrays(['Total Samples'], [[total]])
    );
  }

  private countBy(table: DataTable, column: string): DataTable {
    const rows = table.groupBy(column).map((group): CellValue[] => [group.key, group.table.length]);
    return tableFromArrays([column, 'sample_count'], rows);
  }
}
