import { BaseHandler, type HandlerContext, type HandlerResult } from './baseHandler.js';
import { extractParameters } from '../utils/entityExtractor.js';
import { formatNumber, tableFromArrays } from '../utils/resultFormatter.js';
import { DEFAULT_CORRELATION_PAIR } from '../lexicon.js';
import { classifyCorrelation, correlationMatrix } from '../../correlationAnalyzer.js';
import type { CellValue } from '../../dataTable.js';

const CORRELATION_TRIGGERS = ['correlation', 'correlate', 'relationship'];

/**
 * Correlation Handler
 * Handles queries like "correlation between temperature and dissolved oxygen"
 */
export class CorrelationHandler extends BaseHandler {
  readonly name = 'correlation';

  canHandle(question: string): boolean {
    return this.containsAny(question, CORRELATION_TRIGGERS);
  }

  handle(context: HandlerContext): HandlerResult {
    const { question, table } = context;

    const mentioned = extractParameters(question);
    const params = mentioned.length >= 2 ? mentioned.slice(0, 2) : [...DEFAULT_CORRELATION_PAIR];
    console.log(`🔗 Correlating ${params[0]} with ${params[1]}`);

    const matrix = correlationMatrix(table, params);
    const coefficient = matrix.values[0][1];

    const explanation =
      `Correlation between ${params[0]} and ${params[1]}: ${formatNumber(coefficient, 3)} ` +
      `(${classifyCorrelation(coefficient)})`;

    const rows = matrix.columns.map((col, i): CellValue[] => [col, ...matrix.values[i]]);
    return this.matched(explanation, tableFromArrays(['Parameter', ...matrix.columns], rows));
  }
}
