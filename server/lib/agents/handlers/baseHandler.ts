import type { DataTable } from '../../dataTable.js';
import { extractParameter } from '../utils/entityExtractor.js';

/**
 * Handler Context
 * Contains all information needed for a handler to process a question
 */
export interface HandlerContext {
  /** Lowercased, trimmed question text */
  question: string;
  /** Snapshot of the data for this question; never modified */
  table: DataTable;
}

/**
 * Handler Result
 * A handler either answers the question or abstains so the next one can try.
 * A matched answer without a table means the question was understood but no rows matched.
 */
export type HandlerResult =
  | { status: 'matched'; explanation: string; table: DataTable | null }
  | { status: 'abstained' };

/**
 * Base Handler Class
 * All query handlers extend this base class
 */
export abstract class BaseHandler {
  abstract readonly name: string;

  /**
   * Trigger words this handler needs before it will look at the question
   */
  abstract canHandle(question: string): boolean;

  /**
   * Answer the question or abstain. Computation faults are thrown, not converted.
   */
  abstract handle(context: HandlerContext): HandlerResult;

  protected matched(explanation: string, table: DataTable): HandlerResult {
    return { status: 'matched', explanation, table };
  }

  /**
   * Understood the question, but nothing in the data satisfies it
   */
  protected noData(explanation: string): HandlerResult {
    return { status: 'matched', explanation, table: null };
  }

  protected abstain(): HandlerResult {
    return { status: 'abstained' };
  }

  /**
   * Parameter named in the question, provided the live table has that column
   */
  protected resolveParameter(context: HandlerContext): string | null {
    const param = extractParameter(context.question);
    if (!param || !context.table.hasColumn(param)) {
      return null;
    }
    return param;
  }

  protected containsAny(question: string, words: readonly string[]): boolean {
    return words.some(word => question.includes(word));
  }
}
