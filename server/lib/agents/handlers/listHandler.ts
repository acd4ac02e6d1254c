import { BaseHandler, type HandlerContext, type HandlerResult } from './baseHandler.js';
import { columnTable } from '../utils/resultFormatter.js';

const LIST_TRIGGERS = ['list', 'show all', 'what'];
const COLUMN_WORDS = ['column', 'parameter', 'variable'];

/**
 * List Handler
 * Handles queries like "list all sites" or "what columns are there"
 */
export class ListHandler extends BaseHandler {
  readonly name = 'list';

  canHandle(question: string): boolean {
    return this.containsAny(question, LIST_TRIGGERS);
  }

  handle(context: HandlerContext): HandlerResult {
    const { question, table } = context;

    if (question.includes('site')) {
      const sites = table.unique('site');
      return this.matched(`All ${sites.length} sites in the dataset:`, columnTable('Sites', sites));
    }

    if (this.containsAny(question, COLUMN_WORDS)) {
      const columns = [...table.columns];
      return this.matched(`All ${columns.length} columns in the dataset:`, columnTable('Columns', columns));
    }

    if (question.includes('year')) {
      const years = table.unique('year');
      return this.matched(`All ${years.length} years in the dataset:`, columnTable('Years', years));
    }

    return this.abstain();
  }
}
