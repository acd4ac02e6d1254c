import type { BaseHandler, HandlerContext } from './handlers/baseHandler.js';
import type { DataTable } from '../dataTable.js';
import { normalizeQuestion } from './utils/entityExtractor.js';
import { buildFallbackResponse } from './utils/fallback.js';
import { createErrorResponse } from './utils/errorRecovery.js';

/**
 * Answer returned for every question
 */
export interface QueryAnswer {
  explanation: string;
  table: DataTable | null;
  /** Name of the handler that answered, or 'fallback' / 'error' */
  handledBy: string;
}

/**
 * Query Orchestrator
 * Tries each handler in its fixed priority order and returns the first answer.
 * The handler list is fixed at construction.
 */
export class QueryOrchestrator {
  private readonly handlers: readonly BaseHandler[];

  constructor(handlers: readonly BaseHandler[]) {
    this.handlers = Object.freeze([...handlers]);
  }

  /**
   * Get handler count (for initialization check)
   */
  getHandlerCount(): number {
    return this.handlers.length;
  }

  getHandlerNames(): string[] {
    return this.handlers.map(handler => handler.name);
  }

  /**
   * Run the cascade. A handler that throws stops the cascade and the error
   * propagates; lower-priority handlers are not tried.
   */
  dispatch(question: string, table: DataTable): QueryAnswer {
    const context: HandlerContext = { question: normalizeQuestion(question), table };

    for (const handler of this.handlers) {
      if (!handler.canHandle(context.question)) continue;

      const result = handler.handle(context);
      if (result.status === 'matched') {
        console.log(`✅ Routing to handler: ${handler.name}`);
        return { explanation: result.explanation, table: result.table, handledBy: handler.name };
      }
    }

    console.log(`⚠️ No handler matched, returning help`);
    return { ...buildFallbackResponse(), handledBy: 'fallback' };
  }

  /**
   * Process a user question. Never throws: failures become an error explanation.
   */
  processQuery(question: string, table: DataTable): QueryAnswer {
    console.log(`\n🔍 Processing query: "${question}"`);
    try {
      return this.dispatch(question, table);
    } catch (error) {
      console.error(`❌ Query failed:`, error);
      const response = createErrorResponse(error);
      return { explanation: response.explanation, table: response.table, handledBy: 'error' };
    }
  }
}
