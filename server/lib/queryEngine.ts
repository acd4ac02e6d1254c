import type { DataProvider } from './dataProvider.js';
import type { DataTable } from './dataTable.js';
import type { QueryOrchestrator } from './agents/orchestrator.js';
import { getInitializedOrchestrator } from './agents/index.js';
import { createErrorResponse } from './agents/utils/errorRecovery.js';

export interface QueryResult {
  explanation: string;
  table: DataTable | null;
}

/**
 * Answers natural-language questions against the provider's current table.
 * Each question gets its own snapshot; nothing carries over between questions.
 */
export class QueryEngine {
  constructor(
    private readonly provider: DataProvider,
    private readonly orchestrator: QueryOrchestrator = getInitializedOrchestrator()
  ) {}

  query(question: string): QueryResult {
    let table: DataTable;
    try {
      table = this.provider.currentTable();
    } catch (error) {
      console.error('❌ Failed to load data:', error);
      const response = createErrorResponse(error);
      return { explanation: response.explanation, table: response.table };
    }

    const answer = this.orchestrator.processQuery(question, table);
    return { explanation: answer.explanation, table: answer.table };
  }
}
