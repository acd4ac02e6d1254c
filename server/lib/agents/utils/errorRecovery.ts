import type { DataTable } from '../../dataTable.js';

/**
 * Error Response Interface
 */
export interface ErrorResponse {
  explanation: string;
  table: DataTable | null;
  error: string;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Turn a failure raised while answering a question into a plain answer.
 * The caller never sees the exception itself.
 */
export function createErrorResponse(error: unknown): ErrorResponse {
  const errorMessage = getErrorMessage(error);
  return {
    explanation: `Error processing query: ${errorMessage}`,
    table: null,
    error: errorMessage,
  };
}
