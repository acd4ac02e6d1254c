/**
 * Raised when a table computation cannot be carried out
 * (missing column, extreme of an all-empty series, describe with no columns).
 * Handlers let it propagate; only the orchestrator's top level catches it.
 */
export class ComputationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ComputationError';
  }
}
