/**
 * Agent System Entry Point
 * Builds the orchestrator with all handlers registered in priority order
 */

import { QueryOrchestrator } from './orchestrator.js';
import { CorrelationHandler } from './handlers/correlationHandler.js';
import { ComparisonHandler } from './handlers/comparisonHandler.js';
import { ExtremeHandler } from './handlers/extremeHandler.js';
import { AggregationHandler } from './handlers/aggregationHandler.js';
import { SiteHandler } from './handlers/siteHandler.js';
import { TimeRangeHandler } from './handlers/timeRangeHandler.js';
import { CountHandler } from './handlers/countHandler.js';
import { TrendHandler } from './handlers/trendHandler.js';
import { SummaryHandler } from './handlers/summaryHandler.js';
import { ListHandler } from './handlers/listHandler.js';

/**
 * Create an orchestrator with every handler.
 * More specific handlers come first; order decides ambiguous questions.
 */
export function initializeAgents(): QueryOrchestrator {
  const orchestrator = new QueryOrchestrator([
    new CorrelationHandler(),
    new ComparisonHandler(), // before Extreme: "compare ... between" questions
    new ExtremeHandler(), // before Aggregation: "highest average" is an extreme
    new AggregationHandler(),
    new SiteHandler(),
    new TimeRangeHandler(),
    new CountHandler(),
    new TrendHandler(),
    new SummaryHandler(),
    new ListHandler(),
  ]);

  console.log(`✅ Query engine initialized with ${orchestrator.getHandlerCount()} handlers`);
  return orchestrator;
}

let orchestratorInstance: QueryOrchestrator | null = null;

/**
 * Get initialized orchestrator
 */
export function getInitializedOrchestrator(): QueryOrchestrator {
  if (!orchestratorInstance) {
    orchestratorInstance = initializeAgents();
  }
  return orchestratorInstance;
}

export { QueryOrchestrator } from './orchestrator.js';
export type { QueryAnswer } from './orchestrator.js';
export type { HandlerResult, HandlerContext } from './handlers/baseHandler.js';
