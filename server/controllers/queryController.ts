import type { Request, Response } from "express";
import { queryRequestSchema, type QueryResponse } from "../../shared/schema.js";
import type { QueryEngine } from "../lib/queryEngine.js";
import type { DataProvider } from "../lib/dataProvider.js";
import { summarizeTable } from "../lib/dataSummary.js";
import { sendError, sendSuccess, sendValidationError } from "../utils/index.js";

export interface QueryController {
  askQuestion(req: Request, res: Response): void;
  getDataSummary(req: Request, res: Response): void;
}

export function createQueryController(engine: QueryEngine, provider: DataProvider): QueryController {
  // Answer a natural-language question about the samples
  const askQuestion = (req: Request, res: Response): void => {
    const parsed = queryRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const message = parsed.error.errors.map(issue => issue.message).join(', ');
      sendValidationError(res, message);
      return;
    }

    const result = engine.query(parsed.data.question);
    const body: QueryResponse = {
      explanation: result.explanation,
      table: result.table ? result.table.toJSON() : null,
    };
    sendSuccess(res, body);
  };

  // Overview of the loaded data
  const getDataSummary = (_req: Request, res: Response): void => {
    try {
      sendSuccess(res, summarizeTable(provider.currentTable()));
    } catch (error) {
      console.error('Error building data summary:', error);
      sendError(res, error instanceof Error ? error : 'Failed to load data');
    }
  };

  return { askQuestion, getDataSummary };
}
