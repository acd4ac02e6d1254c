import type { Express } from "express";
import { createQueryRoutes } from "./query.js";
import { createQueryController } from "../controllers/queryController.js";
import type { QueryEngine } from "../lib/queryEngine.js";
import type { DataProvider } from "../lib/dataProvider.js";

export function registerRoutes(app: Express, engine: QueryEngine, provider: DataProvider): void {
  const controller = createQueryController(engine, provider);
  app.use('/api', createQueryRoutes(controller));
  console.log('✅ Routes registered: /api/query, /api/data/summary');
}
