import express, { type ErrorRequestHandler, type Express } from "express";
import { corsConfig } from "./middleware/index.js";
import { registerRoutes } from "./routes/index.js";
import { QueryEngine } from "./lib/queryEngine.js";
import type { DataProvider } from "./lib/dataProvider.js";
import { sendError, sendNotFound } from "./utils/index.js";

// Body-parser and CORS failures carry an HTTP status
const handleError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  const status =
    typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' ? err.status : 500;
  console.error('❌ Request failed:', err);
  sendError(res, err instanceof Error ? err : 'Internal server error', status);
};

export function createApp(provider: DataProvider, engine: QueryEngine = new QueryEngine(provider)): Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  // Handle preflight requests explicitly
  app.options('*', corsConfig);
  app.use(corsConfig);

  // Health check endpoint
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'OK', message: 'Server is running' });
  });

  registerRoutes(app, engine, provider);

  app.use('/api', (_req, res) => {
    sendNotFound(res, 'Endpoint not found');
  });

  app.use(handleError);

  return app;
}
