import { Router } from "express";
import type { QueryController } from "../controllers/queryController.js";

export function createQueryRoutes(controller: QueryController): Router {
  const router = Router();

  // Question endpoint
  router.post('/query', controller.askQuestion);

  // Data overview endpoint
  router.get('/data/summary', controller.getDataSummary);

  return router;
}
