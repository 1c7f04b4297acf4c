import { Router } from 'express';
import rateLimit from 'express-rate-limit';
import { authenticate } from '../../middleware/auth.middleware.js';
import { createQueryController, type QueryControllerServices } from './query.controller.js';

export interface QueryRateLimit {
  windowMs: number;
  max: number;
}

export function createQueryRouter(services: QueryControllerServices, limit: QueryRateLimit): Router {
  const router = Router();
  const controller = createQueryController(services);

  const generationLimiter = rateLimit({
    windowMs: limit.windowMs,
    max: limit.max,
    standardHeaders: true,
    legacyHeaders: false,
    message: { success: false, error: 'Too many query generation requests, please slow down' }
  });

  /**
   * GET /api/queries/examples
   * Knowledge-base examples, optionally filtered by keyword.
   */
  router.get('/examples', authenticate, controller.listExamples);

  /**
   * POST /api/queries
   * Generate SQL from a natural-language question.
   */
  router.post('/', authenticate, generationLimiter, controller.generate);

  /**
   * GET /api/queries/:id
   */
  router.get('/:id', authenticate, controller.getAttempt);

  /**
   * POST /api/queries/:id/execute
   * Run the generated SQL once against the target database.
   */
  router.post('/:id/execute', authenticate, controller.execute);

  /**
   * GET /api/queries/:id/results?page=1
   */
  router.get('/:id/results', authenticate, controller.getResults);

  /**
   * POST /api/queries/:id/rerun
   * Regenerate SQL for the same question as a new, linked attempt.
   */
  router.post('/:id/rerun', authenticate, generationLimiter, controller.rerun);

  return router;
}
