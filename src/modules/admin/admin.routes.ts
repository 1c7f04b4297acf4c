import { Router } from 'express';
import { authenticate, requireAdmin } from '../../middleware/auth.middleware.js';
import { createAdminController, type AdminControllerServices } from './admin.controller.js';

export function createAdminRouter(services: AdminControllerServices): Router {
  const router = Router();
  const controller = createAdminController(services);

  router.use(authenticate, requireAdmin);

  // Reload the schema dump without a restart
  router.post('/schema/refresh', controller.refreshSchema);

  // Re-read knowledge-base files and the embeddings side file
  router.post('/kb/refresh', controller.refreshKnowledgeBase);

  // Embed examples that have no vector yet
  router.post('/embeddings/generate', controller.generateEmbeddings);

  router.get('/kb/stats', controller.knowledgeBaseStats);
  router.get('/stats', controller.stats);

  return router;
}
