import type { NextFunction, Response } from 'express';
import { createLogger } from '../../core/logger.js';
import type { AuthRequest } from '../../middleware/auth.middleware.js';
import type { ExampleStore } from '../examples/example-store.js';
import type { SchemaCatalog } from '../schema/schema-catalog.js';

const logger = createLogger('ADMIN-CONTROLLER');

export interface AdminControllerServices {
  catalog: SchemaCatalog;
  examples: ExampleStore;
}

export function createAdminController(services: AdminControllerServices) {
  return {
    /**
     * POST /api/admin/schema/refresh
     */
    refreshSchema: async (req: AuthRequest, res: Response, next: NextFunction) => {
      try {
        const stats = await services.catalog.refresh();
        logger.info('refreshSchema', 'SUCCESS', `USER-${req.user?.userId ?? 'unknown'} Tables:${stats.totalTables}`);
        return res.json({ success: true, data: stats });
      } catch (error) {
        return next(error);
      }
    },

    /**
     * POST /api/admin/kb/refresh
     */
    refreshKnowledgeBase: async (req: AuthRequest, res: Response, next: NextFunction) => {
      try {
        const stats = await services.examples.refresh();
        logger.info('refreshKnowledgeBase', 'SUCCESS', `USER-${req.user?.userId ?? 'unknown'} Examples:${stats.totalExamples}`);
        return res.json({ success: true, data: stats });
      } catch (error) {
        return next(error);
      }
    },

    /**
     * POST /api/admin/embeddings/generate
     */
    generateEmbeddings: async (_req: AuthRequest, res: Response, next: NextFunction) => {
      try {
        const stats = await services.examples.generateEmbeddings();
        return res.json({ success: true, data: stats });
      } catch (error) {
        return next(error);
      }
    },

    /**
     * GET /api/admin/kb/stats
     */
    knowledgeBaseStats: async (_req: AuthRequest, res: Response, next: NextFunction) => {
      try {
        return res.json({ success: true, data: await services.examples.stats() });
      } catch (error) {
        return next(error);
      }
    },

    /**
     * GET /api/admin/stats
     */
    stats: async (_req: AuthRequest, res: Response, next: NextFunction) => {
      try {
        const [schema, knowledgeBase] = await Promise.all([services.catalog.stats(), services.examples.stats()]);
        return res.json({ success: true, data: { schema, knowledgeBase } });
      } catch (error) {
        return next(error);
      }
    }
  };
}
