import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { errorMiddleware } from './middleware/error.middleware.js';
import { createAdminRouter } from './modules/admin/admin.routes.js';
import type { ExampleStore } from './modules/examples/example-store.js';
import type { ExecutionGuard } from './modules/execution/execution-guard.js';
import type { GenerationService } from './modules/generation/generation.service.js';
import { createQueryRouter, type QueryRateLimit } from './modules/query/query.routes.js';
import type { SchemaCatalog } from './modules/schema/schema-catalog.js';

export interface AppServices {
  catalog: SchemaCatalog;
  examples: ExampleStore;
  generation: GenerationService;
  guard: ExecutionGuard;
}

export interface AppOptions {
  corsOrigins: string[];
  rateLimit: QueryRateLimit;
}

export function createApp(services: AppServices, options: AppOptions): Express {
  const app = express();

  app.use(helmet());
  app.use(
    cors({
      origin: options.corsOrigins,
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type', 'Authorization'],
      credentials: true
    })
  );
  app.use(express.json({ limit: '100kb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api/queries', createQueryRouter(services, options.rateLimit));
  app.use('/api/admin', createAdminRouter(services));

  // Error middleware MUST be the last one added
  app.use(errorMiddleware);

  return app;
}
