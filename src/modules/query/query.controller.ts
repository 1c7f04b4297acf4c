import type { NextFunction, Response } from 'express';
import { z } from 'zod';
import { PipelineError, httpStatusFor } from '../../core/errors.js';
import type { AuthRequest } from '../../middleware/auth.middleware.js';
import type { QueryAttempt } from '../attempts/types.js';
import type { ExampleStore } from '../examples/example-store.js';
import type { ExecutionGuard } from '../execution/execution-guard.js';
import { readResultsPage } from '../execution/pagination.js';
import type { GenerationService } from '../generation/generation.service.js';
import type { GenerationOutcome } from '../generation/types.js';

const GenerateQuerySchema = z.object({
  query: z.string().trim().min(3, 'Query must be at least 3 characters').max(2000, 'Query is too long'),
  conversationHistory: z
    .array(
      z.object({
        role: z.enum(['user', 'assistant']),
        content: z.string()
      })
    )
    .optional()
});

const ResultsQuerySchema = z.object({
  page: z.coerce.number().int('Page must be an integer').min(1, 'Page must be at least 1').default(1)
});

const ExamplesQuerySchema = z.object({
  q: z.string().trim().optional()
});

export interface QueryControllerServices {
  generation: GenerationService;
  guard: ExecutionGuard;
  examples: ExampleStore;
}

function getUserId(req: AuthRequest): string | null {
  return req.user?.userId ?? null;
}

function validationDetails(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join(', ');
}

export function serializeAttempt(attempt: QueryAttempt) {
  return {
    id: attempt.id,
    naturalLanguageQuery: attempt.naturalLanguageQuery,
    generatedSql: attempt.generatedSql,
    status: attempt.status,
    createdAt: attempt.createdAt.toISOString(),
    generatedAt: attempt.generatedAt?.toISOString() ?? null,
    executedAt: attempt.executedAt?.toISOString() ?? null,
    generationMs: attempt.generationMs,
    executionMs: attempt.executionMs,
    errorMessage: attempt.errorMessage,
    originalAttemptId: attempt.originalAttemptId
  };
}

function sendGenerationOutcome(res: Response, outcome: GenerationOutcome): Response {
  switch (outcome.kind) {
    case 'sql':
      return res.status(201).json({
        success: true,
        kind: 'sql',
        data: {
          attempt: serializeAttempt(outcome.attempt),
          sql: outcome.sql,
          selectedTables: outcome.selectedTables,
          source: outcome.source,
          matchedExample: outcome.matchedExample ?? null
        }
      });
    case 'clarification':
      return res.status(201).json({
        success: true,
        kind: 'clarification',
        code: 'GENERATION_AMBIGUOUS',
        data: {
          attempt: serializeAttempt(outcome.attempt),
          question: outcome.question,
          selectedTables: outcome.selectedTables
        }
      });
    case 'failure':
      return res.status(httpStatusFor(outcome.code)).json({
        success: false,
        kind: 'failure',
        code: outcome.code,
        error: outcome.message,
        data: { attempt: serializeAttempt(outcome.attempt) }
      });
  }
}

/**
 * Handlers for /api/queries.
 */
export function createQueryController(services: QueryControllerServices) {
  const unauthorized = (res: Response) =>
    res.status(401).json({ success: false, error: 'Unauthorized', details: 'No valid user session' });

  return {
    /**
     * POST /api/queries
     */
    generate: async (req: AuthRequest, res: Response, next: NextFunction) => {
      const userId = getUserId(req);
      if (!userId) return unauthorized(res);

      const validation = GenerateQuerySchema.safeParse(req.body);
      if (!validation.success) {
        return res.status(400).json({ success: false, error: 'Invalid request', details: validationDetails(validation.error) });
      }

      try {
        const outcome = await services.generation.generate({
          userId,
          question: validation.data.query,
          conversationHistory: validation.data.conversationHistory
        });
        return sendGenerationOutcome(res, outcome);
      } catch (error) {
        return next(error);
      }
    },

    /**
     * GET /api/queries/examples?q=
     */
    listExamples: async (req: AuthRequest, res: Response, next: NextFunction) => {
      const validation = ExamplesQuerySchema.safeParse(req.query);
      if (!validation.success) {
        return res.status(400).json({ success: false, error: 'Invalid request', details: validationDetails(validation.error) });
      }

      try {
        const keyword = validation.data.q;
        const examples = keyword ? await services.examples.findByKeyword(keyword) : await services.examples.all();
        return res.json({
          success: true,
          data: examples.map((example) => ({
            filename: example.filename,
            title: example.title,
            description: example.description ?? null,
            sql: example.sql
          }))
        });
      } catch (error) {
        return next(error);
      }
    },

    /**
     * GET /api/queries/:id
     */
    getAttempt: async (req: AuthRequest, res: Response, next: NextFunction) => {
      const userId = getUserId(req);
      if (!userId) return unauthorized(res);

      try {
        const attempt = await services.generation.getOwnedAttempt(userId, req.params.id);
        return res.json({ success: true, data: serializeAttempt(attempt) });
      } catch (error) {
        return next(error);
      }
    },

    /**
     * POST /api/queries/:id/execute
     */
    execute: async (req: AuthRequest, res: Response, next: NextFunction) => {
      const userId = getUserId(req);
      if (!userId) return unauthorized(res);

      try {
        const attempt = await services.generation.getOwnedAttempt(userId, req.params.id);
        const outcome = await services.guard.executeAttempt(attempt);

        switch (outcome.kind) {
          case 'success':
            return res.json({
              success: true,
              data: {
                attempt: serializeAttempt(outcome.attempt),
                results: readResultsPage(outcome.manifest, 1)
              }
            });
          case 'failure':
            return res.status(httpStatusFor(outcome.code)).json({
              success: false,
              code: outcome.code,
              error: outcome.message,
              data: { attempt: serializeAttempt(outcome.attempt) }
            });
          case 'rejected':
            return res.status(httpStatusFor(outcome.code)).json({
              success: false,
              code: outcome.code,
              error: outcome.message
            });
        }
      } catch (error) {
        return next(error);
      }
    },

    /**
     * GET /api/queries/:id/results?page=
     */
    getResults: async (req: AuthRequest, res: Response, next: NextFunction) => {
      const userId = getUserId(req);
      if (!userId) return unauthorized(res);

      const validation = ResultsQuerySchema.safeParse(req.query);
      if (!validation.success) {
        return res.status(400).json({ success: false, error: 'Invalid request', details: validationDetails(validation.error) });
      }

      try {
        const attempt = await services.generation.getOwnedAttempt(userId, req.params.id);
        if (attempt.status !== 'success') {
          throw new PipelineError('This query has not been executed successfully', 'ATTEMPT_STATE', attempt.status);
        }
        const manifest = await services.guard.findResults(attempt.id);
        if (!manifest) {
          throw new PipelineError('No stored results for this query', 'NOT_FOUND', attempt.id);
        }
        return res.json({ success: true, data: readResultsPage(manifest, validation.data.page) });
      } catch (error) {
        return next(error);
      }
    },

    /**
     * POST /api/queries/:id/rerun
     */
    rerun: async (req: AuthRequest, res: Response, next: NextFunction) => {
      const userId = getUserId(req);
      if (!userId) return unauthorized(res);

      try {
        const outcome = await services.generation.rerun(userId, req.params.id);
        return sendGenerationOutcome(res, outcome);
      } catch (error) {
        return next(error);
      }
    }
  };
}
