/**
 * Interactions Controller
 * POST /api/v1/interactions - record one reaction to a place
 *
 * Always 202 once the body is valid; `recorded` reports whether the store accepted it.
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { InteractionRecorder } from '../../services/recommendations/fingerprint/interaction-recorder.js';
import { createValidationError } from '../../middleware/error.middleware.js';
import { RecordInteractionSchema } from '../schemas.js';

export function createInteractionsRouter(recorder: InteractionRecorder): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = RecordInteractionSchema.safeParse(req.body);
      if (!parsed.success) {
        throw createValidationError('Invalid interaction', parsed.error.flatten());
      }

      const recorded = await recorder.record(parsed.data, req.traceId);
      res.status(202).json({ recorded });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
