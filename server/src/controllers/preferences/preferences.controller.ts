/**
 * Preferences Controller
 *
 * GET /api/v1/preferences/:userId/radius       { radiusMiles }
 * PUT /api/v1/preferences/:userId/radius       { radiusMiles } -> { radiusMiles }
 * PUT /api/v1/preferences/:userId/onboarding   { responses } -> 204
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { PreferenceStore } from '../../services/recommendations/preferences/preference-store.js';
import type { FingerprintStore } from '../../services/recommendations/fingerprint/fingerprint-store.interface.js';
import { createValidationError } from '../../middleware/error.middleware.js';
import { OnboardingSchema, RadiusSchema, UserIdSchema } from '../schemas.js';

function parseUserId(req: Request): string {
  const parsed = UserIdSchema.safeParse(req.params.userId);
  if (!parsed.success) {
    throw createValidationError('Invalid userId', parsed.error.flatten());
  }
  return parsed.data;
}

export function createPreferencesRouter(preferences: PreferenceStore, fingerprints: FingerprintStore): Router {
  const router = Router();

  router.get('/:userId/radius', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const radiusMiles = await preferences.getRadiusMiles(parseUserId(req));
      res.json({ radiusMiles });
    } catch (error) {
      next(error);
    }
  });

  router.put('/:userId/radius', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const userId = parseUserId(req);
      const parsed = RadiusSchema.safeParse(req.body);
      if (!parsed.success) {
        throw createValidationError('Invalid radius', parsed.error.flatten());
      }

      await preferences.setRadiusMiles(userId, parsed.data.radiusMiles);
      req.log.info({ event: 'radius_updated', userId, radiusMiles: parsed.data.radiusMiles }, '[PREFERENCES] Radius updated');
      res.json({ radiusMiles: parsed.data.radiusMiles });
    } catch (error) {
      next(error);
    }
  });

  router.put('/:userId/onboarding', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const userId = parseUserId(req);
      const parsed = OnboardingSchema.safeParse(req.body);
      if (!parsed.success) {
        throw createValidationError('Invalid onboarding responses', parsed.error.flatten());
      }

      await fingerprints.saveOnboarding(userId, parsed.data.responses);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
