/**
 * API v1 Router Aggregator
 *
 * Route Structure:
 * - /api/v1/recommendations   POST /, GET /:userId, POST /:userId/categories/:categoryId/more
 * - /api/v1/interactions      POST /
 * - /api/v1/preferences       GET|PUT /:userId/radius, PUT /:userId/onboarding
 */

import { Router } from 'express';
import type { AppServices } from '../../services/recommendations/index.js';
import { createRecommendationsRouter } from '../../controllers/recommendations/recommendations.controller.js';
import { createInteractionsRouter } from '../../controllers/interactions/interactions.controller.js';
import { createPreferencesRouter } from '../../controllers/preferences/preferences.controller.js';

export function createV1Router(services: AppServices): Router {
  const router = Router();

  router.use('/recommendations', createRecommendationsRouter(services.recommendations));
  router.use('/interactions', createInteractionsRouter(services.recorder));
  router.use('/preferences', createPreferencesRouter(services.preferences, services.fingerprints));

  return router;
}
