/**
 * Recommendations Controller
 *
 * POST /api/v1/recommendations                                     run a generation cycle
 * GET  /api/v1/recommendations/:userId                             latest published feed
 * POST /api/v1/recommendations/:userId/categories/:categoryId/more more places for a category
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { RecommendationService } from '../../services/recommendations/recommendation.service.js';
import { createNotFoundError, createValidationError } from '../../middleware/error.middleware.js';
import { GenerateRecommendationsSchema, MorePlacesSchema, UserIdSchema } from '../schemas.js';

export function createRecommendationsRouter(recommendations: RecommendationService): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = GenerateRecommendationsSchema.safeParse(req.body);
      if (!parsed.success) {
        throw createValidationError('Invalid recommendations request', parsed.error.flatten());
      }

      const { userId, location } = parsed.data;
      const { feed, published } = await recommendations.generate(userId, location, req.traceId);

      res.json({ ...feed, stale: !published });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:userId', (req: Request, res: Response, next: NextFunction) => {
    const userId = UserIdSchema.safeParse(req.params.userId);
    if (!userId.success) {
      next(createValidationError('Invalid userId', userId.error.flatten()));
      return;
    }

    const feed = recommendations.getLatest(userId.data);
    if (!feed) {
      next(createNotFoundError('No recommendations generated for this user yet'));
      return;
    }

    res.json(feed);
  });

  router.post('/:userId/categories/:categoryId/more', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const userId = UserIdSchema.safeParse(req.params.userId);
      const body = MorePlacesSchema.safeParse(req.body);
      if (!userId.success || !body.success) {
        throw createValidationError('Invalid more-places request', {
          userId: userId.success ? undefined : userId.error.flatten(),
          body: body.success ? undefined : body.error.flatten()
        });
      }

      const places = await recommendations.fetchMorePlaces(
        userId.data,
        req.params.categoryId ?? '',
        body.data.location,
        req.traceId
      );
      if (!places) {
        throw createNotFoundError('Category not found in the latest recommendations');
      }

      res.json({ places });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
