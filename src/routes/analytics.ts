import { Router } from 'express';
import type { AppContext } from '../context.js';
import { analyticsValidation, historyValidation, validate } from '../middleware/validation.js';
import { numberParam } from '../lib/params.js';

const DEFAULT_DAYS = 30;

export function createAnalyticsRouter({ sessionLogger }: AppContext) {
  const analyticsRouter = Router();

  analyticsRouter.get('/:userId/history', validate(historyValidation), async (req, res, next) => {
    try {
      const page = numberParam(req.query.page, 1);
      const perPage = numberParam(req.query.perPage, 50);
      res.json(await sessionLogger.history(req.params.userId, page, perPage));
    } catch (err) {
      next(err);
    }
  });

  analyticsRouter.get('/:userId/analytics/calories', validate(analyticsValidation), async (req, res, next) => {
    try {
      res.json(await sessionLogger.calorieSummary(req.params.userId, numberParam(req.query.days, DEFAULT_DAYS)));
    } catch (err) {
      next(err);
    }
  });

  analyticsRouter.get('/:userId/analytics/readiness', async (req, res, next) => {
    try {
      res.json(await sessionLogger.readiness(req.params.userId));
    } catch (err) {
      next(err);
    }
  });

  analyticsRouter.get('/:userId/analytics', validate(analyticsValidation), async (req, res, next) => {
    try {
      res.json(await sessionLogger.analytics(req.params.userId, numberParam(req.query.days, DEFAULT_DAYS)));
    } catch (err) {
      next(err);
    }
  });

  return analyticsRouter;
}
