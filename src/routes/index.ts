import { Router } from 'express';
import type { AppContext } from '../context.js';
import { createExercisesRouter } from './exercises.js';
import { createWorkoutsRouter } from './workouts.js';
import { createAnalyticsRouter } from './analytics.js';
import { createAdminRouter } from './admin.js';

export function createApiRouter(context: AppContext) {
  const apiRouter = Router();

  apiRouter.get('/health', (_req, res) => {
    res.json({ status: 'OK' });
  });

  apiRouter.use('/exercises', createExercisesRouter());
  apiRouter.use('/users', createWorkoutsRouter(context));
  apiRouter.use('/users', createAnalyticsRouter(context));
  apiRouter.use('/admin', createAdminRouter(context));

  return apiRouter;
}
