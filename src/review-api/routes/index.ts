import { Router } from 'express';
import type { ReviewSettings } from '@shared/config';
import type { ReviewStore } from '@db/review-store';
import healthRouter from './health';
import { createEntriesRouter } from './entries';
import { createReviewsRouter, type CaseReviewer } from './reviews';

export interface ApiDependencies {
  settings: ReviewSettings;
  store: ReviewStore;
  review: CaseReviewer;
}

export function createApiRouter(deps: ApiDependencies): Router {
  const router = Router();
  router.use(healthRouter);
  router.use('/entries', createEntriesRouter(deps.settings));
  router.use('/reviews', createReviewsRouter({ store: deps.store, review: deps.review }));
  return router;
}
