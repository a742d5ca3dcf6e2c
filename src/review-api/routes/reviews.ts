import { Router } from 'express';
import { z } from 'zod';
import type { CaseOutcome } from '@shared/types';
import type { ReviewStore } from '@db/review-store';
import { asyncHandler } from '../middleware/index';

export type CaseReviewer = (caseId: string, text: string) => Promise<CaseOutcome>;

const MAX_LIMIT = 200;
const DEFAULT_LIMIT = 50;

const reviewBodySchema = z.object({
  caseId: z.string().regex(/^[A-Za-z0-9_-]+$/, 'caseId may only contain letters, digits, - and _'),
  text: z.string().min(1, 'text is required'),
});

const limitSchema = z.coerce.number().int().min(1).max(MAX_LIMIT).default(DEFAULT_LIMIT);

export function createReviewsRouter(deps: { store: ReviewStore; review: CaseReviewer }): Router {
  const router = Router();

  // POST /reviews -- judge a transcript supplied in the request body
  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const body = reviewBodySchema.safeParse(req.body);
      if (!body.success) {
        return res
          .status(400)
          .json({ success: false, error: body.error.issues.map((i) => i.message).join('; ') });
      }

      const outcome = await deps.review(body.data.caseId, body.data.text);
      const record = await deps.store.record(outcome);
      return res.status(201).json({ success: true, data: { outcome, record } });
    }),
  );

  // GET /reviews -- most recent reviews
  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const limit = limitSchema.safeParse(req.query.limit);
      if (!limit.success) {
        return res
          .status(400)
          .json({ success: false, error: `limit must be between 1 and ${MAX_LIMIT}` });
      }
      const rows = await deps.store.list(limit.data);
      return res.json({ success: true, data: rows });
    }),
  );

  // GET /reviews/:caseId -- history of one case, newest first
  router.get(
    '/:caseId',
    asyncHandler(async (req, res) => {
      const rows = await deps.store.listByCase(req.params.caseId);
      if (rows.length === 0) {
        return res.status(404).json({ success: false, error: 'No reviews for this case' });
      }
      return res.json({ success: true, data: rows });
    }),
  );

  return router;
}
