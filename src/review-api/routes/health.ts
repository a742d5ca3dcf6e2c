import { Router } from 'express';
import { REVIEW_CORE_VERSION } from '@core/index';

const router = Router();

router.get('/health', (_req, res) => {
  res.json({ success: true, data: { status: 'ok', version: REVIEW_CORE_VERSION } });
});

export default router;
