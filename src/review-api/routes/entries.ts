import { Router } from 'express';
import { z } from 'zod';
import type { ReviewSettings } from '@shared/config';
import { buildHeaderPatterns } from '@core/header';
import { extractEntries } from '@core/entries';
import { buildTranscript } from '@core/transcript';

const extractBodySchema = z.object({
  text: z.string(),
  clean: z.boolean().optional(),
});

export function createEntriesRouter(settings: ReviewSettings): Router {
  const router = Router();
  const patterns = buildHeaderPatterns(settings.extraction);

  // POST /entries/extract -- transcript text to {date, type, data} entries
  router.post('/extract', (req, res) => {
    const body = extractBodySchema.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ success: false, error: 'text must be a string' });
    }

    const entries = body.data.clean
      ? buildTranscript(body.data.text, settings, patterns)
      : extractEntries(body.data.text, patterns);
    return res.json({ success: true, data: entries });
  });

  return router;
}
