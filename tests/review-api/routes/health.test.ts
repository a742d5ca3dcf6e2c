import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import healthRouter from '@api/routes/health';
import { REVIEW_CORE_VERSION } from '@core/index';
import { makeSettings } from '../../helpers/settings';
import { MemoryReviewStore } from '../../helpers/memory-store';
import { startTestServer, type TestServer } from '../../helpers/http';

describe('health router', () => {
  it('exports a router', () => {
    expect(healthRouter).toBeDefined();
    expect(healthRouter.stack).toBeDefined();
  });

  describe('GET /api/health', () => {
    let server: TestServer;

    beforeAll(async () => {
      server = await startTestServer({
        settings: makeSettings(),
        store: new MemoryReviewStore(),
        review: async (caseId) => ({ caseId, status: 'skipped', reason: 'no_entries' }),
      });
    });

    afterAll(async () => {
      await server.close();
    });

    it('reports status and version', async () => {
      expect(await server.call('GET', '/health')).toEqual({
        status: 200,
        json: { success: true, data: { status: 'ok', version: REVIEW_CORE_VERSION } },
      });
    });
  });
});
