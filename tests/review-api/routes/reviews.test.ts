import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { reviewCase } from '@core/pipeline';
import { StaticTranscriptSource } from '@worker/adapters/transcript-sources';
import { fenced, makeSettings } from '../../helpers/settings';
import { FakeOracle, RecordingNotifier } from '../../helpers/fakes';
import { MemoryReviewStore } from '../../helpers/memory-store';
import { startTestServer, type TestServer } from '../../helpers/http';

const transcript = fenced([
  { header: '2024/01/01 09:00 QUESTION', body: 'Order 7 is late.' },
  { header: '2024/01/01 10:00 ANSWER', body: 'Order 9 was refunded.' },
]);

describe('reviews router', () => {
  let server: TestServer;
  const store = new MemoryReviewStore();
  const notifier = new RecordingNotifier();

  beforeAll(async () => {
    server = await startTestServer({
      settings: makeSettings(),
      store,
      review: (caseId, text) =>
        reviewCase(caseId, {
          settings: makeSettings(),
          promptTemplate: '{entries}',
          source: new StaticTranscriptSource(new Map([[caseId, text]])),
          oracle: new FakeOracle('査閲結果：却下\n理由：order numbers differ'),
          notifier,
          notifications: {
            enabled: true,
            endpoints: { default: 'https://hooks.test/default', reject: 'https://hooks.test/reject' },
            caseBaseUrl: 'https://desk.test/cases',
          },
        }),
    });
  });

  afterAll(async () => {
    await server.close();
  });

  it('POST /reviews judges the transcript and records the outcome', async () => {
    const { status, json } = await server.call('POST', '/reviews', { caseId: '00000007', text: transcript });

    expect(status).toBe(201);
    expect(json).toMatchObject({
      success: true,
      data: {
        outcome: { caseId: '00000007', status: 'judged', targets: ['default', 'reject'] },
        record: {
          id: 'review-1',
          caseId: '00000007',
          status: 'judged',
          verdict: 'Rejected',
          verdictReason: 'order numbers differ',
          entryCount: 2,
          partial: false,
          targets: ['default', 'reject'],
        },
      },
    });
    expect(notifier.sent).toHaveLength(2);
  });

  it('POST /reviews records skipped cases too', async () => {
    const { status, json } = await server.call('POST', '/reviews', { caseId: '00000008', text: 'nothing here' });
    expect(status).toBe(201);
    expect(json).toMatchObject({
      data: { record: { caseId: '00000008', status: 'skipped', reason: 'no_entries', verdict: null } },
    });
  });

  it('POST /reviews validates the body', async () => {
    expect(await server.call('POST', '/reviews', { caseId: 'bad id', text: '' })).toEqual({
      status: 400,
      json: {
        success: false,
        error: 'caseId may only contain letters, digits, - and _; text is required',
      },
    });
  });

  it('GET /reviews lists newest first', async () => {
    const { status, json } = await server.call('GET', '/reviews?limit=1');
    expect(status).toBe(200);
    expect(json).toMatchObject({ success: true, data: [{ caseId: '00000008' }] });
  });

  it('GET /reviews rejects an out-of-range limit', async () => {
    expect(await server.call('GET', '/reviews?limit=500')).toEqual({
      status: 400,
      json: { success: false, error: 'limit must be between 1 and 200' },
    });
  });

  it('GET /reviews/:caseId returns the history of one case', async () => {
    const { json } = await server.call('GET', '/reviews/00000007');
    expect(json).toMatchObject({ success: true, data: [{ id: 'review-1', verdict: 'Rejected' }] });
  });

  it('GET /reviews/:caseId returns 404 for an unknown case', async () => {
    expect(await server.call('GET', '/reviews/12345678')).toEqual({
      status: 404,
      json: { success: false, error: 'No reviews for this case' },
    });
  });
});
