import { describe, it, expect } from 'vitest';
import { toReviewRecord, toReviewRow } from '@db/review-store';
import type { ReviewRow } from '@db/schema/reviews';
import type { JudgedOutcome } from '@shared/types';
import { entry } from '../helpers/settings';

function makeRow(overrides: Partial<ReviewRow> = {}): ReviewRow {
  return {
    id: 'id-1',
    caseId: '00000001',
    status: 'judged',
    reason: null,
    verdict: 'Approved',
    verdictReason: 'fine',
    rawReply: '査閲結果：承認',
    entryCount: 2,
    partial: false,
    targets: ['default'],
    deliveries: [],
    createdAt: new Date('2024-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

describe('toReviewRow', () => {
  it('maps a skipped outcome', () => {
    expect(toReviewRow({ caseId: '1', status: 'skipped', reason: 'no_entries' })).toEqual({
      caseId: '1',
      status: 'skipped',
      reason: 'no_entries',
    });
  });

  it('maps a failed outcome', () => {
    expect(toReviewRow({ caseId: '1', status: 'failed', error: 'HTTP 503' })).toEqual({
      caseId: '1',
      status: 'failed',
      reason: 'HTTP 503',
    });
  });

  it('maps a partial judged outcome', () => {
    const outcome: JudgedOutcome = {
      caseId: '1',
      status: 'judged',
      partial: true,
      entries: [entry('Question', 'q'), entry('Answer', 'a')],
      judgement: { verdict: 'Rejected', reason: 'mismatch', rawText: 'raw', source: 'marker' },
      targets: ['default', 'reject'],
      deliveries: [{ target: 'default', delivered: true }],
    };
    expect(toReviewRow(outcome)).toEqual({
      caseId: '1',
      status: 'judged',
      reason: 'last_entry_not_answer',
      verdict: 'Rejected',
      verdictReason: 'mismatch',
      rawReply: 'raw',
      entryCount: 2,
      partial: true,
      targets: ['default', 'reject'],
      deliveries: [{ target: 'default', delivered: true }],
    });
  });
});

describe('toReviewRecord', () => {
  it('maps a row for the API', () => {
    expect(toReviewRecord(makeRow())).toEqual({
      id: 'id-1',
      caseId: '00000001',
      status: 'judged',
      reason: null,
      verdict: 'Approved',
      verdictReason: 'fine',
      entryCount: 2,
      partial: false,
      targets: ['default'],
      createdAt: '2024-01-01T00:00:00.000Z',
    });
  });

  it('drops values it does not know', () => {
    const record = toReviewRecord(makeRow({ status: 'odd', verdict: 'Maybe', targets: ['default', 'pager'] }));
    expect(record.status).toBe('failed');
    expect(record.verdict).toBeNull();
    expect(record.targets).toEqual(['default']);
  });
});
