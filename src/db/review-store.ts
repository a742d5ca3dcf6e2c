import { desc, eq } from 'drizzle-orm';
import { NOTIFICATION_TARGETS, OUTCOME_STATUSES, VERDICTS } from '@shared/constants';
import type {
  CaseOutcome,
  NotificationTarget,
  OutcomeStatus,
  ReviewRecord,
  Verdict,
} from '@shared/types';
import { createDatabase, type Database } from './connection';
import { reviews, type NewReviewRow, type ReviewRow } from './schema/reviews';

export interface ReviewStore {
  record(outcome: CaseOutcome): Promise<ReviewRecord>;
  list(limit: number): Promise<ReviewRecord[]>;
  listByCase(caseId: string): Promise<ReviewRecord[]>;
}

// --- Row mapping ---

function isVerdict(value: string): value is Verdict {
  return (VERDICTS as readonly string[]).includes(value);
}

function isStatus(value: string): value is OutcomeStatus {
  return (OUTCOME_STATUSES as readonly string[]).includes(value);
}

function isTarget(value: string): value is NotificationTarget {
  return (NOTIFICATION_TARGETS as readonly string[]).includes(value);
}

export function toReviewRow(outcome: CaseOutcome): NewReviewRow {
  switch (outcome.status) {
    case 'skipped':
      return { caseId: outcome.caseId, status: 'skipped', reason: outcome.reason };
    case 'failed':
      return { caseId: outcome.caseId, status: 'failed', reason: outcome.error };
    case 'judged':
      return {
        caseId: outcome.caseId,
        status: 'judged',
        reason: outcome.partial ? 'last_entry_not_answer' : null,
        verdict: outcome.judgement.verdict,
        verdictReason: outcome.judgement.reason ?? null,
        rawReply: outcome.judgement.rawText,
        entryCount: outcome.entries.length,
        partial: outcome.partial,
        targets: outcome.targets,
        deliveries: outcome.deliveries,
      };
  }
}

export function toReviewRecord(row: ReviewRow): ReviewRecord {
  return {
    id: row.id,
    caseId: row.caseId,
    status: isStatus(row.status) ? row.status : 'failed',
    reason: row.reason,
    verdict: row.verdict !== null && isVerdict(row.verdict) ? row.verdict : null,
    verdictReason: row.verdictReason,
    entryCount: row.entryCount,
    partial: row.partial,
    targets: row.targets.filter(isTarget),
    createdAt: row.createdAt.toISOString(),
  };
}

// --- Drizzle implementation ---

export class DrizzleReviewStore implements ReviewStore {
  constructor(private readonly db: Database) {}

  async record(outcome: CaseOutcome): Promise<ReviewRecord> {
    const [row] = await this.db.insert(reviews).values(toReviewRow(outcome)).returning();
    return toReviewRecord(row);
  }

  async list(limit: number): Promise<ReviewRecord[]> {
    const rows = await this.db.select().from(reviews).orderBy(desc(reviews.createdAt)).limit(limit);
    return rows.map(toReviewRecord);
  }

  async listByCase(caseId: string): Promise<ReviewRecord[]> {
    const rows = await this.db
      .select()
      .from(reviews)
      .where(eq(reviews.caseId, caseId))
      .orderBy(desc(reviews.createdAt));
    return rows.map(toReviewRecord);
  }
}

export function createReviewStore(url: string): ReviewStore & { close(): Promise<void> } {
  const handle = createDatabase(url);
  const store = new DrizzleReviewStore(handle.db);
  return {
    record: (outcome) => store.record(outcome),
    list: (limit) => store.list(limit),
    listByCase: (caseId) => store.listByCase(caseId),
    close: () => handle.close(),
  };
}
