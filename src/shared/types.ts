import type {
  ENTRY_TYPES,
  VERDICTS,
  SKIP_REASONS,
  OUTCOME_STATUSES,
  NOTIFICATION_TARGETS,
} from './constants';

export type EntryType = (typeof ENTRY_TYPES)[number];
export type Verdict = (typeof VERDICTS)[number];
export type SkipReason = (typeof SKIP_REASONS)[number];
export type OutcomeStatus = (typeof OUTCOME_STATUSES)[number];
export type NotificationTarget = (typeof NOTIFICATION_TARGETS)[number];

export interface Entry {
  date: string;
  type: EntryType;
  data: string;
}

/** Shape of one history item as sent to the judgement oracle. */
export interface OracleEntry {
  type: string;
  created_on: string;
  text: string;
}

export interface JudgementResult {
  verdict: Verdict;
  reason?: string;
  rawText: string;
  /** Which parse strategy produced the verdict. */
  source: 'marker' | 'json' | 'none';
  /** Token as found in the reply: the localized result or the lower-cased JSON decision. */
  decision?: string;
}

export interface DeliveryResult {
  target: NotificationTarget;
  delivered: boolean;
  skipped?: 'no_url' | 'disabled';
  error?: string;
}

export interface SkippedOutcome {
  caseId: string;
  status: 'skipped';
  reason: SkipReason;
}

export interface JudgedOutcome {
  caseId: string;
  status: 'judged';
  partial: boolean;
  entries: Entry[];
  judgement: JudgementResult;
  targets: NotificationTarget[];
  deliveries: DeliveryResult[];
}

export interface FailedOutcome {
  caseId: string;
  status: 'failed';
  error: string;
}

export type CaseOutcome = SkippedOutcome | JudgedOutcome | FailedOutcome;

export interface ReviewRecord {
  id: string;
  caseId: string;
  status: OutcomeStatus;
  reason: string | null;
  verdict: Verdict | null;
  verdictReason: string | null;
  entryCount: number;
  partial: boolean;
  targets: NotificationTarget[];
  createdAt: string;
}
