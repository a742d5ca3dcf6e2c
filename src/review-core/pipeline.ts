// src/review-core/pipeline.ts
// One case, end to end: transcript → entries → gate → budget → oracle →
// verdict → notifications. All collaborators are injected; reviewCase never rejects.

import type { ReviewSettings } from '@shared/config';
import type { CaseOutcome, Entry } from '@shared/types';
import { silentLogger, type Logger } from '@shared/logger';
import { buildHeaderPatterns, type HeaderPatterns } from './header';
import { cleanTranscript } from './transcript';
import { trimRecentEntries } from './trimmer';
import { evaluateCompleteness } from './completeness';
import { renderPrompt, type JudgementOracle } from './prompt';
import { parseVerdict } from './verdict';
import { resultLabel, selectTargets } from './routing';
import {
  buildCaseUrl,
  buildNotificationPayload,
  dispatchNotification,
  type Notifier,
  type TargetEndpoints,
} from './notification';
import { describeError } from './errors';

// ---------------------------------------------------------------------------
// Ports
// ---------------------------------------------------------------------------

export interface TranscriptSource {
  fetchTranscript(caseId: string): Promise<string>;
}

export interface EntryArtifactSink {
  saveEntries(caseId: string, entries: readonly Entry[]): Promise<void>;
}

export interface ReviewDependencies {
  settings: ReviewSettings;
  promptTemplate: string;
  source: TranscriptSource;
  oracle: JudgementOracle;
  notifier: Notifier;
  notifications: {
    enabled: boolean;
    endpoints: TargetEndpoints;
    caseBaseUrl: string;
  };
  artifacts?: EntryArtifactSink;
  patterns?: HeaderPatterns;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

async function runCase(caseId: string, deps: ReviewDependencies, logger: Logger): Promise<CaseOutcome> {
  const text = await deps.source.fetchTranscript(caseId);
  logger.debug(`case_id=${caseId} fetched chars=${text.length}`);

  const patterns = deps.patterns ?? buildHeaderPatterns(deps.settings.extraction);
  const cleaned = cleanTranscript(text, deps.settings, patterns, logger);

  // the gate looks at the whole cleaned history; the budget comes after it
  const gate = evaluateCompleteness(cleaned, deps.settings.allowPartial);
  if (gate.status === 'skipped') {
    logger.info(`case_id=${caseId} result=skipped reason=${gate.reason}`);
    return { caseId, status: 'skipped', reason: gate.reason };
  }
  const partial = gate.status === 'partial';
  if (gate.status === 'partial') {
    logger.info(
      `case_id=${caseId} result=partial reason=last_entry_not_answer entries=${gate.entries.length} dropped=${gate.droppedCount}`,
    );
  }

  const entries = trimRecentEntries(gate.entries, deps.settings.maxChars);
  logger.debug(
    `case_id=${caseId} cleaned=${cleaned.length} kept=${entries.length} budget=${deps.settings.maxChars}`,
  );
  if (entries.length === 0) {
    logger.info(`case_id=${caseId} result=skipped reason=no_entries`);
    return { caseId, status: 'skipped', reason: 'no_entries' };
  }

  if (deps.artifacts) await deps.artifacts.saveEntries(caseId, entries);

  const rendered = renderPrompt(deps.promptTemplate, caseId, entries);
  if (!rendered.placeholderFound) {
    logger.warn('prompt template has no {entries} placeholder; sending it unchanged');
  }
  const reply = await deps.oracle.complete(caseId, rendered.messages);
  const judgement = parseVerdict(reply);
  if (judgement.verdict === 'Unparsed') {
    logger.warn(`case_id=${caseId} oracle reply did not contain a verdict`);
  }

  const targets = selectTargets(judgement);
  const payload = buildNotificationPayload(
    caseId,
    buildCaseUrl(deps.notifications.caseBaseUrl, caseId),
    judgement,
  );
  const deliveries = await dispatchNotification(
    targets,
    deps.notifications.endpoints,
    payload,
    deps.notifier,
    deps.notifications.enabled,
  );
  for (const delivery of deliveries) {
    if (delivery.error) {
      logger.error(`case_id=${caseId} notification to ${delivery.target} failed: ${delivery.error}`);
    }
  }

  logger.info(`case_id=${caseId} result=${resultLabel(judgement)}`);
  return { caseId, status: 'judged', partial, entries, judgement, targets, deliveries };
}

export async function reviewCase(caseId: string, deps: ReviewDependencies): Promise<CaseOutcome> {
  const logger = deps.logger ?? silentLogger;
  try {
    return await runCase(caseId, deps, logger);
  } catch (err) {
    logger.error(`case_id=${caseId} failed to process: ${describeError(err)}`);
    return { caseId, status: 'failed', error: describeError(err) };
  }
}
