// src/review-core/verdict.ts
// Parses the oracle's free-text reply into a verdict.
//
// Strategies run in order and the first one that yields a decision wins:
//   1. marker: the localized "査閲結果：<承認|却下|不明>" / "理由：<text>" lines
//   2. json: a JSON object (whole reply, else the first-{ to last-} span)
//      carrying a `decision` field
// A reply with a result marker is never read as JSON, even if it also
// contains a JSON decision.

import { z } from 'zod';
import type { JudgementResult, Verdict } from '@shared/types';
import { APPROVE_SYNONYMS, REJECT_SYNONYMS, RESULT_TOKENS } from '@shared/constants';

export type VerdictStrategy = (text: string) => Omit<JudgementResult, 'rawText'> | null;

const RESULT_MARKER = /査閲結果[：:]\s*(承認|却下|不明)/;
const REASON_MARKER = /理由[：:]\s*(.+)/;

const LOCALIZED_VERDICTS: Record<string, Verdict> = {
  [RESULT_TOKENS.approve]: 'Approved',
  [RESULT_TOKENS.reject]: 'Rejected',
  [RESULT_TOKENS.unknown]: 'Unknown',
};

const decisionReplySchema = z
  .object({
    decision: z.union([z.string(), z.number(), z.boolean()]),
    reason: z.unknown().optional(),
  })
  .passthrough();

export const markerStrategy: VerdictStrategy = (text) => {
  const result = RESULT_MARKER.exec(text);
  if (!result) return null;
  const reason = REASON_MARKER.exec(text)?.[1]?.trim();
  return {
    verdict: LOCALIZED_VERDICTS[result[1]] ?? 'Unknown',
    reason: reason || undefined,
    source: 'marker',
    decision: result[1],
  };
};

/** Whole text first, then the outermost brace span. */
export function parseJsonReply(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start === -1 || end <= start) return undefined;
    try {
      return JSON.parse(text.slice(start, end + 1));
    } catch {
      return undefined;
    }
  }
}

export function decisionToVerdict(decision: string): Verdict {
  const normalized = decision.trim().toLowerCase();
  if ((REJECT_SYNONYMS as readonly string[]).includes(normalized)) return 'Rejected';
  if ((APPROVE_SYNONYMS as readonly string[]).includes(normalized)) return 'Approved';
  return 'Unknown';
}

export const jsonStrategy: VerdictStrategy = (text) => {
  const parsed = decisionReplySchema.safeParse(parseJsonReply(text));
  if (!parsed.success) return null;
  const decision = String(parsed.data.decision).trim().toLowerCase();
  const reason = typeof parsed.data.reason === 'string' ? parsed.data.reason.trim() : '';
  return {
    verdict: decisionToVerdict(decision),
    reason: reason || undefined,
    source: 'json',
    decision,
  };
};

export const DEFAULT_STRATEGIES: readonly VerdictStrategy[] = [markerStrategy, jsonStrategy];

export function parseVerdict(
  text: string,
  strategies: readonly VerdictStrategy[] = DEFAULT_STRATEGIES,
): JudgementResult {
  for (const strategy of strategies) {
    const result = strategy(text);
    if (result) return { ...result, rawText: text };
  }
  return { verdict: 'Unparsed', reason: text, rawText: text, source: 'none' };
}
