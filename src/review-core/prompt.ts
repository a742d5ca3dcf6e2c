import type { Entry, OracleEntry } from '@shared/types';
import { ENTRIES_PLACEHOLDER } from '@shared/constants';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface RenderedPrompt {
  messages: ChatMessage[];
  placeholderFound: boolean;
}

/** Transport to the judgement oracle; resolves with the reply text. */
export interface JudgementOracle {
  complete(caseId: string, messages: ChatMessage[]): Promise<string>;
}

export function toOracleEntries(entries: readonly Entry[]): OracleEntry[] {
  return entries.map((entry) => ({
    type: entry.type.toLowerCase(),
    created_on: entry.date,
    text: entry.data,
  }));
}

export function serializeEntries(entries: readonly Entry[]): string {
  return JSON.stringify(toOracleEntries(entries), null, 2);
}

export function caseRequestLine(caseId: string): string {
  return `Case ID: ${caseId} の判定をお願いします。`;
}

/**
 * Fills the `{entries}` placeholder of the template. A template without the
 * placeholder is used as is; `placeholderFound` tells the caller to warn.
 */
export function renderPrompt(
  template: string,
  caseId: string,
  entries: readonly Entry[],
): RenderedPrompt {
  const placeholderFound = template.includes(ENTRIES_PLACEHOLDER);
  const payload = serializeEntries(entries);
  const system = template.split(ENTRIES_PLACEHOLDER).join(payload);
  return {
    messages: [
      { role: 'system', content: system },
      { role: 'user', content: caseRequestLine(caseId) },
    ],
    placeholderFound,
  };
}
