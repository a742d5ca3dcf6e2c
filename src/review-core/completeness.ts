import type { Entry, SkipReason } from '@shared/types';

export type CompletenessResult =
  | { status: 'ready'; entries: Entry[] }
  | { status: 'partial'; entries: Entry[]; droppedCount: number }
  | { status: 'skipped'; reason: SkipReason };

/**
 * Decides whether a transcript can be judged. It must end with an Answer;
 * in partial mode a transcript is cut back to its last Answer instead.
 */
export function evaluateCompleteness(
  entries: readonly Entry[],
  allowPartial: boolean,
): CompletenessResult {
  if (entries.length === 0) return { status: 'skipped', reason: 'no_entries' };

  if (entries[entries.length - 1].type === 'Answer') {
    return { status: 'ready', entries: [...entries] };
  }
  if (!allowPartial) return { status: 'skipped', reason: 'last_entry_not_answer' };

  for (let i = entries.length - 1; i >= 0; i -= 1) {
    if (entries[i].type === 'Answer') {
      return {
        status: 'partial',
        entries: entries.slice(0, i + 1),
        droppedCount: entries.length - (i + 1),
      };
    }
  }
  return { status: 'skipped', reason: 'no_answer_entry' };
}
