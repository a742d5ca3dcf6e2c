import type { Entry } from '@shared/types';
import { charLength } from './cleaner';

function takePrefix(value: string, count: number): string {
  return Array.from(value).slice(0, count).join('');
}

/**
 * Keeps entries in the given order until their bodies fill `budget`
 * characters. The entry that reaches the budget is cut to fit; everything
 * after it is dropped. Empty bodies are skipped.
 */
export function trimEntries(entries: readonly Entry[], budget: number): Entry[] {
  const trimmed: Entry[] = [];
  let total = 0;

  for (const entry of entries) {
    if (!entry.data) continue;
    if (total >= budget) break;

    const remaining = budget - total;
    const length = charLength(entry.data);
    const data = length > remaining ? takePrefix(entry.data, remaining) : entry.data;

    trimmed.push(data === entry.data ? entry : { ...entry, data });
    total += Math.min(length, remaining);
    if (total >= budget) break;
  }

  return trimmed;
}

/**
 * Same budget, filled from the newest entry backwards, so the closing
 * exchange survives a long history. The result keeps source order.
 */
export function trimRecentEntries(entries: readonly Entry[], budget: number): Entry[] {
  return trimEntries([...entries].reverse(), budget).reverse();
}
