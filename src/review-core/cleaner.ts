// src/review-core/cleaner.ts
// Noise removal for entry bodies. Each pass returns undefined when it would
// leave nothing, and callers keep the pass input instead (`pass(x) ?? x`).

import type { CleaningSettings } from '@shared/config';

const META_LINE = /^(【.*】|\[.*\])$/;
const LOG_LINE = /^\s*(\d{4}-\d{2}-\d{2}|\d{2}:\d{2}:\d{2}|INFO|ERROR|DEBUG|TRACE|WARN|WARNING)\b/;
const PAYLOAD_LINE = /^\s*[{[].*[}\]]\s*$/;

/** Length in code points, so surrogate pairs count once. */
export function charLength(value: string): number {
  return Array.from(value).length;
}

function keepLines(text: string, keep: (trimmed: string) => boolean): string | undefined {
  const kept = text.split(/\r\n|\r|\n/).filter((line) => {
    const trimmed = line.trim();
    return trimmed !== '' && keep(trimmed);
  });
  const joined = kept.join('\n').trim();
  return joined === '' ? undefined : joined;
}

/** Drops blank lines and lines that are entirely a 【…】 or […] marker. */
export function stripMetaLines(text: string): string | undefined {
  return keepLines(text, (trimmed) => !META_LINE.test(trimmed));
}

/** Drops log-shaped, payload-shaped and overlong lines. */
export function stripLogLines(text: string, maxLineLength: number): string | undefined {
  return keepLines(
    text,
    (trimmed) =>
      !LOG_LINE.test(trimmed) &&
      !PAYLOAD_LINE.test(trimmed) &&
      charLength(trimmed) <= maxLineLength,
  );
}

export function cleanEntryData(text: string, settings: CleaningSettings): string {
  const withoutMeta = stripMetaLines(text) ?? text;
  if (!settings.logFilterEnabled) return withoutMeta;
  return stripLogLines(withoutMeta, settings.maxLineLength) ?? withoutMeta;
}
