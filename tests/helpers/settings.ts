import type { ReviewSettings } from '@shared/config';
import type { Entry } from '@shared/types';

export function makeSettings(overrides: Partial<ReviewSettings> = {}): ReviewSettings {
  return {
    extraction: {
      fencePattern: '[ー\\-]+',
      questionKeywords: ['QUESTION'],
      answerKeywords: ['ANSWER'],
      headerDatePattern: '\\d{4}/\\d{2}/\\d{2}\\s+\\d{2}:\\d{2}',
    },
    cleaning: { logFilterEnabled: true, maxLineLength: 200 },
    maxChars: 6000,
    allowPartial: false,
    ...overrides,
  };
}

export function entry(type: Entry['type'], data: string, date = '2024/01/01 09:00'): Entry {
  return { date, type, data };
}

/** Builds a transcript in the fenced layout, one record per item. */
export function fenced(records: { header: string; body: string }[]): string {
  const lines: string[] = [];
  for (const r of records) {
    lines.push('ーーーーー', r.header, '------', r.body);
  }
  lines.push('ーーーーー');
  return lines.join('\n');
}
