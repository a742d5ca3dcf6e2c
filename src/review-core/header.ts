import type { ExtractionSettings } from '@shared/config';
import type { EntryType } from '@shared/types';
import { compileFence, type FencePredicate } from './segmenter';

export interface HeaderPatterns {
  isFence: FencePredicate;
  header: RegExp;
  questionKeywords: readonly string[];
  answerKeywords: readonly string[];
}

export interface HeaderMatch {
  date: string;
  type: EntryType;
}

const IDEOGRAPHIC_SPACE = /\u3000/g;

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

export function buildHeaderPatterns(settings: ExtractionSettings): HeaderPatterns {
  const keywords = [...settings.questionKeywords, ...settings.answerKeywords];
  const typeAlternation = keywords.map(escapeRegExp).join('|');
  return {
    isFence: compileFence(settings.fencePattern),
    header: new RegExp(
      `(?<date>${settings.headerDatePattern}).*?(?<type>${typeAlternation})`,
      'i',
    ),
    questionKeywords: settings.questionKeywords,
    answerKeywords: settings.answerKeywords,
  };
}

function matchesAny(value: string, keywords: readonly string[]): boolean {
  const lower = value.toLowerCase();
  return keywords.some((k) => k.toLowerCase() === lower);
}

/** Returns null when the line is not a recognizable entry header. */
export function classifyHeader(line: string, patterns: HeaderPatterns): HeaderMatch | null {
  const normalized = line.replace(IDEOGRAPHIC_SPACE, ' ');
  const match = patterns.header.exec(normalized);
  const date = match?.groups?.date;
  const keyword = match?.groups?.type;
  if (date === undefined || keyword === undefined) return null;

  let type: EntryType = 'Unknown';
  if (matchesAny(keyword, patterns.questionKeywords)) {
    type = 'Question';
  } else if (matchesAny(keyword, patterns.answerKeywords)) {
    type = 'Answer';
  }
  return { date, type };
}
