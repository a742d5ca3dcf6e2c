import { describe, it, expect } from 'vitest';
import { buildHeaderPatterns } from '@core/header';
import { extractEntries } from '@core/entries';
import { fenced, makeSettings } from '../helpers/settings';

const patterns = buildHeaderPatterns(makeSettings().extraction);

describe('extractEntries', () => {
  it('extracts a single well-formed record', () => {
    const text = 'ー\n2024/01/01 09:00 QUESTION\n------\nHello\nー';
    expect(extractEntries(text, patterns)).toEqual([
      { date: '2024/01/01 09:00', type: 'Question', data: 'Hello' },
    ]);
  });

  it('returns no entries for text without fences', () => {
    expect(extractEntries('2024/01/01 09:00 QUESTION\nHello', patterns)).toEqual([]);
  });

  it('keeps source order and joins multi-line bodies', () => {
    const text = fenced([
      { header: '2024/01/02 10:00 QUESTION', body: 'line one\nline two' },
      { header: '2024/01/02 11:00 ANSWER', body: 'reply' },
      { header: '2024/01/01 08:00 QUESTION', body: 'older' },
    ]);
    expect(extractEntries(text, patterns)).toEqual([
      { date: '2024/01/02 10:00', type: 'Question', data: 'line one\nline two' },
      { date: '2024/01/02 11:00', type: 'Answer', data: 'reply' },
      { date: '2024/01/01 08:00', type: 'Question', data: 'older' },
    ]);
  });

  it('drops records with unrecognized headers and keeps going', () => {
    const text = fenced([
      { header: 'Internal memo', body: 'not an entry' },
      { header: '2024/01/02 11:00 ANSWER', body: 'reply' },
    ]);
    expect(extractEntries(text, patterns)).toEqual([
      { date: '2024/01/02 11:00', type: 'Answer', data: 'reply' },
    ]);
  });

  it('trims surrounding whitespace of the body but keeps inner lines', () => {
    const text = ['ー', '2024/01/01 09:00 ANSWER', 'ー', '', '  first', '', 'last  ', '', 'ー'].join('\n');
    expect(extractEntries(text, patterns)[0].data).toBe('first\n\nlast');
  });

  it('keeps records whose body is empty', () => {
    const text = ['ー', '2024/01/01 09:00 ANSWER', 'ー', 'ー'].join('\n');
    expect(extractEntries(text, patterns)).toEqual([
      { date: '2024/01/01 09:00', type: 'Answer', data: '' },
    ]);
  });
});
