import { describe, it, expect } from 'vitest';
import { trimEntries, trimRecentEntries } from '@core/trimmer';
import { entry } from '../helpers/settings';

describe('trimEntries', () => {
  it('cuts the entry that crosses the budget and drops the rest', () => {
    const result = trimEntries(
      [entry('Question', 'a'.repeat(4000)), entry('Answer', 'b'.repeat(4000)), entry('Answer', 'c')],
      6000,
    );
    expect(result).toHaveLength(2);
    expect(result[0].data).toBe('a'.repeat(4000));
    expect(result[1].data).toBe('b'.repeat(2000));
    expect(result[1].type).toBe('Answer');
  });

  it('returns everything when the budget is not reached', () => {
    const entries = [entry('Question', 'hi'), entry('Answer', 'there')];
    expect(trimEntries(entries, 100)).toEqual(entries);
  });

  it('stops exactly at the budget without an empty tail entry', () => {
    const result = trimEntries([entry('Question', 'abc'), entry('Answer', 'def')], 3);
    expect(result).toEqual([entry('Question', 'abc')]);
  });

  it('skips entries with empty bodies', () => {
    const result = trimEntries([entry('Question', ''), entry('Answer', 'ok')], 10);
    expect(result).toEqual([entry('Answer', 'ok')]);
  });

  it('counts code points, not UTF-16 units', () => {
    const result = trimEntries([entry('Answer', '😀😀😀')], 2);
    expect(result[0].data).toBe('😀😀');
  });

  it('returns nothing for a zero budget', () => {
    expect(trimEntries([entry('Answer', 'ok')], 0)).toEqual([]);
  });

  it('does not mutate its input', () => {
    const entries = [entry('Answer', 'abcdef')];
    trimEntries(entries, 2);
    expect(entries[0].data).toBe('abcdef');
  });
});

describe('trimRecentEntries', () => {
  it('keeps the newest entries whole and cuts the older one that crosses the budget', () => {
    const result = trimRecentEntries(
      [entry('Question', 'old'), entry('Question', 'q'.repeat(50)), entry('Answer', 'a')],
      10,
    );
    expect(result).toEqual([entry('Question', 'q'.repeat(9)), entry('Answer', 'a')]);
  });

  it('returns input below the budget unchanged and in order', () => {
    const entries = [entry('Question', 'hi'), entry('Answer', 'there')];
    expect(trimRecentEntries(entries, 100)).toEqual(entries);
  });

  it('does not reorder its input', () => {
    const entries = [entry('Question', 'a'), entry('Answer', 'b')];
    trimRecentEntries(entries, 1);
    expect(entries.map((e) => e.data)).toEqual(['a', 'b']);
  });
});
