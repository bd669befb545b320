import { describe, expect, it } from 'vitest';
import {
  findContainingRange,
  findEmailRanges,
  findParentheticalRanges,
  findQuotedRanges,
  findSkipRanges,
} from '../src/segment/skip-ranges.js';

describe('findSkipRanges', () => {
  it('finds quoted and parenthetical spans', () => {
    expect(findSkipRanges('He said "hi." Then (maybe) left.')).toEqual([
      { start: 8, end: 13 },
      { start: 19, end: 26 },
    ]);
  });

  it('lets a quotation span newlines', () => {
    expect(findSkipRanges('«Un.\nDeux.» fin')).toEqual([{ start: 0, end: 11 }]);
  });

  it('does not treat an elision apostrophe as a quote', () => {
    expect(findSkipRanges("l'un et l'autre")).toEqual([]);
  });

  it('consumes an escaped opener inside a parenthetical', () => {
    expect(findSkipRanges('see (a \\( b) now')).toEqual([{ start: 4, end: 12 }]);
  });

  it('finds email addresses after the other categories, unsorted', () => {
    expect(findSkipRanges('Ask me at jo@test.io or (ring me) later.')).toEqual([
      { start: 24, end: 33 },
      { start: 10, end: 20 },
    ]);
  });

  it('keeps overlapping ranges of different kinds', () => {
    expect(findSkipRanges('"Mail me (now)."')).toEqual([
      { start: 0, end: 16 },
      { start: 9, end: 14 },
    ]);
  });

  it('ignores unbalanced quotes and brackets', () => {
    expect(findSkipRanges('An (open paren and "quote.')).toEqual([]);
  });
});

describe('findQuotedRanges', () => {
  it('takes the leftmost opener across pairs', () => {
    expect(findQuotedRanges('„a“ «b»')).toEqual([
      { start: 0, end: 3 },
      { start: 4, end: 7 },
    ]);
  });

  it('prefers the earlier pair when two share an opener', () => {
    expect(findQuotedRanges('„x” y“')).toEqual([{ start: 0, end: 6 }]);
  });

  it('stops matching a pair once its closer no longer occurs', () => {
    expect(findQuotedRanges('"a" "b')).toEqual([{ start: 0, end: 3 }]);
  });

  it('uses only the given pairs', () => {
    expect(findQuotedRanges('"a" «b»', [['«', '»']])).toEqual([{ start: 4, end: 7 }]);
  });
});

describe('findParentheticalRanges', () => {
  it('closes at the first closing bracket of any kind', () => {
    expect(findParentheticalRanges('x (a [b] c)')).toEqual([{ start: 2, end: 8 }]);
  });

  it('does not cross a newline', () => {
    expect(findParentheticalRanges('a (b\nc) d')).toEqual([]);
  });
});

describe('findEmailRanges', () => {
  it('restarts the local part after a failed address', () => {
    expect(findEmailRanges('x@y@z.com')).toEqual([{ start: 2, end: 9 }]);
  });

  it('keeps the longest host followed by a top-level domain', () => {
    expect(findEmailRanges('mail me@host.example.org.')).toEqual([{ start: 5, end: 24 }]);
  });

  it('needs at least two letters after the last dot', () => {
    expect(findEmailRanges('a@b.c')).toEqual([]);
  });
});

describe('skip range scaling', () => {
  it('handles many unclosed openers in one pass', () => {
    const text = 'a ( a « a „ '.repeat(50_000);

    const started = performance.now();
    const ranges = findSkipRanges(text);
    const elapsed = performance.now() - started;

    expect(ranges).toEqual([]);
    expect(elapsed).toBeLessThan(2_000);
  });
});

describe('findContainingRange', () => {
  const sets = {
    quotes: [{ start: 0, end: 10 }],
    parentheticals: [{ start: 5, end: 20 }],
    emails: [],
  };

  it('returns the first range that strictly contains the offset', () => {
    expect(findContainingRange(sets, 7)).toEqual({ start: 0, end: 10 });
    expect(findContainingRange(sets, 10)).toEqual({ start: 5, end: 20 });
  });

  it('excludes both range edges', () => {
    expect(findContainingRange(sets, 0)).toBeUndefined();
    expect(findContainingRange(sets, 20)).toBeUndefined();
  });

  it('searches sorted ranges of one kind', () => {
    const quotes = {
      quotes: [
        { start: 0, end: 4 },
        { start: 6, end: 9 },
        { start: 12, end: 15 },
      ],
      parentheticals: [],
      emails: [],
    };

    expect(findContainingRange(quotes, 13)).toEqual({ start: 12, end: 15 });
    expect(findContainingRange(quotes, 10)).toBeUndefined();
  });
});
