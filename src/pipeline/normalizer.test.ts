import { describe, it, expect } from 'vitest';
import { RecordNormalizer, decodeEntities } from './normalizer.js';
import type { CanonicalRecord } from './types.js';

describe('RecordNormalizer', () => {
  const normalizer = new RecordNormalizer();

  describe('normalizeRecord', () => {
    it('maps a Reddit-style row onto the canonical fields', () => {
      const record = normalizer.normalizeRecord(
        {
          title: 'Flat roof leaking',
          selftext: 'Water comes in &amp; drips',
          author: 'roofer42',
          created_utc: 1695900000,
          permalink: 'https://www.reddit.com/r/DIY/comments/abc/',
          score: 12,
          num_comments: 4,
          tags: ['DIY'],
        },
        'reddit'
      );

      expect(record).toEqual({
        source: 'reddit',
        title: 'Flat roof leaking',
        body: 'Water comes in & drips',
        author: 'roofer42',
        date: new Date('2023-09-28T11:20:00.000Z'),
        url: 'https://www.reddit.com/r/DIY/comments/abc/',
        score: 12,
        comments_count: 4,
        tags: ['DIY'],
      });
    });

    it('takes the first candidate that is present and not null', () => {
      const record = normalizer.normalizeRecord(
        { title: null, subject: 'Forum subject', name: 'repo-name', body: undefined, content: 'post text' },
        'forums'
      );

      expect(record.title).toBe('Forum subject');
      expect(record.body).toBe('post text');
    });

    it('fills defaults for an empty row', () => {
      expect(normalizer.normalizeRecord({}, 'news')).toEqual({
        source: 'news',
        title: '',
        body: '',
        author: '',
        date: null,
        url: '',
        score: 0,
        comments_count: 0,
        tags: [],
      });
    });

    it('reads the login of a nested author object', () => {
      expect(normalizer.normalizeRecord({ user: { login: 'octocat', id: 1 } }, 'github').author).toBe('octocat');
      expect(normalizer.normalizeRecord({ owner: { display_name: 'Jane' } }, 'stackoverflow').author).toBe('Jane');
    });

    it('counts comments given as an array', () => {
      expect(normalizer.normalizeRecord({ comments: ['a', 'b', 'c'] }, 'github').comments_count).toBe(3);
    });

    it('parses numeric strings for score and comments', () => {
      const record = normalizer.normalizeRecord({ points: '17', comment_count: '2.9' }, 'forums');

      expect(record.score).toBe(17);
      expect(record.comments_count).toBe(2);
    });

    it('falls back to zero for a non-numeric score', () => {
      expect(normalizer.normalizeRecord({ score: 'n/a' }, 'forums').score).toBe(0);
    });

    it('splits comma-separated tags and drops non-string entries', () => {
      expect(normalizer.normalizeRecord({ tags: 'roof, repair ,,' }, 'news').tags).toEqual(['roof', 'repair']);
      expect(normalizer.normalizeRecord({ tags: ['roof', 7, null, { x: 1 }] }, 'news').tags).toEqual(['roof', '7']);
    });

    it('returns a canonical record unchanged', () => {
      const canonical: CanonicalRecord = {
        source: 'github',
        title: 'Issue title',
        body: 'Issue body',
        author: 'octocat',
        date: new Date('2024-01-15T08:30:00.000Z'),
        url: 'https://github.com/o/r/issues/1',
        score: 3,
        comments_count: 5,
        tags: ['bug'],
      };

      expect(normalizer.normalizeRecord({ ...canonical }, 'github')).toEqual(canonical);
    });

    it('uses the source argument rather than a source field in the row', () => {
      expect(normalizer.normalizeRecord({ source: 'github' }, 'reddit').source).toBe('reddit');
    });
  });

  describe('normalizeTable', () => {
    it('normalizes every row and keeps the order', () => {
      const table = normalizer.normalizeTable([{ title: 'one' }, { title: 'two' }], 'suppliers');

      expect(table.map((record) => record.title)).toEqual(['one', 'two']);
      expect(table.every((record) => record.source === 'suppliers')).toBe(true);
    });

    it('returns an empty table for no rows', () => {
      expect(normalizer.normalizeTable([], 'suppliers')).toEqual([]);
    });
  });

  describe('normalizeDate', () => {
    it('reads numbers as Unix seconds', () => {
      expect(normalizer.normalizeDate(1695900000)?.toISOString()).toBe('2023-09-28T11:20:00.000Z');
    });

    it('reads ISO date-times without an offset as UTC', () => {
      expect(normalizer.normalizeDate('2023-09-28T11:20:00')?.toISOString()).toBe('2023-09-28T11:20:00.000Z');
      expect(normalizer.normalizeDate('2023-09-28 11:20')?.toISOString()).toBe('2023-09-28T11:20:00.000Z');
    });

    it('honours an explicit offset', () => {
      expect(normalizer.normalizeDate('2023-09-28T14:20:00+03:00')?.toISOString()).toBe('2023-09-28T11:20:00.000Z');
    });

    it('parses RFC 2822 dates as found in feeds', () => {
      expect(normalizer.normalizeDate('Thu, 28 Sep 2023 11:20:00 GMT')?.toISOString()).toBe(
        '2023-09-28T11:20:00.000Z'
      );
    });

    it('applies numeric and named zones in RFC 2822 dates', () => {
      expect(normalizer.normalizeDate('28 Sep 2023 14:20:00 +0300')?.toISOString()).toBe('2023-09-28T11:20:00.000Z');
      expect(normalizer.normalizeDate('Thu, 28 Sep 2023 07:20:00 EDT')?.toISOString()).toBe(
        '2023-09-28T11:20:00.000Z'
      );
    });

    it('reads day-first dotted dates as UTC', () => {
      expect(normalizer.normalizeDate('28.09.2023 14:30')?.toISOString()).toBe('2023-09-28T14:30:00.000Z');
      expect(normalizer.normalizeDate('28.09.2023')?.toISOString()).toBe('2023-09-28T00:00:00.000Z');
      expect(normalizer.normalizeDate('1.2.2024 08:05:09')?.toISOString()).toBe('2024-02-01T08:05:09.000Z');
    });

    it('reads written-out and slashed dates as UTC', () => {
      expect(normalizer.normalizeDate('Sep 28, 2023')?.toISOString()).toBe('2023-09-28T00:00:00.000Z');
      expect(normalizer.normalizeDate('September 28, 2023 2:30 pm')?.toISOString()).toBe('2023-09-28T14:30:00.000Z');
      expect(normalizer.normalizeDate('2023/09/28 11:20')?.toISOString()).toBe('2023-09-28T11:20:00.000Z');
    });

    it('rejects text that only looks partly like a date', () => {
      expect(normalizer.normalizeDate('Reply 3')).toBeNull();
      expect(normalizer.normalizeDate('Forum Post 12')).toBeNull();
      expect(normalizer.normalizeDate('posted by bob 5')).toBeNull();
      expect(normalizer.normalizeDate('10 Feb')).toBeNull();
    });

    it('rejects calendar values that would roll over', () => {
      expect(normalizer.normalizeDate('31.02.2024')).toBeNull();
      expect(normalizer.normalizeDate('2024/13/01')).toBeNull();
      expect(normalizer.normalizeDate('28.09.2023 25:00')).toBeNull();
    });

    it('copies Date inputs', () => {
      const input = new Date('2024-02-01T00:00:00.000Z');
      const output = normalizer.normalizeDate(input);

      expect(output).toEqual(input);
      expect(output).not.toBe(input);
    });

    it('returns null for missing or unparseable values', () => {
      expect(normalizer.normalizeDate(null)).toBeNull();
      expect(normalizer.normalizeDate(undefined)).toBeNull();
      expect(normalizer.normalizeDate('')).toBeNull();
      expect(normalizer.normalizeDate('not a date')).toBeNull();
      expect(normalizer.normalizeDate(Number.NaN)).toBeNull();
      expect(normalizer.normalizeDate({ year: 2024 })).toBeNull();
    });
  });

  describe('cleanText', () => {
    it('strips tags, decodes entities and collapses whitespace', () => {
      expect(normalizer.cleanText('  <p>Roof &amp; gutter</p>\n\n<b>repair</b>  ')).toBe('Roof & gutter repair');
    });

    it('does not treat decoded angle brackets as tags', () => {
      expect(normalizer.cleanText('a &lt;b&gt; c')).toBe('a <b> c');
    });

    it('turns null into an empty string and numbers into text', () => {
      expect(normalizer.cleanText(null)).toBe('');
      expect(normalizer.cleanText(42)).toBe('42');
    });
  });
});

describe('decodeEntities', () => {
  it('decodes named, decimal and hex references', () => {
    expect(decodeEntities('&quot;x&quot; &#8364; &#x41;')).toBe('"x" € A');
  });

  it('leaves unknown entities alone', () => {
    expect(decodeEntities('&bogus; &#0;')).toBe('&bogus; &#0;');
  });
});
