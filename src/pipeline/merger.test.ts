import { describe, it, expect } from 'vitest';
import { mergeTables } from './merger.js';
import type { CanonicalRecord } from './types.js';
import type { SourceId } from '../adapters/types.js';

function record(source: SourceId, title: string, date: string | null): CanonicalRecord {
  return {
    source,
    title,
    body: '',
    author: '',
    date: date ? new Date(date) : null,
    url: `https://example.com/${title}`,
    score: 0,
    comments_count: 0,
    tags: [],
  };
}

describe('mergeTables', () => {
  it('returns an empty table when every input is empty', () => {
    expect(mergeTables([])).toEqual([]);
    expect(mergeTables([[], []])).toEqual([]);
  });

  it('sorts records from all tables newest first', () => {
    const merged = mergeTables([
      [record('reddit', 'r-old', '2024-01-01T00:00:00Z'), record('reddit', 'r-new', '2024-03-01T00:00:00Z')],
      [record('github', 'g-mid', '2024-02-01T00:00:00Z')],
    ]);

    expect(merged.map((r) => r.title)).toEqual(['r-new', 'g-mid', 'r-old']);
  });

  it('places undated records last in their input order', () => {
    const merged = mergeTables([
      [record('news', 'undated-1', null), record('news', 'dated', '2024-01-01T00:00:00Z')],
      [record('forums', 'undated-2', null)],
    ]);

    expect(merged.map((r) => r.title)).toEqual(['dated', 'undated-1', 'undated-2']);
  });

  it('keeps equal dates in input order', () => {
    const when = '2024-05-05T05:05:05Z';
    const merged = mergeTables([[record('reddit', 'a', when)], [record('github', 'b', when)], [record('news', 'c', when)]]);

    expect(merged.map((r) => r.title)).toEqual(['a', 'b', 'c']);
  });

  it('does not deduplicate across sources', () => {
    const twin = record('reddit', 'same', '2024-01-01T00:00:00Z');
    const merged = mergeTables([[twin], [{ ...twin, source: 'news' }]]);

    expect(merged).toHaveLength(2);
    expect(merged.map((r) => r.source)).toEqual(['reddit', 'news']);
  });

  it('does not modify the input tables', () => {
    const table = [record('reddit', 'old', '2020-01-01T00:00:00Z'), record('reddit', 'new', '2021-01-01T00:00:00Z')];

    mergeTables([table]);

    expect(table.map((r) => r.title)).toEqual(['old', 'new']);
  });
});
