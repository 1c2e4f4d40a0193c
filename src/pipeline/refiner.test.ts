import { describe, it, expect } from 'vitest';
import { QueryRefiner, formatSuggestionsForDisplay } from './refiner.js';

describe('QueryRefiner', () => {
  describe('suggest', () => {
    it('builds token, pair and domain suggestions capped at ten', () => {
      expect(new QueryRefiner('flat roof repair').suggest()).toEqual([
        '"flat"',
        '"roof"',
        '"repair"',
        '"flat roof"',
        '"roof repair"',
        'flat roof repair Latvia',
        'flat roof repair Riga',
        'flat roof repair contractor',
        'flat roof repair installation',
        'flat roof repair materials',
      ]);
    });

    it('returns nothing for a single non-domain word', () => {
      expect(new QueryRefiner('python').suggest()).toEqual([]);
    });

    it('recognizes capitalized place names as domain indicators', () => {
      expect(new QueryRefiner('Riga roofing').suggest()).toEqual([
        '"riga"',
        '"roofing"',
        '"riga roofing"',
        'Riga roofing Latvia',
        'Riga roofing contractor',
        'Riga roofing installation',
        'Riga roofing repair',
        'Riga roofing materials',
        'Riga roofing cost',
      ]);
    });

    it('skips short tokens but keeps every adjacent pair', () => {
      expect(new QueryRefiner('css and js').suggest()).toEqual(['"css and"', '"and js"']);
    });

    it('extends a single-word domain query without token suggestions', () => {
      expect(new QueryRefiner('roof', { maxSuggestions: 3 }).suggest()).toEqual([
        'roof Latvia',
        'roof Riga',
        'roof contractor',
      ]);
    });

    it('uses configured indicators and domain terms', () => {
      const refiner = new QueryRefiner('garden shed', {
        indicators: ['Shed'],
        domainTerms: ['kit', 'shed'],
        minTokenLength: 10,
      });

      expect(refiner.suggest()).toEqual(['"garden shed"', 'garden shed kit']);
    });

    it('is deterministic', () => {
      const first = new QueryRefiner('roof repair cost').suggest();
      const second = new QueryRefiner('roof repair cost').suggest();

      expect(second).toEqual(first);
    });

    it('returns nothing for an empty query', () => {
      expect(new QueryRefiner('   ').suggest()).toEqual([]);
    });
  });
});

describe('formatSuggestionsForDisplay', () => {
  it('numbers the suggestions', () => {
    expect(formatSuggestionsForDisplay(['"roof"', 'roof Riga'])).toBe(
      '\nSuggested searches:\n\n   1. "roof"\n   2. roof Riga\n'
    );
  });

  it('reports when there is nothing to suggest', () => {
    expect(formatSuggestionsForDisplay([])).toBe('No suggestions for this query.');
  });
});
