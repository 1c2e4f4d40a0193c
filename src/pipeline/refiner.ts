import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('refiner');

export interface RefinementOptions {
  /** Query tokens that mark a query as belonging to the domain. */
  indicators?: readonly string[];
  /** Terms appended to a domain query when it does not mention them yet. */
  domainTerms?: readonly string[];
  maxSuggestions?: number;
  minTokenLength?: number;
}

export const DEFAULT_INDICATORS = [
  'roof',
  'construction',
  'building',
  'contractor',
  'repair',
  'install',
  'material',
  'latvia',
  'riga',
] as const;

export const DEFAULT_DOMAIN_TERMS = [
  'Latvia',
  'Riga',
  'contractor',
  'installation',
  'repair',
  'materials',
  'cost',
] as const;

/**
 * Derives follow-up queries from the query text alone: quoted single
 * tokens, quoted adjacent pairs and, for domain queries, the query extended
 * with domain terms it lacks. Deterministic for a given query.
 */
export class QueryRefiner {
  private readonly tokens: string[];
  private readonly indicators: Set<string>;

  constructor(
    private readonly originalQuery: string,
    private readonly options: RefinementOptions = {}
  ) {
    this.tokens = originalQuery.toLowerCase().split(/\s+/).filter(Boolean);
    const indicators: readonly string[] = options.indicators ?? DEFAULT_INDICATORS;
    this.indicators = new Set(indicators.map((term) => term.toLowerCase()));
  }

  suggest(): string[] {
    const suggestions: string[] = [];
    const minLength = this.options.minTokenLength ?? 4;

    if (this.tokens.length > 1) {
      for (const token of this.tokens) {
        if (token.length >= minLength) {
          suggestions.push(`"${token}"`);
        }
      }

      for (let i = 0; i < this.tokens.length - 1; i++) {
        suggestions.push(`"${this.tokens[i]} ${this.tokens[i + 1]}"`);
      }
    }

    if (this.isDomainQuery()) {
      const lowerQuery = this.originalQuery.toLowerCase();
      for (const term of this.options.domainTerms ?? DEFAULT_DOMAIN_TERMS) {
        if (!lowerQuery.includes(term.toLowerCase())) {
          suggestions.push(`${this.originalQuery} ${term}`);
        }
      }
    }

    const limited = suggestions.slice(0, this.options.maxSuggestions ?? 10);
    logger.debug({ query: this.originalQuery, suggestions: limited }, 'Search suggestions built');
    return limited;
  }

  private isDomainQuery(): boolean {
    return this.tokens.some((token) => this.indicators.has(token));
  }
}

export function formatSuggestionsForDisplay(suggestions: readonly string[]): string {
  if (suggestions.length === 0) {
    return 'No suggestions for this query.';
  }

  const lines = ['', 'Suggested searches:', ''];

  suggestions.forEach((suggestion, i) => {
    lines.push(`  ${(i + 1).toString().padStart(2)}. ${suggestion}`);
  });

  lines.push('');
  return lines.join('\n');
}
