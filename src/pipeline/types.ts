import type { SourceId } from '../adapters/types.js';

export const CANONICAL_FIELDS = [
  'source',
  'title',
  'body',
  'author',
  'date',
  'url',
  'score',
  'comments_count',
  'tags',
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

export interface CanonicalRecord {
  source: SourceId;
  title: string;
  body: string;
  /** Empty, or a provider sentinel such as "[deleted]", when unknown. */
  author: string;
  date: Date | null;
  url: string;
  score: number;
  comments_count: number;
  tags: string[];
}

export interface SourceOutcome {
  success: boolean;
  count: number;
  search_time_seconds: number;
  error?: string;
  scraper_configured: boolean;
}

export interface SearchSummary {
  query: string;
  sources_searched: SourceId[];
  total_results: number;
  search_time_seconds: number;
  search_timestamp: string;
  source_results: Partial<Record<SourceId, SourceOutcome>>;
}

export interface SearchFailure {
  error: string;
}

export type SearchMetadata = SearchSummary | SearchFailure;

export interface SingleSourceMetadata extends SourceOutcome {
  source: SourceId;
  query: string;
}

export interface SearchResponse<M> {
  records: CanonicalRecord[];
  metadata: M;
}

export type ProgressCallback = (percent: number, message: string) => void;

export interface DateRange {
  from: Date;
  to: Date;
}

export interface FilterOptions {
  sources?: readonly string[];
  dateRange?: DateRange;
  minScore?: number;
  keyword?: string;
}

export interface SourceStatus {
  name: string;
  configured: boolean;
  available: boolean;
}

export function isSearchFailure(metadata: SearchMetadata): metadata is SearchFailure {
  return 'error' in metadata;
}
