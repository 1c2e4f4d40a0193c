import pLimit from 'p-limit';
import {
  SOURCE_IDS,
  toSourceId,
  type AdapterRegistry,
  type SourceAdapter,
  type SourceId,
} from '../adapters/types.js';
import type { SourceParams, SourceParamsMap } from '../adapters/params.js';
import { RecordNormalizer } from './normalizer.js';
import { mergeTables } from './merger.js';
import { filterRecords } from './filter.js';
import { QueryRefiner, type RefinementOptions } from './refiner.js';
import type {
  CanonicalRecord,
  FilterOptions,
  ProgressCallback,
  SearchFailure,
  SearchMetadata,
  SearchResponse,
  SingleSourceMetadata,
  SourceOutcome,
  SourceStatus,
} from './types.js';
import { errorMessage } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('orchestrator');

export interface OrchestratorOptions {
  adapters: AdapterRegistry;
  /** Human-readable source labels for progress and status output. */
  displayNames?: Partial<Record<SourceId, string>>;
  normalizer?: RecordNormalizer;
  refinement?: RefinementOptions;
  /** Upper bound on units in flight. Defaults to all selected sources at once. */
  concurrency?: number;
}

export interface SearchAllOptions {
  limitPerSource?: number;
  daysBack?: number;
  sourceParams?: SourceParams;
  onProgress?: ProgressCallback;
}

export interface SingleSearchOptions<P> {
  limit?: number;
  daysBack?: number;
  params?: P;
}

interface UnitResult {
  records: CanonicalRecord[];
  outcome: SourceOutcome;
}

export const DEFAULT_LIMIT = 50;
export const DEFAULT_DAYS_BACK = 30;

function secondsSince(start: number): number {
  return Math.round((Date.now() - start) / 10) / 100;
}

/**
 * Fans a query out to the registered adapters, normalizes each source's rows
 * and merges them into one date-ordered table. Adapter failures never escape:
 * they are reported per source in the metadata.
 */
export class SearchOrchestrator {
  private readonly adapters: AdapterRegistry;
  private readonly displayNames: Partial<Record<SourceId, string>>;
  private readonly normalizer: RecordNormalizer;
  private readonly refinement: RefinementOptions;
  private readonly concurrency?: number;

  constructor(options: OrchestratorOptions) {
    this.adapters = { ...options.adapters };
    this.displayNames = options.displayNames ?? {};
    this.normalizer = options.normalizer ?? new RecordNormalizer();
    this.refinement = options.refinement ?? {};
    this.concurrency = options.concurrency;
  }

  get sources(): SourceId[] {
    return SOURCE_IDS.filter((id) => this.adapters[id] !== undefined);
  }

  async searchAllSources(
    query: string,
    selectedSources: readonly string[],
    options: SearchAllOptions = {}
  ): Promise<SearchResponse<SearchMetadata>> {
    const start = Date.now();
    const limit = options.limitPerSource ?? DEFAULT_LIMIT;
    const daysBack = options.daysBack ?? DEFAULT_DAYS_BACK;
    const sourceParams = options.sourceParams ?? {};
    const report = this.progressReporter(options.onProgress);

    logger.info({ query, sources: selectedSources, limit, daysBack }, 'Starting search');
    report(0, `Initializing search for '${query}'...`);

    const validSources = this.resolveSources(selectedSources);
    if (validSources.length === 0) {
      logger.error({ selectedSources }, 'No valid sources selected');
      const failure: SearchFailure = { error: 'No valid sources selected' };
      return { records: [], metadata: failure };
    }

    const run = pLimit(this.concurrency ?? validSources.length);
    const units = validSources.map((source, index) =>
      run(() => {
        const progress = Math.floor((index / validSources.length) * 80);
        report(progress, `Searching ${this.displayName(source)}...`);
        return this.runUnit(source, query, limit, daysBack, sourceParams[source]);
      })
    );
    const results = await Promise.all(units);

    report(90, 'Merging and normalizing results...');

    const sourceResults: Partial<Record<SourceId, SourceOutcome>> = {};
    validSources.forEach((source, index) => {
      const result = results[index];
      if (result) {
        sourceResults[source] = result.outcome;
      }
    });

    const records = mergeTables(results.map((result) => result.records));
    const searchTime = secondsSince(start);

    report(100, `Search completed! Found ${records.length} total results.`);
    logger.info({ query, results: records.length, seconds: searchTime }, 'Search completed');

    return {
      records,
      metadata: {
        query,
        sources_searched: validSources,
        total_results: records.length,
        search_time_seconds: searchTime,
        source_results: sourceResults,
        search_timestamp: new Date().toISOString(),
      },
    };
  }

  async searchSingleSource<K extends SourceId>(
    source: K,
    query: string,
    options?: SingleSearchOptions<SourceParamsMap[K]>
  ): Promise<SearchResponse<SingleSourceMetadata | SearchFailure>>;
  async searchSingleSource(
    source: string,
    query: string,
    options?: SingleSearchOptions<unknown>
  ): Promise<SearchResponse<SingleSourceMetadata | SearchFailure>>;
  async searchSingleSource(
    source: string,
    query: string,
    options: SingleSearchOptions<unknown> = {}
  ): Promise<SearchResponse<SingleSourceMetadata | SearchFailure>> {
    const id = toSourceId(source);
    if (!id || !this.adapters[id]) {
      const error = `Unknown source: ${source}`;
      logger.error({ source }, error);
      return { records: [], metadata: { error } };
    }

    const { records, outcome } = await this.runUnit(
      id,
      query,
      options.limit ?? DEFAULT_LIMIT,
      options.daysBack ?? DEFAULT_DAYS_BACK,
      options.params
    );

    return { records, metadata: { ...outcome, source: id, query } };
  }

  filterResults(records: readonly CanonicalRecord[], filters: FilterOptions = {}): CanonicalRecord[] {
    return filterRecords(records, filters);
  }

  getScraperStatus(): Partial<Record<SourceId, SourceStatus>> {
    const status: Partial<Record<SourceId, SourceStatus>> = {};

    for (const source of this.sources) {
      const adapter = this.adapters[source];
      if (!adapter) continue;
      status[source] = {
        name: this.displayName(source),
        configured: this.isConfigured(adapter),
        available: true,
      };
    }

    return status;
  }

  getSearchSuggestions(query: string): string[] {
    return new QueryRefiner(query, this.refinement).suggest();
  }

  private resolveSources(selected: readonly string[]): SourceId[] {
    const valid: SourceId[] = [];
    for (const name of selected) {
      const id = toSourceId(name);
      if (id && this.adapters[id] && !valid.includes(id)) {
        valid.push(id);
      }
    }
    return valid;
  }

  /** One fan-out branch: search, then normalize. Never rejects. */
  private async runUnit(
    source: SourceId,
    query: string,
    limit: number,
    daysBack: number,
    params: unknown
  ): Promise<UnitResult> {
    const start = Date.now();
    const adapter = this.adapters[source];
    if (!adapter) {
      return {
        records: [],
        outcome: {
          success: false,
          count: 0,
          search_time_seconds: 0,
          error: `Unknown source: ${source}`,
          scraper_configured: false,
        },
      };
    }

    try {
      const rows = await adapter.search(query, { limit, daysBack }, params);
      const records = this.normalizer.normalizeTable(rows, source);
      const searchTime = secondsSince(start);

      logger.info({ source, count: records.length, seconds: searchTime }, 'Source search completed');

      return {
        records,
        outcome: {
          success: true,
          count: records.length,
          search_time_seconds: searchTime,
          scraper_configured: this.isConfigured(adapter),
        },
      };
    } catch (error) {
      const message = errorMessage(error);
      logger.error({ source, error: message }, 'Source search failed');

      return {
        records: [],
        outcome: {
          success: false,
          count: 0,
          search_time_seconds: secondsSince(start),
          error: message,
          scraper_configured: this.isConfigured(adapter),
        },
      };
    }
  }

  private isConfigured(adapter: SourceAdapter): boolean {
    try {
      return adapter.validateConfig();
    } catch (error) {
      logger.warn({ source: adapter.id, error: errorMessage(error) }, 'Config validation threw');
      return false;
    }
  }

  private displayName(source: SourceId): string {
    return this.displayNames[source] ?? source;
  }

  /** Wraps the caller's callback so a throwing callback cannot lose results. */
  private progressReporter(callback?: ProgressCallback): ProgressCallback {
    return (percent, message) => {
      if (!callback) return;
      try {
        callback(percent, message);
      } catch (error) {
        logger.warn({ percent, error: errorMessage(error) }, 'Progress callback failed');
      }
    };
  }
}
