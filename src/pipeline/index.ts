export { SearchOrchestrator, DEFAULT_LIMIT, DEFAULT_DAYS_BACK, type OrchestratorOptions, type SearchAllOptions, type SingleSearchOptions } from './orchestrator.js';
export { RecordNormalizer, FIELD_CANDIDATES, decodeEntities } from './normalizer.js';
export { mergeTables, compareByDateDesc } from './merger.js';
export { filterRecords } from './filter.js';
export {
  QueryRefiner,
  formatSuggestionsForDisplay,
  DEFAULT_INDICATORS,
  DEFAULT_DOMAIN_TERMS,
  type RefinementOptions,
} from './refiner.js';
export * from './types.js';
export { createAdapters, SOURCE_IDS, type SourceAdapter, type SourceId, type SourceParams, type SourceParamsMap } from '../adapters/index.js';
export { loadConfig, parseConfig, mergeConfigWithCLI } from '../config/loader.js';
export type { Config } from '../config/schema.js';
export { JsonExporter, CsvExporter, exportRecords } from '../output/index.js';
export { ScoutError, ConfigError, AdapterError, ExportError, RateLimiter, HttpClient } from '../utils/index.js';
