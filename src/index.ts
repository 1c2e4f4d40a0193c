#!/usr/bin/env node

import { Command } from 'commander';

import { loadConfig, mergeConfigWithCLI } from './config/loader.js';
import { OutputFormatSchema, type Config } from './config/schema.js';
import { formatSuggestionsForDisplay } from './pipeline/refiner.js';
import { isSearchFailure, type CanonicalRecord, type FilterOptions, type ProgressCallback } from './pipeline/types.js';
import { exportRecords, renderRecords, type ExportMetadata } from './output/index.js';
import {
  clamp,
  formatOutcomeLine,
  formatStatus,
  orchestratorFromConfig,
  parseDateRange,
  parseInteger,
  parseList,
  parseNumber,
  parseSingleSourceParams,
  parseSourceParams,
  resolveOutputTarget,
} from './cli/helpers.js';
import { SOURCE_IDS, toSourceId } from './adapters/types.js';
import { ScoutError, errorMessage } from './utils/errors.js';
import { createChildLogger } from './utils/logger.js';

const cliLogger = createChildLogger('cli');

interface CommonOptions {
  limit?: string;
  days?: string;
  format?: string;
  output?: string;
  config?: string;
  params?: string;
}

interface SearchCommandOptions extends CommonOptions {
  sources?: string;
  sourceFilter?: string;
  minScore?: string;
  keyword?: string;
  since?: string;
  until?: string;
  progress: boolean;
}

const program = new Command();

program
  .name('topic-scout')
  .description('Search discussion boards, code hosts, news and Latvian marketplaces in one go')
  .version('1.0.0');

program
  .command('search')
  .description('Search every selected source and merge the results')
  .argument('<query>', 'Search query')
  .option('-s, --sources <sources>', `Comma-separated sources (${SOURCE_IDS.join(',')})`)
  .option('-l, --limit <number>', 'Maximum results per source')
  .option('-d, --days <number>', 'How many days back to search')
  .option('--params <json>', 'Per-source parameters as JSON, keyed by source')
  .option('--source-filter <sources>', 'Keep only results from these sources')
  .option('--min-score <number>', 'Keep only results with at least this score')
  .option('--keyword <text>', 'Keep only results whose title or body contains this text')
  .option('--since <date>', 'Keep only results dated on or after this date (YYYY-MM-DD)')
  .option('--until <date>', 'Keep only results dated on or before this date (YYYY-MM-DD)')
  .option('-f, --format <format>', 'Output format: json or csv')
  .option('-o, --output <path>', 'Output file path')
  .option('-c, --config <path>', 'Path to config file')
  .option('--no-progress', 'Do not print progress to stderr')
  .action(async (query: string, options: SearchCommandOptions) => {
    try {
      const config = await resolveConfig(options);
      const orchestrator = orchestratorFromConfig(config);
      const sources = parseList(options.sources) ?? orchestrator.sources;

      const response = await orchestrator.searchAllSources(query, sources, {
        limitPerSource: config.search.defaultLimit,
        daysBack: config.search.defaultDaysBack,
        sourceParams: parseSourceParams(options.params),
        onProgress: options.progress ? printProgress : undefined,
      });

      if (isSearchFailure(response.metadata)) {
        throw new ScoutError(response.metadata.error);
      }

      const { source_results: outcomes } = response.metadata;
      for (const source of response.metadata.sources_searched) {
        const outcome = outcomes[source];
        if (outcome) {
          console.error(formatOutcomeLine(config.displayNames[source], outcome));
        }
      }

      const filters: FilterOptions = {
        sources: parseList(options.sourceFilter),
        dateRange: parseDateRange(options.since, options.until),
        minScore: parseNumber(options.minScore, '--min-score'),
        keyword: options.keyword,
      };
      const records = hasFilters(filters) ? orchestrator.filterResults(response.records, filters) : response.records;

      await emit(records, config, {
        toFile: options.output !== undefined,
        formatGiven: options.format !== undefined,
        prefix: 'search',
        metadata: response.metadata,
      });

      cliLogger.info(
        { query, results: records.length, seconds: response.metadata.search_time_seconds },
        'Search complete'
      );
    } catch (error) {
      fail('Search failed', error);
    }
  });

program
  .command('source')
  .description('Search a single source')
  .argument('<name>', `Source name (${SOURCE_IDS.join(', ')})`)
  .argument('<query>', 'Search query')
  .option('-l, --limit <number>', 'Maximum results')
  .option('-d, --days <number>', 'How many days back to search')
  .option('--params <json>', 'Source parameters as JSON')
  .option('-f, --format <format>', 'Output format: json or csv')
  .option('-o, --output <path>', 'Output file path')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (name: string, query: string, options: CommonOptions) => {
    try {
      const config = await resolveConfig(options);
      const orchestrator = orchestratorFromConfig(config);

      const response = await orchestrator.searchSingleSource(name, query, {
        limit: config.search.defaultLimit,
        daysBack: config.search.defaultDaysBack,
        params: parseSingleSourceParams(options.params),
      });

      const { metadata } = response;
      if (!('success' in metadata)) {
        throw new ScoutError(metadata.error);
      }
      const source = toSourceId(name);
      console.error(formatOutcomeLine(source ? config.displayNames[source] : name, metadata));
      if (!metadata.success) {
        throw new ScoutError(metadata.error ?? `Search of ${name} failed`);
      }

      await emit(response.records, config, {
        toFile: options.output !== undefined,
        formatGiven: options.format !== undefined,
        prefix: name,
        metadata,
      });
    } catch (error) {
      fail('Source search failed', error);
    }
  });

program
  .command('status')
  .description('Show which sources are configured')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: { config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      console.log(formatStatus(orchestratorFromConfig(config).getScraperStatus()));
    } catch (error) {
      fail('Status check failed', error);
    }
  });

program
  .command('suggest')
  .description('Suggest follow-up queries')
  .argument('<query>', 'Search query')
  .option('-c, --config <path>', 'Path to config file')
  .option('--json', 'Output suggestions as JSON')
  .action(async (query: string, options: { config?: string; json?: boolean }) => {
    try {
      const config = await loadConfig(options.config);
      const suggestions = orchestratorFromConfig(config).getSearchSuggestions(query);

      if (options.json) {
        console.log(JSON.stringify({ query, suggestions }, null, 2));
      } else {
        console.log(formatSuggestionsForDisplay(suggestions));
      }
    } catch (error) {
      fail('Suggestion failed', error);
    }
  });

/** Loads the config, overlays the flags and clamps limit and days to the configured maxima. */
async function resolveConfig(options: CommonOptions): Promise<Config> {
  const config = await loadConfig(options.config);
  const format = options.format === undefined ? undefined : OutputFormatSchema.safeParse(options.format);
  if (format && !format.success) {
    throw new ScoutError(`Unsupported format "${options.format}". Use json or csv.`);
  }

  const limit = parseInteger(options.limit, '--limit');
  const days = parseInteger(options.days, '--days');

  return mergeConfigWithCLI(config, {
    limit: limit === undefined ? undefined : clampWithWarning('limit', limit, config.search.maxLimit),
    daysBack: days === undefined ? undefined : clampWithWarning('days', days, config.search.maxDaysBack),
    format: format?.data,
    output: options.output,
  });
}

function clampWithWarning(name: string, value: number, max: number): number {
  const clamped = clamp(value, max);
  if (clamped !== value) {
    cliLogger.warn({ [name]: value, clamped }, 'Value out of range, clamped');
  }
  return clamped;
}

function hasFilters(filters: FilterOptions): boolean {
  return Object.values(filters).some((value) => value !== undefined);
}

interface EmitOptions {
  toFile: boolean;
  formatGiven: boolean;
  prefix: string;
  metadata: ExportMetadata;
}

/** Writes to the `--output` path when given, otherwise prints to stdout. */
async function emit(records: CanonicalRecord[], config: Config, options: EmitOptions): Promise<void> {
  const { format, directory } = config.output;

  if (!options.toFile) {
    console.log(renderRecords(records, format, options.metadata));
    return;
  }

  const target = resolveOutputTarget(directory, format, options.formatGiven, options.prefix);
  const written = await exportRecords(records, target.format, target.path, options.metadata);
  console.log(`Output written to: ${written}`);
}

const printProgress: ProgressCallback = (percent, message) => {
  process.stderr.write(`[${String(percent).padStart(3)}%] ${message}\n`);
};

function fail(message: string, error: unknown): never {
  cliLogger.error({ error: errorMessage(error) }, message);
  console.error('Error:', errorMessage(error));
  process.exit(1);
}

program.parse();
