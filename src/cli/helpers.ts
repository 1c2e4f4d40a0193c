import { SourceParamsSchema, type SourceParams } from '../adapters/params.js';
import { createAdapters } from '../adapters/index.js';
import { join, extname } from 'path';
import { OutputFormatSchema, type Config, type OutputFormat } from '../config/schema.js';
import { defaultExportName } from '../output/writer.js';
import { SearchOrchestrator } from '../pipeline/orchestrator.js';
import type { DateRange, SourceOutcome, SourceStatus } from '../pipeline/types.js';
import type { SourceId } from '../adapters/types.js';
import { ScoutError } from '../utils/errors.js';

export function orchestratorFromConfig(config: Config): SearchOrchestrator {
  return new SearchOrchestrator({
    adapters: createAdapters(config),
    displayNames: config.displayNames,
    refinement: config.suggestions,
  });
}

export function parseList(value?: string): string[] | undefined {
  if (value === undefined) return undefined;
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : undefined;
}

export function parseInteger(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new ScoutError(`${flag} must be an integer, got "${value}"`);
  }
  return parsed;
}

export function parseNumber(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new ScoutError(`${flag} must be a number, got "${value}"`);
  }
  return parsed;
}

/** Bounds a requested value to `[1, max]`. */
export function clamp(value: number, max: number): number {
  return Math.min(Math.max(1, value), max);
}

const BARE_DAY = /^\d{4}-\d{2}-\d{2}$/;

export function parseDateRange(since?: string, until?: string): DateRange | undefined {
  if (!since && !until) {
    return undefined;
  }

  const from = since ? new Date(since) : new Date(0);
  // A bare day as the upper bound covers that whole day.
  const to = until ? new Date(BARE_DAY.test(until) ? `${until}T23:59:59.999Z` : until) : new Date();

  if (isNaN(from.getTime()) || isNaN(to.getTime())) {
    throw new ScoutError('Invalid date format. Use YYYY-MM-DD.');
  }

  return { from, to };
}

function parseJsonOption(value: string, flag: string): unknown {
  try {
    return JSON.parse(value);
  } catch (error) {
    throw new ScoutError(`${flag} must be valid JSON`, { cause: error });
  }
}

/** Reads `--params` for a multi-source search: `{"reddit": {...}, "github": {...}}`. */
export function parseSourceParams(value?: string): SourceParams | undefined {
  if (value === undefined) return undefined;
  const result = SourceParamsSchema.safeParse(parseJsonOption(value, '--params'));
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
    throw new ScoutError(`Invalid --params: ${issues}`);
  }
  return result.data;
}

/** Reads `--params` for one source; the adapter validates the payload. */
export function parseSingleSourceParams(value?: string): unknown {
  return value === undefined ? undefined : parseJsonOption(value, '--params');
}

export function formatOutcomeLine(label: string, outcome: SourceOutcome): string {
  if (outcome.success) {
    return `  ✓ ${label}: ${outcome.count} results (${outcome.search_time_seconds}s)`;
  }
  return `  ✗ ${label}: ${outcome.error ?? 'failed'}`;
}

export function formatStatus(status: Partial<Record<SourceId, SourceStatus>>): string {
  const lines = ['Source status:', ''];
  for (const [source, entry] of Object.entries(status)) {
    if (!entry) continue;
    const icon = entry.configured ? '✓' : '○';
    const note = entry.configured ? 'configured' : 'not configured (limited access)';
    lines.push(`  ${icon} ${entry.name} [${source}]: ${note}`);
  }
  return lines.join('\n');
}

export interface OutputTarget {
  path: string;
  format: OutputFormat;
}

/**
 * Maps `--output` to a file. A path ending in `.json` or `.csv` is the file
 * itself and sets the format unless `--format` named another one; any other
 * path is a directory that gets a timestamped file name.
 */
export function resolveOutputTarget(
  output: string,
  format: OutputFormat,
  formatGiven: boolean,
  prefix: string,
  now: Date = new Date()
): OutputTarget {
  const extension = OutputFormatSchema.safeParse(extname(output).slice(1).toLowerCase());
  if (!extension.success) {
    return { path: join(output, defaultExportName(prefix, format, now)), format };
  }

  if (formatGiven && extension.data !== format) {
    throw new ScoutError(`Output file ${output} does not match --format ${format}`);
  }
  return { path: output, format: extension.data };
}
