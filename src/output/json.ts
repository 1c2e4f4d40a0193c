import type { SourceId } from '../adapters/types.js';
import type { CanonicalRecord, SearchMetadata, SingleSourceMetadata } from '../pipeline/types.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('json');

export type ExportMetadata = SearchMetadata | SingleSourceMetadata;

export interface JsonOutputOptions {
  metadata?: ExportMetadata;
  pretty?: boolean;
}

export interface JsonOutput {
  meta: {
    timestamp: string;
    totalResults: number;
    sources: SourceId[];
    search?: ExportMetadata;
  };
  results: JsonResult[];
}

export type JsonResult = Omit<CanonicalRecord, 'date'> & { date: string | null };

export function toJsonResult(record: CanonicalRecord): JsonResult {
  return { ...record, date: record.date ? record.date.toISOString() : null };
}

export class JsonExporter {
  generate(records: readonly CanonicalRecord[], options: JsonOutputOptions = {}): string {
    const sources: SourceId[] = [];
    for (const record of records) {
      if (!sources.includes(record.source)) {
        sources.push(record.source);
      }
    }

    const output: JsonOutput = {
      meta: {
        timestamp: new Date().toISOString(),
        totalResults: records.length,
        sources,
      },
      results: records.map(toJsonResult),
    };

    if (options.metadata) {
      output.meta.search = options.metadata;
    }

    logger.debug({ resultCount: records.length }, 'JSON generated');

    if (options.pretty ?? true) {
      return JSON.stringify(output, null, 2);
    }

    return JSON.stringify(output);
  }
}
