import { mkdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import type { CanonicalRecord } from '../pipeline/types.js';
import { ExportError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { CsvExporter } from './csv.js';
import { JsonExporter, type ExportMetadata } from './json.js';

const logger = createChildLogger('writer');

export function renderRecords(
  records: readonly CanonicalRecord[],
  format: string,
  metadata?: ExportMetadata
): string {
  switch (format) {
    case 'json':
      return new JsonExporter().generate(records, { metadata });
    case 'csv':
      return new CsvExporter().generate(records);
    default:
      throw new ExportError(`Unsupported export format: ${format}`);
  }
}

/** Writes the records to `path`, creating parent directories. Returns the absolute path. */
export async function exportRecords(
  records: readonly CanonicalRecord[],
  format: string,
  path: string,
  metadata?: ExportMetadata
): Promise<string> {
  const content = renderRecords(records, format, metadata);
  const target = resolve(path);

  try {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, 'utf-8');
  } catch (error) {
    throw new ExportError(`Failed to write ${target}`, { cause: error });
  }

  logger.info({ path: target, format, count: records.length }, 'Results exported');
  return target;
}

/** Timestamped file name such as `search_20240101_120000.csv`. */
export function defaultExportName(prefix: string, format: string, now: Date = new Date()): string {
  const stamp = now
    .toISOString()
    .slice(0, 19)
    .replace(/[-:]/g, '')
    .replace('T', '_');
  return `${prefix}_${stamp}.${format}`;
}
