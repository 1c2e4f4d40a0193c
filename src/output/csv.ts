import { CANONICAL_FIELDS, type CanonicalRecord } from '../pipeline/types.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('csv');

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function cell(record: CanonicalRecord, field: (typeof CANONICAL_FIELDS)[number]): string {
  switch (field) {
    case 'date':
      return record.date ? record.date.toISOString() : '';
    case 'tags':
      return record.tags.join(';');
    case 'score':
    case 'comments_count':
      return String(record[field]);
    default:
      return record[field];
  }
}

/** One header row of the canonical columns, then one row per record, CRLF-terminated. */
export class CsvExporter {
  generate(records: readonly CanonicalRecord[]): string {
    const lines = [CANONICAL_FIELDS.join(',')];

    for (const record of records) {
      lines.push(CANONICAL_FIELDS.map((field) => escapeCsvField(cell(record, field))).join(','));
    }

    logger.debug({ resultCount: records.length }, 'CSV generated');
    return `${lines.join('\r\n')}\r\n`;
  }
}
