import type { CanonicalRecord } from './types.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('merger');

function dateValue(record: CanonicalRecord): number {
  return record.date ? record.date.getTime() : Number.NEGATIVE_INFINITY;
}

/**
 * Newest first. Records without a date rank as the oldest; ties keep their
 * input order.
 */
export function compareByDateDesc(a: CanonicalRecord, b: CanonicalRecord): number {
  const left = dateValue(a);
  const right = dateValue(b);
  if (left === right) return 0;
  return left > right ? -1 : 1;
}

/**
 * Concatenates per-source tables and sorts them by date. Records are not
 * deduplicated across sources: the same URL from two providers stays twice.
 */
export function mergeTables(tables: readonly (readonly CanonicalRecord[])[]): CanonicalRecord[] {
  const nonEmpty = tables.filter((table) => table.length > 0);
  if (nonEmpty.length === 0) {
    return [];
  }

  const merged = nonEmpty.flat();
  merged.sort(compareByDateDesc);

  logger.info({ tables: nonEmpty.length, records: merged.length }, 'Merged result tables');
  return merged;
}
