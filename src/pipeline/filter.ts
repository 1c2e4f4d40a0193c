import type { CanonicalRecord, FilterOptions } from './types.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('filter');

/**
 * Returns the records matching every given criterion. Omitted criteria are
 * no-ops; the input array is left untouched.
 */
export function filterRecords(
  records: readonly CanonicalRecord[],
  options: FilterOptions = {}
): CanonicalRecord[] {
  const { sources, dateRange, minScore, keyword } = options;
  const allowed = sources && sources.length > 0 ? new Set<string>(sources) : undefined;
  const needle = keyword ? keyword.toLowerCase() : undefined;

  const filtered = records.filter((record) => {
    if (allowed && !allowed.has(record.source)) {
      return false;
    }

    if (dateRange) {
      if (!record.date) return false;
      const time = record.date.getTime();
      if (time < dateRange.from.getTime() || time > dateRange.to.getTime()) {
        return false;
      }
    }

    if (minScore !== undefined && record.score < minScore) {
      return false;
    }

    if (needle !== undefined) {
      const inTitle = record.title.toLowerCase().includes(needle);
      const inBody = record.body.toLowerCase().includes(needle);
      if (!inTitle && !inBody) return false;
    }

    return true;
  });

  logger.info({ before: records.length, after: filtered.length }, 'Filtered results');
  return filtered;
}
