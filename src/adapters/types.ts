import type { z } from 'zod';

export const SOURCE_IDS = [
  'reddit',
  'github',
  'stackoverflow',
  'forums',
  'news',
  'classifieds',
  'suppliers',
] as const;

export type SourceId = (typeof SOURCE_IDS)[number];

/** One row as an adapter produced it, with provider-specific field names. */
export type RawRecord = Record<string, unknown>;

export interface AdapterSearchOptions {
  limit: number;
  daysBack: number;
}

/**
 * Uniform contract every provider implements. `params` is the opaque
 * per-source payload the caller passed; each adapter validates it against
 * its own schema.
 */
export interface SourceAdapter {
  readonly id: SourceId;
  search(query: string, options: AdapterSearchOptions, params?: unknown): Promise<RawRecord[]>;
  /** Synchronous, no I/O. Informational only: never gates invocation. */
  validateConfig(): boolean;
}

export type AdapterRegistry = Partial<Record<SourceId, SourceAdapter>>;

export function toSourceId(value: string): SourceId | undefined {
  return SOURCE_IDS.find((id) => id === value);
}

/** Start of the search window, `daysBack` days before `now`. */
export function windowStart(daysBack: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - daysBack * 24 * 60 * 60 * 1000);
}

export type ParamsSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;
