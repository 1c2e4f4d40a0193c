import type { RawRecord, SourceId } from '../adapters/types.js';
import type { CanonicalField, CanonicalRecord } from './types.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('normalizer');

/**
 * Raw field names tried, in order, for each canonical field. The first key
 * that is present with a non-null value wins. `comments_count` closes its own
 * list so an already canonical record normalizes to itself.
 */
export const FIELD_CANDIDATES = {
  title: ['title', 'subject', 'name', 'question_title'],
  body: ['body', 'content', 'text', 'description', 'question_body', 'selftext'],
  author: ['author', 'user', 'username', 'display_name', 'owner'],
  date: ['created_utc', 'created_at', 'date', 'timestamp', 'creation_date'],
  url: ['url', 'permalink', 'link', 'html_url'],
  score: ['score', 'ups', 'upvotes', 'votes', 'points'],
  comments_count: ['num_comments', 'comments', 'comment_count', 'answer_count', 'comments_count'],
} as const satisfies Partial<Record<CanonicalField, readonly string[]>>;

const AUTHOR_KEYS = ['login', 'display_name', 'name', 'username'] as const;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  ndash: '–',
  mdash: '—',
  lsquo: '‘',
  rsquo: '’',
  ldquo: '“',
  rdquo: '”',
  hellip: '…',
  euro: '€',
  copy: '©',
  reg: '®',
  deg: '°',
};

const ISO_WITHOUT_ZONE = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;
const ISO_DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const ISO_WITH_ZONE = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)\s?(Z|UTC|GMT|[+-]\d{2}:?\d{2})$/i;
// Thu, 28 Sep 2023 11:20:00 GMT
const DAY_MONTH_YEAR = /^(?:[a-z]{3},?\s+)?(\d{1,2})\s+([a-z]{3,9})\.?\s+(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?(?:\s+([a-z]{1,3}|[+-]\d{4}))?$/i;
// Sep 28, 2023 2:30 pm
const MONTH_DAY_YEAR = /^(?:[a-z]{3},?\s+)?([a-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})(?:,?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([ap]m)?)?$/i;
const SLASHED_YMD = /^(\d{4})\/(\d{1,2})\/(\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const DOTTED_DMY = /^(\d{1,2})\.(\d{1,2})\.(\d{4})\.?(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'] as const;

/** Zone abbreviations seen in feed dates, as minutes east of UTC. */
const ZONE_OFFSETS: Record<string, number> = {
  UT: 0,
  UTC: 0,
  GMT: 0,
  Z: 0,
  EST: -300,
  EDT: -240,
  CST: -360,
  CDT: -300,
  MST: -420,
  MDT: -360,
  PST: -480,
  PDT: -420,
};

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  offsetMinutes: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstAvailable(raw: RawRecord, candidates: readonly string[]): unknown {
  for (const key of candidates) {
    if (Object.hasOwn(raw, key)) {
      const value = raw[key];
      if (value !== null && value !== undefined) {
        return value;
      }
    }
  }
  return undefined;
}

function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : value.toISOString();
  }
  return '';
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

function numberAt(match: RegExpExecArray, index: number): number {
  const value = match[index];
  return value === undefined ? 0 : Number(value);
}

function monthNumber(name: string | undefined): number {
  const key = (name ?? '').slice(0, 3).toLowerCase();
  return MONTHS.findIndex((month) => month === key) + 1;
}

function zoneOffset(zone: string | undefined): number | null {
  if (zone === undefined) return 0;
  const numeric = /^([+-])(\d{2})(\d{2})$/.exec(zone);
  if (numeric) {
    const minutes = numberAt(numeric, 2) * 60 + numberAt(numeric, 3);
    return numeric[1] === '-' ? -minutes : minutes;
  }
  return ZONE_OFFSETS[zone.toUpperCase()] ?? null;
}

/** Builds the instant for calendar fields, rejecting out-of-range values instead of rolling them over. */
function fromParts(parts: DateParts): Date | null {
  const { year, month, day, hour, minute, second, offsetMinutes } = parts;
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  if (date.getUTCDate() !== day) {
    return null;
  }
  return new Date(date.getTime() - offsetMinutes * 60_000);
}

function to24Hour(hour: number, meridiem: string | undefined): number {
  if (meridiem === undefined) return hour;
  if (hour < 1 || hour > 12) return Number.NaN;
  const base = hour % 12;
  return meridiem.toLowerCase() === 'pm' ? base + 12 : base;
}

function validOrNull(date: Date): Date | null {
  return Number.isNaN(date.getTime()) ? null : date;
}

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z][a-z0-9]*);/gi, (entity, body: string) => {
    if (body.startsWith('#')) {
      const hex = body[1] === 'x' || body[1] === 'X';
      const codePoint = parseInt(body.slice(hex ? 2 : 1), hex ? 16 : 10);
      return codePoint > 0 && codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : entity;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

/** Maps raw provider rows onto the canonical record shape. Pure: no I/O. */
export class RecordNormalizer {
  normalizeRecord(raw: RawRecord, source: SourceId): CanonicalRecord {
    return {
      source,
      title: this.field('title', '', () => this.cleanText(firstAvailable(raw, FIELD_CANDIDATES.title))),
      body: this.field('body', '', () => this.cleanText(firstAvailable(raw, FIELD_CANDIDATES.body))),
      author: this.field('author', '', () => this.authorName(firstAvailable(raw, FIELD_CANDIDATES.author))),
      date: this.field('date', null, () => this.normalizeDate(firstAvailable(raw, FIELD_CANDIDATES.date))),
      url: this.field('url', '', () => toText(firstAvailable(raw, FIELD_CANDIDATES.url))),
      score: this.field('score', 0, () => toNumber(firstAvailable(raw, FIELD_CANDIDATES.score))),
      comments_count: this.field('comments_count', 0, () =>
        this.commentCount(firstAvailable(raw, FIELD_CANDIDATES.comments_count))
      ),
      tags: this.field('tags', [], () => this.tags(raw['tags'])),
    };
  }

  normalizeTable(rows: readonly RawRecord[], source: SourceId): CanonicalRecord[] {
    return rows.map((row) => this.normalizeRecord(row, source));
  }

  /**
   * Returns an absolute instant or null. Numbers are Unix epoch seconds.
   * Strings must match a known layout (ISO 8601, RFC 2822, `Sep 28, 2023`,
   * `2023/09/28`, `28.09.2023 14:30`); those without an offset are read as UTC.
   */
  normalizeDate(input: unknown): Date | null {
    if (input === null || input === undefined) {
      return null;
    }

    if (input instanceof Date) {
      return validOrNull(new Date(input.getTime()));
    }

    if (typeof input === 'number') {
      return Number.isFinite(input) ? validOrNull(new Date(input * 1000)) : null;
    }

    if (typeof input === 'string') {
      const parsed = this.parseDateString(input.trim());
      if (!parsed) {
        logger.warn({ input }, 'Failed to parse date');
      }
      return parsed;
    }

    logger.warn({ type: typeof input }, 'Unsupported date value');
    return null;
  }

  /** Strips tags, decodes entities, collapses whitespace. */
  cleanText(input: unknown): string {
    if (input === null || input === undefined) {
      return '';
    }

    const withoutTags = toText(input).replace(/<[^>]+>/g, '');
    return decodeEntities(withoutTags).replace(/\s+/g, ' ').trim();
  }

  private parseDateString(text: string): Date | null {
    if (text === '') {
      return null;
    }

    const iso = ISO_WITHOUT_ZONE.exec(text);
    if (iso) {
      return validOrNull(new Date(`${iso[1]}T${iso[2]}Z`));
    }

    if (ISO_DATE_ONLY.test(text)) {
      return validOrNull(new Date(`${text}T00:00:00Z`));
    }

    const zoned = ISO_WITH_ZONE.exec(text);
    if (zoned) {
      const zone = (zoned[3] ?? 'Z').toUpperCase();
      const offset = zone === 'UTC' || zone === 'GMT' ? 'Z' : zone.replace(/^([+-]\d{2})(\d{2})$/, '$1:$2');
      return validOrNull(new Date(`${zoned[1]}T${zoned[2]}${offset}`));
    }

    const rfc = DAY_MONTH_YEAR.exec(text);
    if (rfc) {
      const offsetMinutes = zoneOffset(rfc[7]);
      return offsetMinutes === null
        ? null
        : fromParts({
            year: numberAt(rfc, 3),
            month: monthNumber(rfc[2]),
            day: numberAt(rfc, 1),
            hour: numberAt(rfc, 4),
            minute: numberAt(rfc, 5),
            second: numberAt(rfc, 6),
            offsetMinutes,
          });
    }

    const written = MONTH_DAY_YEAR.exec(text);
    if (written) {
      return fromParts({
        year: numberAt(written, 3),
        month: monthNumber(written[1]),
        day: numberAt(written, 2),
        hour: to24Hour(numberAt(written, 4), written[7]),
        minute: numberAt(written, 5),
        second: numberAt(written, 6),
        offsetMinutes: 0,
      });
    }

    const slashed = SLASHED_YMD.exec(text);
    if (slashed) {
      return fromParts({
        year: numberAt(slashed, 1),
        month: numberAt(slashed, 2),
        day: numberAt(slashed, 3),
        hour: numberAt(slashed, 4),
        minute: numberAt(slashed, 5),
        second: numberAt(slashed, 6),
        offsetMinutes: 0,
      });
    }

    const dotted = DOTTED_DMY.exec(text);
    if (dotted) {
      return fromParts({
        year: numberAt(dotted, 3),
        month: numberAt(dotted, 2),
        day: numberAt(dotted, 1),
        hour: numberAt(dotted, 4),
        minute: numberAt(dotted, 5),
        second: numberAt(dotted, 6),
        offsetMinutes: 0,
      });
    }

    return null;
  }

  private authorName(value: unknown): string {
    if (isRecord(value)) {
      for (const key of AUTHOR_KEYS) {
        const name = value[key];
        if (typeof name === 'string') return name;
      }
      return '';
    }
    return toText(value);
  }

  private commentCount(value: unknown): number {
    if (Array.isArray(value)) {
      return value.length;
    }
    return Math.trunc(toNumber(value));
  }

  private tags(value: unknown): string[] {
    if (Array.isArray(value)) {
      return value.flatMap((tag: unknown) => {
        if (typeof tag === 'string') return [tag];
        if (typeof tag === 'number') return [String(tag)];
        return [];
      });
    }
    if (typeof value === 'string') {
      return value
        .split(',')
        .map((tag) => tag.trim())
        .filter((tag) => tag.length > 0);
    }
    return [];
  }

  private field<T>(name: CanonicalField, fallback: T, read: () => T): T {
    try {
      return read();
    } catch (error) {
      logger.debug({ field: name, error }, 'Field extraction failed, using default');
      return fallback;
    }
  }
}
