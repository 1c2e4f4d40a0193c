import { z } from 'zod';
import { windowStart, type AdapterSearchOptions, type RawRecord, type SourceAdapter, type SourceId } from './types.js';
import { StackOverflowParamsSchema, parseParams } from './params.js';
import { HttpClient } from '../utils/http.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('stackoverflow');

const API_BASE = 'https://api.stackexchange.com/2.3';
const PAGE_SIZE = 100;
const MAX_PAGES = 10;

const QuestionSchema = z.object({
  question_id: z.number(),
  title: z.string(),
  body: z.string().optional(),
  owner: z.object({ display_name: z.string().optional() }).optional(),
  creation_date: z.number(),
  score: z.number().default(0),
  answer_count: z.number().default(0),
  is_answered: z.boolean().optional(),
  link: z.string(),
  tags: z.array(z.string()).default([]),
});

const PageSchema = z.object({
  items: z.array(QuestionSchema).default([]),
  has_more: z.boolean().default(false),
  quota_remaining: z.number().optional(),
});

type Question = z.infer<typeof QuestionSchema>;

export interface StackOverflowSettings {
  site: string;
  key?: string;
}

export class StackOverflowAdapter implements SourceAdapter {
  readonly id: SourceId = 'stackoverflow';

  constructor(
    private readonly http: HttpClient,
    private readonly settings: StackOverflowSettings
  ) {}

  validateConfig(): boolean {
    return true;
  }

  async search(query: string, options: AdapterSearchOptions, params?: unknown): Promise<RawRecord[]> {
    const { tags } = parseParams(this.id, StackOverflowParamsSchema, params);
    const now = new Date();
    const search = new URLSearchParams({
      order: 'desc',
      sort: 'relevance',
      q: query,
      site: this.settings.site,
      pagesize: String(Math.min(options.limit, PAGE_SIZE)),
      fromdate: String(Math.floor(windowStart(options.daysBack, now).getTime() / 1000)),
      todate: String(Math.floor(now.getTime() / 1000)),
      filter: 'withbody',
    });
    if (tags && tags.length > 0) {
      search.set('tagged', tags.join(';'));
    }
    if (this.settings.key) {
      search.set('key', this.settings.key);
    }

    logger.info({ query, tags, limit: options.limit }, 'Searching Stack Overflow');

    const questions: Question[] = [];
    for (let page = 1; page <= MAX_PAGES && questions.length < options.limit; page++) {
      search.set('page', String(page));
      const result = await this.http.getJson(`${API_BASE}/search/advanced?${search.toString()}`, PageSchema);
      questions.push(...result.items);

      if (result.quota_remaining !== undefined) {
        logger.debug({ page, quotaRemaining: result.quota_remaining }, 'Stack Exchange page fetched');
      }
      if (!result.has_more) break;
    }

    return questions.slice(0, options.limit).map(toRaw);
  }
}

function toRaw(question: Question): RawRecord {
  return {
    question_id: question.question_id,
    question_title: question.title,
    question_body: question.body ?? '',
    display_name: question.owner?.display_name ?? '',
    creation_date: question.creation_date,
    score: question.score,
    answer_count: question.answer_count,
    is_answered: question.is_answered ?? false,
    link: question.link,
    tags: question.tags,
  };
}
