import { z } from 'zod';
import type { AdapterSearchOptions, RawRecord, SourceAdapter, SourceId } from './types.js';
import { RedditParamsSchema, parseParams } from './params.js';
import { HttpClient } from '../utils/http.js';
import { createChildLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const logger = createChildLogger('reddit');

export interface RedditCredentials {
  clientId?: string;
  clientSecret?: string;
  userAgent: string;
}

const PostSchema = z.object({
  id: z.string(),
  title: z.string().default(''),
  selftext: z.string().default(''),
  author: z.string().default('[deleted]'),
  created_utc: z.number().optional(),
  permalink: z.string(),
  url: z.string().optional(),
  score: z.number().default(0),
  num_comments: z.number().default(0),
  subreddit: z.string().default(''),
  link_flair_text: z.string().nullable().optional(),
});

const ListingSchema = z.object({
  data: z.object({
    children: z.array(z.object({ data: PostSchema })),
  }),
});

const TokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number().default(3600),
});

type RedditPost = z.infer<typeof PostSchema>;
type TimeFilter = 'day' | 'week' | 'month' | 'year' | 'all';

export function timeFilterFor(daysBack: number): TimeFilter {
  if (daysBack <= 1) return 'day';
  if (daysBack <= 7) return 'week';
  if (daysBack <= 30) return 'month';
  if (daysBack <= 365) return 'year';
  return 'all';
}

export class RedditAdapter implements SourceAdapter {
  readonly id: SourceId = 'reddit';
  private token?: { value: string; expiresAt: number };

  constructor(
    private readonly credentials: RedditCredentials,
    private readonly http: HttpClient
  ) {}

  validateConfig(): boolean {
    const { clientId, clientSecret, userAgent } = this.credentials;
    return Boolean(clientId && clientSecret && userAgent);
  }

  async search(query: string, options: AdapterSearchOptions, params?: unknown): Promise<RawRecord[]> {
    const { subreddits, sort } = parseParams(this.id, RedditParamsSchema, params);
    const timeFilter = timeFilterFor(options.daysBack);
    const headers = await this.authHeaders();
    const host = headers.Authorization ? 'https://oauth.reddit.com' : 'https://www.reddit.com';

    logger.info({ query, limit: options.limit, timeFilter, subreddits }, 'Searching Reddit');

    if (!subreddits || subreddits.length === 0) {
      const posts = await this.fetchListing(`${host}/search.json`, query, sort, timeFilter, options.limit, headers, false);
      return posts.slice(0, options.limit).map(toRaw);
    }

    const posts: RedditPost[] = [];
    for (const subreddit of subreddits) {
      if (posts.length >= options.limit) break;
      try {
        const found = await this.fetchListing(
          `${host}/r/${encodeURIComponent(subreddit)}/search.json`,
          query,
          sort,
          timeFilter,
          options.limit - posts.length,
          headers,
          true
        );
        posts.push(...found);
      } catch (error) {
        logger.warn({ subreddit, error: errorMessage(error) }, 'Subreddit search failed');
      }
    }

    return posts.slice(0, options.limit).map(toRaw);
  }

  private async fetchListing(
    endpoint: string,
    query: string,
    sort: string,
    timeFilter: TimeFilter,
    limit: number,
    headers: Record<string, string>,
    restrict: boolean
  ): Promise<RedditPost[]> {
    const search = new URLSearchParams({
      q: query,
      sort,
      t: timeFilter,
      limit: String(Math.min(limit, 100)),
      raw_json: '1',
    });
    if (restrict) {
      search.set('restrict_sr', '1');
    }

    const listing = await this.http.getJson(`${endpoint}?${search.toString()}`, ListingSchema, { headers });
    return listing.data.children.map((child) => child.data);
  }

  /** Application-only OAuth when credentials are configured, anonymous otherwise. */
  private async authHeaders(): Promise<Record<string, string>> {
    const { clientId, clientSecret } = this.credentials;
    if (!clientId || !clientSecret) {
      return {};
    }

    if (!this.token || this.token.expiresAt <= Date.now()) {
      const basic = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');
      const granted = await this.http.postForm(
        'https://www.reddit.com/api/v1/access_token',
        { grant_type: 'client_credentials' },
        TokenSchema,
        { headers: { Authorization: `Basic ${basic}` } }
      );
      // Refresh a minute early.
      this.token = {
        value: granted.access_token,
        expiresAt: Date.now() + (granted.expires_in - 60) * 1000,
      };
      logger.debug('Reddit access token obtained');
    }

    return { Authorization: `Bearer ${this.token.value}` };
  }
}

function toRaw(post: RedditPost): RawRecord {
  return {
    id: post.id,
    title: post.title,
    selftext: post.selftext,
    author: post.author,
    created_utc: post.created_utc,
    permalink: `https://www.reddit.com${post.permalink}`,
    link_url: post.url,
    score: post.score,
    num_comments: post.num_comments,
    subreddit: post.subreddit,
    tags: [post.subreddit, post.link_flair_text].filter((tag): tag is string => Boolean(tag)),
  };
}
