import type { Config } from '../config/schema.js';
import { HttpClient, DEFAULT_USER_AGENT } from '../utils/http.js';
import { RateLimiterRegistry } from '../utils/rate-limiter.js';
import { ClassifiedsAdapter } from './classifieds.js';
import { ForumAdapter } from './forums.js';
import { GitHubAdapter } from './github.js';
import { NewsAdapter } from './news.js';
import { RedditAdapter } from './reddit.js';
import { StackOverflowAdapter } from './stackoverflow.js';
import { SuppliersAdapter } from './suppliers.js';
import type { AdapterRegistry, SourceId } from './types.js';

export { SOURCE_IDS, toSourceId, type AdapterRegistry, type RawRecord, type SourceAdapter, type SourceId } from './types.js';
export type { SourceParams, SourceParamsMap } from './params.js';
export { RedditAdapter, ClassifiedsAdapter, ForumAdapter, GitHubAdapter, NewsAdapter, StackOverflowAdapter, SuppliersAdapter };

/** One adapter per source, each with its own rate limiter and HTTP client. */
export function createAdapters(
  config: Config,
  registry: RateLimiterRegistry = new RateLimiterRegistry()
): AdapterRegistry {
  const { sources, search } = config;

  const http = (source: SourceId, rateLimit: number, userAgent = DEFAULT_USER_AGENT) =>
    new HttpClient({
      source,
      rateLimiter: registry.get(source, rateLimit),
      timeoutMs: search.timeoutMs,
      retries: search.retries,
      userAgent,
    });

  return {
    reddit: new RedditAdapter(
      {
        clientId: sources.reddit.clientId,
        clientSecret: sources.reddit.clientSecret,
        userAgent: sources.reddit.userAgent,
      },
      http('reddit', sources.reddit.rateLimit, sources.reddit.userAgent)
    ),
    github: new GitHubAdapter(http('github', sources.github.rateLimit), sources.github.token),
    stackoverflow: new StackOverflowAdapter(http('stackoverflow', sources.stackoverflow.rateLimit), {
      site: sources.stackoverflow.site,
      key: sources.stackoverflow.key,
    }),
    forums: new ForumAdapter(http('forums', sources.forums.rateLimit), sources.forums.urls),
    news: new NewsAdapter(http('news', sources.news.rateLimit), {
      region: sources.news.region,
      language: sources.news.language,
      feeds: sources.news.feeds,
    }),
    classifieds: new ClassifiedsAdapter(http('classifieds', sources.classifieds.rateLimit), sources.classifieds.baseUrl),
    suppliers: new SuppliersAdapter(http('suppliers', sources.suppliers.rateLimit), sources.suppliers.sites),
  };
}
