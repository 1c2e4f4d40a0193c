import * as cheerio from 'cheerio';
import type { AdapterSearchOptions, RawRecord, SourceAdapter, SourceId } from './types.js';
import { ForumParamsSchema, parseParams } from './params.js';
import { HttpClient } from '../utils/http.js';
import { createChildLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const logger = createChildLogger('forums');

export type ForumPlatform = 'discourse' | 'phpbb' | 'vbulletin' | 'generic';

interface SelectorTable {
  /** Search path relative to the forum root; `{query}` is replaced, encoded. */
  searchPath?: string;
  post: string;
  title: string;
  content: string;
  author: string;
  date: string;
}

const PLATFORM_SELECTORS: Record<ForumPlatform, SelectorTable> = {
  discourse: {
    searchPath: 'search?q={query}',
    post: '.fps-result',
    title: '.fps-topic',
    content: '.fps-post',
    author: '.username',
    date: '.relative-date',
  },
  phpbb: {
    searchPath: 'search.php?keywords={query}',
    post: '.post',
    title: '.post-subject',
    content: '.post-text',
    author: '.username',
    date: '.post-date',
  },
  vbulletin: {
    searchPath: 'search.php?do=process&query={query}',
    post: '.post',
    title: '.title',
    content: '.post-content',
    author: '.username',
    date: '.post-date',
  },
  generic: {
    post: 'article, .post, .topic, .message',
    title: 'h1, h2, h3, .title, .subject',
    content: '.content, .message, .post-content, p',
    author: '.author, .username, .user',
    date: '.date, .timestamp, time',
  },
};

const REPLY_PATTERNS = [/(\d+)\s*repl/i, /repl[^:]*:\s*(\d+)/i, /(\d+)\s*response/i, /(\d+)\s*comment/i];

/** Platform guess from home page markup; anything unrecognized is generic. */
export function detectPlatform(html: string): ForumPlatform {
  const content = html.toLowerCase();
  if (content.includes('discourse')) return 'discourse';
  if (content.includes('phpbb')) return 'phpbb';
  if (content.includes('vbulletin')) return 'vbulletin';
  return 'generic';
}

export function extractReplyCount(text: string): number {
  for (const pattern of REPLY_PATTERNS) {
    const match = pattern.exec(text);
    if (match?.[1]) {
      return Number.parseInt(match[1], 10);
    }
  }
  return 0;
}

function resolveUrl(href: string | undefined, base: string): string {
  if (!href) return base;
  try {
    return new URL(href, base).toString();
  } catch {
    return base;
  }
}

/**
 * Extracts posts from a forum page with one selector table. With a `filter`
 * only posts whose text contains it (case-insensitively) are kept.
 */
export function extractPosts(
  html: string,
  forumUrl: string,
  platform: ForumPlatform,
  limit: number,
  filter?: string
): RawRecord[] {
  const $ = cheerio.load(html);
  const selectors = PLATFORM_SELECTORS[platform];
  const needle = filter?.toLowerCase();
  const host = new URL(forumUrl).hostname;
  const posts: RawRecord[] = [];

  $(selectors.post).each((_, element) => {
    if (posts.length >= limit) return false;

    const node = $(element);
    const fullText = node.text();
    if (needle && !fullText.toLowerCase().includes(needle)) return;

    const title = node.find(selectors.title).first().text().trim();
    const contentNode = node.find(selectors.content).first();
    const content = (contentNode.length > 0 ? contentNode.text() : fullText).trim();
    if (!title && !content) return;

    const author = node.find(selectors.author).first().text().trim();
    const dateNode = node.find(selectors.date).first();
    const timestamp = dateNode.attr('datetime') ?? dateNode.text().trim();

    posts.push({
      subject: title ? title.slice(0, 500) : 'Forum Post',
      content: content.slice(0, 2000),
      username: author.slice(0, 100),
      timestamp: timestamp || null,
      link: resolveUrl(node.find('a[href]').first().attr('href'), forumUrl),
      comment_count: extractReplyCount(fullText),
      forum_url: forumUrl,
      forum_type: platform,
      score: 0,
      tags: [host],
    });
    return;
  });

  return posts;
}

export class ForumAdapter implements SourceAdapter {
  readonly id: SourceId = 'forums';

  constructor(
    private readonly http: HttpClient,
    private readonly defaultUrls: readonly string[]
  ) {}

  validateConfig(): boolean {
    return true;
  }

  async search(query: string, options: AdapterSearchOptions, params?: unknown): Promise<RawRecord[]> {
    const { forumUrls, forumType } = parseParams(this.id, ForumParamsSchema, params);
    const urls = forumUrls ?? this.defaultUrls;
    if (urls.length === 0) {
      logger.info('No forum URLs configured');
      return [];
    }

    const perForum = Math.max(1, Math.floor(options.limit / urls.length));
    logger.info({ query, forums: urls.length, perForum }, 'Searching forums');

    const posts: RawRecord[] = [];
    for (const forumUrl of urls) {
      try {
        posts.push(...(await this.searchForum(forumUrl, query, perForum, forumType)));
      } catch (error) {
        logger.warn({ forumUrl, error: errorMessage(error) }, 'Forum search failed');
      }
    }

    logger.debug({ count: posts.length }, 'Forum posts collected');
    return posts.slice(0, options.limit);
  }

  private async searchForum(
    forumUrl: string,
    query: string,
    limit: number,
    forumType: ForumPlatform | 'auto'
  ): Promise<RawRecord[]> {
    const platform = forumType === 'auto' ? await this.detect(forumUrl) : forumType;
    const searchPath = PLATFORM_SELECTORS[platform].searchPath;

    if (searchPath) {
      const searchUrl = resolveUrl(searchPath.replace('{query}', encodeURIComponent(query)), withTrailingSlash(forumUrl));
      try {
        const html = await this.http.getText(searchUrl);
        const posts = extractPosts(html, forumUrl, platform, limit);
        if (posts.length > 0) return posts;
      } catch (error) {
        logger.debug({ searchUrl, error: errorMessage(error) }, 'Platform search failed, using home page');
      }
    }

    const home = await this.http.getText(forumUrl);
    return extractPosts(home, forumUrl, 'generic', limit, query);
  }

  private async detect(forumUrl: string): Promise<ForumPlatform> {
    try {
      const platform = detectPlatform(await this.http.getText(forumUrl));
      logger.debug({ forumUrl, platform }, 'Forum platform detected');
      return platform;
    } catch (error) {
      logger.debug({ forumUrl, error: errorMessage(error) }, 'Platform detection failed');
      return 'generic';
    }
  }
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}
