import { z } from 'zod';
import { windowStart, type AdapterSearchOptions, type RawRecord, type SourceAdapter, type SourceId } from './types.js';
import { GitHubParamsSchema, parseParams } from './params.js';
import { HttpClient } from '../utils/http.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('github');

const API_BASE = 'https://api.github.com';
const MAX_PAGE_SIZE = 100;

const UserSchema = z.object({ login: z.string() }).nullable().optional();

const IssueSchema = z.object({
  number: z.number(),
  title: z.string(),
  body: z.string().nullable().optional(),
  user: UserSchema,
  created_at: z.string(),
  updated_at: z.string().optional(),
  state: z.string().optional(),
  comments: z.number().default(0),
  html_url: z.string(),
  labels: z.array(z.union([z.string(), z.object({ name: z.string().optional() })])).default([]),
  reactions: z.object({ total_count: z.number() }).optional(),
  pull_request: z.unknown().optional(),
});

const RepositorySchema = z.object({
  full_name: z.string(),
  name: z.string(),
  description: z.string().nullable().optional(),
  owner: UserSchema,
  created_at: z.string(),
  html_url: z.string(),
  stargazers_count: z.number().default(0),
  forks_count: z.number().default(0),
  language: z.string().nullable().optional(),
  topics: z.array(z.string()).default([]),
});

const searchResponse = <T extends z.ZodTypeAny>(item: T) =>
  z.object({
    total_count: z.number(),
    items: z.array(item),
  });

const IssueSearchSchema = searchResponse(IssueSchema);
const RepositorySearchSchema = searchResponse(RepositorySchema);

type Issue = z.infer<typeof IssueSchema>;
type Repository = z.infer<typeof RepositorySchema>;

export class GitHubAdapter implements SourceAdapter {
  readonly id: SourceId = 'github';

  constructor(
    private readonly http: HttpClient,
    private readonly token?: string
  ) {}

  /** Anonymous search works, at a lower rate limit. */
  validateConfig(): boolean {
    return true;
  }

  async search(query: string, options: AdapterSearchOptions, params?: unknown): Promise<RawRecord[]> {
    const { searchType, repositories } = parseParams(this.id, GitHubParamsSchema, params);
    const qualifiers = (repositories ?? []).map((repo) => `repo:${repo}`);

    logger.info({ query, searchType, repositories, limit: options.limit }, 'Searching GitHub');

    if (searchType === 'repositories') {
      const q = [query, ...qualifiers].join(' ');
      const search = new URLSearchParams({
        q,
        sort: 'stars',
        order: 'desc',
        per_page: String(Math.min(options.limit, MAX_PAGE_SIZE)),
      });
      const response = await this.http.getJson(
        `${API_BASE}/search/repositories?${search.toString()}`,
        RepositorySearchSchema,
        { headers: this.headers() }
      );
      return response.items.slice(0, options.limit).map(repositoryToRaw);
    }

    const since = windowStart(options.daysBack).toISOString().slice(0, 10);
    const q = [query, ...qualifiers, `created:>=${since}`].join(' ');
    const search = new URLSearchParams({
      q,
      sort: 'created',
      order: 'desc',
      per_page: String(Math.min(options.limit, MAX_PAGE_SIZE)),
    });
    const response = await this.http.getJson(`${API_BASE}/search/issues?${search.toString()}`, IssueSearchSchema, {
      headers: this.headers(),
    });

    logger.debug({ total: response.total_count, returned: response.items.length }, 'GitHub issues fetched');
    return response.items.slice(0, options.limit).map(issueToRaw);
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }
    return headers;
  }
}

function issueToRaw(issue: Issue): RawRecord {
  return {
    number: issue.number,
    title: issue.title,
    body: issue.body ?? '',
    user: issue.user?.login ?? '',
    created_at: issue.created_at,
    updated_at: issue.updated_at,
    state: issue.state,
    comments: issue.comments,
    html_url: issue.html_url,
    score: issue.reactions?.total_count ?? 0,
    is_pull_request: issue.pull_request !== undefined,
    tags: issue.labels.flatMap((label) => {
      if (typeof label === 'string') return [label];
      return label.name ? [label.name] : [];
    }),
  };
}

function repositoryToRaw(repo: Repository): RawRecord {
  return {
    full_name: repo.full_name,
    name: repo.name,
    description: repo.description ?? '',
    owner: repo.owner?.login ?? '',
    created_at: repo.created_at,
    html_url: repo.html_url,
    score: repo.stargazers_count,
    forks: repo.forks_count,
    language: repo.language ?? '',
    tags: repo.topics,
  };
}
