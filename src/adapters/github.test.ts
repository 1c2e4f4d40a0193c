import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GitHubAdapter } from './github.js';
import { HttpClient } from '../utils/http.js';
import { RateLimiter } from '../utils/rate-limiter.js';

function http(): HttpClient {
  return new HttpClient({ source: 'github', rateLimiter: new RateLimiter('github', 1000), retries: 0 });
}

function searchResponse(items: unknown[]): Response {
  return new Response(JSON.stringify({ total_count: items.length, incomplete_results: false, items }));
}

const issue = {
  number: 42,
  title: 'Roof sensor drops readings',
  body: 'Readings stop after **rain**',
  user: { login: 'octocat', id: 1 },
  created_at: '2024-03-10T09:00:00Z',
  updated_at: '2024-03-11T09:00:00Z',
  state: 'open',
  comments: 3,
  html_url: 'https://github.com/octo/roof/issues/42',
  labels: [{ name: 'bug', color: 'red' }, { name: 'sensor' }],
  reactions: { total_count: 7, '+1': 7 },
};

const repository = {
  full_name: 'octo/roof',
  name: 'roof',
  description: 'Roof monitoring toolkit',
  owner: { login: 'octo' },
  created_at: '2021-06-01T00:00:00Z',
  html_url: 'https://github.com/octo/roof',
  stargazers_count: 120,
  forks_count: 9,
  language: 'TypeScript',
  topics: ['iot', 'roofing'],
};

function requestUrl(fetchMock: { mock: { calls: unknown[][] } }): URL {
  return new URL(String(fetchMock.mock.calls[0]?.[0]));
}

describe('GitHubAdapter', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-03-15T12:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('is always configured', () => {
    expect(new GitHubAdapter(http()).validateConfig()).toBe(true);
  });

  it('searches recent issues newest first', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(searchResponse([issue]));

    const rows = await new GitHubAdapter(http()).search('roof leak', { limit: 20, daysBack: 14 });

    const url = requestUrl(fetchMock);
    expect(url.pathname).toBe('/search/issues');
    expect(url.searchParams.get('q')).toBe('roof leak created:>=2024-03-01');
    expect(url.searchParams.get('sort')).toBe('created');
    expect(url.searchParams.get('order')).toBe('desc');
    expect(url.searchParams.get('per_page')).toBe('20');
    expect(rows).toEqual([
      {
        number: 42,
        title: 'Roof sensor drops readings',
        body: 'Readings stop after **rain**',
        user: 'octocat',
        created_at: '2024-03-10T09:00:00Z',
        updated_at: '2024-03-11T09:00:00Z',
        state: 'open',
        comments: 3,
        html_url: 'https://github.com/octo/roof/issues/42',
        score: 7,
        is_pull_request: false,
        tags: ['bug', 'sensor'],
      },
    ]);
  });

  it('adds repository qualifiers', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(searchResponse([]));

    await new GitHubAdapter(http()).search('sensor', { limit: 10, daysBack: 1 }, { repositories: ['octo/roof'] });

    expect(requestUrl(fetchMock).searchParams.get('q')).toBe('sensor repo:octo/roof created:>=2024-03-14');
  });

  it('searches repositories by stars', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(searchResponse([repository]));

    const rows = await new GitHubAdapter(http()).search(
      'roof',
      { limit: 5, daysBack: 30 },
      { searchType: 'repositories' }
    );

    const url = requestUrl(fetchMock);
    expect(url.pathname).toBe('/search/repositories');
    expect(url.searchParams.get('q')).toBe('roof');
    expect(url.searchParams.get('sort')).toBe('stars');
    expect(rows).toEqual([
      {
        full_name: 'octo/roof',
        name: 'roof',
        description: 'Roof monitoring toolkit',
        owner: 'octo',
        created_at: '2021-06-01T00:00:00Z',
        html_url: 'https://github.com/octo/roof',
        score: 120,
        forks: 9,
        language: 'TypeScript',
        tags: ['iot', 'roofing'],
      },
    ]);
  });

  it('caps the page size at 100 and the rows at the limit', async () => {
    const many = Array.from({ length: 3 }, (_, i) => ({ ...issue, number: i }));
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(searchResponse(many));

    const rows = await new GitHubAdapter(http()).search('roof', { limit: 2, daysBack: 30 });
    expect(rows).toHaveLength(2);
    expect(requestUrl(fetchMock).searchParams.get('per_page')).toBe('2');

    fetchMock.mockResolvedValueOnce(searchResponse([]));
    await new GitHubAdapter(http()).search('roof', { limit: 500, daysBack: 30 });
    expect(new URL(String(fetchMock.mock.calls[1]?.[0])).searchParams.get('per_page')).toBe('100');
  });

  it('sends the token as a bearer token', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(searchResponse([]));

    await new GitHubAdapter(http(), 'test-token').search('roof', { limit: 5, daysBack: 30 });

    const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
    expect(headers.get('authorization')).toBe('Bearer test-token');
    expect(headers.get('accept')).toBe('application/vnd.github+json');
  });

  it('rejects malformed repository names', async () => {
    await expect(
      new GitHubAdapter(http()).search('roof', { limit: 5, daysBack: 30 }, { repositories: ['not a repo'] })
    ).rejects.toThrow('[github] Invalid parameters: repositories.0: expected owner/name');
  });
});
