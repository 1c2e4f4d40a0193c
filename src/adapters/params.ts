import { z } from 'zod';
import type { ParamsSchema, SourceId } from './types.js';
import { AdapterError } from '../utils/errors.js';

export function parseParams<T>(source: SourceId, schema: ParamsSchema<T>, params: unknown): T {
  const result = schema.safeParse(params ?? {});
  if (!result.success) {
    const issues = result.error.errors
      .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
      .join('; ');
    throw new AdapterError(source, `Invalid parameters: ${issues}`);
  }
  return result.data;
}

export const RedditParamsSchema = z.object({
  subreddits: z.array(z.string().min(1)).optional(),
  sort: z.enum(['relevance', 'hot', 'top', 'new', 'comments']).default('relevance'),
});

export const GitHubParamsSchema = z.object({
  searchType: z.enum(['issues', 'repositories']).default('issues'),
  repositories: z.array(z.string().regex(/^[\w.-]+\/[\w.-]+$/, 'expected owner/name')).optional(),
});

export const StackOverflowParamsSchema = z.object({
  tags: z.array(z.string().min(1)).optional(),
});

export const NewsParamsSchema = z.object({
  region: z.string().length(2).optional(),
  language: z.enum(['en', 'lv']).optional(),
  customFeeds: z.array(z.string().url()).optional(),
});

export const ForumParamsSchema = z.object({
  forumUrls: z.array(z.string().url()).optional(),
  forumType: z.enum(['auto', 'discourse', 'phpbb', 'vbulletin', 'generic']).default('auto'),
});

export const ClassifiedsParamsSchema = z.object({
  region: z.string().min(1).default('riga'),
});

export const SupplierSiteSchema = z.enum(['K-Senukai', 'Stokker']);

export const SuppliersParamsSchema = z.object({
  sites: z.array(SupplierSiteSchema).optional(),
});

/** Parameters each source accepts, as callers write them. */
export interface SourceParamsMap {
  reddit: z.input<typeof RedditParamsSchema>;
  github: z.input<typeof GitHubParamsSchema>;
  stackoverflow: z.input<typeof StackOverflowParamsSchema>;
  forums: z.input<typeof ForumParamsSchema>;
  news: z.input<typeof NewsParamsSchema>;
  classifieds: z.input<typeof ClassifiedsParamsSchema>;
  suppliers: z.input<typeof SuppliersParamsSchema>;
}

export type SourceParams = { [K in keyof SourceParamsMap]?: SourceParamsMap[K] };

/** Validates a whole per-source parameter map, as read from the command line. */
export const SourceParamsSchema = z
  .object({
    reddit: RedditParamsSchema,
    github: GitHubParamsSchema,
    stackoverflow: StackOverflowParamsSchema,
    forums: ForumParamsSchema,
    news: NewsParamsSchema,
    classifieds: ClassifiedsParamsSchema,
    suppliers: SuppliersParamsSchema,
  })
  .partial()
  .strict();
