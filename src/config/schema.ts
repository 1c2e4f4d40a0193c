import { z } from 'zod';
import { SupplierSiteSchema } from '../adapters/params.js';
import { DEFAULT_DOMAIN_TERMS, DEFAULT_INDICATORS } from '../pipeline/refiner.js';

const rateLimit = (fallback: number) => z.number().positive().default(fallback);

export const SearchConfigSchema = z
  .object({
    defaultLimit: z.number().int().positive().default(50),
    maxLimit: z.number().int().positive().default(500),
    defaultDaysBack: z.number().int().positive().default(30),
    maxDaysBack: z.number().int().positive().default(365),
    timeoutMs: z.number().int().positive().default(30000),
    retries: z.number().int().nonnegative().default(2),
  })
  .refine((search) => search.defaultLimit <= search.maxLimit, {
    message: 'defaultLimit must not exceed maxLimit',
    path: ['defaultLimit'],
  })
  .refine((search) => search.defaultDaysBack <= search.maxDaysBack, {
    message: 'defaultDaysBack must not exceed maxDaysBack',
    path: ['defaultDaysBack'],
  });

export const RedditConfigSchema = z.object({
  clientId: z.string().optional(),
  clientSecret: z.string().optional(),
  userAgent: z.string().min(1).default('TopicScout/1.0'),
  rateLimit: rateLimit(1),
});

export const GitHubConfigSchema = z.object({
  token: z.string().optional(),
  rateLimit: rateLimit(1),
});

export const StackOverflowConfigSchema = z.object({
  key: z.string().optional(),
  site: z.string().min(1).default('stackoverflow'),
  rateLimit: rateLimit(1),
});

export const ForumsConfigSchema = z.object({
  urls: z.array(z.string().url()).default([]),
  rateLimit: rateLimit(0.5),
});

export const NewsConfigSchema = z.object({
  region: z.string().length(2).default('lv'),
  language: z.enum(['en', 'lv']).default('en'),
  feeds: z.array(z.string().url()).default([]),
  rateLimit: rateLimit(1),
});

export const ClassifiedsConfigSchema = z.object({
  baseUrl: z.string().url().default('https://www.ss.com'),
  rateLimit: rateLimit(0.67),
});

export const SuppliersConfigSchema = z.object({
  sites: z.array(SupplierSiteSchema).default(['K-Senukai', 'Stokker']),
  rateLimit: rateLimit(0.67),
});

export const SourcesConfigSchema = z.object({
  reddit: RedditConfigSchema.default({}),
  github: GitHubConfigSchema.default({}),
  stackoverflow: StackOverflowConfigSchema.default({}),
  forums: ForumsConfigSchema.default({}),
  news: NewsConfigSchema.default({}),
  classifieds: ClassifiedsConfigSchema.default({}),
  suppliers: SuppliersConfigSchema.default({}),
});

export const DisplayNamesSchema = z.object({
  reddit: z.string().default('Reddit'),
  github: z.string().default('GitHub'),
  stackoverflow: z.string().default('Stack Overflow'),
  forums: z.string().default('Forums'),
  news: z.string().default('News'),
  classifieds: z.string().default('Classifieds (ss.com)'),
  suppliers: z.string().default('Suppliers'),
});

export const SuggestionsConfigSchema = z.object({
  indicators: z.array(z.string().min(1)).default([...DEFAULT_INDICATORS]),
  domainTerms: z.array(z.string().min(1)).default([...DEFAULT_DOMAIN_TERMS]),
  maxSuggestions: z.number().int().positive().default(10),
});

export const OutputFormatSchema = z.enum(['json', 'csv']);

export const OutputConfigSchema = z.object({
  format: OutputFormatSchema.default('json'),
  directory: z.string().default('./output'),
});

export const ConfigSchema = z.object({
  search: SearchConfigSchema.default({}),
  sources: SourcesConfigSchema.default({}),
  displayNames: DisplayNamesSchema.default({}),
  suggestions: SuggestionsConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type SourcesConfig = z.infer<typeof SourcesConfigSchema>;
export type SuggestionsConfig = z.infer<typeof SuggestionsConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
