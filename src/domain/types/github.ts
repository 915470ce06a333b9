/**
 * GitHub REST API payloads, validated at the edge with zod. Only the fields
 * the scanner reads are declared; everything else is stripped.
 */

import { z } from 'zod';

export const SearchRepositorySchema = z.object({
  name: z.string(),
  full_name: z.string(),
  html_url: z.string(),
  description: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  pushed_at: z.string().nullable(),
  stargazers_count: z.number(),
  watchers_count: z.number(),
  forks_count: z.number(),
  language: z.string().nullable(),
  owner: z.object({ login: z.string() }),
  private: z.boolean(),
  size: z.number(),
  open_issues_count: z.number(),
  default_branch: z.string(),
});

export type SearchRepository = z.infer<typeof SearchRepositorySchema>;

export const SearchPageSchema = z.object({
  total_count: z.number().optional(),
  incomplete_results: z.boolean().optional(),
  items: z.array(z.unknown()),
});

export const CommitSchema = z.object({
  sha: z.string(),
  commit: z.object({
    author: z
      .object({
        name: z.string(),
        date: z.string(),
      })
      .nullable(),
  }),
});

export type Commit = z.infer<typeof CommitSchema>;

export const ContentEntrySchema = z.object({
  type: z.string(),
  name: z.string(),
  path: z.string(),
});

export type ContentEntry = z.infer<typeof ContentEntrySchema>;

/**
 * Error body GitHub sends with 4xx responses
 */
export const ApiErrorBodySchema = z.object({
  message: z.string(),
  errors: z
    .array(z.union([z.object({ message: z.string() }).passthrough(), z.string()]))
    .optional(),
});
