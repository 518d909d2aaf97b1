import { z } from 'zod';

/**
 * OpenAlex work record（只列出會用到的欄位，其餘原樣保留）
 * https://docs.openalex.org/api-entities/works/work-object
 */
const AuthorshipSchema = z.object({
  author: z.object({
    id: z.string().nullish(),
    display_name: z.string().nullish(),
    orcid: z.string().nullish(),
  }).passthrough(),
}).passthrough();

export const WorkSchema = z.object({
  id: z.string(),
  doi: z.string().nullish(),
  display_name: z.string().nullish(),
  title: z.string().nullish(),
  type: z.string().nullish(),
  publication_year: z.number().int().nullish(),
  publication_date: z.string().nullish(),
  created_date: z.string().nullish(),
  cited_by_count: z.number().int().nullish(),
  authorships: z.array(AuthorshipSchema).default([]),
  abstract_inverted_index: z.record(z.array(z.number().int())).nullish(),
  primary_location: z.object({
    landing_page_url: z.string().nullish(),
    source: z.object({
      display_name: z.string().nullish(),
    }).passthrough().nullish(),
  }).passthrough().nullish(),
  biblio: z.object({
    volume: z.string().nullish(),
    issue: z.string().nullish(),
    first_page: z.string().nullish(),
    last_page: z.string().nullish(),
  }).passthrough().nullish(),
  referenced_works: z.array(z.string()).default([]),
  related_works: z.array(z.string()).default([]),
}).passthrough();

export type Work = z.infer<typeof WorkSchema>;

export const AuthorSchema = z.object({
  id: z.string(),
  display_name: z.string(),
  orcid: z.string().nullish(),
  works_count: z.number().int().nullish(),
}).passthrough();

export type Author = z.infer<typeof AuthorSchema>;

export const AuthorHintSchema = z.object({
  id: z.string(),
  display_name: z.string(),
  hint: z.string().nullish(),
  external_id: z.string().nullish(),
}).passthrough();

export type AuthorHint = z.infer<typeof AuthorHintSchema>;
