import { z } from 'zod';

/** 單筆 bibtex 條目（由 BibtexParser 產生） */
export const BibtexEntrySchema = z.object({
  type: z.string(),
  key: z.string(),
  fields: z.record(z.string()),
});

export type BibtexEntry = z.infer<typeof BibtexEntrySchema>;

/**
 * CorpusItem 的 metadata：列出已知的 key，其餘 key 原樣保留
 *
 * 已知 key：
 * - title / authors / source（期刊或會議）/ publicationDate / publicationYear
 * - citedByCount / doi / openalexId / citation
 * - bibtex：bibtex 檔抽取出的條目
 * - frontmatter：Markdown frontmatter
 * - work：OpenAlex 原始 work record
 * - extractor：產生文字的抽取器名稱
 */
export const ItemMetadataSchema = z.object({
  title: z.string().optional(),
  authors: z.array(z.string()).optional(),
  source: z.string().optional(),
  publicationDate: z.string().optional(),
  publicationYear: z.number().int().optional(),
  citedByCount: z.number().int().optional(),
  doi: z.string().optional(),
  openalexId: z.string().optional(),
  citation: z.string().optional(),
  bibtex: z.array(BibtexEntrySchema).optional(),
  frontmatter: z.record(z.unknown()).optional(),
  work: z.record(z.unknown()).optional(),
  extractor: z.string().optional(),
}).passthrough();

export type ItemMetadata = z.infer<typeof ItemMetadataSchema>;

/** 從 DB 的 JSON 欄位還原 metadata；欄位為 NULL 時回傳空物件 */
export function parseMetadataJson(json: string | null): ItemMetadata {
  if (json === null || json === '') return {};
  return ItemMetadataSchema.parse(JSON.parse(json));
}
