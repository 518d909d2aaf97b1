import type { Work } from '../../domain/entities/Work.js';
import { WorkSchema } from '../../domain/entities/Work.js';
import type { Candidate } from '../../domain/entities/CorpusItem.js';
import type { ItemMetadata } from '../../domain/entities/ItemMetadata.js';

/** OpenAlex 以 word → positions 儲存摘要，依位置還原成原文 */
export function abstractFromInvertedIndex(index: Record<string, number[]> | null | undefined): string {
  if (!index) return '';
  const words: string[] = [];
  for (const [word, positions] of Object.entries(index)) {
    for (const position of positions) words[position] = word;
  }
  return words.filter((w) => w !== undefined).join(' ');
}

export function workTitle(work: Work): string {
  return (work.title ?? work.display_name ?? '').trim();
}

export function workAuthors(work: Work): string[] {
  return work.authorships
    .map((a) => a.author.display_name?.trim())
    .filter((name): name is string => Boolean(name));
}

export function workVenue(work: Work): string | undefined {
  return work.primary_location?.source?.display_name ?? undefined;
}

/** DOI URL 優先，沒有 DOI 時使用 OpenAlex id */
export function workIdentifier(work: Work): string {
  return work.doi ?? work.id;
}

function pages(work: Work): string | undefined {
  const first = work.biblio?.first_page;
  const last = work.biblio?.last_page;
  if (first && last && first !== last) return `${first}-${last}`;
  return first ?? undefined;
}

/** 純文字引用格式：Authors, Title, Venue, Volume(Issue), Pages (Year), DOI */
export function toCitation(work: Work): string {
  const authors = workAuthors(work).join(', ');
  const volume = work.biblio?.volume
    ? `${work.biblio.volume}${work.biblio.issue ? `(${work.biblio.issue})` : ''}`
    : undefined;
  const year = work.publication_year ? `(${work.publication_year})` : undefined;
  const tail = [pages(work), year].filter(Boolean).join(' ');

  return [authors, workTitle(work), workVenue(work), volume, tail, work.doi ?? work.id]
    .filter((part): part is string => Boolean(part))
    .join(', ');
}

const BIBTEX_TYPES: Record<string, string> = {
  article: 'article',
  'book-chapter': 'incollection',
  book: 'book',
  dissertation: 'phdthesis',
};

function bibtexKey(work: Work): string {
  const [firstAuthor] = workAuthors(work);
  const lastName = firstAuthor?.split(/\s+/).pop() ?? 'anon';
  const firstWord = workTitle(work).split(/\s+/).find((w) => w.length > 3) ?? '';
  return `${lastName}-${work.publication_year ?? ''}-${firstWord}`
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[^a-z0-9-]/g, '');
}

function bibtexValue(value: string): string {
  return value.replace(/[{}]/g, '');
}

export function toBibtex(work: Work): string {
  const type = BIBTEX_TYPES[work.type ?? ''] ?? 'misc';
  const venueField = type === 'incollection' ? 'booktitle' : 'journal';
  const fields: Array<[string, string | number | null | undefined]> = [
    ['author', workAuthors(work).join(' and ')],
    ['title', workTitle(work)],
    [venueField, workVenue(work)],
    ['volume', work.biblio?.volume],
    ['number', work.biblio?.issue],
    ['pages', pages(work)],
    ['year', work.publication_year],
    ['doi', work.doi?.replace(/^https?:\/\/doi\.org\//, '')],
    ['url', work.doi ?? work.primary_location?.landing_page_url ?? work.id],
  ];

  const lines = fields
    .filter((f): f is [string, string | number] => f[1] !== undefined && f[1] !== null && f[1] !== '')
    .map(([name, value]) => `  ${name} = {${bibtexValue(String(value))}},`);

  return `@${type}{${bibtexKey(work)},\n${lines.join('\n')}\n}`;
}

/** 嵌入與全文檢索使用的文字：標題、作者、出處與年份、摘要 */
export function workText(work: Work): string {
  const venueYear = [workVenue(work), work.publication_year].filter(Boolean).join(', ');
  return [workTitle(work), workAuthors(work).join(', '), venueYear, abstractFromInvertedIndex(work.abstract_inverted_index)]
    .filter((part) => part.trim())
    .join('\n\n');
}

export function workMetadata(work: Work): ItemMetadata {
  const metadata: ItemMetadata = {
    title: workTitle(work) || undefined,
    authors: workAuthors(work),
    source: workVenue(work),
    publicationDate: work.publication_date ?? undefined,
    publicationYear: work.publication_year ?? undefined,
    citedByCount: work.cited_by_count ?? undefined,
    doi: work.doi ?? undefined,
    openalexId: work.id,
    citation: toCitation(work),
    work,
    extractor: 'openalex',
  };
  // undefined 欄位不寫進 JSON
  for (const key of Object.keys(metadata)) {
    if (metadata[key] === undefined) delete metadata[key];
  }
  return metadata;
}

export function workToCandidate(work: Work): Candidate {
  return {
    identifier: workIdentifier(work),
    text: workText(work),
    metadata: workMetadata(work),
  };
}

/** 從已儲存的 metadata.work 還原 Work，格式不符時回傳 undefined */
export function storedWork(metadata: ItemMetadata): Work | undefined {
  if (!metadata.work) return undefined;
  const parsed = WorkSchema.safeParse(metadata.work);
  return parsed.success ? parsed.data : undefined;
}
