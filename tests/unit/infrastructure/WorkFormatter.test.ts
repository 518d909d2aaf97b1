import { describe, it, expect } from 'vitest';
import { WorkSchema } from '../../../src/domain/entities/Work.js';
import {
  abstractFromInvertedIndex,
  toBibtex,
  toCitation,
  workMetadata,
  workText,
  workToCandidate,
  storedWork,
} from '../../../src/infrastructure/openalex/WorkFormatter.js';

const work = WorkSchema.parse({
  id: 'https://openalex.org/W42',
  doi: 'https://doi.org/10.1234/abc',
  title: 'Graphene Catalysts for Batteries',
  type: 'article',
  publication_year: 2021,
  publication_date: '2021-06-01',
  cited_by_count: 12,
  authorships: [
    { author: { display_name: 'Jane Smith' } },
    { author: { display_name: 'John Doe' } },
  ],
  primary_location: { source: { display_name: 'Journal of Materials' } },
  biblio: { volume: '12', issue: '3', first_page: '100', last_page: '110' },
  abstract_inverted_index: { We: [0], study: [1], 'graphene.': [2] },
});

const bare = WorkSchema.parse({
  id: 'https://openalex.org/W7',
  title: 'On things',
  type: 'dataset',
});

describe('WorkFormatter', () => {
  it('should rebuild an abstract from its inverted index', () => {
    expect(abstractFromInvertedIndex({ b: [1], a: [0], c: [3] })).toBe('a b c');
    expect(abstractFromInvertedIndex(null)).toBe('');
  });

  it('should format a citation string', () => {
    expect(toCitation(work)).toBe(
      'Jane Smith, John Doe, Graphene Catalysts for Batteries, Journal of Materials, 12(3), 100-110 (2021), https://doi.org/10.1234/abc',
    );
  });

  it('should format a BibTeX entry with a generated key', () => {
    expect(toBibtex(work)).toBe([
      '@article{smith-2021-graphene,',
      '  author = {Jane Smith and John Doe},',
      '  title = {Graphene Catalysts for Batteries},',
      '  journal = {Journal of Materials},',
      '  volume = {12},',
      '  number = {3},',
      '  pages = {100-110},',
      '  year = {2021},',
      '  doi = {10.1234/abc},',
      '  url = {https://doi.org/10.1234/abc},',
      '}',
    ].join('\n'));
  });

  it('should fall back to @misc and skip missing fields', () => {
    expect(toBibtex(bare)).toBe('@misc{anon--things,\n  title = {On things},\n  url = {https://openalex.org/W7},\n}');
  });

  it('should build the indexed text from title, authors, venue and abstract', () => {
    expect(workText(work)).toBe(
      'Graphene Catalysts for Batteries\n\nJane Smith, John Doe\n\nJournal of Materials, 2021\n\nWe study graphene.',
    );
  });

  it('should use the DOI as identifier and the OpenAlex id without one', () => {
    expect(workToCandidate(work).identifier).toBe('https://doi.org/10.1234/abc');
    expect(workToCandidate(bare).identifier).toBe('https://openalex.org/W7');
  });

  it('should leave undefined fields out of the metadata', () => {
    const metadata = workMetadata(bare);
    expect(Object.keys(metadata).sort()).toEqual(
      ['authors', 'citation', 'extractor', 'openalexId', 'title', 'work'],
    );
    expect(metadata.openalexId).toBe('https://openalex.org/W7');
  });

  it('should restore the stored work from metadata', () => {
    expect(storedWork(workMetadata(work))?.id).toBe('https://openalex.org/W42');
    expect(storedWork({})).toBeUndefined();
    expect(storedWork({ work: { unrelated: true } })).toBeUndefined();
  });
});
