import { describe, it, expect } from 'vitest';
import { BibtexParser, formatBibtexEntry, stripBraces } from '../../../src/infrastructure/extraction/BibtexParser.js';
import { BibtexExtractor } from '../../../src/infrastructure/extraction/BibtexExtractor.js';

const SAMPLE = `@comment{ignored entry}
@article{smith2020,
  title = {Graphene {Oxide} Membranes},
  author = "Smith, Jane and Doe, John",
  year = 2020,
  journal = {Journal of } # {Materials},
}
@book(lee2019, title={Polymer Basics}, year={2019})
`;

describe('BibtexParser', () => {
  const parser = new BibtexParser();

  it('should parse braced, quoted, bare and concatenated values', () => {
    const [article] = parser.parse(SAMPLE);
    expect(article).toEqual({
      type: 'article',
      key: 'smith2020',
      fields: {
        title: 'Graphene {Oxide} Membranes',
        author: 'Smith, Jane and Doe, John',
        year: '2020',
        journal: 'Journal of Materials',
      },
    });
  });

  it('should skip @comment and accept parenthesized entries', () => {
    const entries = parser.parse(SAMPLE);
    expect(entries.map((e) => e.key)).toEqual(['smith2020', 'lee2019']);
    expect(entries[1].type).toBe('book');
    expect(entries[1].fields).toEqual({ title: 'Polymer Basics', year: '2019' });
  });

  it('should return nothing for text without entries', () => {
    expect(parser.parse('just some notes, no entries')).toEqual([]);
  });

  it('should strip grouping braces', () => {
    expect(stripBraces('Graphene {Oxide} Membranes')).toBe('Graphene Oxide Membranes');
  });

  it('should format an entry back to BibTeX', () => {
    expect(formatBibtexEntry({ type: 'book', key: 'lee2019', fields: { title: 'Polymer Basics', year: '2019' } }))
      .toBe('@book{lee2019,\n  title = {Polymer Basics},\n  year = {2019},\n}');
  });
});

describe('BibtexExtractor', () => {
  it('should produce one line per entry and keep the entries in metadata', async () => {
    const result = await new BibtexExtractor().extract('/refs/library.bib', Buffer.from(SAMPLE));

    expect(result.text).toBe(
      'smith2020, Graphene Oxide Membranes, Smith, Jane and Doe, John, Journal of Materials, 2020\n' +
      'lee2019, Polymer Basics, 2019',
    );
    expect(result.metadata.extractor).toBe('bibtex');
    expect(result.metadata.bibtex).toHaveLength(2);
  });
});
