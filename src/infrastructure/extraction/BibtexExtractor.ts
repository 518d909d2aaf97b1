import type { Extraction, ExtractorPort } from '../../domain/ports/ExtractorPort.js';
import type { BibtexEntry } from '../../domain/entities/ItemMetadata.js';
import { BibtexParser, stripBraces } from './BibtexParser.js';

const SUMMARY_FIELDS = ['title', 'author', 'journal', 'booktitle', 'year', 'doi'] as const;

function entryLine(entry: BibtexEntry): string {
  const values = SUMMARY_FIELDS
    .map((field) => entry.fields[field])
    .filter((value): value is string => Boolean(value))
    .map(stripBraces);
  return [entry.key, ...values].join(', ');
}

/** 整個 .bib 檔是一筆 item：每個條目一行文字，條目本身存進 metadata.bibtex */
export class BibtexExtractor implements ExtractorPort {
  readonly name = 'bibtex';
  readonly extensions = ['.bib'] as const;
  private readonly parser = new BibtexParser();

  async extract(_filePath: string, bytes: Buffer): Promise<Extraction> {
    const entries = this.parser.parse(bytes.toString('utf-8'));
    return {
      text: entries.map(entryLine).join('\n'),
      metadata: { extractor: this.name, bibtex: entries },
    };
  }
}
