import path from 'node:path';
import type { Extraction, ExtractorPort } from '../../domain/ports/ExtractorPort.js';
import { ExtractionError, LitdbError, errorMessage } from '../../domain/errors/DomainErrors.js';
import { PdfExtractor } from './PdfExtractor.js';
import { DocxExtractor } from './DocxExtractor.js';
import { PptxExtractor } from './PptxExtractor.js';
import { HtmlExtractor } from './HtmlExtractor.js';
import { NotebookExtractor } from './NotebookExtractor.js';
import { BibtexExtractor } from './BibtexExtractor.js';
import { MarkdownExtractor } from './MarkdownExtractor.js';
import { PlainTextExtractor } from './PlainTextExtractor.js';

export function defaultExtractors(): ExtractorPort[] {
  return [
    new PdfExtractor(),
    new DocxExtractor(),
    new PptxExtractor(),
    new HtmlExtractor(),
    new NotebookExtractor(),
    new BibtexExtractor(),
    new MarkdownExtractor(),
    new PlainTextExtractor(),
  ];
}

/**
 * 依副檔名分派抽取器；未知副檔名以 fallback（UTF-8 純文字）處理
 * 抽取器丟出的非 domain error 一律包成 ExtractionError
 */
export class ExtractorRegistry {
  private readonly byExtension = new Map<string, ExtractorPort>();

  constructor(
    extractors: readonly ExtractorPort[] = defaultExtractors(),
    private readonly fallback: ExtractorPort = new PlainTextExtractor(),
  ) {
    for (const extractor of extractors) {
      for (const ext of extractor.extensions) {
        this.byExtension.set(ext.toLowerCase(), extractor);
      }
    }
  }

  forPath(filePath: string): ExtractorPort {
    return this.byExtension.get(path.extname(filePath).toLowerCase()) ?? this.fallback;
  }

  async extract(filePath: string, bytes: Buffer): Promise<Extraction> {
    const extractor = this.forPath(filePath);
    try {
      return await extractor.extract(filePath, bytes);
    } catch (err) {
      if (err instanceof LitdbError) throw err;
      throw new ExtractionError(filePath, `${extractor.name}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
