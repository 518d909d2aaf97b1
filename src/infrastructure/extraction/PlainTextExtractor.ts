import type { Extraction, ExtractorPort } from '../../domain/ports/ExtractorPort.js';
import type { ItemMetadata } from '../../domain/entities/ItemMetadata.js';

const ORG_TITLE = /^#\+TITLE:\s*(.+)$/im;

/** org 與純文字，也是未知副檔名的 fallback */
export class PlainTextExtractor implements ExtractorPort {
  readonly name = 'text';
  readonly extensions = ['.org', '.txt'] as const;

  async extract(_filePath: string, bytes: Buffer): Promise<Extraction> {
    const text = bytes.toString('utf-8');
    const metadata: ItemMetadata = { extractor: this.name };
    const title = ORG_TITLE.exec(text)?.[1]?.trim();
    if (title) metadata.title = title;
    return { text, metadata };
  }
}
