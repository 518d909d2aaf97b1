import * as cheerio from 'cheerio';
import type { Extraction, ExtractorPort } from '../../domain/ports/ExtractorPort.js';

export class HtmlExtractor implements ExtractorPort {
  readonly name = 'html';
  readonly extensions = ['.html', '.htm'] as const;

  async extract(_filePath: string, bytes: Buffer): Promise<Extraction> {
    return this.extractHtml(bytes.toString('utf-8'));
  }

  /** 去掉 script/style 等非內文節點，壓縮空白；<title> 放進 metadata */
  extractHtml(html: string): Extraction {
    const $ = cheerio.load(html);
    $('script, style, noscript, template').remove();

    const title = $('title').first().text().trim();
    const root = $('body').length > 0 ? $('body') : $.root();
    const text = root.text().replace(/\s+/g, ' ').trim();

    return {
      text,
      metadata: title ? { extractor: this.name, title } : { extractor: this.name },
    };
  }
}
