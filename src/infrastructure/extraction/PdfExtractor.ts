import type { Extraction, ExtractorPort } from '../../domain/ports/ExtractorPort.js';

export class PdfExtractor implements ExtractorPort {
  readonly name = 'pdf';
  readonly extensions = ['.pdf'] as const;

  async extract(_filePath: string, bytes: Buffer): Promise<Extraction> {
    // pdf-parse 連帶載入 pdfjs，只在真的遇到 PDF 時才 import
    const { PDFParse } = await import('pdf-parse');
    const parser = new PDFParse({ data: new Uint8Array(bytes) });
    try {
      const result = await parser.getText();
      return {
        text: result.text,
        metadata: { extractor: this.name, pageCount: result.total },
      };
    } finally {
      await parser.destroy();
    }
  }
}
