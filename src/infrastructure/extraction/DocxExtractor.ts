import type { Extraction, ExtractorPort } from '../../domain/ports/ExtractorPort.js';

export class DocxExtractor implements ExtractorPort {
  readonly name = 'docx';
  readonly extensions = ['.docx'] as const;

  async extract(_filePath: string, bytes: Buffer): Promise<Extraction> {
    const { default: mammoth } = await import('mammoth');
    const result = await mammoth.extractRawText({ buffer: bytes });
    return { text: result.value, metadata: { extractor: this.name } };
  }
}
