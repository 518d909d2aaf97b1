import type { FileSystemPort } from '../domain/ports/FileSystemPort.js';
import type { ExtractorRegistry } from '../infrastructure/extraction/ExtractorRegistry.js';
import type { Outcome } from '../domain/value-objects/Outcome.js';
import type { IngestUseCase, SubmitOptions } from './IngestUseCase.js';
import { ExtractionError, LitdbError, errorMessage } from '../domain/errors/DomainErrors.js';

/**
 * 單一檔案的讀取 → 抽取 → submit，add 與目錄掃描共用
 * 讀檔或抽取失敗回傳 failed，不中斷呼叫端的迴圈
 */
export class FileIngestor {
  constructor(
    private readonly fs: FileSystemPort,
    private readonly extractors: ExtractorRegistry,
    private readonly ingest: IngestUseCase,
  ) {}

  /** canonicalPath 同時作為 identifier */
  async ingestFile(canonicalPath: string, options: SubmitOptions = {}): Promise<Outcome> {
    let bytes: Buffer;
    try {
      bytes = await this.fs.readBytes(canonicalPath);
    } catch (err) {
      const error = new ExtractionError(canonicalPath, `read failed: ${errorMessage(err)}`, { cause: err });
      return { kind: 'failed', identifier: canonicalPath, error };
    }

    try {
      const extraction = await this.extractors.extract(canonicalPath, bytes);
      return await this.ingest.submit(
        { identifier: canonicalPath, text: extraction.text, metadata: extraction.metadata },
        options,
      );
    } catch (err) {
      if (err instanceof LitdbError) {
        return { kind: 'failed', identifier: canonicalPath, error: err };
      }
      throw err;
    }
  }
}
