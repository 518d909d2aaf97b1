import type { DirectoryPort } from '../domain/ports/DirectoryPort.js';
import type { FileSystemPort } from '../domain/ports/FileSystemPort.js';
import type { CorpusPort } from '../domain/ports/CorpusPort.js';
import type { WatchedDirectory } from '../domain/entities/WatchedDirectory.js';
import type { DirectoryScanReport, ReindexResult } from './dto/DirectoryScanReport.js';
import type { FileIngestor } from './FileIngestor.js';
import type { Outcome } from '../domain/value-objects/Outcome.js';
import { toFailureRecord } from '../domain/value-objects/Outcome.js';
import { ExtractionError, LitdbError, NotFoundError, errorMessage } from '../domain/errors/DomainErrors.js';
import { Logger } from '../shared/Logger.js';

export interface DirectorySyncOptions {
  /** 小寫、含點的副檔名 */
  extensions: readonly string[];
  skipHidden: boolean;
}

/**
 * 目錄同步：遞迴掃描目錄、收錄尚未入庫的檔案，
 * 整棵樹走完後才記錄 last_scanned；中止時不記錄
 */
export class DirectorySyncUseCase {
  private readonly logger = new Logger('DirectorySyncUseCase');

  constructor(
    private readonly directories: DirectoryPort,
    private readonly fs: FileSystemPort,
    private readonly corpus: CorpusPort,
    private readonly fileIngestor: FileIngestor,
    private readonly options: DirectorySyncOptions,
    private readonly now: () => number = Date.now,
  ) {}

  listDirectories(): WatchedDirectory[] {
    return this.directories.list();
  }

  async scan(dirPath: string, options: { signal?: AbortSignal } = {}): Promise<DirectoryScanReport> {
    const { signal } = options;
    if (!(await this.fs.directoryExists(dirPath))) {
      throw new NotFoundError('directory', dirPath);
    }

    const root = await this.fs.canonicalPath(dirPath);
    this.logger.info('Scanning directory', { directory: root });

    const files = await this.fs.walkFiles(root, this.options.extensions, {
      skipHidden: this.options.skipHidden,
      signal,
    });

    const report: Omit<DirectoryScanReport, 'lastScanned'> = {
      directory: root,
      filesSeen: files.length,
      added: 0,
      skipped: 0,
      failed: 0,
      failures: [],
    };

    for (const file of files) {
      signal?.throwIfAborted();
      const outcome = await this.ingestListed(file, signal);
      switch (outcome.kind) {
        case 'inserted':
        case 'updated':
          report.added++;
          break;
        case 'skipped':
          report.skipped++;
          break;
        case 'failed':
          report.failed++;
          report.failures.push(toFailureRecord(outcome));
          this.logger.warn('File ingest failed', { file: outcome.identifier, error: outcome.error });
          break;
      }
    }

    signal?.throwIfAborted();
    const directory = this.directories.markScanned(root, this.now());
    const lastScanned = directory.lastScanned ?? this.now();

    this.logger.info('Directory scanned', {
      directory: root, added: report.added, skipped: report.skipped, failed: report.failed,
    });
    return { ...report, lastScanned };
  }

  /**
   * 收錄走訪時列出的檔案，已在庫中的不讀檔直接略過
   * 走訪後才消失或無法讀取的檔案記為 failed
   */
  private async ingestListed(file: string, signal?: AbortSignal): Promise<Outcome> {
    let canonical: string;
    try {
      canonical = await this.fs.canonicalPath(file);
    } catch (err) {
      const error = new ExtractionError(file, `read failed: ${errorMessage(err)}`, { cause: err });
      return { kind: 'failed', identifier: file, error };
    }

    if (this.corpus.has(canonical)) return { kind: 'skipped', identifier: canonical, reason: 'duplicate' };
    return this.fileIngestor.ingestFile(canonical, { signal });
  }

  /** 重新掃描所有已記錄的目錄，單一目錄失敗不影響其他目錄 */
  async reindexAll(options: { signal?: AbortSignal } = {}): Promise<ReindexResult[]> {
    const results: ReindexResult[] = [];
    for (const directory of this.directories.list()) {
      options.signal?.throwIfAborted();
      try {
        const report = await this.scan(directory.path, options);
        results.push({ directory: directory.path, report });
      } catch (err) {
        if (options.signal?.aborted) throw err;
        const code = err instanceof LitdbError ? err.code : 'UNEXPECTED';
        this.logger.error('Directory reindex failed', { directory: directory.path, error: err });
        results.push({ directory: directory.path, error: { code, message: errorMessage(err) } });
      }
    }
    return results;
  }
}
