import fs from 'node:fs/promises';
import path from 'node:path';
import type { FileSystemPort } from '../../domain/ports/FileSystemPort.js';

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

export class NodeFileSystemAdapter implements FileSystemPort {
  async fileExists(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async directoryExists(dirPath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(dirPath);
      return stat.isDirectory();
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async canonicalPath(p: string): Promise<string> {
    return fs.realpath(path.resolve(p));
  }

  async readBytes(filePath: string): Promise<Buffer> {
    return fs.readFile(filePath);
  }

  async walkFiles(
    dirPath: string,
    extensions: readonly string[],
    options: { skipHidden?: boolean; signal?: AbortSignal } = {},
  ): Promise<string[]> {
    const wanted = new Set(extensions.map((e) => e.toLowerCase()));
    const results: string[] = [];
    await this.walkDir(dirPath, wanted, options.skipHidden ?? true, results, options.signal);
    return results.sort();
  }

  /** 遞迴走訪目錄，收集副檔名符合的檔案（symlink 不跟隨） */
  private async walkDir(
    dir: string,
    wanted: ReadonlySet<string>,
    skipHidden: boolean,
    results: string[],
    signal?: AbortSignal,
  ): Promise<void> {
    signal?.throwIfAborted();
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!(skipHidden && entry.name.startsWith('.'))) {
          await this.walkDir(fullPath, wanted, skipHidden, results, signal);
        }
      } else if (entry.isFile() && wanted.has(path.extname(entry.name).toLowerCase())) {
        results.push(fullPath);
      }
    }
  }
}
