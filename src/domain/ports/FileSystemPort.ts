export interface FileSystemPort {
  directoryExists(dirPath: string): Promise<boolean>;
  fileExists(filePath: string): Promise<boolean>;
  /** 解析 symlink 與相對路徑，回傳 canonical 絕對路徑 */
  canonicalPath(p: string): Promise<string>;
  readBytes(filePath: string): Promise<Buffer>;
  /** 遞迴列出副檔名符合的檔案（副檔名比對不分大小寫） */
  walkFiles(dirPath: string, extensions: readonly string[], options?: { skipHidden?: boolean; signal?: AbortSignal }): Promise<string[]>;
}
