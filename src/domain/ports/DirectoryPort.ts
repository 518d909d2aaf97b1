import type { WatchedDirectory } from '../entities/WatchedDirectory.js';

export interface DirectoryPort {
  get(path: string): WatchedDirectory | undefined;
  list(): WatchedDirectory[];
  /** 完整掃描結束後呼叫：不存在則新增，存在則更新 last_scanned */
  markScanned(path: string, scannedAt: number): WatchedDirectory;
}
