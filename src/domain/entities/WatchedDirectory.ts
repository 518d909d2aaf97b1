export interface WatchedDirectory {
  directoryId: number;
  /** canonical 絕對路徑 */
  path: string;
  /** 上次完整掃描結束的時間（ms），尚未掃描完成為 null */
  lastScanned: number | null;
}
