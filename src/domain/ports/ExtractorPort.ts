import type { ItemMetadata } from '../entities/ItemMetadata.js';

export interface Extraction {
  text: string;
  metadata: ItemMetadata;
}

/** 單一格式的文字抽取器：bytes → 純文字 + metadata */
export interface ExtractorPort {
  readonly name: string;
  /** 小寫、含點，例如 '.pdf' */
  readonly extensions: readonly string[];
  extract(filePath: string, bytes: Buffer): Promise<Extraction>;
}
