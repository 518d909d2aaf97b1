import { createHash } from 'node:crypto';

/**
 * 文字內容的 SHA-256（hex）
 * refresh 時用來判斷 text 是否改變、是否需要重新 embedding
 */
export function hashText(text: string): string {
  return createHash('sha256').update(text, 'utf-8').digest('hex');
}
