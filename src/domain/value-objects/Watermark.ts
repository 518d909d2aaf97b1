import { formatISO, isValid, parseISO } from 'date-fns';

/**
 * Filter 的 watermark：UTC 日期字串 YYYY-MM-DD
 * 與 OpenAlex from_created_date 的粒度一致，可直接以字串比較大小
 */
export type Watermark = string;

const WATERMARK_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isWatermark(value: string): value is Watermark {
  return WATERMARK_PATTERN.test(value) && isValid(parseISO(value));
}

/** 取 UTC 日期，避免本地時區把日期往前或往後推一天 */
export function watermarkOf(date: Date): Watermark {
  return date.toISOString().slice(0, 10);
}

/** 將 OpenAlex 的 created_date / publication_date 正規化為 watermark，無法解析時回傳 null */
export function toWatermark(value: string | null | undefined): Watermark | null {
  if (!value) return null;
  const parsed = parseISO(value);
  if (!isValid(parsed)) return null;
  return WATERMARK_PATTERN.test(value.slice(0, 10))
    ? value.slice(0, 10)
    : formatISO(parsed, { representation: 'date' });
}

/** 取最大者，null 視為「時間起點」 */
export function maxWatermark(...values: Array<Watermark | null>): Watermark | null {
  let max: Watermark | null = null;
  for (const value of values) {
    if (value !== null && (max === null || value > max)) max = value;
  }
  return max;
}
