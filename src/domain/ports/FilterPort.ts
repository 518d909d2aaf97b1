import type { Filter } from '../entities/Filter.js';
import type { Watermark } from '../value-objects/Watermark.js';

export interface FilterPort {
  /** insert-or-ignore；回傳既有或新建的 filter */
  add(query: string, description?: string): { filter: Filter; created: boolean };
  remove(query: string): boolean;
  get(query: string): Filter | undefined;
  list(): Filter[];
  /** 只會往前推進；回傳是否實際更新 */
  advanceWatermark(query: string, watermark: Watermark): boolean;
}
