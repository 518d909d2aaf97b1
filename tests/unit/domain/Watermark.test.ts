import { describe, it, expect } from 'vitest';
import {
  isWatermark, watermarkOf, toWatermark, maxWatermark,
} from '../../../src/domain/value-objects/Watermark.js';

describe('Watermark', () => {
  it('should accept valid YYYY-MM-DD dates only', () => {
    expect(isWatermark('2024-02-29')).toBe(true);
    expect(isWatermark('2024-13-01')).toBe(false);
    expect(isWatermark('2024-1-01')).toBe(false);
    expect(isWatermark('yesterday')).toBe(false);
  });

  it('should take the UTC date of a timestamp', () => {
    expect(watermarkOf(new Date('2024-05-10T23:30:00Z'))).toBe('2024-05-10');
    expect(watermarkOf(new Date('2024-05-10T00:00:00Z'))).toBe('2024-05-10');
  });

  it('should normalize OpenAlex dates', () => {
    expect(toWatermark('2024-03-01')).toBe('2024-03-01');
    expect(toWatermark('2024-03-01T12:00:00')).toBe('2024-03-01');
    expect(toWatermark('not a date')).toBeNull();
    expect(toWatermark(null)).toBeNull();
    expect(toWatermark(undefined)).toBeNull();
  });

  it('should pick the latest value and treat null as the beginning of time', () => {
    expect(maxWatermark(null, '2024-01-01', '2023-12-31')).toBe('2024-01-01');
    expect(maxWatermark(null, null)).toBeNull();
    expect(maxWatermark('2024-06-01', '2024-05-10')).toBe('2024-06-01');
  });
});
