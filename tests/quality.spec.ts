import { describe, expect, it } from 'vitest';
import { clampQuality, mapQuality } from '../src/quality.js';

describe('clampQuality', () => {
  it('clamps values outside 0-100 to the nearest bound', () => {
    expect(clampQuality(-20)).toBe(0);
    expect(clampQuality(250)).toBe(100);
    expect(clampQuality(Number.POSITIVE_INFINITY)).toBe(100);
  });

  it('rounds fractional values and treats NaN as zero', () => {
    expect(clampQuality(79.6)).toBe(80);
    expect(clampQuality(Number.NaN)).toBe(0);
  });
});

describe('mapQuality', () => {
  it('keeps the 0-100 scale for lossy formats', () => {
    expect(mapQuality(80, 'jpeg')).toBe(80);
    expect(mapQuality(75, 'webp')).toBe(75);
    expect(mapQuality(30, 'avif')).toBe(30);
  });

  it('rescales onto the 0-9 PNG compression range', () => {
    expect(mapQuality(100, 'png')).toBe(9);
    expect(mapQuality(0, 'png')).toBe(0);
    expect(mapQuality(50, 'png')).toBe(5);
    expect(mapQuality(33, 'png')).toBe(3);
  });

  it('maps out-of-range requests like their boundary', () => {
    expect(mapQuality(-5, 'jpeg')).toBe(mapQuality(0, 'jpeg'));
    expect(mapQuality(140, 'jpeg')).toBe(mapQuality(100, 'jpeg'));
    expect(mapQuality(1000, 'png')).toBe(9);
    expect(mapQuality(-1000, 'png')).toBe(0);
  });

  it('returns undefined for formats without a quality setting', () => {
    for (const quality of [-10, 0, 50, 100, 200]) {
      expect(mapQuality(quality, 'gif')).toBeUndefined();
      expect(mapQuality(quality, 'bmp')).toBeUndefined();
    }
  });
});
