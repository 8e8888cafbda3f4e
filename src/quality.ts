import { QUALITY_CEILINGS } from './config.js';
import type { ImageFormat } from './types.js';

const MIN_QUALITY = 0;
const MAX_QUALITY = 100;

export function clampQuality(requested: number): number {
  if (Number.isNaN(requested)) {
    return MIN_QUALITY;
  }
  return Math.min(MAX_QUALITY, Math.max(MIN_QUALITY, Math.round(requested)));
}

/**
 * Rescales a 0-100 quality onto the encoder's native range. Returns
 * `undefined` for formats whose encoder takes no quality argument.
 */
export function mapQuality(requested: number, format: ImageFormat): number | undefined {
  const ceiling = QUALITY_CEILINGS[format];
  if (ceiling === null) {
    return undefined;
  }
  return Math.round((clampQuality(requested) / MAX_QUALITY) * ceiling);
}
