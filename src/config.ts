import type { ImageFormat } from './types.js';

export const SUPPORTED_FORMATS = ['jpeg', 'png', 'gif', 'webp', 'bmp', 'avif'] as const;

export const ALLOWED_MIME_TYPES: readonly string[] = SUPPORTED_FORMATS.map((format) => `image/${format}`);

export const DEFAULT_FORMAT: ImageFormat = 'webp';
export const DEFAULT_QUALITY = 80;

// Native quality range each encoder takes; null means the format has no quality knob.
export const QUALITY_CEILINGS: Readonly<Record<ImageFormat, number | null>> = {
  jpeg: 100,
  webp: 100,
  avif: 100,
  png: 9,
  gif: null,
  bmp: null,
};
