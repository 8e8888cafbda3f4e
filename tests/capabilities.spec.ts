import { describe, expect, it, vi } from 'vitest';
import { CapabilityCache, formatFromMimeType } from '../src/capabilities.js';
import { FakeBackend } from './helpers/fakeBackend.js';

describe('CapabilityCache', () => {
  it('keeps only allow-listed formats from the capability report', () => {
    const cache = new CapabilityCache(new FakeBackend());
    expect(Array.from(cache.getSupportedFormats()).sort()).toEqual([
      'image/avif',
      'image/bmp',
      'image/gif',
      'image/jpeg',
      'image/png',
      'image/webp',
    ]);
  });

  it('queries the backend once and returns the same set afterwards', () => {
    const backend = new FakeBackend();
    const cache = new CapabilityCache(backend);

    const first = cache.getSupportedFormats();
    const second = cache.getSupportedFormats();
    cache.getCapability('image/png');

    expect(second).toBe(first);
    expect(backend.queryCapabilities).toHaveBeenCalledTimes(1);
  });

  it('merges duplicate entries and lowercases names', () => {
    const backend = new FakeBackend({
      report: [
        { names: ['png'], decode: true, encode: false },
        { names: ['PNG'], decode: false, encode: true },
        { names: ['gif'], decode: false, encode: false },
      ],
    });
    const cache = new CapabilityCache(backend);

    expect(cache.getCapability('image/png')).toEqual({
      format: 'png',
      mimeType: 'image/png',
      decode: true,
      encode: true,
    });
    expect(cache.getSupportedFormats().has('image/gif')).toBe(false);
  });

  it('reports the detected formats through the logger', () => {
    const logger = { info: vi.fn(), verbose: vi.fn(), error: vi.fn() };
    const backend = new FakeBackend({ report: [{ names: ['webp'], decode: true, encode: true }] });

    new CapabilityCache(backend, logger).getSupportedFormats();

    expect(logger.verbose).toHaveBeenCalledWith('Detected fake support for: image/webp');
  });
});

describe('formatFromMimeType', () => {
  it('maps allow-listed MIME types onto formats', () => {
    expect(formatFromMimeType('image/jpeg')).toBe('jpeg');
    expect(formatFromMimeType('image/avif')).toBe('avif');
    expect(formatFromMimeType('image/jpg')).toBeUndefined();
    expect(formatFromMimeType('image/tiff')).toBeUndefined();
  });
});
