import type { Buffer } from 'node:buffer';

export const HEADER_LENGTH = 32;

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const BMP_DIB_HEADER_SIZES = new Set([12, 40, 52, 56, 64, 108, 124]);
const AVIF_BRANDS = new Set(['avif', 'avis']);

/**
 * Identifies an image by its leading bytes. Returns the MIME type, or `null`
 * when the header matches none of the known signatures.
 */
export function sniffMimeType(header: Buffer): string | null {
  if (startsWith(header, [0xff, 0xd8, 0xff])) {
    return 'image/jpeg';
  }
  if (startsWith(header, PNG_SIGNATURE)) {
    return 'image/png';
  }
  const ascii = header.toString('latin1', 0, Math.min(header.length, 12));
  if (ascii.startsWith('GIF87a') || ascii.startsWith('GIF89a')) {
    return 'image/gif';
  }
  if (ascii.startsWith('RIFF') && ascii.slice(8, 12) === 'WEBP') {
    return 'image/webp';
  }
  if (isBmp(header)) {
    return 'image/bmp';
  }
  if (isAvif(header)) {
    return 'image/avif';
  }
  return null;
}

function startsWith(header: Buffer, signature: number[]): boolean {
  return header.length >= signature.length && signature.every((byte, index) => header[index] === byte);
}

function isBmp(header: Buffer): boolean {
  if (header.length < 18 || header[0] !== 0x42 || header[1] !== 0x4d) {
    return false;
  }
  return BMP_DIB_HEADER_SIZES.has(header.readUInt32LE(14));
}

// ISO-BMFF: [size:u32][ftyp][major brand][minor version][compatible brands...]
function isAvif(header: Buffer): boolean {
  if (header.length < 16 || header.toString('latin1', 4, 8) !== 'ftyp') {
    return false;
  }
  const boxSize = Math.min(header.readUInt32BE(0), header.length);
  if (AVIF_BRANDS.has(header.toString('latin1', 8, 12))) {
    return true;
  }
  for (let offset = 16; offset + 4 <= boxSize; offset += 4) {
    if (AVIF_BRANDS.has(header.toString('latin1', offset, offset + 4))) {
      return true;
    }
  }
  return false;
}
