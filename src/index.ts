import { ImageConverter } from './converter.js';
import type { ConversionOptions } from './types.js';

export type {
  CapabilityReportEntry,
  ConversionOptions,
  CropRegion,
  FormatCapability,
  ImageFormat,
  Logger,
  OutputSink,
} from './types.js';
export type { DecodedImage, ImageBackend } from './backend/types.js';
export { ImageConverter, createImageConverter } from './converter.js';
export type { ImageConverterOptions } from './converter.js';
export { RawImage, SharpBackend, createSharpBackend } from './backend/sharpBackend.js';
export { CapabilityCache } from './capabilities.js';
export { DEFAULT_FORMAT, DEFAULT_QUALITY, QUALITY_CEILINGS, SUPPORTED_FORMATS } from './config.js';
export {
  ConversionError,
  EncodeError,
  EnvironmentError,
  FileError,
  FormatError,
  TransformError,
  isConversionError,
} from './errors.js';
export type { ErrorKind, Result } from './errors.js';
export { clampQuality, mapQuality } from './quality.js';
export { computeCoverGeometry, resizeCover, shouldResize } from './transform.js';
export type { CoverGeometry } from './transform.js';

let sharedConverter: ImageConverter | null = null;

function getConverter(): ImageConverter {
  if (!sharedConverter) {
    sharedConverter = new ImageConverter();
  }
  return sharedConverter;
}

export async function convertToBase64(filePath: string, options: ConversionOptions = {}): Promise<string> {
  return getConverter().convertToBase64(filePath, options);
}

export async function convertToDisk(
  filePath: string,
  savePath: string,
  options: ConversionOptions = {},
): Promise<void> {
  return getConverter().convertToDisk(filePath, savePath, options);
}

export function getSupportedFormats(): ReadonlySet<string> {
  return getConverter().getSupportedFormats();
}
