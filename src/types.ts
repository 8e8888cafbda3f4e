import type { SUPPORTED_FORMATS } from './config.js';

export type ImageFormat = (typeof SUPPORTED_FORMATS)[number];

export interface ConversionOptions {
  format?: string;
  quality?: number;
  width?: number;
  height?: number;
}

export interface FormatCapability {
  format: ImageFormat;
  mimeType: string;
  decode: boolean;
  encode: boolean;
}

/**
 * One entry of the graphics library's capability report. `names` holds the
 * library's id for the format plus any aliases it accepts for output.
 */
export interface CapabilityReportEntry {
  names: string[];
  decode: boolean;
  encode: boolean;
}

export interface CropRegion {
  left: number;
  top: number;
  width: number;
  height: number;
}

export type OutputSink = { kind: 'buffer' } | { kind: 'file'; path: string };


export interface Logger {
  info: (...args: unknown[]) => void;
  verbose: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}
