import type { Buffer } from 'node:buffer';
import type { CapabilityReportEntry, CropRegion, ImageFormat, OutputSink } from '../types.js';

/**
 * Pixels decoded from a source file. Each instance belongs to exactly one
 * conversion call and must be released once that call no longer needs it.
 */
export interface DecodedImage {
  readonly width: number;
  readonly height: number;
  readonly released: boolean;
  release(): void;
}

/**
 * The graphics library the converter delegates to. Every method that returns a
 * `DecodedImage` hands ownership of that image to the caller.
 */
export interface ImageBackend<TImage extends DecodedImage = DecodedImage> {
  readonly name: string;
  isAvailable(): boolean;
  queryCapabilities(): CapabilityReportEntry[];
  decode(filePath: string, format: ImageFormat): Promise<TImage>;
  resample(image: TImage, width: number, height: number): Promise<TImage>;
  crop(image: TImage, region: CropRegion): Promise<TImage>;
  /** Resolves with the encoded bytes for a buffer sink and `null` once a file sink is written. */
  encode(image: TImage, sink: OutputSink, format: ImageFormat, quality?: number): Promise<Buffer | null>;
}
