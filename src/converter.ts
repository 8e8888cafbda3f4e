import type { Buffer } from 'node:buffer';
import { CapabilityCache } from './capabilities.js';
import { DEFAULT_FORMAT, DEFAULT_QUALITY } from './config.js';
import { EncodeError, FileError, describeError, isConversionError } from './errors.js';
import { createSharpBackend } from './backend/sharpBackend.js';
import type { DecodedImage, ImageBackend } from './backend/types.js';
import { mapQuality } from './quality.js';
import { resizeCover, shouldResize } from './transform.js';
import type { ConversionOptions, ImageFormat, Logger, OutputSink } from './types.js';
import { validateRequest } from './validate.js';

export interface ImageConverterOptions {
  backend?: ImageBackend;
  logger?: Logger;
}

interface PipelineResult {
  target: ImageFormat;
  bytes: Buffer | null;
}

export class ImageConverter {
  private readonly backend: ImageBackend;
  private readonly capabilities: CapabilityCache;
  private readonly logger?: Logger;

  constructor(options: ImageConverterOptions = {}) {
    this.backend = options.backend ?? createSharpBackend();
    this.logger = options.logger;
    this.capabilities = new CapabilityCache(this.backend, this.logger);
  }

  /** MIME types this converter can handle in the current environment, e.g. `image/webp`. */
  getSupportedFormats(): ReadonlySet<string> {
    return this.capabilities.getSupportedFormats();
  }

  /**
   * Converts `filePath` and returns the result as a data URI
   * (`data:image/<format>;base64,...`).
   */
  async convertToBase64(filePath: string, options: ConversionOptions = {}): Promise<string> {
    const { target, bytes } = await this.run(filePath, { kind: 'buffer' }, options);
    if (!bytes) {
      throw new EncodeError(`Encoding to ${target} produced no output.`);
    }
    return `data:image/${target};base64,${bytes.toString('base64')}`;
  }

  /** Converts `filePath` and writes the result to `savePath`, replacing any existing file. */
  async convertToDisk(
    filePath: string,
    savePath: string,
    options: ConversionOptions = {},
  ): Promise<void> {
    await this.run(filePath, { kind: 'file', path: savePath }, options);
  }

  private async run(
    filePath: string,
    sink: OutputSink,
    options: ConversionOptions,
  ): Promise<PipelineResult> {
    const format = options.format ?? DEFAULT_FORMAT;
    const width = options.width ?? 0;
    const height = options.height ?? 0;

    const validated = await validateRequest(this.backend, this.capabilities, filePath, format);
    if (!validated.ok) {
      throw validated.error;
    }

    const { source, target } = validated.value;
    const quality = mapQuality(options.quality ?? DEFAULT_QUALITY, target);
    const decoded = await this.decode(filePath, source);

    let image: DecodedImage = decoded;
    try {
      if (shouldResize(width, height)) {
        this.logger?.verbose(
          `Resizing ${decoded.width}x${decoded.height} to cover ${width}x${height}.`,
        );
        image = await resizeCover(this.backend, decoded, width, height);
      }
      const bytes = await this.encode(image, sink, target, quality);
      return { target, bytes };
    } finally {
      if (image !== decoded) {
        image.release();
      }
      decoded.release();
    }
  }

  private async decode(filePath: string, format: ImageFormat): Promise<DecodedImage> {
    try {
      return await this.backend.decode(filePath, format);
    } catch (error) {
      throw new FileError(`Failed to decode ${filePath}: ${describeError(error)}`, { cause: error });
    }
  }

  private async encode(
    image: DecodedImage,
    sink: OutputSink,
    format: ImageFormat,
    quality: number | undefined,
  ): Promise<Buffer | null> {
    this.logger?.verbose(
      quality === undefined
        ? `Encoding ${format} without a quality setting.`
        : `Encoding ${format} at quality ${quality}.`,
    );
    try {
      return quality === undefined
        ? await this.backend.encode(image, sink, format)
        : await this.backend.encode(image, sink, format, quality);
    } catch (error) {
      if (isConversionError(error)) {
        throw error;
      }
      throw new EncodeError(`Failed to encode ${format}: ${describeError(error)}`, { cause: error });
    }
  }
}

export function createImageConverter(options: ImageConverterOptions = {}): ImageConverter {
  return new ImageConverter(options);
}
