import type { Buffer } from 'node:buffer';
import { createRequire } from 'node:module';
import type sharp from 'sharp';
import { EnvironmentError, describeError } from '../errors.js';
import type { CapabilityReportEntry, CropRegion, ImageFormat, OutputSink } from '../types.js';
import type { DecodedImage, ImageBackend } from './types.js';

type SharpModule = typeof sharp;
// Greyscale and grey+alpha sources decode to 1 and 2 channels.
type PixelChannels = sharp.OutputInfo['channels'];
type Encoder = (pipeline: sharp.Sharp, quality?: number) => sharp.Sharp;

const require = createRequire(import.meta.url);

// sharp's lossy encoders take 1-100.
const MIN_LOSSY_QUALITY = 1;

// `null` marks formats stock libvips cannot read.
const DECODERS: Record<ImageFormat, sharp.SharpOptions | null> = {
  jpeg: {},
  png: {},
  gif: { pages: 1 },
  webp: { pages: 1 },
  avif: {},
  bmp: null,
};

const ENCODERS: Record<ImageFormat, Encoder> = {
  jpeg: (pipeline, quality) =>
    quality === undefined ? pipeline.jpeg() : pipeline.jpeg({ quality: toLossyQuality(quality) }),
  webp: (pipeline, quality) =>
    quality === undefined ? pipeline.webp() : pipeline.webp({ quality: toLossyQuality(quality) }),
  avif: (pipeline, quality) =>
    quality === undefined ? pipeline.avif() : pipeline.avif({ quality: toLossyQuality(quality) }),
  png: (pipeline, quality) =>
    quality === undefined ? pipeline.png() : pipeline.png({ compressionLevel: quality }),
  gif: (pipeline) => pipeline.gif(),
  bmp: () => {
    throw new Error('sharp has no BMP encoder');
  },
};

/** Uncompressed pixels held in memory between pipeline steps. */
export class RawImage implements DecodedImage {
  private pixels: Buffer | null;

  constructor(
    pixels: Buffer,
    readonly width: number,
    readonly height: number,
    readonly channels: PixelChannels,
  ) {
    this.pixels = pixels;
  }

  get released(): boolean {
    return this.pixels === null;
  }

  get data(): Buffer {
    if (!this.pixels) {
      throw new Error('Image has already been released.');
    }
    return this.pixels;
  }

  release(): void {
    this.pixels = null;
  }
}

export class SharpBackend implements ImageBackend<RawImage> {
  readonly name = 'sharp';
  private loaded?: { module: SharpModule } | { error: unknown };

  constructor(private readonly loadModule: () => SharpModule = () => require('sharp')) {}

  isAvailable(): boolean {
    return 'module' in this.load();
  }

  queryCapabilities(): CapabilityReportEntry[] {
    const lib = this.requireSharp();
    return Object.values(lib.format).map((info) => ({
      names: [info.id, ...readAliases(info.output)],
      decode: info.input.file || info.input.buffer,
      encode: info.output.file || info.output.buffer,
    }));
  }

  async decode(filePath: string, format: ImageFormat): Promise<RawImage> {
    const options = DECODERS[format];
    if (!options) {
      throw new Error(`sharp cannot decode ${format} images`);
    }
    const lib = this.requireSharp();
    const { data, info } = await lib(filePath, options).raw().toBuffer({ resolveWithObject: true });
    return new RawImage(data, info.width, info.height, info.channels);
  }

  async resample(image: RawImage, width: number, height: number): Promise<RawImage> {
    const pipeline = this.fromRaw(image).resize(width, height, { fit: 'fill', kernel: 'cubic' });
    return this.collect(pipeline);
  }

  async crop(image: RawImage, region: CropRegion): Promise<RawImage> {
    return this.collect(this.fromRaw(image).extract(region));
  }

  async encode(
    image: RawImage,
    sink: OutputSink,
    format: ImageFormat,
    quality?: number,
  ): Promise<Buffer | null> {
    const pipeline = ENCODERS[format](this.fromRaw(image), quality);
    if (sink.kind === 'buffer') {
      return pipeline.toBuffer();
    }
    await pipeline.toFile(sink.path);
    return null;
  }

  private load(): { module: SharpModule } | { error: unknown } {
    if (this.loaded) {
      return this.loaded;
    }
    let state: { module: SharpModule } | { error: unknown };
    try {
      state = { module: this.loadModule() };
    } catch (error) {
      state = { error };
    }
    this.loaded = state;
    return state;
  }

  private requireSharp(): SharpModule {
    const state = this.load();
    if ('error' in state) {
      throw new EnvironmentError(`sharp failed to load: ${describeError(state.error)}`, {
        cause: state.error,
      });
    }
    return state.module;
  }

  private fromRaw(image: RawImage): sharp.Sharp {
    const lib = this.requireSharp();
    return lib(image.data, {
      raw: { width: image.width, height: image.height, channels: image.channels },
    });
  }

  private async collect(pipeline: sharp.Sharp): Promise<RawImage> {
    const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
    return new RawImage(data, info.width, info.height, info.channels);
  }
}

export function createSharpBackend(): SharpBackend {
  return new SharpBackend();
}

function toLossyQuality(quality: number): number {
  return Math.max(MIN_LOSSY_QUALITY, quality);
}

function readAliases(output: object): string[] {
  if (!('alias' in output) || !Array.isArray(output.alias)) {
    return [];
  }
  return output.alias.filter((alias): alias is string => typeof alias === 'string');
}
