import { ALLOWED_MIME_TYPES, SUPPORTED_FORMATS } from './config.js';
import type { ImageBackend } from './backend/types.js';
import type { FormatCapability, ImageFormat, Logger } from './types.js';

/**
 * Memoizes which allow-listed formats the backend can read or write. The
 * backend is queried on first access only; the report reflects native
 * libraries installed alongside the process, so it never goes stale.
 */
export class CapabilityCache {
  private capabilities?: ReadonlyMap<string, FormatCapability>;
  private supported?: ReadonlySet<string>;

  constructor(
    private readonly backend: ImageBackend,
    private readonly logger?: Logger,
  ) {}

  getSupportedFormats(): ReadonlySet<string> {
    if (!this.supported) {
      this.supported = new Set(this.getCapabilities().keys());
    }
    return this.supported;
  }

  getCapability(mimeType: string): FormatCapability | undefined {
    return this.getCapabilities().get(mimeType);
  }

  private getCapabilities(): ReadonlyMap<string, FormatCapability> {
    if (!this.capabilities) {
      this.capabilities = this.compute();
    }
    return this.capabilities;
  }

  private compute(): ReadonlyMap<string, FormatCapability> {
    const found = new Map<string, FormatCapability>();
    for (const entry of this.backend.queryCapabilities()) {
      if (!entry.decode && !entry.encode) {
        continue;
      }
      for (const name of entry.names) {
        const mimeType = `image/${name.toLowerCase()}`;
        const format = formatFromMimeType(mimeType);
        if (!format) {
          continue;
        }
        const existing = found.get(mimeType);
        found.set(mimeType, {
          format,
          mimeType,
          decode: entry.decode || (existing?.decode ?? false),
          encode: entry.encode || (existing?.encode ?? false),
        });
      }
    }
    this.logger?.verbose(
      `Detected ${this.backend.name} support for: ${Array.from(found.keys()).join(', ') || 'none'}`,
    );
    return found;
  }
}

export function formatFromMimeType(mimeType: string): ImageFormat | undefined {
  if (!ALLOWED_MIME_TYPES.includes(mimeType)) {
    return undefined;
  }
  return SUPPORTED_FORMATS.find((format) => `image/${format}` === mimeType);
}
