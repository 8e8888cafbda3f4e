import { TransformError, describeError } from './errors.js';
import type { DecodedImage, ImageBackend } from './backend/types.js';
import type { CropRegion } from './types.js';

export interface CoverGeometry {
  scale: number;
  scaledWidth: number;
  scaledHeight: number;
  crop: CropRegion;
}

/** Both dimensions must be positive; a single one leaves the image untouched. */
export function shouldResize(width: number, height: number): boolean {
  return width > 0 && height > 0;
}

/**
 * Geometry for filling a `targetWidth` x `targetHeight` box: scale until both
 * sides cover the box, then take the centred region.
 *
 * The axis that drives the scale is picked by cross-multiplying, so that side
 * lands exactly on its target instead of drifting a pixel through float error.
 */
export function computeCoverGeometry(
  originalWidth: number,
  originalHeight: number,
  targetWidth: number,
  targetHeight: number,
): CoverGeometry {
  assertDimension(originalWidth, 'source width');
  assertDimension(originalHeight, 'source height');
  assertDimension(targetWidth, 'target width');
  assertDimension(targetHeight, 'target height');

  const scale = Math.max(targetWidth / originalWidth, targetHeight / originalHeight);

  let scaledWidth: number;
  let scaledHeight: number;
  if (targetWidth * originalHeight >= targetHeight * originalWidth) {
    scaledWidth = targetWidth;
    scaledHeight = Math.max(targetHeight, Math.ceil((originalHeight * targetWidth) / originalWidth));
  } else {
    scaledHeight = targetHeight;
    scaledWidth = Math.max(targetWidth, Math.ceil((originalWidth * targetHeight) / originalHeight));
  }

  return {
    scale,
    scaledWidth,
    scaledHeight,
    crop: {
      left: centredOffset(scaledWidth, targetWidth),
      top: centredOffset(scaledHeight, targetHeight),
      width: targetWidth,
      height: targetHeight,
    },
  };
}

/**
 * Resamples `image` to cover the target box and crops the overflow. The
 * caller keeps ownership of `image`; the returned image is a new one the
 * caller must release.
 */
export async function resizeCover<TImage extends DecodedImage>(
  backend: ImageBackend<TImage>,
  image: TImage,
  targetWidth: number,
  targetHeight: number,
): Promise<TImage> {
  const geometry = computeCoverGeometry(image.width, image.height, targetWidth, targetHeight);

  let resampled: TImage;
  try {
    resampled = await backend.resample(image, geometry.scaledWidth, geometry.scaledHeight);
  } catch (error) {
    throw new TransformError(`Failed to resize image: ${describeError(error)}`, { cause: error });
  }

  try {
    return await backend.crop(resampled, geometry.crop);
  } catch (error) {
    throw new TransformError(`Failed to crop image: ${describeError(error)}`, { cause: error });
  } finally {
    resampled.release();
  }
}

function centredOffset(scaled: number, target: number): number {
  const overflow = Math.max(0, scaled - target);
  return Math.min(overflow, Math.max(0, Math.floor(overflow / 2)));
}

function assertDimension(value: number, label: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new TransformError(`Invalid ${label}: ${value}. Expected a positive integer.`);
  }
}
