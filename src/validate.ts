import type { Buffer } from 'node:buffer';
import { formatFromMimeType, type CapabilityCache } from './capabilities.js';
import {
  EnvironmentError,
  FileError,
  FormatError,
  describeError,
  err,
  ok,
  type Result,
} from './errors.js';
import type { ImageBackend } from './backend/types.js';
import type { ImageFormat } from './types.js';
import { fileExists, readHeader } from './utils/fileIO.js';
import { HEADER_LENGTH, sniffMimeType } from './utils/mime.js';

export interface ValidatedRequest {
  source: ImageFormat;
  target: ImageFormat;
}

export function normalizeMimeType(format: string): string {
  return `image/${format.toLowerCase()}`;
}

export function checkEnvironment(backend: ImageBackend): Result<void> {
  if (!backend.isAvailable()) {
    return err(new EnvironmentError(`Image backend "${backend.name}" is not available.`));
  }
  return ok(undefined);
}

export function checkOutputFormat(format: string, capabilities: CapabilityCache): Result<ImageFormat> {
  const mimeType = normalizeMimeType(format);
  const capability = capabilities.getCapability(mimeType);
  if (!capability || !capability.encode) {
    return err(new FormatError(`Format not supported: ${mimeType}`));
  }
  return ok(capability.format);
}

export async function detectMimeType(filePath: string): Promise<Result<string>> {
  if (!(await fileExists(filePath))) {
    return err(new FileError(`File does not exist: ${filePath}`));
  }

  let header: Buffer;
  try {
    header = await readHeader(filePath, HEADER_LENGTH);
  } catch (error) {
    return err(new FileError(`Unable to read ${filePath}: ${describeError(error)}`, { cause: error }));
  }

  const mimeType = sniffMimeType(header);
  if (!mimeType) {
    return err(new FileError(`Not a valid image file: ${filePath}`));
  }
  return ok(mimeType);
}

export async function checkSourceFile(
  filePath: string,
  capabilities: CapabilityCache,
): Promise<Result<ImageFormat>> {
  const detected = await detectMimeType(filePath);
  if (!detected.ok) {
    return detected;
  }

  const capability = capabilities.getCapability(detected.value);
  const format = formatFromMimeType(detected.value);
  if (!format || !capability || !capability.decode) {
    return err(new FormatError(`File type is not supported: ${detected.value}`));
  }
  return ok(format);
}

/**
 * Runs every pre-decode check in order and stops at the first failure. The
 * output format is checked before the source file is touched.
 */
export async function validateRequest(
  backend: ImageBackend,
  capabilities: CapabilityCache,
  filePath: string,
  format: string,
): Promise<Result<ValidatedRequest>> {
  const environment = checkEnvironment(backend);
  if (!environment.ok) {
    return environment;
  }

  const target = checkOutputFormat(format, capabilities);
  if (!target.ok) {
    return target;
  }

  const source = await checkSourceFile(filePath, capabilities);
  if (!source.ok) {
    return source;
  }

  return ok({ source: source.value, target: target.value });
}
