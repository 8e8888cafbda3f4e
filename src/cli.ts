#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { realpathSync } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { pathToFileURL } from 'node:url';
import { DEFAULT_FORMAT, SUPPORTED_FORMATS } from './config.js';
import { describeError } from './errors.js';
import { createImageConverter } from './index.js';
import { isSupportedFormat, loadPresetByName, loadPresetCollection, type PresetOptions } from './presets.js';
import type { ConversionOptions, ImageFormat, Logger } from './types.js';

export interface CliFlags {
  out?: string;
  format?: ImageFormat;
  quality?: number;
  width?: number;
  height?: number;
  base64?: boolean;
  preset?: string;
  presetFile?: string;
  listFormats?: boolean;
  listPresets?: boolean;
  silent?: boolean;
  verbose?: boolean;
}

export interface CliExecutionOptions {
  logger?: Logger;
  /** Receives command output (data URIs, listings). Defaults to stdout. */
  write?: (text: string) => void;
}

export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  const parsed = await program.parseAsync(argv);
  const [input] = parsed.args;
  const options = parsed.opts<CliFlags>();
  await executeCli(input, options);
}

function buildProgram(): Command {
  const program = new Command();
  program
    .name('imgconv')
    .description('Convert raster images between JPEG, PNG, GIF, WebP, BMP and AVIF.')
    .argument('[input]', 'Source image path.')
    .option('-o, --out <file>', 'Output file path (defaults to the input name with the new extension).')
    .option('-f, --format <format>', `Output format (${SUPPORTED_FORMATS.join(', ')}).`, parseFormat)
    .option('-q, --quality <value>', 'Quality from 0 to 100; out-of-range values are clamped.', (value) =>
      parseInteger(value, 'quality'),
    )
    .option('-w, --width <pixels>', 'Target width; resizes only together with --height.', (value) =>
      parseNonNegativeInteger(value, 'width'),
    )
    .option('-H, --height <pixels>', 'Target height; resizes only together with --width.', (value) =>
      parseNonNegativeInteger(value, 'height'),
    )
    .option('--base64', 'Print a base64 data URI instead of writing a file.')
    .option('-p, --preset <name>', 'Apply options from a named preset.')
    .option('--preset-file <path>', 'Preset file to read instead of the default search paths.')
    .option('--list-formats', 'List the formats supported in this environment.')
    .option('--list-presets', 'List available presets.')
    .option('--silent', 'Suppress non-error log output.')
    .option('--verbose', 'Enable verbose log output.');

  return program;
}

export async function executeCli(
  input: string | undefined,
  flags: CliFlags,
  context: CliExecutionOptions = {},
): Promise<void> {
  const logger = context.logger ?? createLogger(flags);
  const write = context.write ?? ((text: string) => process.stdout.write(`${text}\n`));
  const converter = createImageConverter({ logger });

  if (flags.listFormats) {
    for (const mimeType of Array.from(converter.getSupportedFormats()).sort()) {
      write(mimeType);
    }
    return;
  }

  if (flags.listPresets) {
    const collection = await loadPresetCollection(flags.presetFile);
    if (!collection || collection.presets.length === 0) {
      logger.info('No presets found.');
      return;
    }
    logger.verbose(`Presets loaded from ${collection.path}`);
    for (const preset of collection.presets) {
      write(preset.description ? `${preset.name} - ${preset.description}` : preset.name);
    }
    return;
  }

  if (!input) {
    throw new InvalidArgumentError('An input image path is required.');
  }

  if (flags.base64 && flags.out) {
    throw new InvalidArgumentError('--out cannot be combined with --base64.');
  }

  const presetOptions = await resolvePresetOptions(flags, logger);
  const options: ConversionOptions = {
    format: flags.format ?? presetOptions.format ?? DEFAULT_FORMAT,
    quality: flags.quality ?? presetOptions.quality,
    width: flags.width ?? presetOptions.width,
    height: flags.height ?? presetOptions.height,
  };
  const inputPath = path.resolve(input);
  const start = Date.now();

  if (flags.base64) {
    write(await converter.convertToBase64(inputPath, options));
    logger.verbose(`Encoded ${path.basename(inputPath)} in ${Date.now() - start}ms.`);
    return;
  }

  const format = options.format ?? DEFAULT_FORMAT;
  const outputPath = flags.out ? path.resolve(flags.out) : deriveOutputPath(inputPath, format);
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await converter.convertToDisk(inputPath, outputPath, options);
  logger.info(
    `✔ ${path.basename(inputPath)} → ${outputPath} (${format.toUpperCase()}, ${Date.now() - start}ms)`,
  );
}

async function resolvePresetOptions(flags: CliFlags, logger: Logger): Promise<PresetOptions> {
  if (!flags.preset) {
    return {};
  }
  const match = await loadPresetByName(flags.preset, flags.presetFile);
  if (!match) {
    throw new InvalidArgumentError(`Preset "${flags.preset}" was not found.`);
  }
  logger.verbose(`Using preset "${match.preset.name}" from ${match.path}`);
  return match.preset.options;
}

export function deriveOutputPath(inputPath: string, format: string): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}.${extensionForFormat(format)}`);
}

function extensionForFormat(format: string): string {
  const normalized = format.toLowerCase();
  return normalized === 'jpeg' ? 'jpg' : normalized;
}

function parseFormat(value: string): ImageFormat {
  const normalized = value.toLowerCase();
  if (!isSupportedFormat(normalized)) {
    throw new InvalidArgumentError(`Unsupported format "${value}". Choose from: ${SUPPORTED_FORMATS.join(', ')}`);
  }
  return normalized;
}

function parseInteger(value: string, label: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`${label} must be an integer.`);
  }
  return parsed;
}

function parseNonNegativeInteger(value: string, label: string): number {
  const parsed = parseInteger(value, label);
  if (parsed < 0) {
    throw new InvalidArgumentError(`${label} must be zero or greater.`);
  }
  return parsed;
}

function createLogger(flags: CliFlags): Logger {
  return {
    info: (...args: unknown[]) => {
      if (!flags.silent) {
        console.log(...args);
      }
    },
    verbose: (...args: unknown[]) => {
      if (!flags.silent && flags.verbose) {
        console.log(...args);
      }
    },
    error: (...args: unknown[]) => {
      console.error(...args);
    },
  };
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return pathToFileURL(realpathSync(entry)).href === import.meta.url;
  } catch {
    return false;
  }
}

if (isMainModule()) {
  runCli(process.argv).catch((error: unknown) => {
    console.error(describeError(error));
    process.exitCode = 1;
  });
}
