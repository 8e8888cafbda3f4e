import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { deriveOutputPath, executeCli, runCli, type CliFlags } from '../src/cli.js';

const silentLogger = { info: () => undefined, verbose: () => undefined, error: () => undefined };

const { convertToDiskMock, convertToBase64Mock, getSupportedFormatsMock } = vi.hoisted(() => {
  const toDisk = vi.fn(async (_input: string, _output: string, _options?: unknown) => undefined);
  const toBase64 = vi.fn(async (_input: string, _options?: unknown) => 'data:image/webp;base64,AAAA');
  const supported = vi.fn(() => new Set(['image/webp', 'image/jpeg', 'image/png']));
  return {
    convertToDiskMock: toDisk,
    convertToBase64Mock: toBase64,
    getSupportedFormatsMock: supported,
  };
});

vi.mock('../src/index.js', () => ({
  createImageConverter: () => ({
    convertToDisk: convertToDiskMock,
    convertToBase64: convertToBase64Mock,
    getSupportedFormats: getSupportedFormatsMock,
  }),
}));

describe('CLI', () => {
  let tmpDir: string;
  let inputPath: string;
  const baseFlags: CliFlags = { silent: true };

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'imgconv-cli-'));
    inputPath = path.join(tmpDir, 'photo.png');
    convertToDiskMock.mockClear();
    convertToBase64Mock.mockClear();
    getSupportedFormatsMock.mockClear();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('converts a single file to an explicit output path', async () => {
    const outFile = path.join(tmpDir, 'nested', 'photo.jpg');
    await runCli([
      'node',
      'imgconv',
      inputPath,
      '--out',
      outFile,
      '--format',
      'JPEG',
      '-q',
      '70',
      '-w',
      '10',
      '-H',
      '20',
      '--silent',
    ]);

    expect(convertToDiskMock).toHaveBeenCalledTimes(1);
    expect(convertToDiskMock.mock.calls[0]).toEqual([
      inputPath,
      outFile,
      { format: 'jpeg', quality: 70, width: 10, height: 20 },
    ]);
    const nested = await fs.stat(path.dirname(outFile));
    expect(nested.isDirectory()).toBe(true);
  });

  it('writes beside the input with the format extension by default', async () => {
    await executeCli(inputPath, { ...baseFlags, format: 'jpeg' }, { logger: silentLogger });
    expect(convertToDiskMock.mock.calls[0][1]).toBe(path.join(tmpDir, 'photo.jpg'));
  });

  it('prints a data URI with --base64', async () => {
    const lines: string[] = [];
    await executeCli(
      inputPath,
      { ...baseFlags, base64: true, format: 'webp' },
      { logger: silentLogger, write: (text) => lines.push(text) },
    );

    expect(lines).toEqual(['data:image/webp;base64,AAAA']);
    expect(convertToDiskMock).not.toHaveBeenCalled();
  });

  it('refuses --out together with --base64', async () => {
    await expect(
      executeCli(
        inputPath,
        { ...baseFlags, base64: true, out: path.join(tmpDir, 'x.webp') },
        { logger: silentLogger },
      ),
    ).rejects.toThrow('--out cannot be combined with --base64.');
  });

  it('requires an input unless listing', async () => {
    await expect(executeCli(undefined, baseFlags, { logger: silentLogger })).rejects.toThrow(
      'An input image path is required.',
    );
  });

  it('lists supported formats in sorted order', async () => {
    const lines: string[] = [];
    await executeCli(
      undefined,
      { ...baseFlags, listFormats: true },
      { logger: silentLogger, write: (text) => lines.push(text) },
    );
    expect(lines).toEqual(['image/jpeg', 'image/png', 'image/webp']);
  });

  it('applies preset options and lets flags override them', async () => {
    const presetPath = path.join(tmpDir, 'imgconv.presets.json');
    await fs.writeFile(
      presetPath,
      JSON.stringify({
        presets: [
          {
            name: 'thumb',
            description: 'Square thumbnail',
            options: { format: 'avif', quality: 40, width: 128, height: 128 },
          },
        ],
      }),
    );

    await executeCli(
      inputPath,
      { ...baseFlags, preset: 'thumb', presetFile: presetPath, quality: 90 },
      { logger: silentLogger },
    );

    const [, outputPath, options] = convertToDiskMock.mock.calls[0];
    expect(outputPath).toBe(path.join(tmpDir, 'photo.avif'));
    expect(options).toEqual({ format: 'avif', quality: 90, width: 128, height: 128 });
  });

  it('lists presets with their descriptions', async () => {
    const presetPath = path.join(tmpDir, 'imgconv.presets.json');
    await fs.writeFile(
      presetPath,
      JSON.stringify([
        { name: 'thumb', description: 'Square thumbnail', options: { width: 64, height: 64 } },
        { name: 'archive', options: { format: 'png' } },
      ]),
    );

    const lines: string[] = [];
    await executeCli(
      undefined,
      { ...baseFlags, listPresets: true, presetFile: presetPath },
      { logger: silentLogger, write: (text) => lines.push(text) },
    );
    expect(lines).toEqual(['archive', 'thumb - Square thumbnail']);
  });

  it('throws when a preset cannot be found', async () => {
    const presetPath = path.join(tmpDir, 'imgconv.presets.json');
    await fs.writeFile(presetPath, JSON.stringify({ presets: [] }));

    await expect(
      executeCli(inputPath, { ...baseFlags, preset: 'missing', presetFile: presetPath }, { logger: silentLogger }),
    ).rejects.toThrow(/Preset "missing"/);
  });
});

describe('deriveOutputPath', () => {
  it('swaps the extension and uses .jpg for JPEG', () => {
    expect(deriveOutputPath('/images/cat.png', 'jpeg')).toBe(path.join('/images', 'cat.jpg'));
    expect(deriveOutputPath('/images/cat.tar.png', 'webp')).toBe(path.join('/images', 'cat.tar.webp'));
  });
});
