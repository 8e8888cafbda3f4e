import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { SUPPORTED_FORMATS } from './config.js';
import type { ConversionOptions, ImageFormat } from './types.js';
import { fileExists } from './utils/fileIO.js';

export const DEFAULT_PRESET_FILENAME = 'imgconv.presets.json';

export interface PresetOptions extends ConversionOptions {
  format?: ImageFormat;
}

export interface PresetEntry {
  name: string;
  description?: string;
  options: PresetOptions;
}

export interface PresetCollection {
  path: string;
  presets: PresetEntry[];
}

export function getPresetSearchPaths(customPath?: string): string[] {
  const candidates: string[] = [];
  if (customPath) {
    candidates.push(path.resolve(customPath));
  }
  candidates.push(path.resolve(process.cwd(), DEFAULT_PRESET_FILENAME));
  candidates.push(path.join(getUserConfigDir(), DEFAULT_PRESET_FILENAME));
  return Array.from(new Set(candidates));
}

export async function findPresetFile(customPath?: string): Promise<string | null> {
  const candidates = getPresetSearchPaths(customPath);
  for (const candidate of candidates) {
    if (await fileExists(candidate)) {
      return candidate;
    }
  }
  return null;
}

export async function loadPresetCollection(customPath?: string): Promise<PresetCollection | null> {
  const presetFile = await findPresetFile(customPath);
  if (!presetFile) {
    return null;
  }
  const presets = await readPresetEntries(presetFile);
  return { path: presetFile, presets };
}

export async function loadPresetByName(
  name: string,
  customPath?: string,
): Promise<{ path: string; preset: PresetEntry } | null> {
  const normalizedName = name.trim();
  if (!normalizedName) {
    return null;
  }
  const collection = await loadPresetCollection(customPath);
  if (!collection) {
    return null;
  }
  const preset = collection.presets.find((entry) => entry.name === normalizedName);
  if (!preset) {
    return null;
  }
  return { path: collection.path, preset };
}

async function readPresetEntries(filePath: string): Promise<PresetEntry[]> {
  const content = await fs.readFile(filePath, 'utf8');
  if (!content.trim()) {
    return [];
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(`Failed to parse presets file ${filePath}: ${error instanceof Error ? error.message : error}`);
  }

  const byName = new Map<string, PresetEntry>();
  for (const raw of extractRawPresetEntries(parsed)) {
    const entry = normalizePresetEntry(raw);
    if (!entry) {
      continue;
    }
    byName.set(entry.name, entry);
  }
  return Array.from(byName.values()).sort((a, b) => a.name.localeCompare(b.name));
}

// Accepts `[{...}]`, `{ presets: [{...}] }` or `{ name: options }`.
function extractRawPresetEntries(parsed: unknown): unknown[] {
  if (Array.isArray(parsed)) {
    return parsed;
  }
  if (isPlainObject(parsed) && Array.isArray(parsed.presets)) {
    return parsed.presets;
  }
  if (isPlainObject(parsed)) {
    return Object.entries(parsed)
      .filter(([, value]) => isPlainObject(value))
      .map(([name, value]) => ({ name, options: value }));
  }
  return [];
}

function normalizePresetEntry(raw: unknown): PresetEntry | null {
  if (!isPlainObject(raw) || typeof raw.name !== 'string') {
    return null;
  }
  const name = raw.name.trim();
  if (!name) {
    return null;
  }
  const description =
    typeof raw.description === 'string' ? raw.description.trim() || undefined : undefined;
  return { name, description, options: normalizePresetOptions(raw.options) };
}

function normalizePresetOptions(input: unknown): PresetOptions {
  if (!isPlainObject(input)) {
    return {};
  }
  const normalized: PresetOptions = {};
  if (typeof input.format === 'string') {
    const format = input.format.toLowerCase();
    if (isSupportedFormat(format)) {
      normalized.format = format;
    }
  }
  if (typeof input.quality === 'number' && Number.isFinite(input.quality)) {
    normalized.quality = input.quality;
  }
  if (typeof input.width === 'number' && Number.isInteger(input.width) && input.width >= 0) {
    normalized.width = input.width;
  }
  if (typeof input.height === 'number' && Number.isInteger(input.height) && input.height >= 0) {
    normalized.height = input.height;
  }
  return normalized;
}

function getUserConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming');
    return path.join(appData, 'imgconv');
  }
  if (process.platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', 'imgconv');
  }
  return path.join(os.homedir(), '.config', 'imgconv');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSupportedFormat(format: string): format is ImageFormat {
  return SUPPORTED_FORMATS.some((supported) => supported === format);
}
