/**
 * Startup configuration loading.
 *
 * Reads ~/.pendulum-wave/config.json (or the file named by
 * PENDULUM_WAVE_CONFIG) and merges it over the named defaults. Fields of the
 * wrong type are ignored with a warning; values of the right type that make
 * no sense (negative period, 95° amplitude...) fail validation and stop the
 * app before the first frame.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { DEFAULT_WAVE_CONFIG } from '@/lib/config/defaults.js';
import type { WaveColors, WaveConfig, WaveConfigOverrides } from '@/lib/config/types.js';
import { validateWaveConfig } from '@/lib/config/validate.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const CONFIG_PATH_ENV = 'PENDULUM_WAVE_CONFIG';

const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.pendulum-wave', 'config.json');

type NumericKey = Exclude<keyof WaveConfig, 'colors'>;

const NUMERIC_KEYS: readonly NumericKey[] = [
  'screenWidth',
  'screenHeight',
  'oscillatorCount',
  'totalPeriodS',
  'baseOscillations',
  'maxAmplitudeDeg',
  'bobRadius',
  'pivotRadius',
  'pivotOffsetY',
  'gravity',
  'maxVisualLengthRatio',
  'speedStep',
  'frameRate',
];

const COLOR_KEYS: readonly (keyof WaveColors)[] = ['background', 'pivot', 'string'];

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env[CONFIG_PATH_ENV]?.trim();
  return fromEnv ? fromEnv : DEFAULT_CONFIG_PATH;
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

export function mergeWaveConfig(base: WaveConfig, overrides: WaveConfigOverrides): WaveConfig {
  const { colors, ...rest } = overrides;
  return {
    ...base,
    ...rest,
    colors: { ...base.colors, ...colors },
  };
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/**
 * Load and validate the wave configuration.
 *
 * Returns defaults if the file is missing or not a JSON object.
 * Throws ConfigurationError when the merged values are invalid.
 */
export function loadWaveConfig(filePath: string = resolveConfigPath()): WaveConfig {
  if (!fs.existsSync(filePath)) {
    console.debug(`[config] No config file at ${filePath}, using defaults`);
    return validateWaveConfig(DEFAULT_WAVE_CONFIG);
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    console.warn(`[config] Failed to read config from ${filePath}:`, err);
    return validateWaveConfig(DEFAULT_WAVE_CONFIG);
  }

  if (!isRecord(data)) {
    console.warn(`[config] Expected a JSON object in ${filePath}, using defaults`);
    return validateWaveConfig(DEFAULT_WAVE_CONFIG);
  }

  return validateWaveConfig(mergeWaveConfig(DEFAULT_WAVE_CONFIG, extractOverrides(data)));
}

/**
 * Pick recognised keys of the right type; warn about the rest.
 */
export function extractOverrides(data: Record<string, unknown>): WaveConfigOverrides {
  const overrides: { -readonly [K in NumericKey]?: number } = {};

  for (const key of NUMERIC_KEYS) {
    const value = data[key];
    if (value === undefined) continue;
    if (typeof value === 'number') {
      overrides[key] = value;
    } else {
      console.warn(`[config] Ignoring "${key}": expected a number`);
    }
  }

  const colors = extractColors(data.colors);
  return colors ? { ...overrides, colors } : overrides;
}

function extractColors(value: unknown): Partial<WaveColors> | null {
  if (value === undefined) return null;
  if (!isRecord(value)) {
    console.warn('[config] Ignoring "colors": expected an object');
    return null;
  }

  const result: { -readonly [K in keyof WaveColors]?: string } = {};
  for (const key of COLOR_KEYS) {
    const color = value[key];
    if (color === undefined) continue;
    if (typeof color === 'string') {
      result[key] = color;
    } else {
      console.warn(`[config] Ignoring "colors.${key}": expected a string`);
    }
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
