/**
 * Navigation config loading: optional YAML file, then environment
 * overrides, then schema validation.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYAML } from 'yaml';
import type { NavigationConfig } from '@statenav/contracts';
import { ConfigValidationError, parseNavigationConfig } from '@statenav/contracts';

export const ENV_KEYS = {
  mode: 'STATENAV_MODE',
  exhaustiveFallback: 'STATENAV_EXHAUSTIVE_FALLBACK',
  maxConcurrentProbes: 'STATENAV_MAX_CONCURRENT_PROBES',
  logLevel: 'STATENAV_LOG_LEVEL',
} as const;

export interface LoadConfigOptions {
  /** Path to a YAML file; skipped when omitted */
  file?: string;
  env?: NodeJS.ProcessEnv;
}

function parseBoolean(value: string): boolean | string {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }
  // Left as a string so the schema reports it.
  return value;
}

function parseInteger(value: string): number | string {
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : value;
}

/**
 * Environment variables as raw config fields
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const mode = env[ENV_KEYS.mode];
  if (mode) {
    out.mode = mode;
  }
  const fallback = env[ENV_KEYS.exhaustiveFallback];
  if (fallback) {
    out.exhaustiveFallback = parseBoolean(fallback);
  }
  const probes = env[ENV_KEYS.maxConcurrentProbes];
  if (probes) {
    out.maxConcurrentProbes = parseInteger(probes);
  }
  const logLevel = env[ENV_KEYS.logLevel];
  if (logLevel) {
    out.logLevel = logLevel;
  }
  return out;
}

export async function readConfigFile(file: string): Promise<Record<string, unknown>> {
  const content = await readFile(file, 'utf-8');
  const data: unknown = parseYAML(content);
  if (data === null || data === undefined) {
    return {};
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new ConfigValidationError([{ path: '', message: `${file} must contain a mapping` }]);
  }
  return Object.fromEntries(Object.entries(data));
}

export async function loadNavigationConfig(
  options: LoadConfigOptions = {},
): Promise<NavigationConfig> {
  const fromFile = options.file ? await readConfigFile(options.file) : {};
  const fromEnv = configFromEnv(options.env ?? process.env);
  return parseNavigationConfig({ ...fromFile, ...fromEnv });
}
