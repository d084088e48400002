import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigValidationError } from '@statenav/contracts';
import { configFromEnv, loadNavigationConfig } from '../load-config.js';

describe('configFromEnv', () => {
  it('maps known variables', () => {
    expect(
      configFromEnv({
        STATENAV_MODE: 'simulated',
        STATENAV_EXHAUSTIVE_FALLBACK: 'false',
        STATENAV_MAX_CONCURRENT_PROBES: '3',
        STATENAV_LOG_LEVEL: 'debug',
        UNRELATED: 'x',
      }),
    ).toEqual({
      mode: 'simulated',
      exhaustiveFallback: false,
      maxConcurrentProbes: 3,
      logLevel: 'debug',
    });
  });

  it('returns nothing for an empty environment', () => {
    expect(configFromEnv({})).toEqual({});
  });
});

describe('loadNavigationConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'statenav-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('uses defaults without file or environment', async () => {
    expect(await loadNavigationConfig({ env: {} })).toEqual({
      mode: 'live',
      exhaustiveFallback: true,
      maxConcurrentProbes: 1,
      logLevel: 'info',
    });
  });

  it('reads YAML and lets the environment win', async () => {
    const file = join(dir, 'navigation.yml');
    await writeFile(file, 'mode: simulated\nmaxConcurrentProbes: 4\n', 'utf-8');

    const config = await loadNavigationConfig({
      file,
      env: { STATENAV_MAX_CONCURRENT_PROBES: '2' },
    });

    expect(config.mode).toBe('simulated');
    expect(config.maxConcurrentProbes).toBe(2);
  });

  it('accepts an empty file', async () => {
    const file = join(dir, 'empty.yml');
    await writeFile(file, '', 'utf-8');
    expect((await loadNavigationConfig({ file, env: {} })).mode).toBe('live');
  });

  it('rejects a file that is not a mapping', async () => {
    const file = join(dir, 'list.yml');
    await writeFile(file, '- live\n- simulated\n', 'utf-8');
    await expect(loadNavigationConfig({ file, env: {} })).rejects.toBeInstanceOf(ConfigValidationError);
  });

  it('rejects invalid values from the environment', async () => {
    await expect(
      loadNavigationConfig({ env: { STATENAV_EXHAUSTIVE_FALLBACK: 'maybe' } }),
    ).rejects.toBeInstanceOf(ConfigValidationError);
  });
});
