import { describe, expect, it } from 'vitest';
import { existsSync } from 'fs';
import { DEFAULT_BASE_URL, loadFxConfig } from '@/core/config';

describe('loadFxConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadFxConfig({}, '/srv/fx')).toEqual({
      baseUrl: DEFAULT_BASE_URL,
      maxAttempts: 3,
      requestTimeoutMs: 10_000,
      healthTimeoutMs: 5_000,
      backoffBaseMs: 1_000,
      fallbackPath: '/srv/fx/data/sample_fx.json',
    });
  });

  it('applies overrides from the environment', () => {
    const config = loadFxConfig(
      {
        FX_API_BASE_URL: 'http://localhost:8080/',
        FX_MAX_ATTEMPTS: '5',
        FX_REQUEST_TIMEOUT_MS: '2500',
        FX_HEALTH_TIMEOUT_MS: '1000',
        FX_BACKOFF_BASE_MS: '0',
        FX_FALLBACK_FILE: 'fixtures/rates.json',
      },
      '/srv/fx'
    );

    expect(config).toEqual({
      baseUrl: 'http://localhost:8080',
      maxAttempts: 5,
      requestTimeoutMs: 2500,
      healthTimeoutMs: 1000,
      backoffBaseMs: 0,
      fallbackPath: '/srv/fx/fixtures/rates.json',
    });
  });

  it('keeps absolute fallback paths and ignores invalid numbers', () => {
    const config = loadFxConfig(
      {
        FX_FALLBACK_FILE: '/opt/fx/snapshot.json',
        FX_MAX_ATTEMPTS: '0',
        FX_REQUEST_TIMEOUT_MS: 'soon',
        FX_BACKOFF_BASE_MS: '-1',
      },
      '/srv/fx'
    );

    expect(config.fallbackPath).toBe('/opt/fx/snapshot.json');
    expect(config.maxAttempts).toBe(3);
    expect(config.requestTimeoutMs).toBe(10_000);
    expect(config.backoffBaseMs).toBe(1_000);
  });

  it('points at the bundled snapshot by default', () => {
    expect(existsSync(loadFxConfig({}).fallbackPath)).toBe(true);
  });
});
