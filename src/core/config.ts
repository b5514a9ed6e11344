/**
 * FX summary configuration.
 *
 * Built once by the caller and handed to the client and service constructors;
 * nothing here is cached at module level.
 */

import { isAbsolute, join } from 'path';
import { fileURLToPath } from 'url';

export interface FxConfig {
  /** Provider root, without trailing slash. */
  baseUrl: string;
  maxAttempts: number;
  requestTimeoutMs: number;
  healthTimeoutMs: number;
  /** Backoff before retry n is `backoffBaseMs * 2^n`. */
  backoffBaseMs: number;
  fallbackPath: string;
}

export const DEFAULT_BASE_URL = 'https://api.frankfurter.app';

export const DEFAULT_FX_CONFIG: Omit<FxConfig, 'fallbackPath'> = {
  baseUrl: DEFAULT_BASE_URL,
  maxAttempts: 3,
  requestTimeoutMs: 10_000,
  healthTimeoutMs: 5_000,
  backoffBaseMs: 1_000,
};

/** Package root; the bundled snapshot lives under data/ here. */
export const PROJECT_ROOT = fileURLToPath(new URL('../../', import.meta.url));

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number(raw.trim());
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function readNonNegativeInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number(raw.trim());
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

function resolveFallbackPath(projectRoot: string, value: string | undefined): string {
  if (!value) return join(projectRoot, 'data', 'sample_fx.json');
  return isAbsolute(value) ? value : join(projectRoot, value);
}

export function loadFxConfig(env: Env = process.env, projectRoot: string = PROJECT_ROOT): FxConfig {
  const baseUrl = (env.FX_API_BASE_URL?.trim() || DEFAULT_BASE_URL).replace(/\/+$/, '');

  return {
    baseUrl,
    maxAttempts: readPositiveInt(env, 'FX_MAX_ATTEMPTS', DEFAULT_FX_CONFIG.maxAttempts),
    requestTimeoutMs: readPositiveInt(env, 'FX_REQUEST_TIMEOUT_MS', DEFAULT_FX_CONFIG.requestTimeoutMs),
    healthTimeoutMs: readPositiveInt(env, 'FX_HEALTH_TIMEOUT_MS', DEFAULT_FX_CONFIG.healthTimeoutMs),
    backoffBaseMs: readNonNegativeInt(env, 'FX_BACKOFF_BASE_MS', DEFAULT_FX_CONFIG.backoffBaseMs),
    fallbackPath: resolveFallbackPath(projectRoot, env.FX_FALLBACK_FILE?.trim()),
  };
}
