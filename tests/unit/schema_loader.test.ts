import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { fileURLToPath } from 'url';
import pino from 'pino';
import { createFxSummaryService } from '@/fx/service';
import { loadFallbackSnapshot } from '@/fx/fallback';
import { schemaPath } from '@/validation/schema_loader';
import type { FetchLike } from '@/providers/frankfurter/types';

const silent = pino({ level: 'silent' });
const SNAPSHOT_PATH = fileURLToPath(new URL('../../data/sample_fx.json', import.meta.url));

const apiBody = {
  rates: {
    '2025-02-03': { USD: 1.0 },
    '2025-02-04': { USD: 1.1 },
  },
};

// Each test file gets a fresh module graph, so the schema cache is empty
// until the first validation below runs under the foreign working directory.
describe('schema lookup outside the project root', () => {
  beforeEach(() => {
    vi.spyOn(process, 'cwd').mockReturnValue(tmpdir());
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('resolves the schema beside the sources', () => {
    expect(existsSync(schemaPath('rates_payload.v1'))).toBe(true);
    expect(schemaPath('rates_payload.v1').startsWith(tmpdir())).toBe(false);
  });

  it('serves the API result on the first attempt', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response(JSON.stringify(apiBody), { status: 200 }));
    const sleep = vi.fn(async (_ms: number) => undefined);
    const service = createFxSummaryService(
      {
        baseUrl: 'https://fx.test',
        maxAttempts: 3,
        requestTimeoutMs: 10_000,
        healthTimeoutMs: 5_000,
        backoffBaseMs: 1_000,
        fallbackPath: SNAPSHOT_PATH,
      },
      { fetchImpl, sleep, logger: silent }
    );

    const result = await service.summarize({ start: '2025-02-03', end: '2025-02-04', breakdown: 'none' });

    expect(result.source).toBe('api');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('still validates the fallback snapshot', () => {
    expect(Object.keys(loadFallbackSnapshot(SNAPSHOT_PATH).rates)).toHaveLength(21);
  });
});
