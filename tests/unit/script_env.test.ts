import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { fileURLToPath } from 'url';

let originalCwd: string;
let originalLevel: string | undefined;
let tempDir: string;

describe('script environment loading', () => {
  beforeEach(() => {
    originalCwd = process.cwd();
    originalLevel = process.env.LOG_LEVEL;
    delete process.env.LOG_LEVEL;
    tempDir = mkdtempSync(join(tmpdir(), 'fx-env-'));
    process.chdir(tempDir);
    vi.resetModules();
  });

  afterEach(() => {
    process.chdir(originalCwd);
    rmSync(tempDir, { recursive: true, force: true });
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  it('applies LOG_LEVEL from .env to the logger', async () => {
    writeFileSync(join(tempDir, '.env'), 'LOG_LEVEL=warn\n');

    await import('../../scripts/env');
    const { logger } = await import('@/utils/logger');

    expect(process.env.LOG_LEVEL).toBe('warn');
    expect(logger.level).toBe('warn');
  });

  it('prefers .env.local over .env', async () => {
    writeFileSync(join(tempDir, '.env.local'), 'LOG_LEVEL=error\n');
    writeFileSync(join(tempDir, '.env'), 'LOG_LEVEL=debug\n');

    await import('../../scripts/env');

    expect(process.env.LOG_LEVEL).toBe('error');
  });

  it('is the first import of the CLI', () => {
    const cli = readFileSync(fileURLToPath(new URL('../../scripts/fx_summary.ts', import.meta.url)), 'utf-8');
    const imports = cli.split('\n').filter((line) => line.startsWith('import '));

    expect(imports[0]).toBe("import './env';");
  });
});
