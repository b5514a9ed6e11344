/**
 * EUR/USD summary from the command line
 *
 * Usage:
 *   npx tsx scripts/fx_summary.ts --start=2025-01-02 --end=2025-01-30 [--breakdown=none]
 *   npx tsx scripts/fx_summary.ts --health
 */

import './env';
import { loadFxConfig } from '../src/core/config';
import { createFxSummaryService } from '../src/fx/service';
import { handleHealthRequest, handleSummaryRequest } from '../src/api/handlers';
import type { QueryParams } from '../src/lib/inputValidation';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('fx_summary');

function readArg(name: string): string | undefined {
  const eqArg = process.argv.find((arg) => arg.startsWith(`--${name}=`));
  if (eqArg) return eqArg.slice(name.length + 3);
  const posIndex = process.argv.findIndex((arg) => arg === `--${name}`);
  return posIndex >= 0 ? process.argv[posIndex + 1] : undefined;
}

async function main(): Promise<number> {
  const config = loadFxConfig();
  const service = createFxSummaryService(config);

  if (process.argv.includes('--health')) {
    const { body } = await handleHealthRequest(service.client);
    console.log(JSON.stringify(body, null, 2));
    return 0;
  }

  const params: QueryParams = {
    start: readArg('start'),
    end: readArg('end'),
    breakdown: readArg('breakdown'),
  };

  const { status, body } = await handleSummaryRequest(params, service);
  if (status !== 200) {
    logger.error({ status, ...body }, 'FX summary failed');
    return 1;
  }

  console.log(JSON.stringify(body, null, 2));
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'Unexpected failure');
    process.exitCode = 1;
  });
