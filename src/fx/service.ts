/**
 * EUR/USD summary orchestration: validate -> fetch -> fall back -> summarize.
 */

import type { FxConfig } from '@/core/config';
import { validateRange } from '@/lib/inputValidation';
import { FrankfurterClient, type FrankfurterClientOptions } from '@/providers/frankfurter/client';
import { createChildLogger, type Logger } from '@/utils/logger';
import { loadFallbackSnapshot } from './fallback';
import { summarizePayload } from './summarize';
import type { Provenance, RateFetcher, RatesPayload, SummaryRequest, SummaryResult } from './types';

export interface SummaryDependencies {
  fetcher: RateFetcher;
  loadFallback: () => RatesPayload;
  logger?: Logger;
}

export async function getFxSummary(
  request: SummaryRequest,
  deps: SummaryDependencies
): Promise<SummaryResult> {
  const log = deps.logger ?? createChildLogger('fx-summary');
  const { breakdown } = request;
  const { start, end } = validateRange(request.start, request.end);

  const fetched = await deps.fetcher.fetchRange(start, end);

  let payload: RatesPayload;
  let source: Provenance;
  if (fetched.kind === 'series') {
    payload = fetched.payload;
    source = 'api';
  } else {
    log.warn(
      { start, end, attempts: fetched.attempts, error: fetched.lastError },
      'Remote provider unavailable, serving fallback snapshot'
    );
    payload = deps.loadFallback();
    source = 'fallback';
  }

  const summary = summarizePayload(payload, breakdown, source);
  log.info(
    { start, end, breakdown, source, days: Object.keys(payload.rates).length },
    'Built FX summary'
  );
  return summary;
}

export interface FxSummaryService {
  summarize(request: SummaryRequest): Promise<SummaryResult>;
  client: FrankfurterClient;
}

export function createFxSummaryService(
  config: FxConfig,
  options: FrankfurterClientOptions = {}
): FxSummaryService {
  const client = new FrankfurterClient(config, options);
  const deps: SummaryDependencies = {
    fetcher: client,
    loadFallback: () => loadFallbackSnapshot(config.fallbackPath),
    logger: options.logger,
  };

  return {
    client,
    summarize: (request) => getFxSummary(request, deps),
  };
}
