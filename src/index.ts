export { loadFxConfig, DEFAULT_FX_CONFIG, type FxConfig } from './core/config';
export * from './fx/types';
export * from './fx/errors';
export { loadFallbackSnapshot } from './fx/fallback';
export { summarizePayload, summarizeSeries, toRateSeries } from './fx/summarize';
export { getFxSummary, createFxSummaryService, type SummaryDependencies, type FxSummaryService } from './fx/service';
export { FrankfurterClient, type FrankfurterClientOptions } from './providers/frankfurter/client';
export { checkProviderHealth } from './lib/health';
export { parseSummaryQuery } from './lib/inputValidation';
export { handleSummaryRequest, handleHealthRequest } from './api/handlers';
