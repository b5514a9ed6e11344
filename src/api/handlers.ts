/**
 * Transport-neutral request handlers. A host HTTP framework maps its query
 * string onto `QueryParams` and writes `{ status, body }` back out.
 */

import type { HealthReport, SummaryRequest, SummaryResult } from '@/fx/types';
import { apiErrorResponse, type ApiErrorBody, type ApiResponse } from '@/lib/apiError';
import { checkProviderHealth, type ProviderProbe } from '@/lib/health';
import { parseSummaryQuery, type QueryParams } from '@/lib/inputValidation';

export interface SummaryHandlerDeps {
  summarize(request: SummaryRequest): Promise<SummaryResult>;
}

export async function handleSummaryRequest(
  params: QueryParams,
  deps: SummaryHandlerDeps
): Promise<ApiResponse<SummaryResult | ApiErrorBody>> {
  try {
    const request = parseSummaryQuery(params);
    const summary = await deps.summarize(request);
    return { status: 200, body: summary };
  } catch (error) {
    return apiErrorResponse(error);
  }
}

export async function handleHealthRequest(
  provider: ProviderProbe
): Promise<ApiResponse<HealthReport>> {
  return { status: 200, body: await checkProviderHealth(provider) };
}
