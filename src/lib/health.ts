import type { HealthReport } from '@/fx/types';

export interface ProviderProbe {
  probe(): Promise<boolean>;
}

/**
 * Reachability of the rate provider. Read-only; never throws and never
 * touches the summary path.
 */
export async function checkProviderHealth(provider: ProviderProbe): Promise<HealthReport> {
  const apiReachable = await provider.probe();
  return { status: 'ok', api_reachable: apiReachable };
}
