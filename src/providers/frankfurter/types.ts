/**
 * Frankfurter API plumbing types.
 * Response bodies are validated against schemas/rates_payload.v1.schema.json.
 */

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number) => Promise<void>;

export class ProviderHttpError extends Error {
  constructor(readonly status: number, statusText: string) {
    super(`Frankfurter API error: ${status} ${statusText}`.trim());
    this.name = 'ProviderHttpError';
  }
}
