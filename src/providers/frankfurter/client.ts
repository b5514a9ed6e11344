/**
 * Frankfurter API Client
 * Bounded retry with exponential backoff; exhaustion is reported, not thrown
 */

import type { ValidateFunction } from 'ajv';
import type { FxConfig } from '@/core/config';
import type { FetchResult, RateFetcher, RatesPayload } from '@/fx/types';
import { createChildLogger, type Logger } from '@/utils/logger';
import { getRatesPayloadValidator, validateRatesPayload } from '@/validation/ajv_instance';
import { ProviderHttpError, type FetchLike, type SleepFn } from './types';

const PAIR_QUERY = 'from=EUR&to=USD';

export interface FrankfurterClientOptions {
  fetchImpl?: FetchLike;
  sleep?: SleepFn;
  logger?: Logger;
}

export class FrankfurterClient implements RateFetcher {
  private readonly fetchImpl: FetchLike;
  private readonly sleep: SleepFn;
  private readonly logger: Logger;

  constructor(
    private readonly config: FxConfig,
    options: FrankfurterClientOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createChildLogger('frankfurter');
  }

  rangeUrl(start: string, end: string): string {
    return `${this.config.baseUrl}/${start}..${end}?${PAIR_QUERY}`;
  }

  latestUrl(): string {
    return `${this.config.baseUrl}/latest?${PAIR_QUERY}`;
  }

  async fetchRange(start: string, end: string): Promise<FetchResult> {
    const url = this.rangeUrl(start, end);
    const { maxAttempts, backoffBaseMs } = this.config;
    // outside the attempt loop: schema faults propagate, they are not retried
    const validate = getRatesPayloadValidator();
    let lastError = 'no attempt made';

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        const payload = await this.requestOnce(url, validate);
        this.logger.debug({ start, end, attempt }, 'Fetched rate series');
        return { kind: 'series', payload, attempts: attempt + 1 };
      } catch (error) {
        lastError = error instanceof Error ? error.message : String(error);

        if (attempt < maxAttempts - 1) {
          const backoffMs = backoffBaseMs * Math.pow(2, attempt);
          this.logger.warn(
            { attempt, backoffMs, error: lastError },
            'Frankfurter request failed, retrying'
          );
          await this.sleep(backoffMs);
        }
      }
    }

    this.logger.error(
      { start, end, attempts: maxAttempts, error: lastError },
      'Frankfurter unavailable after retries'
    );
    return { kind: 'unavailable', attempts: maxAttempts, lastError };
  }

  /**
   * Single reachability check against the latest-rate endpoint. No retry.
   */
  async probe(): Promise<boolean> {
    try {
      const response = await this.fetchWithTimeout(this.latestUrl(), this.config.healthTimeoutMs);
      return response.status === 200;
    } catch (error) {
      this.logger.debug(
        { error: error instanceof Error ? error.message : String(error) },
        'Frankfurter probe failed'
      );
      return false;
    }
  }

  private async requestOnce(
    url: string,
    validate: ValidateFunction<RatesPayload>
  ): Promise<RatesPayload> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    try {
      const response = await this.fetchImpl(url, { signal: controller.signal });
      if (!response.ok) {
        throw new ProviderHttpError(response.status, response.statusText);
      }

      const body: unknown = await response.json();
      const result = validateRatesPayload(body, validate);
      if (!result.valid) {
        throw new Error(`Invalid rates payload: ${result.errors.join('; ')}`);
      }
      return result.data;
    } finally {
      clearTimeout(timeout);
    }
  }

  private async fetchWithTimeout(url: string, timeoutMs: number): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await this.fetchImpl(url, { signal: controller.signal });
    } finally {
      clearTimeout(timeout);
    }
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
