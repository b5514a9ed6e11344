import { isFxError, type FxErrorCode } from '@/fx/errors';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('api');

export interface ApiErrorBody {
  error: string;
  code: FxErrorCode | 'INTERNAL';
}

export interface ApiResponse<T> {
  status: number;
  body: T;
}

export function sanitizeError(error: unknown): string {
  if (error instanceof Error) {
    if (process.env.NODE_ENV === 'development') {
      return error.message;
    }
    return 'An internal error occurred';
  }
  return 'An unknown error occurred';
}

export function apiError(message: string, code: ApiErrorBody['code'], status: number = 500): ApiResponse<ApiErrorBody> {
  return { status, body: { error: message, code } };
}

/**
 * Client-facing FxErrors keep their message; anything else is logged and
 * reduced to a generic 500.
 */
export function apiErrorResponse(error: unknown): ApiResponse<ApiErrorBody> {
  if (isFxError(error)) {
    if (error.status >= 500) {
      logger.error({ err: error, code: error.code }, 'FX request failed');
      return apiError(sanitizeError(error), error.code, error.status);
    }
    return apiError(error.message, error.code, error.status);
  }

  logger.error({ err: error }, 'Unhandled error in FX request');
  return apiError(sanitizeError(error), 'INTERNAL', 500);
}
