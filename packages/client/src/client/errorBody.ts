/**
 * Error body decoding
 * Strict model decode first, then a loose message lookup, then the fixed default.
 */

import { globalErrorModelSchema, type GlobalErrorModel } from '@serppro/shared';

export const UNPROCESSABLE_DEFAULT_MESSAGE = 'Unprocessable Content - invalid query';

export interface DecodedErrorBody {
  message: string;
  errorModel?: GlobalErrorModel;
}

export function defaultErrorMessage(statusCode: number): string {
  return statusCode === 422 ? UNPROCESSABLE_DEFAULT_MESSAGE : `HTTP ${statusCode}`;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Never throws: a body that cannot be read yields the default message and no model.
 * An empty body decodes as an empty model.
 */
export function decodeErrorBody(body: unknown, statusCode: number): DecodedErrorBody {
  const fallback = defaultErrorMessage(statusCode);

  let data: unknown;
  if (typeof body === 'string') {
    if (body.trim() === '') {
      data = {};
    } else {
      try {
        data = JSON.parse(body);
      } catch {
        return { message: fallback };
      }
    }
  } else {
    data = body ?? {};
  }

  const strict = globalErrorModelSchema.safeParse(data);
  if (strict.success) {
    const errorModel = strict.data;
    return {
      message: errorModel.error_message || fallback,
      errorModel,
    };
  }

  if (isRecord(data) && typeof data.error_message === 'string' && data.error_message !== '') {
    return { message: data.error_message };
  }

  return { message: fallback };
}
