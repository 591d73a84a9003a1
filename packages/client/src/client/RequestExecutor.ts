/**
 * Request Executor
 * Sends one API request and turns the outcome into decoded JSON or a SerpProApiError
 */

import { Agent } from 'node:https';
import axios, { AxiosError, type AxiosInstance, type AxiosResponse } from 'axios';
import { API_KEY_HEADER, SerpProErrorType, sleep } from '@serppro/shared';
import { logger } from '../monitoring/logger';
import { decodeErrorBody } from './errorBody';
import type { ResolvedClientConfig } from './profiles';
import { SerpProApiError, TRANSPORT_STATUS_CODE } from './SerpProApiError';

export type HttpMethod = 'GET' | 'POST';

// Undefined values are left out of the query string
export type QueryParams = Record<string, string | undefined>;

export interface ApiRequest {
  method: HttpMethod;
  path: string;
  body?: object;
  params?: QueryParams;
}

export type ExecutorConfig = Pick<
  ResolvedClientConfig,
  'apiKey' | 'baseUrl' | 'verifyTls' | 'timeoutMs' | 'retry' | 'adapter'
>;

/**
 * Connect and read timeouts, whichever layer reported them.
 */
export function isTimeoutError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;
  return error.code === AxiosError.ETIMEDOUT || error.code === AxiosError.ECONNABORTED;
}

export class RequestExecutor {
  private readonly http: AxiosInstance;
  private readonly httpsAgent: Agent;

  constructor(private readonly config: ExecutorConfig) {
    this.httpsAgent = new Agent({
      keepAlive: true,
      rejectUnauthorized: config.verifyTls,
    });

    this.http = axios.create({
      baseURL: config.baseUrl,
      // 0 leaves the transport's own default in place
      timeout: config.timeoutMs ?? 0,
      headers: {
        [API_KEY_HEADER]: config.apiKey,
        'Content-Type': 'application/json',
      },
      httpsAgent: this.httpsAgent,
      // Bodies are decoded here so a broken error body can fall back to a default message
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      transitional: { clarifyTimeoutError: true },
      ...(config.adapter !== undefined ? { adapter: config.adapter } : {}),
    });
  }

  /**
   * Sends the request, retrying timeouts when the retry policy allows it.
   * @returns the decoded JSON body of a 200 response
   */
  async execute(request: ApiRequest): Promise<unknown> {
    const { retry } = this.config;
    let attempt = 0;

    while (true) {
      attempt++;

      let response: AxiosResponse<unknown>;
      try {
        response = await this.http.request<unknown>({
          method: request.method,
          url: request.path,
          ...(request.body !== undefined ? { data: request.body } : {}),
          ...(request.params !== undefined ? { params: request.params } : {}),
        });
      } catch (error) {
        if (isTimeoutError(error) && retry.mode === 'retry') {
          if (retry.maxAttempts !== undefined && attempt >= retry.maxAttempts) {
            throw this.createTransportError(error, request, attempt, true);
          }

          logger.warn(
            {
              endpoint: request.path,
              attempt,
              maxAttempts: retry.maxAttempts ?? null,
              timeoutMs: this.config.timeoutMs ?? null,
            },
            `${this.describeTimeout()}. Retrying...`
          );
          if (retry.delayMs !== undefined && retry.delayMs > 0) {
            await sleep(retry.delayMs);
          }
          continue;
        }

        throw this.createTransportError(error, request, attempt, false);
      }

      return this.interpretResponse(response, request);
    }
  }

  /**
   * Releases pooled keep-alive sockets.
   */
  close(): void {
    this.httpsAgent.destroy();
  }

  private interpretResponse(response: AxiosResponse<unknown>, request: ApiRequest): unknown {
    if (response.status === 200) {
      return this.parseSuccessBody(response.data, request);
    }

    const { message, errorModel } = decodeErrorBody(response.data, response.status);

    logger.warn(
      {
        endpoint: request.path,
        method: request.method,
        status: response.status,
        invalidData: errorModel?.invalid_data ?? null,
      },
      `SerpPro API Error: ${response.status} ${message}`
    );

    throw new SerpProApiError(response.status, message, errorModel !== undefined ? { errorModel } : {});
  }

  private parseSuccessBody(data: unknown, request: ApiRequest): unknown {
    if (typeof data !== 'string') {
      return data;
    }

    try {
      return JSON.parse(data);
    } catch (error) {
      logger.error({ endpoint: request.path, bodyLength: data.length }, 'SerpPro API returned invalid JSON');
      throw new SerpProApiError(200, 'Invalid JSON in response body', {
        type: SerpProErrorType.PARSING,
        cause: error,
      });
    }
  }

  /**
   * TIMEOUT only when a bounded retry ran out; a single-attempt timeout is a plain transport failure.
   */
  private createTransportError(
    error: unknown,
    request: ApiRequest,
    attempt: number,
    retriesExhausted: boolean
  ): SerpProApiError {
    const message = error instanceof Error ? error.message : String(error);
    const timedOut = isTimeoutError(error);

    logger.error(
      {
        endpoint: request.path,
        method: request.method,
        attempt,
        code: axios.isAxiosError(error) ? error.code ?? null : null,
        error: message,
      },
      timedOut ? 'SerpPro API request timed out' : 'SerpPro API request failed before a response was received'
    );

    return new SerpProApiError(TRANSPORT_STATUS_CODE, message, {
      type: retriesExhausted ? SerpProErrorType.TIMEOUT : SerpProErrorType.TRANSPORT,
      cause: error,
    });
  }

  private describeTimeout(): string {
    return this.config.timeoutMs !== undefined
      ? `Timeout occurred after ${this.config.timeoutMs / 1000} seconds`
      : 'Request timed out';
  }
}
