/**
 * SerpPro API Client
 * Typed methods for the Wordstat, Region and Finance endpoints
 */

import type { z } from 'zod';
import {
  FINANCE_ENDPOINTS,
  REGION_ENDPOINTS,
  SerpProErrorType,
  WORDSTAT_ENDPOINTS,
  createClientConfig,
  deepRequestSchema,
  deepResponseSchema,
  financeStatsRequestSchema,
  financeStatsResponseSchema,
  financeTotalParamsSchema,
  frequencyRequestSchema,
  frequencyResponseSchema,
  historyRequestSchema,
  historyResponseSchema,
  parseRequest,
  regionCheckParamsSchema,
  regionListResponseSchema,
  regionSearchParamsSchema,
  type DeepOptions,
  type DeepResponse,
  type EnvSource,
  type FinanceStatsOptions,
  type FinanceStatsResponse,
  type FrequencyOptions,
  type FrequencyResponse,
  type HistoryOptions,
  type HistoryResponse,
  type RegionCheckOptions,
  type RegionResponse,
  type ServiceType,
} from '@serppro/shared';
import { logger } from '../monitoring/logger';
import {
  resolveClientOptions,
  type ResolvedClientConfig,
  type SerpProClientOptions,
  type TimeoutRetryPolicy,
} from './profiles';
import { RequestExecutor, type ApiRequest } from './RequestExecutor';
import { SerpProApiError } from './SerpProApiError';

export class SerpProApiClient {
  private readonly config: ResolvedClientConfig;
  private readonly executor: RequestExecutor;

  constructor(options: SerpProClientOptions) {
    this.config = resolveClientOptions(options);
    this.executor = new RequestExecutor(this.config);

    if (!this.config.verifyTls) {
      logger.warn(
        { baseUrl: this.config.baseUrl, profile: this.config.profile },
        'TLS certificate verification is disabled for this SerpPro client'
      );
    }
  }

  /**
   * Build a client from SERPPRO_* environment variables.
   * SERPPRO_MAX_ATTEMPTS switches timeouts to a bounded retry.
   */
  static fromEnv(env?: EnvSource, overrides: Partial<SerpProClientOptions> = {}): SerpProApiClient {
    const config = createClientConfig(env);
    logger.level = config.logLevel;

    const retry: TimeoutRetryPolicy | undefined =
      config.maxAttempts !== undefined ? { mode: 'retry', maxAttempts: config.maxAttempts } : undefined;

    return new SerpProApiClient({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      profile: config.profile,
      ...(config.verifyTls !== undefined ? { verifyTls: config.verifyTls } : {}),
      ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
      ...(retry !== undefined ? { retry } : {}),
      ...overrides,
    });
  }

  /** Settings after the profile and caller overrides were merged */
  get settings(): Readonly<Omit<ResolvedClientConfig, 'apiKey' | 'adapter'>> {
    const { apiKey: _apiKey, adapter: _adapter, ...rest } = this.config;
    return rest;
  }

  // ===== WORDSTAT =====

  /**
   * Query frequency. Device is ignored remotely for taskType Direct.
   */
  async wordstatFrequency(options: FrequencyOptions = {}): Promise<FrequencyResponse> {
    const body = parseRequest(frequencyRequestSchema, options);
    const data = await this.send({ method: 'POST', path: WORDSTAT_ENDPOINTS.FREQUENCY, body });
    return this.decode(frequencyResponseSchema, data, WORDSTAT_ENDPOINTS.FREQUENCY);
  }

  /**
   * Related ("associations") and popular queries for a phrase.
   */
  async wordstatDeep(options: DeepOptions = {}): Promise<DeepResponse> {
    const body = parseRequest(deepRequestSchema, options);
    const data = await this.send({ method: 'POST', path: WORDSTAT_ENDPOINTS.DEEP, body });
    return this.decode(deepResponseSchema, data, WORDSTAT_ENDPOINTS.DEEP);
  }

  /**
   * Frequency over time. query must be 1-3000 characters.
   */
  async wordstatHistory(options: HistoryOptions): Promise<HistoryResponse> {
    const body = parseRequest(historyRequestSchema, options);
    const data = await this.send({ method: 'POST', path: WORDSTAT_ENDPOINTS.HISTORY, body });
    return this.decode(historyResponseSchema, data, WORDSTAT_ENDPOINTS.HISTORY);
  }

  // ===== REGION =====

  async regionYandex(query: string): Promise<RegionResponse[]> {
    const params = parseRequest(regionSearchParamsSchema, { query });
    const data = await this.send({ method: 'GET', path: REGION_ENDPOINTS.YANDEX, params: { ...params } });
    return this.decode(regionListResponseSchema, data, REGION_ENDPOINTS.YANDEX);
  }

  async regionGoogle(query: string): Promise<RegionResponse[]> {
    const params = parseRequest(regionSearchParamsSchema, { query });
    const data = await this.send({ method: 'GET', path: REGION_ENDPOINTS.GOOGLE, params: { ...params } });
    return this.decode(regionListResponseSchema, data, REGION_ENDPOINTS.GOOGLE);
  }

  /**
   * Looks a region name or code up in the Yandex or Google region base.
   */
  async regionCheck(options: RegionCheckOptions): Promise<RegionResponse[]> {
    const params = parseRequest(regionCheckParamsSchema, options);
    const data = await this.send({ method: 'GET', path: REGION_ENDPOINTS.CHECK, params: { ...params } });
    return this.decode(regionListResponseSchema, data, REGION_ENDPOINTS.CHECK);
  }

  // ===== FINANCE =====

  /**
   * Total number of requests made, optionally for a single service.
   */
  async financeTotal(service?: ServiceType): Promise<FinanceStatsResponse> {
    const params = parseRequest(financeTotalParamsSchema, service !== undefined ? { service } : {});
    const data = await this.send({ method: 'GET', path: FINANCE_ENDPOINTS.TOTAL, params: { ...params } });
    return this.decode(financeStatsResponseSchema, data, FINANCE_ENDPOINTS.TOTAL);
  }

  async financeStatistics(options: FinanceStatsOptions = {}): Promise<FinanceStatsResponse> {
    const body = parseRequest(financeStatsRequestSchema, options);
    const data = await this.send({ method: 'POST', path: FINANCE_ENDPOINTS.STATISTICS, body });
    return this.decode(financeStatsResponseSchema, data, FINANCE_ENDPOINTS.STATISTICS);
  }

  /**
   * Releases the client's pooled connections.
   */
  close(): void {
    this.executor.close();
  }

  private send(request: ApiRequest): Promise<unknown> {
    return this.executor.execute(request);
  }

  private decode<S extends z.ZodTypeAny>(schema: S, data: unknown, endpoint: string): z.output<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
      logger.error(
        { endpoint, issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
        'SerpPro API response did not match the expected format'
      );
      throw new SerpProApiError(200, 'Unexpected response format', {
        type: SerpProErrorType.PARSING,
        cause: result.error,
      });
    }
    return result.data;
  }
}
