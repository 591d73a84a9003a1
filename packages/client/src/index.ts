export * from './client';
export { logger, pinoTransport } from './monitoring/logger';

// Re-export the shared vocabulary so callers need a single import
export {
  WordstatDevice,
  WordstatTaskType,
  WordstatSyntax,
  WordstatGrouping,
  ServiceType,
  SearchSystem,
  RegionSearchType,
  SerpProErrorType,
  SerpProError,
  SerpProValidationError,
  SerpProConfigError,
  DEFAULT_BASE_URL,
  createClientConfig,
} from '@serppro/shared';
export type {
  FrequencyOptions,
  FrequencyResponse,
  DeepOptions,
  DeepResponse,
  WordstatItemData,
  HistoryOptions,
  HistoryResponse,
  HistoryResponseItem,
  RegionCheckOptions,
  RegionResponse,
  FinanceStatsOptions,
  FinanceStatsResponse,
  GlobalErrorModel,
  ValidationIssue,
  RegionCodes,
  ApiDate,
  SerpProProfileName,
  EnvSource,
} from '@serppro/shared';
