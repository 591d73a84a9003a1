// ── Types ──
export * from './types';

// ── Schemas ──
export {
  HISTORY_QUERY_MAX_LENGTH,
  REGION_QUERY_MAX_LENGTH,
  frequencyRequestSchema,
  deepRequestSchema,
  historyRequestSchema,
  financeStatsRequestSchema,
  regionSearchParamsSchema,
  regionCheckParamsSchema,
  financeTotalParamsSchema,
  wordstatItemDataSchema,
  historyResponseItemSchema,
  frequencyResponseSchema,
  deepResponseSchema,
  historyResponseSchema,
  regionResponseSchema,
  regionListResponseSchema,
  financeStatsResponseSchema,
  globalErrorModelSchema,
  parseRequest,
  toValidationIssues,
} from './schema';

// ── Constants ──
export * from './constants/ApiEndpoints';

// ── Utilities ──
export * from './utils/logger';
export * from './utils/formatters';
export * from './utils/async-utils';

// ── Core ──
export * from './core/config/ClientConfig';
