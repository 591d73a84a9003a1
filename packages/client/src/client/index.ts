/**
 * SerpPro Client Layer
 * Barrel exports for all client components
 */

// Main API client
export { SerpProApiClient } from './SerpProApiClient';
export { SerpProApiError, TRANSPORT_STATUS_CODE } from './SerpProApiError';

// Transport and error decoding
export { RequestExecutor, isTimeoutError } from './RequestExecutor';
export type { ApiRequest, ExecutorConfig, HttpMethod, QueryParams } from './RequestExecutor';
export { decodeErrorBody, defaultErrorMessage, UNPROCESSABLE_DEFAULT_MESSAGE } from './errorBody';
export type { DecodedErrorBody } from './errorBody';

// Profiles
export { PROFILES, STANDARD_TIMEOUT_MS, resolveClientOptions } from './profiles';
export type {
  ResolvedClientConfig,
  SerpProClientOptions,
  SerpProProfile,
  TimeoutRetryPolicy,
} from './profiles';
