/**
 * Client profiles
 *
 * standard: the general-purpose client. TLS verified, 300 s per attempt,
 *           timeouts retried with no upper bound.
 * wordstat: the Wordstat-only client. TLS not verified, transport default
 *           timeout, every transport failure surfaced on the first attempt.
 */

import { z } from 'zod';
import {
  DEFAULT_BASE_URL,
  PROFILE_NAMES,
  normalizeBaseUrl,
  parseRequest,
  type SerpProProfileName,
} from '@serppro/shared';
import type { AxiosAdapter } from 'axios';

export type TimeoutRetryPolicy =
  | { mode: 'fail-fast' }
  | {
      mode: 'retry';
      /** Counts the first attempt; unset means retry forever */
      maxAttempts?: number;
      delayMs?: number;
    };

export interface SerpProProfile {
  verifyTls: boolean;
  timeoutMs?: number;
  retry: TimeoutRetryPolicy;
}

export const STANDARD_TIMEOUT_MS = 300_000;

export const PROFILES: Readonly<Record<SerpProProfileName, SerpProProfile>> = {
  standard: {
    verifyTls: true,
    timeoutMs: STANDARD_TIMEOUT_MS,
    retry: { mode: 'retry' },
  },
  wordstat: {
    verifyTls: false,
    retry: { mode: 'fail-fast' },
  },
};

export interface SerpProClientOptions {
  apiKey: string;
  baseUrl?: string;
  profile?: SerpProProfileName;
  /** Overrides the profile's TLS policy */
  verifyTls?: boolean;
  /** Per-attempt timeout; overrides the profile's. 0 leaves the transport default (no timeout) */
  timeoutMs?: number;
  retry?: TimeoutRetryPolicy;
  /** Replaces the HTTP transport, e.g. with an in-process stub */
  adapter?: AxiosAdapter;
}

export interface ResolvedClientConfig {
  apiKey: string;
  baseUrl: string;
  profile: SerpProProfileName;
  verifyTls: boolean;
  timeoutMs?: number;
  retry: TimeoutRetryPolicy;
  adapter?: AxiosAdapter;
}

const retryPolicySchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('fail-fast') }).strict(),
  z
    .object({
      mode: z.literal('retry'),
      maxAttempts: z.number().int().positive().optional(),
      delayMs: z.number().nonnegative().optional(),
    })
    .strict(),
]);

const clientOptionsSchema = z.object({
  apiKey: z.string({ required_error: 'API key is required' }).min(1, 'API key is required'),
  baseUrl: z.string().url().optional(),
  profile: z.enum(PROFILE_NAMES).default('standard'),
  verifyTls: z.boolean().optional(),
  timeoutMs: z.number().int().nonnegative().optional(),
  retry: retryPolicySchema.optional(),
});

/**
 * Merges caller options over the selected profile.
 * @throws SerpProValidationError for a missing key or malformed options
 */
export function resolveClientOptions(options: SerpProClientOptions): ResolvedClientConfig {
  const { adapter, ...rest } = options;
  const parsed = parseRequest(clientOptionsSchema, rest);
  const profile = PROFILES[parsed.profile];
  const timeoutMs = parsed.timeoutMs === 0 ? undefined : parsed.timeoutMs ?? profile.timeoutMs;

  return {
    apiKey: parsed.apiKey,
    baseUrl: normalizeBaseUrl(parsed.baseUrl ?? DEFAULT_BASE_URL),
    profile: parsed.profile,
    verifyTls: parsed.verifyTls ?? profile.verifyTls,
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    retry: parsed.retry ?? profile.retry,
    ...(adapter !== undefined ? { adapter } : {}),
  };
}
