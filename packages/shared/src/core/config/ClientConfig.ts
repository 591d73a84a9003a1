import { z } from 'zod';
import { DEFAULT_BASE_URL } from '../../constants/ApiEndpoints';
import { SerpProConfigError } from '../../types/common/ErrorTypes';
import { toValidationIssues } from '../../schema';
import { logger } from '../../utils/logger';

/**
 * Zod schemas for environment-driven client configuration
 */

export const PROFILE_NAMES = ['standard', 'wordstat'] as const;
export type SerpProProfileName = (typeof PROFILE_NAMES)[number];

const envBoolean = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const ClientConfigSchema = z.object({
  apiKey: z.string({ required_error: 'SERPPRO_API_KEY is required' }).min(1, 'SERPPRO_API_KEY cannot be empty'),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  profile: z.enum(PROFILE_NAMES).default('standard'),
  verifyTls: envBoolean.optional(),
  // 0 disables the per-attempt timeout
  timeoutMs: z.coerce.number().int().nonnegative().optional(),
  maxAttempts: z.coerce.number().int().positive().optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type ClientConfigType = z.infer<typeof ClientConfigSchema>;

export type EnvSource = Record<string, string | undefined>;

const ENV_VARIABLES: Record<keyof ClientConfigType, string> = {
  apiKey: 'SERPPRO_API_KEY',
  baseUrl: 'SERPPRO_BASE_URL',
  profile: 'SERPPRO_PROFILE',
  verifyTls: 'SERPPRO_VERIFY_TLS',
  timeoutMs: 'SERPPRO_TIMEOUT_MS',
  maxAttempts: 'SERPPRO_MAX_ATTEMPTS',
  logLevel: 'LOG_LEVEL',
};

const isConfigKey = (field: string): field is keyof ClientConfigType =>
  Object.prototype.hasOwnProperty.call(ENV_VARIABLES, field);

/**
 * Reads client settings from the environment.
 * Empty variables count as unset.
 * @throws SerpProConfigError listing every invalid variable
 */
export const createClientConfig = (env: EnvSource = process.env): ClientConfigType => {
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value === undefined || value === '' ? undefined : value;
  };

  const rawConfig = {
    apiKey: read(ENV_VARIABLES.apiKey),
    baseUrl: read(ENV_VARIABLES.baseUrl),
    profile: read(ENV_VARIABLES.profile),
    verifyTls: read(ENV_VARIABLES.verifyTls)?.toLowerCase(),
    timeoutMs: read(ENV_VARIABLES.timeoutMs),
    maxAttempts: read(ENV_VARIABLES.maxAttempts),
    logLevel: read(ENV_VARIABLES.logLevel)?.toLowerCase(),
  };

  const parsed = ClientConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    // Report variable names rather than config keys
    const issues = toValidationIssues(parsed.error).map((issue) => ({
      ...issue,
      field: isConfigKey(issue.field) ? ENV_VARIABLES[issue.field] : issue.field,
    }));
    logger.error({ issues }, 'Invalid SerpPro configuration');
    throw new SerpProConfigError(issues);
  }

  logger.setLevel(parsed.data.logLevel);
  logger.debug(
    { baseUrl: parsed.data.baseUrl, profile: parsed.data.profile },
    'Loaded SerpPro client configuration'
  );
  return parsed.data;
};
