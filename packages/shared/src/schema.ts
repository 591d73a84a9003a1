import { z } from 'zod';
import {
  WordstatDevice,
  WordstatGrouping,
  WordstatSyntax,
  WordstatTaskType,
  type DeepRequest,
  type FrequencyRequest,
  type HistoryRequest,
} from './types/business/WordstatTypes';
import {
  RegionSearchType,
  SearchSystem,
  type RegionCheckParams,
  type RegionSearchParams,
} from './types/business/RegionTypes';
import {
  ServiceType,
  type FinanceStatsRequest,
  type FinanceTotalParams,
} from './types/business/FinanceTypes';
import { SerpProValidationError, type ValidationIssue } from './types/common/ErrorTypes';
import { formatApiDate, isApiDateString, joinRegionCodes } from './utils/formatters';

export const HISTORY_QUERY_MAX_LENGTH = 3000;
export const REGION_QUERY_MAX_LENGTH = 500;

// ── Field schemas ──

const apiDateSchema = z
  .union([
    z.string().refine(isApiDateString, 'Expected a date in YYYY-MM-DD format'),
    z.date().refine((date) => !isNaN(date.getTime()), 'Invalid date'),
  ])
  .transform(formatApiDate);

const regionCodeSchema = z.union([z.string(), z.number().int().nonnegative()]);

const regionSchema = z
  .union([
    z.string().transform((value) => value.split(',')),
    z.array(regionCodeSchema),
  ])
  .pipe(
    z
      .array(regionCodeSchema.refine((code) => String(code).trim() !== '', 'Region code cannot be empty'))
      .min(1, 'At least one region code is required')
  )
  .transform(joinRegionCodes);

const deviceSchema = z.nativeEnum(WordstatDevice).default(WordstatDevice.ALL);
const taskTypeSchema = z.nativeEnum(WordstatTaskType).default(WordstatTaskType.REGULAR);

/** Response fields may come back as null; both null and a missing key decode as absent */
const optionalField = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullish().transform((value) => value ?? undefined);

// ── Request schemas (caller options → wire records) ──

export const frequencyRequestSchema = z
  .object({
    query: z.string().optional(),
    region: regionSchema.optional(),
    device: deviceSchema,
    taskType: taskTypeSchema,
    syntax: z.nativeEnum(WordstatSyntax).default(WordstatSyntax.WS),
  })
  .strict()
  .transform(
    (options): FrequencyRequest => ({
      ...(options.query !== undefined ? { query: options.query } : {}),
      ...(options.region !== undefined ? { region: options.region } : {}),
      device: options.device,
      task_type: options.taskType,
      syntax: options.syntax,
    })
  );

export const deepRequestSchema = z
  .object({
    query: z.string().optional(),
    region: regionSchema.optional(),
    device: deviceSchema,
    taskType: taskTypeSchema,
  })
  .strict()
  .transform(
    (options): DeepRequest => ({
      ...(options.query !== undefined ? { query: options.query } : {}),
      ...(options.region !== undefined ? { region: options.region } : {}),
      device: options.device,
      task_type: options.taskType,
    })
  );

export const historyRequestSchema = z
  .object({
    query: z
      .string({ required_error: 'Query is required' })
      .min(1, `Query must be between 1 and ${HISTORY_QUERY_MAX_LENGTH} characters`)
      .max(HISTORY_QUERY_MAX_LENGTH, `Query must be between 1 and ${HISTORY_QUERY_MAX_LENGTH} characters`),
    region: regionSchema.optional(),
    device: deviceSchema,
    grouping: z.nativeEnum(WordstatGrouping).default(WordstatGrouping.MONTH),
    startDate: apiDateSchema.optional(),
    endDate: apiDateSchema.optional(),
  })
  .strict()
  .transform(
    (options): HistoryRequest => ({
      query: options.query,
      ...(options.region !== undefined ? { region: options.region } : {}),
      device: options.device,
      grouping: options.grouping,
      ...(options.startDate !== undefined ? { start_date: options.startDate } : {}),
      ...(options.endDate !== undefined ? { end_date: options.endDate } : {}),
    })
  );

export const financeStatsRequestSchema = z
  .object({
    serviceType: z.nativeEnum(ServiceType).optional(),
    startDate: apiDateSchema.optional(),
    endDate: apiDateSchema.optional(),
  })
  .strict()
  .transform(
    (options): FinanceStatsRequest => ({
      ...(options.serviceType !== undefined ? { service_type: options.serviceType } : {}),
      ...(options.startDate !== undefined ? { start_date: options.startDate } : {}),
      ...(options.endDate !== undefined ? { end_date: options.endDate } : {}),
    })
  );

const regionTextSchema = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .min(1, `${field} must be between 1 and ${REGION_QUERY_MAX_LENGTH} characters`)
    .max(REGION_QUERY_MAX_LENGTH, `${field} must be between 1 and ${REGION_QUERY_MAX_LENGTH} characters`);

export const regionSearchParamsSchema = z
  .object({ query: regionTextSchema('Query') })
  .strict()
  .transform((params): RegionSearchParams => ({ query: params.query }));

export const regionCheckParamsSchema = z
  .object({
    code: regionTextSchema('Code'),
    searchSystem: z.nativeEnum(SearchSystem),
    searchType: z.nativeEnum(RegionSearchType),
  })
  .strict()
  .transform(
    (params): RegionCheckParams => ({
      code: params.code,
      searchSystem: params.searchSystem,
      searchType: params.searchType,
    })
  );

export const financeTotalParamsSchema = z
  .object({ service: z.nativeEnum(ServiceType).optional() })
  .strict()
  .transform(
    (params): FinanceTotalParams => (params.service !== undefined ? { service: params.service } : {})
  );

// ── Response schemas ──

export const wordstatItemDataSchema = z.object({
  frequency: optionalField(z.string()),
  phrase: optionalField(z.string()),
});

export const historyResponseItemSchema = z.object({
  date: optionalField(z.string()),
  frequency: optionalField(z.number().int()),
  all_requests_percentage: optionalField(z.number()),
});

export const frequencyResponseSchema = z.object({
  frequency: optionalField(z.number().int()),
  date: optionalField(z.string()),
});

export const deepResponseSchema = z.object({
  associations: optionalField(z.array(wordstatItemDataSchema)),
  popular: optionalField(z.array(wordstatItemDataSchema)),
  date: optionalField(z.string()),
});

export const historyResponseSchema = z.object({
  items: optionalField(z.array(historyResponseItemSchema)),
  date: optionalField(z.string()),
});

export const regionResponseSchema = z.object({
  name: optionalField(z.string()),
  code: optionalField(z.string()),
});

export const regionListResponseSchema = z.array(regionResponseSchema);

export const financeStatsResponseSchema = z.object({
  request_count: z.number().int().default(0),
});

export const globalErrorModelSchema = z.object({
  id: optionalField(z.string()),
  error_message: optionalField(z.string()),
  instance: optionalField(z.string()),
  invalid_data: optionalField(z.array(z.string())),
});

// ── Helpers ──

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'request',
    message: issue.message,
  }));
}

/**
 * Validates caller input against a request schema and returns the wire record.
 * @throws SerpProValidationError listing every rejected field
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new SerpProValidationError(toValidationIssues(result.error));
  }
  return result.data;
}
