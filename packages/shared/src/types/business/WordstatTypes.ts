/**
 * Wordstat Type Definitions
 * Vocabularies and wire records for the frequency, deep and history endpoints
 */

export enum WordstatDevice {
  ALL = 'All',
  DESKTOP = 'Desktop',
  PHONE = 'Phone',
  TABLET = 'Tablet',
}

/** Regular = plain Wordstat, Direct = Yandex.Direct statistics (device is ignored remotely) */
export enum WordstatTaskType {
  REGULAR = 'Regular',
  DIRECT = 'Direct',
}

export enum WordstatSyntax {
  NONE = 'None',
  WS = 'Ws',
  QUOTES = 'Quotes',
  QUOTES_EXCLAMATION_MARK = 'QuotesExclamationMark',
  QUOTES_SQUARE_BRACKETS = 'QuotesSquareBrackets',
  QUOTES_EXCLAMATION_MARK_SQUARE_BRACKETS = 'QuotesExclamationMarkSquareBrackets',
}

export enum WordstatGrouping {
  DAY = 'Day',
  WEEK = 'Week',
  MONTH = 'Month',
  // Only understood by the Wordstat-only endpoint family
  NONE = 'None',
}

// Wordstat API Request Types
export interface FrequencyRequest {
  query?: string;
  region?: string; // Comma-separated region codes: '225' or '225,213'
  device: WordstatDevice;
  task_type: WordstatTaskType;
  syntax: WordstatSyntax;
}

export interface DeepRequest {
  query?: string;
  region?: string;
  device: WordstatDevice;
  task_type: WordstatTaskType;
}

export interface HistoryRequest {
  query: string;
  region?: string;
  device: WordstatDevice;
  grouping: WordstatGrouping;
  start_date?: string; // YYYY-MM-DD
  end_date?: string;
}

// Wordstat API Response Types
export interface WordstatItemData {
  frequency?: string;
  phrase?: string;
}

export interface HistoryResponseItem {
  date?: string;
  frequency?: number;
  all_requests_percentage?: number;
}

export interface FrequencyResponse {
  frequency?: number;
  date?: string;
}

export interface DeepResponse {
  associations?: WordstatItemData[];
  popular?: WordstatItemData[];
  date?: string;
}

export interface HistoryResponse {
  items?: HistoryResponseItem[];
  date?: string;
}

/** Region codes as a single comma-separated string or a list of codes */
export type RegionCodes = string | ReadonlyArray<string | number>;

/** Dates are sent as YYYY-MM-DD; Date objects are formatted on the way out */
export type ApiDate = string | Date;

// Caller-facing options (camelCase), mapped onto the wire records by the request builder
export interface FrequencyOptions {
  query?: string;
  region?: RegionCodes;
  device?: WordstatDevice;
  taskType?: WordstatTaskType;
  syntax?: WordstatSyntax;
}

export interface DeepOptions {
  query?: string;
  region?: RegionCodes;
  device?: WordstatDevice;
  taskType?: WordstatTaskType;
}

export interface HistoryOptions {
  query: string;
  region?: RegionCodes;
  device?: WordstatDevice;
  grouping?: WordstatGrouping;
  startDate?: ApiDate;
  endDate?: ApiDate;
}
