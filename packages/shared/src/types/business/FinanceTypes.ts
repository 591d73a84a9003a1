/**
 * Finance (usage statistics) types
 */

import type { ApiDate } from './WordstatTypes';

export enum ServiceType {
  WORDSTAT_FREQUENCY = 'WordstatFrequency',
  WORDSTAT_DIRECT_FREQUENCY = 'WordstatDirectFrequency',
  WORDSTAT_DEEP = 'WordstatDeep',
  WORDSTAT_DIRECT_DEEP = 'WordstatDirectDeep',
  WORDSTAT_HISTORY = 'WordstatHistory',
  YANDEX_SERP_POSITION = 'YandexSerpPosition',
  GOOGLE_SERP_POSITION = 'GoogleSerpPosition',
  YANDEX_INDEXATION = 'YandexIndexation',
  GOOGLE_INDEXATION = 'GoogleIndexation',
  YANDEX_SERP_URLS = 'YandexSerpUrls',
  GOOGLE_SERP_URLS = 'GoogleSerpUrls',
}

export interface FinanceStatsRequest {
  service_type?: ServiceType;
  start_date?: string;
  end_date?: string;
}

export interface FinanceTotalParams {
  service?: ServiceType;
}

export interface FinanceStatsResponse {
  request_count: number;
}

export interface FinanceStatsOptions {
  serviceType?: ServiceType;
  startDate?: ApiDate;
  endDate?: ApiDate;
}
