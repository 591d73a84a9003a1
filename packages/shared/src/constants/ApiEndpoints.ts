/**
 * SerpPro API endpoint paths
 * Relative to the client's base URL
 */

export const DEFAULT_BASE_URL = 'https://moab-apis.ru';

export const API_BASE = {
  V1: '/api/v1',
} as const;

export const WORDSTAT_ENDPOINTS = {
  FREQUENCY: `${API_BASE.V1}/wordstat/frequency`,
  DEEP: `${API_BASE.V1}/wordstat/deep`,
  HISTORY: `${API_BASE.V1}/wordstat/history`,
} as const;

export const REGION_ENDPOINTS = {
  YANDEX: `${API_BASE.V1}/region/yandex`,
  GOOGLE: `${API_BASE.V1}/region/google`,
  CHECK: `${API_BASE.V1}/region/check`,
} as const;

export const FINANCE_ENDPOINTS = {
  TOTAL: `${API_BASE.V1}/finance/total`,
  STATISTICS: `${API_BASE.V1}/finance/statistics`,
} as const;

export const API_KEY_HEADER = 'X-Api-Key';
