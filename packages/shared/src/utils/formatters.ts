/**
 * Formatting helpers for values sent to the SerpPro API
 */

import { format, isValid, parse } from 'date-fns';

export const API_DATE_FORMAT = 'yyyy-MM-dd';

const API_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Checks that a string is a real calendar date in YYYY-MM-DD form.
 * '2025-02-30' and '2025-2-3' are both rejected.
 */
export function isApiDateString(value: string): boolean {
  if (!API_DATE_PATTERN.test(value)) return false;
  return isValid(parse(value, API_DATE_FORMAT, new Date()));
}

/**
 * Renders a request date the way the API expects it. Strings are passed through
 * untouched; Date objects are formatted in local time.
 */
export function formatApiDate(value: string | Date): string {
  return typeof value === 'string' ? value : format(value, API_DATE_FORMAT);
}

/**
 * Joins region codes into the comma-separated list the Wordstat endpoints take.
 * Whitespace around individual codes is dropped.
 */
export function joinRegionCodes(codes: ReadonlyArray<string | number>): string {
  return codes.map((code) => String(code).trim()).join(',');
}

/**
 * Strips trailing slashes so paths can be appended with a leading '/'.
 */
export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, '');
}
