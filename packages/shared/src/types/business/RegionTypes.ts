/**
 * Region lookup types
 */

export enum SearchSystem {
  YANDEX = 'Yandex',
  GOOGLE = 'Google',
}

export enum RegionSearchType {
  NAME = 'Name',
  CODE = 'Code',
}

export interface RegionResponse {
  name?: string;
  code?: string;
}

export interface RegionCheckOptions {
  code: string;
  searchSystem: SearchSystem;
  searchType: RegionSearchType;
}

// Query-string parameters, named as the API expects them
export interface RegionSearchParams {
  query: string;
}

export interface RegionCheckParams {
  code: string;
  searchSystem: SearchSystem;
  searchType: RegionSearchType;
}
