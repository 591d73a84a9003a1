/**
 * Types barrel export
 */

export * from './business/WordstatTypes';
export * from './business/RegionTypes';
export * from './business/FinanceTypes';
export * from './common/ErrorTypes';
