/**
 * Error type definitions for the SerpPro SDK
 */

export enum SerpProErrorType {
  VALIDATION = 'VALIDATION_ERROR',
  CONFIGURATION = 'CONFIGURATION_ERROR',
  AUTHENTICATION = 'AUTHENTICATION_ERROR',
  NOT_FOUND = 'NOT_FOUND_ERROR',
  SERVER = 'SERVER_ERROR',
  HTTP = 'HTTP_ERROR',
  TRANSPORT = 'TRANSPORT_ERROR',
  TIMEOUT = 'TIMEOUT_ERROR',
  PARSING = 'PARSING_ERROR',
}

/** Structured error body the API returns alongside non-2xx statuses (422 in particular) */
export interface GlobalErrorModel {
  id?: string;
  error_message?: string;
  instance?: string;
  invalid_data?: string[];
}

export interface ValidationIssue {
  field: string;
  message: string;
}

export class SerpProError extends Error {
  public readonly type: SerpProErrorType;

  constructor(message: string, type: SerpProErrorType, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SerpProError';
    this.type = type;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Caller input rejected while building a request. Raised before anything is sent.
 */
export class SerpProValidationError extends SerpProError {
  public readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(
      `Invalid request: ${issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ')}`,
      SerpProErrorType.VALIDATION
    );
    this.name = 'SerpProValidationError';
    this.issues = issues;
  }
}

export class SerpProConfigError extends SerpProError {
  public readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(
      `Invalid SerpPro configuration:\n${issues.map((issue) => `${issue.field}: ${issue.message}`).join('\n')}`,
      SerpProErrorType.CONFIGURATION
    );
    this.name = 'SerpProConfigError';
    this.issues = issues;
  }
}
