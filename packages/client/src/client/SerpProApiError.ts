import { SerpProError, SerpProErrorType, type GlobalErrorModel } from '@serppro/shared';

export const TRANSPORT_STATUS_CODE = 0;

/**
 * Failure reported by, or on the way to, the SerpPro API.
 * statusCode 0 means the remote was never reached.
 */
export class SerpProApiError extends SerpProError {
  public readonly statusCode: number;
  public readonly errorModel?: GlobalErrorModel;

  constructor(
    statusCode: number,
    message: string,
    options: { errorModel?: GlobalErrorModel; type?: SerpProErrorType; cause?: unknown } = {}
  ) {
    super(message, options.type ?? SerpProApiError.typeForStatus(statusCode), { cause: options.cause });
    this.name = 'SerpProApiError';
    this.statusCode = statusCode;
    this.errorModel = options.errorModel;
  }

  static typeForStatus(statusCode: number): SerpProErrorType {
    if (statusCode === TRANSPORT_STATUS_CODE) return SerpProErrorType.TRANSPORT;
    if (statusCode === 401 || statusCode === 403) return SerpProErrorType.AUTHENTICATION;
    if (statusCode === 404) return SerpProErrorType.NOT_FOUND;
    if (statusCode === 422) return SerpProErrorType.VALIDATION;
    if (statusCode >= 500) return SerpProErrorType.SERVER;
    return SerpProErrorType.HTTP;
  }

  /** The remote could not be reached at all (DNS, connection, TLS, timeout) */
  isTransportError(): boolean {
    return this.statusCode === TRANSPORT_STATUS_CODE;
  }

  /** The remote answered with a non-200 status */
  isRemoteError(): boolean {
    return this.statusCode !== TRANSPORT_STATUS_CODE;
  }

  toString(): string {
    return `API Error ${this.statusCode}: ${this.message}`;
  }
}
