import type {
  ConnectivityCheck,
  HttpTransport as CoreHttpTransport,
  Logger as CoreLogger,
} from '@libs/http-client-core';

/**
 * ACLED API Client Types
 *
 * Configuration, error and response types shared by the authenticator and the
 * paginated query client.
 */

// ============================================================================
// Errors
// ============================================================================

export class ApiRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly responseBody?: string,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'ApiRequestError';
  }
}

/** Transport or HTTP failure: non-2xx after retries, unparseable body, missing fields. */
export class AcledRequestError extends ApiRequestError {
  constructor(message: string, status: number, responseBody?: string, retryAfterMs?: number) {
    super(message, status, responseBody, retryAfterMs);
    this.name = 'AcledRequestError';
  }
}

/** Raised for a malformed argument before any request is issued. */
export class AcledValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = 'AcledValidationError';
  }
}

export class AcledConnectivityError extends Error {
  constructor(message = 'No internet connection detected.') {
    super(message);
    this.name = 'AcledConnectivityError';
  }
}

export type AcledClientError = AcledRequestError | AcledValidationError | AcledConnectivityError;

export function isAcledClientError(error: unknown): error is AcledClientError {
  return (
    error instanceof AcledRequestError ||
    error instanceof AcledValidationError ||
    error instanceof AcledConnectivityError
  );
}

// ============================================================================
// Core Client Configuration
// ============================================================================

export interface Logger extends CoreLogger {}

export type HttpTransport = CoreHttpTransport;

export type QueryParamValue = string | number;
export type QueryParams = Record<string, QueryParamValue | undefined>;

export interface RequestOptions extends Omit<RequestInit, 'body' | 'method' | 'headers'> {
  method?: string;
  body?: RequestInit['body'];
  headers?: Record<string, string>;
  params?: QueryParams;
  timeoutMs?: number;
}

export interface AcledProgressEvent {
  page: number;
  pageCount: number;
  rowsRetrieved: number;
  totalCount: number;
}

export interface AcledClientConfig {
  /** Data endpoint (default: https://acleddata.com/api/acled/read) */
  dataUrl?: string;
  /** OAuth token endpoint (default: https://acleddata.com/oauth/token) */
  tokenUrl?: string;
  userAgent?: string;
  /** Total attempts per request, first try included (default: 3) */
  maxAttempts?: number;
  baseRetryDelayMs?: number;
  /** Per-attempt timeout. Unset means the transport's own behaviour applies. */
  timeoutMs?: number;
  logger?: Logger;
  transport?: HttpTransport;
  /** Called with the host of each endpoint before it is hit. Defaults to a DNS lookup. */
  connectivityCheck?: ConnectivityCheck;
  /** Called after every page of a pull, including the first. */
  onProgress?: (event: AcledProgressEvent) => void;
}

// ============================================================================
// OAuth2 Token Types
// ============================================================================

export interface AcledCredentials {
  /** Email address of the ACLED account */
  username: string;
  password: string;
}

/**
 * Token endpoint body. Only `access_token` is guaranteed; `refresh_token`,
 * `token_type` and `expires_in` are passed through as the server sends them.
 */
export interface AcledTokenResponse {
  access_token: string;
  [key: string]: unknown;
}

// ============================================================================
// Data Response Types
// ============================================================================

/** One event row, keyed by ACLED column name (event_id_cnty, event_date, ...). */
export interface AcledEventRow {
  [field: string]: unknown;
}

export interface AcledPageResponse {
  count: number;
  total_count: number;
  data: AcledEventRow[];
}

export type AcledDataResult =
  | {
      status: 'rows';
      rows: AcledEventRow[];
      totalCount: number;
      pageCount: number;
      warnings: string[];
    }
  | {
      status: 'empty';
      rows: [];
      warnings: string[];
    }
  | {
      status: 'error';
      error: AcledClientError;
      warnings: string[];
    };
