/**
 * @libs/acled-client
 *
 * ACLED API Client Library
 *
 * Typed access to the ACLED (Armed Conflict Location & Event Data) API:
 * - OAuth password-grant token exchange
 * - Validated, filtered event queries with server-side comparison operators
 * - Sequential pagination into one concatenated table
 * - Region and interaction code tables, release-calendar helper
 *
 * ## Usage
 *
 * ```typescript
 * import { createAcledClient, getAcledEndDateString } from '@libs/acled-client';
 *
 * const client = createAcledClient();
 * const { access_token } = await client.requestToken({
 *   username: 'analyst@example.org',
 *   password: process.env.ACLED_PASSWORD ?? '',
 * });
 *
 * const result = await client.fetchEvents(access_token, {
 *   country: 'France',
 *   eventDate: `2024-01-01|${getAcledEndDateString()}`,
 *   eventDateWhere: 'BETWEEN',
 * });
 *
 * if (result.status === 'rows') {
 *   console.log(`${result.rows.length} events`);
 * }
 * ```
 *
 * ## Environment Variables
 *
 * All optional:
 * - `ACLED_API_URL` - Data endpoint (default: https://acleddata.com/api/acled/read)
 * - `ACLED_TOKEN_URL` - Token endpoint (default: https://acleddata.com/oauth/token)
 * - `ACLED_USER_AGENT` - User-Agent header
 * - `ACLED_MAX_ATTEMPTS` - Attempts per request (default: 3)
 * - `ACLED_RETRY_DELAY_MS` - Base retry delay in ms (default: 500)
 * - `ACLED_TIMEOUT_MS` - Per-attempt timeout in ms (default: none)
 */

// ============================================================================
// Primary API - Client and Factory
// ============================================================================

export {
  AcledClient,
  createAcledClient,
  getAcledApiToken,
  getAcledData,
  DEFAULT_DATA_URL,
  DEFAULT_TOKEN_URL,
  DEFAULT_USER_AGENT,
  EMPTY_RESULT_WARNING,
} from './acledClient';

export {
  acledQuerySchema,
  validateAcledQuery,
  buildAcledQuery,
  ACLED_WIRE_NAMES,
  WHERE_OPERATORS,
  DEFAULT_LIMIT,
  FORMAT_COERCION_WARNING,
} from './queryParams';

export {
  getAcledRegionCodes,
  getAcledRegionTable,
  getAcledRegionName,
  getAcledInterCodes,
  getAcledInterCodesTable,
  getAcledInterName,
} from './codeTables';

export { getAcledEndDate, getAcledEndDateString } from './releaseCalendar';

// ============================================================================
// Type Exports
// ============================================================================

export type {
  AcledClientConfig,
  AcledCredentials,
  AcledTokenResponse,
  AcledEventRow,
  AcledPageResponse,
  AcledDataResult,
  AcledProgressEvent,
  AcledClientError,
  Logger,
  HttpTransport,
  QueryParams,
} from './types';

export type { AcledQueryParams, AcledQuery, AcledQueryValidation, WhereOperator } from './queryParams';
export type { CodeLookup, RegionTableRow, InterCodeTableRow } from './codeTables';

// ============================================================================
// Error Exports
// ============================================================================

export {
  ApiRequestError,
  AcledRequestError,
  AcledValidationError,
  AcledConnectivityError,
  isAcledClientError,
} from './types';
