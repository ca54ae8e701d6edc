import { setTimeout as sleep } from 'timers/promises';
import { z } from 'zod';
import { ConsoleLogger, createDnsConnectivityCheck } from '@libs/http-client-core';
import type { ConnectivityCheck } from '@libs/http-client-core';
import { buildAcledQuery, validateAcledQuery } from './queryParams';
import type { AcledQuery, AcledQueryParams } from './queryParams';
import {
  AcledConnectivityError,
  AcledRequestError,
  AcledValidationError,
  ApiRequestError,
  isAcledClientError,
} from './types';
import type {
  AcledClientConfig,
  AcledCredentials,
  AcledDataResult,
  AcledEventRow,
  AcledPageResponse,
  AcledProgressEvent,
  AcledTokenResponse,
  HttpTransport,
  Logger,
  QueryParams,
  RequestOptions,
} from './types';

export const DEFAULT_DATA_URL = 'https://acleddata.com/api/acled/read';
export const DEFAULT_TOKEN_URL = 'https://acleddata.com/oauth/token';
export const DEFAULT_USER_AGENT = 'acled-api-client/0.1.0';
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_RETRY_DELAY_MS = 500;

export const EMPTY_RESULT_WARNING = 'No data matched the specified filters.';

// Only access_token is checked; the rest of the body is passed back untouched.
const tokenResponseSchema = z.object({ access_token: z.string().min(1) }).passthrough();

const countSchema = z.union([z.number().int().nonnegative(), z.string().regex(/^\d+$/).transform(Number)]);

const pageResponseSchema = z.object({
  count: countSchema,
  total_count: countSchema,
  data: z.array(z.record(z.string(), z.unknown())),
});

/**
 * ACLED API Client
 *
 * Exchanges account credentials for an OAuth token and pulls event data from
 * the `read` endpoint, walking every page of a query sequentially.
 *
 * The client holds no token and no per-query state; every call is a fresh
 * round trip.
 */
export class AcledClient {
  private readonly dataUrl: string;
  private readonly tokenUrl: string;
  private readonly userAgent: string;
  private readonly maxAttempts: number;
  private readonly baseRetryDelayMs: number;
  private readonly timeoutMs?: number;
  private readonly logger: Logger;
  private readonly transport: HttpTransport;
  private readonly connectivityCheck: ConnectivityCheck;
  private readonly onProgress?: (event: AcledProgressEvent) => void;

  constructor(config: AcledClientConfig = {}) {
    this.dataUrl = config.dataUrl ?? DEFAULT_DATA_URL;
    this.tokenUrl = config.tokenUrl ?? DEFAULT_TOKEN_URL;
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
    this.maxAttempts = Math.max(1, Math.floor(config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS));
    this.baseRetryDelayMs = config.baseRetryDelayMs ?? DEFAULT_BASE_RETRY_DELAY_MS;
    this.timeoutMs = config.timeoutMs;
    this.logger = config.logger ?? new ConsoleLogger('AcledClient');
    this.transport = config.transport ?? ((url, init) => fetch(url, init));
    this.connectivityCheck = config.connectivityCheck ?? createDnsConnectivityCheck();
    this.onProgress = config.onProgress;
  }

  // ==========================================================================
  // OAuth2 Token
  // ==========================================================================

  /**
   * Exchange account credentials for an access/refresh token pair.
   *
   * @throws AcledValidationError when a credential is empty
   * @throws AcledConnectivityError when the network is unreachable
   * @throws AcledRequestError on a non-2xx response or a body without `access_token`
   */
  async requestToken(credentials: AcledCredentials): Promise<AcledTokenResponse> {
    const { username, password } = credentials;
    if (typeof username !== 'string' || username === '') {
      throw new AcledValidationError('username', '`username` must be a non-empty string.');
    }
    if (typeof password !== 'string' || password === '') {
      throw new AcledValidationError('password', '`password` must be a non-empty string.');
    }
    await this.assertOnline(this.tokenUrl);

    const body = new FormData();
    body.append('username', username);
    body.append('password', password);
    body.append('grant_type', 'password');
    body.append('client_id', 'acled');

    let text: string;
    try {
      text = await this.requestWithRetries(this.tokenUrl, { method: 'POST', body }, readBody);
    } catch (error) {
      if (error instanceof AcledRequestError && error.status > 0) {
        throw new AcledRequestError(
          `Authentication failed (HTTP ${error.status}): ${error.responseBody || 'Invalid credentials'}`,
          error.status,
          error.responseBody,
          error.retryAfterMs,
        );
      }
      throw error;
    }

    const parsed = tokenResponseSchema.safeParse(parseJsonOrUndefined(text));
    if (!parsed.success) {
      throw new AcledRequestError(
        'Authentication response missing access_token. Check your credentials.',
        200,
        text,
      );
    }

    return parsed.data;
  }

  // ==========================================================================
  // Event Data
  // ==========================================================================

  /**
   * Pull every page matching `params` and concatenate the rows.
   *
   * Validation, connectivity and HTTP failures come back as
   * `{ status: 'error' }`; a failed page discards the pages before it. Errors
   * thrown by an injected `connectivityCheck` or `onProgress` propagate.
   */
  async fetchEvents(accessToken: string, params: AcledQueryParams = {}): Promise<AcledDataResult> {
    const validation = validateAcledQuery(accessToken, params);
    const warnings = [...validation.warnings];
    for (const warning of warnings) {
      this.logger.warn?.(warning);
    }
    if (!validation.success) {
      return { status: 'error', error: validation.error, warnings };
    }

    try {
      await this.assertOnline(this.dataUrl);
      return await this.pullPages(accessToken, validation.query, warnings);
    } catch (error) {
      if (isAcledClientError(error)) {
        this.logger.error?.(`ACLED pull failed: ${error.message}`);
        return { status: 'error', error, warnings };
      }
      throw error;
    }
  }

  /**
   * Throwing variant of {@link fetchEvents}: resolves the rows, `[]` when the
   * filters match nothing.
   */
  async getData(accessToken: string, params: AcledQueryParams = {}): Promise<AcledEventRow[]> {
    const result = await this.fetchEvents(accessToken, params);
    if (result.status === 'error') {
      throw result.error;
    }
    return result.rows;
  }

  private async pullPages(
    accessToken: string,
    query: AcledQuery,
    warnings: string[],
  ): Promise<AcledDataResult> {
    const first = await this.fetchPage(accessToken, query, 1);

    if (first.total_count === 0 || first.count === 0) {
      warnings.push(EMPTY_RESULT_WARNING);
      this.logger.warn?.(EMPTY_RESULT_WARNING);
      return { status: 'empty', rows: [], warnings };
    }

    const totalCount = first.total_count;
    const pageCount = Math.ceil(totalCount / first.count);
    const pages: AcledEventRow[][] = [first.data];
    let rowsRetrieved = first.data.length;
    this.reportProgress({ page: 1, pageCount, rowsRetrieved, totalCount });

    if (pageCount > 1) {
      this.logger.info?.(`Retrieving ${totalCount} records across ${pageCount} pages...`);
    }

    for (let page = 2; page <= pageCount; page += 1) {
      const response = await this.fetchPage(accessToken, query, page);
      pages.push(response.data);
      rowsRetrieved += response.data.length;
      this.reportProgress({ page, pageCount, rowsRetrieved, totalCount });
    }

    const rows = pages.flat();
    if (rows.length !== totalCount) {
      const mismatch = `Retrieved ${rows.length} records but the API reported ${totalCount}.`;
      warnings.push(mismatch);
      this.logger.warn?.(mismatch);
    }
    this.logger.info?.(`Successfully retrieved ${rows.length} records.`);

    return { status: 'rows', rows, totalCount, pageCount, warnings };
  }

  private async fetchPage(accessToken: string, query: AcledQuery, page: number): Promise<AcledPageResponse> {
    const params = buildAcledQuery(accessToken, query, page);

    let text: string;
    try {
      text = await this.requestWithRetries(
        this.dataUrl,
        {
          method: 'GET',
          params,
          headers: {
            Authorization: `Bearer ${accessToken}`,
            Accept: 'application/json',
          },
        },
        readBody,
      );
    } catch (error) {
      if (error instanceof AcledRequestError && error.status > 0) {
        throw new AcledRequestError(
          `API request failed (HTTP ${error.status}) on page ${page}: ${error.responseBody || 'Unknown error'}`,
          error.status,
          error.responseBody,
          error.retryAfterMs,
        );
      }
      throw error;
    }

    const parsed = pageResponseSchema.safeParse(parseJsonOrUndefined(text));
    if (!parsed.success) {
      throw new AcledRequestError(
        `Unexpected response structure on page ${page}: missing \`count\`, \`total_count\` or \`data\`.`,
        200,
        text,
      );
    }

    return parsed.data;
  }

  private reportProgress(event: AcledProgressEvent): void {
    this.logger.debug?.(`Fetched page ${event.page}/${event.pageCount}`, event);
    this.onProgress?.(event);
  }

  private async assertOnline(endpoint: string): Promise<void> {
    if (!(await this.connectivityCheck(new URL(endpoint).hostname))) {
      throw new AcledConnectivityError();
    }
  }

  // ==========================================================================
  // HTTP
  // ==========================================================================

  private async requestWithRetries<T>(
    endpoint: string,
    options: RequestOptions,
    parser: (response: Response) => Promise<T>,
  ): Promise<T> {
    const method = (options.method ?? 'GET').toUpperCase();
    const url = this.buildUrl(endpoint, options.params);
    const { params: _params, timeoutMs = this.timeoutMs, body, headers, ...rest } = options;
    const init: RequestInit = {
      ...rest,
      method,
      headers: {
        'User-Agent': this.userAgent,
        Accept: 'application/json',
        ...headers,
      },
      body: body ?? null,
    };

    for (let attempt = 0; attempt < this.maxAttempts; attempt += 1) {
      try {
        return await this.executeHttp(url, init, timeoutMs, async (response) => {
          if (!response.ok) {
            throw new AcledRequestError(
              `ACLED request failed with status ${response.status}`,
              response.status,
              await safeReadBody(response),
              parseRetryAfter(response),
            );
          }
          return parser(response);
        });
      } catch (err) {
        const error =
          err instanceof ApiRequestError
            ? err
            : new AcledRequestError(err instanceof Error ? err.message : 'ACLED request failed', 0);

        if (!shouldRetry(error.status) || attempt === this.maxAttempts - 1) {
          throw error;
        }

        await this.waitForRetry(error, attempt, method, endpoint);
      }
    }

    throw new AcledRequestError('ACLED request exceeded retries', 0);
  }

  /**
   * Send one attempt and hand the response to `handle`. The timeout covers
   * the body read as well as the headers.
   */
  private async executeHttp<T>(
    url: string,
    init: RequestInit,
    timeoutMs: number | undefined,
    handle: (response: Response) => Promise<T>,
  ): Promise<T> {
    const send = async (signalInit: RequestInit): Promise<T> => handle(await this.transport(url, signalInit));

    if (!timeoutMs) {
      try {
        return await send(init);
      } catch (error) {
        throw toAttemptError(error);
      }
    }

    const controller = new AbortController();
    const timedOut = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(new Error(`Request timed out after ${timeoutMs}ms`)),
        { once: true },
      );
    });
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await Promise.race([send({ ...init, signal: controller.signal }), timedOut]);
    } catch (error) {
      throw toAttemptError(error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private buildUrl(endpoint: string, params?: QueryParams): string {
    const url = new URL(endpoint);
    if (params) {
      const entries = Object.entries(params).filter(([, value]) => value !== undefined);
      entries.sort(([a], [b]) => a.localeCompare(b));
      for (const [key, value] of entries) {
        url.searchParams.append(key, String(value));
      }
    }
    return url.toString();
  }

  private async waitForRetry(
    error: ApiRequestError,
    attempt: number,
    method: string,
    endpoint: string,
  ): Promise<void> {
    const delayMs =
      error.retryAfterMs && error.retryAfterMs > 0
        ? error.retryAfterMs
        : computeBackoffWithJitter(this.baseRetryDelayMs, attempt);

    this.logger.warn?.(
      `[AcledClient] Retrying ${method} ${endpoint} after ${Math.round(delayMs)}ms due to status ${error.status}`,
    );

    await sleep(delayMs);
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

function toAttemptError(error: unknown): ApiRequestError {
  if (error instanceof ApiRequestError) {
    return error;
  }
  return new AcledRequestError(
    `ACLED request failed: ${error instanceof Error ? error.message : 'network error'}`,
    0,
  );
}

function shouldRetry(status: number): boolean {
  return status === 0 || status === 429 || status === 500 || status === 502 || status === 503 || status === 504;
}

async function readBody(response: Response): Promise<string> {
  return response.text();
}

async function safeReadBody(response: Response): Promise<string | undefined> {
  try {
    return await response.text();
  } catch {
    return undefined;
  }
}

function parseJsonOrUndefined(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function computeBackoffWithJitter(baseMs: number, attempt: number): number {
  const exp = baseMs * 2 ** attempt;
  const jitter = Math.random() * baseMs;
  return exp + jitter;
}

function parseRetryAfter(res: Response): number | undefined {
  const header = res.headers.get('retry-after');
  if (!header) {
    return undefined;
  }

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return seconds * 1000;
  }

  const date = Date.parse(header);
  if (!Number.isNaN(date)) {
    const diff = date - Date.now();
    return diff > 0 ? diff : 0;
  }

  return undefined;
}

function parseNumberOrDefault(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Create an ACLED client from environment variables.
 *
 * Reads `ACLED_API_URL`, `ACLED_TOKEN_URL`, `ACLED_USER_AGENT`,
 * `ACLED_MAX_ATTEMPTS`, `ACLED_RETRY_DELAY_MS` and `ACLED_TIMEOUT_MS`;
 * overrides win over the environment.
 */
export function createAcledClient(overrides: Partial<AcledClientConfig> = {}): AcledClient {
  const timeoutFromEnv = parseNumberOrDefault(process.env.ACLED_TIMEOUT_MS, 0);

  return new AcledClient({
    dataUrl: process.env.ACLED_API_URL ?? DEFAULT_DATA_URL,
    tokenUrl: process.env.ACLED_TOKEN_URL ?? DEFAULT_TOKEN_URL,
    userAgent: process.env.ACLED_USER_AGENT ?? DEFAULT_USER_AGENT,
    maxAttempts: parseNumberOrDefault(process.env.ACLED_MAX_ATTEMPTS, DEFAULT_MAX_ATTEMPTS),
    baseRetryDelayMs: parseNumberOrDefault(process.env.ACLED_RETRY_DELAY_MS, DEFAULT_BASE_RETRY_DELAY_MS),
    timeoutMs: timeoutFromEnv > 0 ? timeoutFromEnv : undefined,
    ...overrides,
  });
}

/**
 * One-shot token request with a default client.
 */
export async function getAcledApiToken(
  username: string,
  password: string,
  tokenUrl: string = DEFAULT_TOKEN_URL,
): Promise<AcledTokenResponse> {
  return createAcledClient({ tokenUrl }).requestToken({ username, password });
}

/**
 * One-shot data pull with a default client. Rejects on any fatal error.
 */
export async function getAcledData(accessToken: string, params: AcledQueryParams = {}): Promise<AcledEventRow[]> {
  return createAcledClient().getData(accessToken, params);
}
