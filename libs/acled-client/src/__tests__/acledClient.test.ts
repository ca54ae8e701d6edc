/**
 * ACLED Client Unit Tests
 *
 * Tests the token exchange, pagination, retry logic and error surfaces with a
 * mocked transport.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { AcledClient, EMPTY_RESULT_WARNING, createAcledClient } from '../acledClient';
import { FORMAT_COERCION_WARNING } from '../queryParams';
import { AcledConnectivityError, AcledRequestError, AcledValidationError } from '../types';
import type { AcledClientConfig } from '../types';

const DATA_URL = 'https://api.acled.test/api/acled/read';
const TOKEN_URL = 'https://api.acled.test/oauth/token';

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

function textResponse(body: string, status: number): Response {
  return new Response(body, { status });
}

function eventRows(page: number, size: number): Array<{ event_id_cnty: string }> {
  return Array.from({ length: size }, (_, i) => ({ event_id_cnty: `EVT${page}-${i}` }));
}

function pageOf(url: string): number {
  return Number(new URL(url).searchParams.get('page'));
}

describe('AcledClient', () => {
  let transport: ReturnType<typeof createTransport>;
  let logger: Record<'debug' | 'info' | 'warn' | 'error', Mock>;

  function createTransport() {
    return vi.fn(async (_url: string, _init: RequestInit): Promise<Response> => jsonResponse({}));
  }

  function createClient(overrides: Partial<AcledClientConfig> = {}): AcledClient {
    return new AcledClient({
      dataUrl: DATA_URL,
      tokenUrl: TOKEN_URL,
      userAgent: 'acled-test/1.0',
      baseRetryDelayMs: 1,
      transport,
      logger,
      connectivityCheck: async () => true,
      ...overrides,
    });
  }

  beforeEach(() => {
    transport = createTransport();
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  });

  describe('OAuth2 Token', () => {
    it('should post the password grant as multipart form data', async () => {
      transport.mockResolvedValueOnce(
        jsonResponse({ access_token: 'test-access', refresh_token: 'test-refresh', expires_in: 86400 }),
      );

      const token = await createClient().requestToken({ username: 'analyst@example.org', password: 'test-secret' });

      expect(token).toEqual({ access_token: 'test-access', refresh_token: 'test-refresh', expires_in: 86400 });
      expect(transport).toHaveBeenCalledTimes(1);

      const [url, init] = transport.mock.calls[0];
      expect(url).toBe(TOKEN_URL);
      expect(init.method).toBe('POST');
      expect(init.body).toBeInstanceOf(FormData);
      if (init.body instanceof FormData) {
        expect(init.body.get('username')).toBe('analyst@example.org');
        expect(init.body.get('password')).toBe('test-secret');
        expect(init.body.get('grant_type')).toBe('password');
        expect(init.body.get('client_id')).toBe('acled');
      }
      expect(new Headers(init.headers).get('authorization')).toBeNull();
    });

    it('should report the status and body of a rejected login', async () => {
      transport.mockImplementation(async () => textResponse('Invalid username or password', 401));

      const error = await createClient()
        .requestToken({ username: 'analyst@example.org', password: 'wrong' })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(AcledRequestError);
      expect(error).toMatchObject({
        status: 401,
        message: 'Authentication failed (HTTP 401): Invalid username or password',
      });
      expect(transport).toHaveBeenCalledTimes(1);
    });

    it('should fall back to a generic reason when the error body is empty', async () => {
      transport.mockImplementation(async () => textResponse('', 403));

      await expect(
        createClient().requestToken({ username: 'analyst@example.org', password: 'wrong' }),
      ).rejects.toThrow('Authentication failed (HTTP 403): Invalid credentials');
    });

    it('should reject a response without access_token', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ token_type: 'Bearer' }));

      await expect(
        createClient().requestToken({ username: 'analyst@example.org', password: 'test-secret' }),
      ).rejects.toThrow('Authentication response missing access_token. Check your credentials.');
    });

    it('should pass through token fields of any shape', async () => {
      transport.mockResolvedValueOnce(
        jsonResponse({ access_token: 'test-access', refresh_token: null, expires_in: '86400' }),
      );

      const token = await createClient().requestToken({ username: 'analyst@example.org', password: 'test-secret' });

      expect(token).toEqual({ access_token: 'test-access', refresh_token: null, expires_in: '86400' });
    });

    it('should reject a successful response that is not JSON', async () => {
      transport.mockResolvedValueOnce(textResponse('<html>login</html>', 200));

      await expect(
        createClient().requestToken({ username: 'analyst@example.org', password: 'test-secret' }),
      ).rejects.toThrow('Authentication response missing access_token. Check your credentials.');
    });

    it('should stop retrying after the attempt limit', async () => {
      transport.mockImplementation(async () => textResponse('Service unavailable', 503));

      await expect(
        createClient().requestToken({ username: 'analyst@example.org', password: 'test-secret' }),
      ).rejects.toMatchObject({
        status: 503,
        message: 'Authentication failed (HTTP 503): Service unavailable',
      });
      expect(transport).toHaveBeenCalledTimes(3);
    });

    it('should check reachability of the token host', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ access_token: 'test-access' }));
      const connectivityCheck = vi.fn(async (_hostname: string) => true);

      await createClient({ tokenUrl: 'https://auth.acled.test/oauth/token', connectivityCheck }).requestToken({
        username: 'analyst@example.org',
        password: 'test-secret',
      });

      expect(connectivityCheck).toHaveBeenCalledWith('auth.acled.test');
    });

    it('should retry a transient server error', async () => {
      transport
        .mockResolvedValueOnce(textResponse('Bad gateway', 502))
        .mockResolvedValueOnce(jsonResponse({ access_token: 'test-access' }));

      const token = await createClient().requestToken({ username: 'analyst@example.org', password: 'test-secret' });

      expect(token.access_token).toBe('test-access');
      expect(transport).toHaveBeenCalledTimes(2);
    });

    it('should validate credentials before any request', async () => {
      await expect(createClient().requestToken({ username: '', password: 'test-secret' })).rejects.toMatchObject({
        name: 'AcledValidationError',
        field: 'username',
      });
      await expect(
        createClient().requestToken({ username: 'analyst@example.org', password: '' }),
      ).rejects.toBeInstanceOf(AcledValidationError);

      expect(transport).not.toHaveBeenCalled();
    });

    it('should fail fast when offline', async () => {
      const client = createClient({ connectivityCheck: async () => false });

      await expect(
        client.requestToken({ username: 'analyst@example.org', password: 'test-secret' }),
      ).rejects.toBeInstanceOf(AcledConnectivityError);
      expect(transport).not.toHaveBeenCalled();
    });
  });

  describe('Event Data', () => {
    it('should walk every page and concatenate rows in order', async () => {
      transport.mockImplementation(async (url) => {
        const page = pageOf(url);
        const size = page < 3 ? 500 : 200;
        return jsonResponse({ count: 500, total_count: 1200, data: eventRows(page, size) });
      });
      const onProgress = vi.fn();

      const result = await createClient({ onProgress }).fetchEvents('test-token', { country: 'Sudan', limit: 500 });

      if (result.status !== 'rows') {
        throw new Error(`expected rows, got ${result.status}`);
      }
      expect(transport).toHaveBeenCalledTimes(3);
      expect(transport.mock.calls.map(([url]) => pageOf(url))).toEqual([1, 2, 3]);
      expect(result.rows).toHaveLength(1200);
      expect(result.rows[0]).toEqual({ event_id_cnty: 'EVT1-0' });
      expect(result.rows[500]).toEqual({ event_id_cnty: 'EVT2-0' });
      expect(result.rows[1199]).toEqual({ event_id_cnty: 'EVT3-199' });
      expect(result.totalCount).toBe(1200);
      expect(result.pageCount).toBe(3);
      expect(result.warnings).toEqual([]);

      expect(onProgress).toHaveBeenCalledTimes(3);
      expect(onProgress).toHaveBeenLastCalledWith({ page: 3, pageCount: 3, rowsRetrieved: 1200, totalCount: 1200 });
      expect(logger.info).toHaveBeenCalledWith('Retrieving 1200 records across 3 pages...');
      expect(logger.info).toHaveBeenCalledWith('Successfully retrieved 1200 records.');
    });

    it('should send filters, paging and auth on the query string and headers', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ count: 1, total_count: 1, data: eventRows(1, 1) }));

      await createClient().fetchEvents('test-token', {
        country: 'France',
        eventDate: '2024-01-01|2024-01-31',
        eventDateWhere: 'BETWEEN',
        assocActor1: 'Farmers',
        year: 2024,
      });

      const [url, init] = transport.mock.calls[0];
      const parsed = new URL(url);
      expect(`${parsed.origin}${parsed.pathname}`).toBe(DATA_URL);
      expect(Object.fromEntries(parsed.searchParams)).toEqual({
        _format: 'json',
        assoc_actor_1: 'Farmers',
        country: 'France',
        event_date: '2024-01-01|2024-01-31',
        event_date_where: 'BETWEEN',
        key: 'test-token',
        limit: '5000',
        page: '1',
        year: '2024',
      });

      const headers = new Headers(init.headers);
      expect(init.method).toBe('GET');
      expect(headers.get('authorization')).toBe('Bearer test-token');
      expect(headers.get('accept')).toBe('application/json');
      expect(headers.get('user-agent')).toBe('acled-test/1.0');
    });

    it('should return an empty result when nothing matches', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ count: 0, total_count: 0, data: [] }));

      const result = await createClient().fetchEvents('test-token', { country: 'Atlantis' });

      expect(result).toEqual({ status: 'empty', rows: [], warnings: [EMPTY_RESULT_WARNING] });
      expect(transport).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(EMPTY_RESULT_WARNING);
    });

    it('should accept counts serialised as strings', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ count: '2', total_count: '2', data: eventRows(1, 2) }));

      const rows = await createClient().getData('test-token');

      expect(rows).toEqual([{ event_id_cnty: 'EVT1-0' }, { event_id_cnty: 'EVT1-1' }]);
    });

    it('should warn when fewer rows arrive than reported', async () => {
      transport.mockImplementation(async (url) =>
        jsonResponse({ count: 2, total_count: 3, data: pageOf(url) === 1 ? eventRows(1, 2) : [] }),
      );

      const result = await createClient().fetchEvents('test-token');

      if (result.status !== 'rows') {
        throw new Error(`expected rows, got ${result.status}`);
      }
      expect(result.rows).toHaveLength(2);
      expect(result.warnings).toEqual(['Retrieved 2 records but the API reported 3.']);
    });

    it('should discard earlier pages when a later page fails', async () => {
      transport.mockImplementation(async (url) =>
        pageOf(url) === 1
          ? jsonResponse({ count: 2, total_count: 4, data: eventRows(1, 2) })
          : textResponse('boom', 500),
      );

      const result = await createClient().fetchEvents('test-token');

      expect(result.status).toBe('error');
      expect('rows' in result).toBe(false);
      if (result.status === 'error') {
        expect(result.error).toBeInstanceOf(AcledRequestError);
        expect(result.error.message).toBe('API request failed (HTTP 500) on page 2: boom');
      }
      // page 1 once, page 2 on every attempt
      expect(transport).toHaveBeenCalledTimes(4);
      expect(logger.error).toHaveBeenCalledWith('ACLED pull failed: API request failed (HTTP 500) on page 2: boom');
    });

    it('should not retry client errors', async () => {
      transport.mockImplementation(async () => textResponse('Forbidden', 403));

      const result = await createClient().fetchEvents('test-token');

      expect(transport).toHaveBeenCalledTimes(1);
      expect(result).toMatchObject({ status: 'error', error: { status: 403 } });
    });

    it('should retry rate limiting and then succeed', async () => {
      transport
        .mockResolvedValueOnce(textResponse('Too many requests', 429))
        .mockResolvedValueOnce(jsonResponse({ count: 1, total_count: 1, data: eventRows(1, 1) }));

      const result = await createClient().fetchEvents('test-token');

      expect(result.status).toBe('rows');
      expect(transport).toHaveBeenCalledTimes(2);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.stringMatching(/^\[AcledClient\] Retrying GET https:\/\/api\.acled\.test\/api\/acled\/read after \d+ms due to status 429$/),
      );
    });

    it('should retry network failures up to the attempt limit', async () => {
      transport.mockRejectedValue(new TypeError('fetch failed'));

      const result = await createClient().fetchEvents('test-token');

      expect(transport).toHaveBeenCalledTimes(3);
      expect(result).toMatchObject({
        status: 'error',
        error: { status: 0, message: 'ACLED request failed: fetch failed' },
      });
    });

    it('should abort attempts that exceed the timeout', async () => {
      transport.mockImplementation(
        (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          }),
      );

      const result = await createClient({ timeoutMs: 5, maxAttempts: 1 }).fetchEvents('test-token');

      expect(result).toMatchObject({
        status: 'error',
        error: { status: 0, message: 'ACLED request failed: Request timed out after 5ms' },
      });
    });

    it('should time out a body that stops arriving after the headers', async () => {
      transport.mockImplementation(
        async () =>
          new Response(
            new ReadableStream<Uint8Array>({
              start(controller) {
                controller.enqueue(new TextEncoder().encode('{"count":'));
              },
            }),
            { status: 200 },
          ),
      );

      const result = await createClient({ timeoutMs: 20, maxAttempts: 1 }).fetchEvents('test-token');

      expect(result).toMatchObject({
        status: 'error',
        error: { status: 0, message: 'ACLED request failed: Request timed out after 20ms' },
      });
    });

    it('should round a fractional attempt limit down', async () => {
      transport.mockImplementation(async () => textResponse('boom', 500));

      const result = await createClient({ maxAttempts: 2.5 }).fetchEvents('test-token');

      expect(transport).toHaveBeenCalledTimes(2);
      expect(result).toMatchObject({
        status: 'error',
        error: { status: 500, message: 'API request failed (HTTP 500) on page 1: boom' },
      });
    });

    it('should reject a malformed response body', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ data: [] }));

      const result = await createClient().fetchEvents('test-token');

      expect(result).toMatchObject({
        status: 'error',
        error: { message: 'Unexpected response structure on page 1: missing `count`, `total_count` or `data`.' },
      });
    });

    it('should reject a body that is not JSON', async () => {
      transport.mockResolvedValueOnce(textResponse('<html>maintenance</html>', 200));

      await expect(createClient().getData('test-token')).rejects.toThrow(
        'Unexpected response structure on page 1: missing `count`, `total_count` or `data`.',
      );
    });

    it('should return validation failures without a request', async () => {
      const result = await createClient().fetchEvents('test-token', { year: '23' });

      expect(transport).not.toHaveBeenCalled();
      if (result.status !== 'error') {
        throw new Error(`expected error, got ${result.status}`);
      }
      expect(result.error).toBeInstanceOf(AcledValidationError);
      expect(result.error.message).toBe('`year` must be in YYYY format or YYYY|YYYY for ranges.');
    });

    it('should reject an empty access token', async () => {
      await expect(createClient().getData('')).rejects.toThrow('`accessToken` must be a non-empty string.');
      expect(transport).not.toHaveBeenCalled();
    });

    it('should coerce other formats to json with a warning', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ count: 1, total_count: 1, data: eventRows(1, 1) }));

      const result = await createClient().fetchEvents('test-token', { format: 'csv' });

      expect(result.warnings).toEqual([FORMAT_COERCION_WARNING]);
      expect(logger.warn).toHaveBeenCalledWith(FORMAT_COERCION_WARNING);
      expect(new URL(transport.mock.calls[0][0]).searchParams.get('_format')).toBe('json');
    });

    it('should check reachability of the data host', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ count: 0, total_count: 0, data: [] }));
      const connectivityCheck = vi.fn(async (_hostname: string) => true);

      await createClient({ connectivityCheck }).fetchEvents('test-token');

      expect(connectivityCheck).toHaveBeenCalledWith('api.acled.test');
    });

    it('should propagate errors thrown by the progress callback', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ count: 1, total_count: 1, data: eventRows(1, 1) }));
      const onProgress = vi.fn(() => {
        throw new Error('progress sink closed');
      });

      await expect(createClient({ onProgress }).fetchEvents('test-token')).rejects.toThrow('progress sink closed');
    });

    it('should report connectivity failures as an error result', async () => {
      const result = await createClient({ connectivityCheck: async () => false }).fetchEvents('test-token');

      expect(transport).not.toHaveBeenCalled();
      expect(result).toMatchObject({ status: 'error', error: { message: 'No internet connection detected.' } });
    });
  });
});

describe('createAcledClient', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should read endpoints and retry settings from the environment', async () => {
    vi.stubEnv('ACLED_API_URL', 'https://env.acled.test/read');
    vi.stubEnv('ACLED_MAX_ATTEMPTS', '1');
    const transport = vi.fn(async (_url: string, _init: RequestInit): Promise<Response> => textResponse('down', 503));

    const client = createAcledClient({
      transport,
      connectivityCheck: async () => true,
      logger: { warn: vi.fn(), error: vi.fn() },
    });
    const result = await client.fetchEvents('test-token');

    expect(transport).toHaveBeenCalledTimes(1);
    expect(transport.mock.calls[0][0].startsWith('https://env.acled.test/read?')).toBe(true);
    expect(result).toMatchObject({ status: 'error', error: { status: 503 } });
  });

  it('should let explicit overrides win over the environment', async () => {
    vi.stubEnv('ACLED_API_URL', 'https://env.acled.test/read');
    const transport = vi.fn(
      async (_url: string, _init: RequestInit): Promise<Response> =>
        jsonResponse({ count: 0, total_count: 0, data: [] }),
    );

    await createAcledClient({
      dataUrl: DATA_URL,
      transport,
      connectivityCheck: async () => true,
      logger: { warn: vi.fn() },
    }).fetchEvents('test-token');

    expect(transport.mock.calls[0][0].startsWith(`${DATA_URL}?`)).toBe(true);
  });
});
