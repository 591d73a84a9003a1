import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AxiosError } from 'axios';
import { SerpProErrorType } from '@serppro/shared';

vi.mock('../monitoring/logger', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), level: 'info' },
  pinoTransport: {},
}));

import { logger } from '../monitoring/logger';
import { RequestExecutor, isTimeoutError, type ExecutorConfig } from '../client/RequestExecutor';
import { SerpProApiError } from '../client/SerpProApiError';
import { PROFILES } from '../client/profiles';
import { createMockAdapter, dnsError, json, timeoutError, type MockHandler } from './helpers/mock-adapter';

function makeExecutor(handler: MockHandler, overrides: Partial<ExecutorConfig> = {}) {
  const { adapter, requests } = createMockAdapter(handler);
  const executor = new RequestExecutor({
    apiKey: 'test-key',
    baseUrl: 'https://moab-apis.test',
    verifyTls: true,
    timeoutMs: 300_000,
    retry: { mode: 'retry' },
    adapter,
    ...overrides,
  });
  return { executor, requests };
}

async function captureError(promise: Promise<unknown>): Promise<SerpProApiError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof SerpProApiError) return error;
    throw error;
  }
  throw new Error('Expected the request to fail');
}

const frequencyRequest = {
  method: 'POST' as const,
  path: '/api/v1/wordstat/frequency',
  body: { query: 'test', device: 'All' },
};

describe('RequestExecutor', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('successful responses', () => {
    it('returns the decoded body of a 200 response', async () => {
      const { executor } = makeExecutor(() => json({ frequency: 42 }));

      await expect(executor.execute(frequencyRequest)).resolves.toEqual({ frequency: 42 });
    });

    it('sends the API key and JSON content type on every request', async () => {
      const { executor, requests } = makeExecutor(() => json([]));

      await executor.execute({ method: 'GET', path: '/api/v1/region/yandex', params: { query: 'Moscow' } });

      expect(requests).toHaveLength(1);
      expect(requests[0].header('X-Api-Key')).toBe('test-key');
      expect(requests[0].header('Content-Type')).toBe('application/json');
    });

    it('sends POST bodies as JSON and GET fields as query parameters', async () => {
      const { executor, requests } = makeExecutor(() => json({}));

      await executor.execute(frequencyRequest);
      await executor.execute({ method: 'GET', path: '/api/v1/finance/total', params: { service: 'WordstatDeep' } });

      expect(requests[0]).toMatchObject({
        method: 'POST',
        url: '/api/v1/wordstat/frequency',
        body: { query: 'test', device: 'All' },
      });
      expect(requests[1]).toMatchObject({
        method: 'GET',
        url: '/api/v1/finance/total',
        params: { service: 'WordstatDeep' },
        body: undefined,
      });
    });

    it('raises a parsing error when a 200 body is not JSON', async () => {
      const { executor } = makeExecutor(() => ({ status: 200, body: '<html>oops</html>' }));

      const error = await captureError(executor.execute(frequencyRequest));

      expect(error.statusCode).toBe(200);
      expect(error.type).toBe(SerpProErrorType.PARSING);
      expect(error.message).toBe('Invalid JSON in response body');
    });
  });

  describe('remote errors', () => {
    it('decodes a structured 422 body', async () => {
      const { executor } = makeExecutor(() =>
        json(
          {
            id: 'err-1',
            error_message: 'Query is too long',
            instance: '/api/v1/wordstat/frequency',
            invalid_data: ['query'],
          },
          422
        )
      );

      const error = await captureError(executor.execute(frequencyRequest));

      expect(error.statusCode).toBe(422);
      expect(error.message).toBe('Query is too long');
      expect(error.type).toBe(SerpProErrorType.VALIDATION);
      expect(error.errorModel).toEqual({
        id: 'err-1',
        error_message: 'Query is too long',
        instance: '/api/v1/wordstat/frequency',
        invalid_data: ['query'],
      });
      expect(error.isRemoteError()).toBe(true);
      expect(error.toString()).toBe('API Error 422: Query is too long');
    });

    it('falls back to the default 422 message when the body is not JSON', async () => {
      const { executor } = makeExecutor(() => ({ status: 422, body: 'not json at all' }));

      const error = await captureError(executor.execute(frequencyRequest));

      expect(error.statusCode).toBe(422);
      expect(error.message).toBe('Unprocessable Content - invalid query');
      expect(error.errorModel).toBeUndefined();
    });

    it('uses the default 422 message when the model has no error_message', async () => {
      const { executor } = makeExecutor(() => json({ invalid_data: ['region'] }, 422));

      const error = await captureError(executor.execute(frequencyRequest));

      expect(error.message).toBe('Unprocessable Content - invalid query');
      expect(error.errorModel?.invalid_data).toEqual(['region']);
    });

    it('defaults the message of other statuses to "HTTP <status>"', async () => {
      const { executor } = makeExecutor(() => json({}, 500));

      const error = await captureError(executor.execute(frequencyRequest));

      expect(error.statusCode).toBe(500);
      expect(error.message).toBe('HTTP 500');
      expect(error.type).toBe(SerpProErrorType.SERVER);
    });

    it('treats an empty error body as an empty model', async () => {
      const { executor } = makeExecutor(() => ({ status: 503 }));

      const error = await captureError(executor.execute(frequencyRequest));

      expect(error.message).toBe('HTTP 503');
      expect(error.errorModel).toEqual({});
    });

    it('keeps the message of a body that does not fit the error model', async () => {
      const { executor } = makeExecutor(() => json({ id: 17, error_message: 'Unknown region' }, 404));

      const error = await captureError(executor.execute(frequencyRequest));

      expect(error.statusCode).toBe(404);
      expect(error.message).toBe('Unknown region');
      expect(error.errorModel).toBeUndefined();
      expect(error.type).toBe(SerpProErrorType.NOT_FOUND);
    });

    it('does not retry remote errors', async () => {
      const { executor, requests } = makeExecutor(() => json({ error_message: 'Invalid API key' }, 401));

      const error = await captureError(executor.execute(frequencyRequest));

      expect(requests).toHaveLength(1);
      expect(error.type).toBe(SerpProErrorType.AUTHENTICATION);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ status: 401, endpoint: '/api/v1/wordstat/frequency' }),
        'SerpPro API Error: 401 Invalid API key'
      );
    });
  });

  describe('timeout retry policy', () => {
    it('resubmits the same request after every timeout until it succeeds', async () => {
      const { executor, requests } = makeExecutor((config, callIndex) => {
        if (callIndex < 5) throw timeoutError(config);
        return json({ frequency: 7 });
      });

      await expect(executor.execute(frequencyRequest)).resolves.toEqual({ frequency: 7 });

      expect(requests).toHaveLength(6);
      expect(requests.every((request) => request.url === '/api/v1/wordstat/frequency')).toBe(true);
      expect(requests.map((request) => request.body)).toEqual(Array(6).fill({ query: 'test', device: 'All' }));
      expect(logger.warn).toHaveBeenCalledTimes(5);
      expect(logger.warn).toHaveBeenLastCalledWith(
        expect.objectContaining({ attempt: 5, maxAttempts: null, timeoutMs: 300_000 }),
        'Timeout occurred after 300 seconds. Retrying...'
      );
    });

    it('stops retrying when a timeout is followed by a remote error', async () => {
      const { executor, requests } = makeExecutor((config, callIndex) => {
        if (callIndex < 2) throw timeoutError(config);
        return json({ error_message: 'Bad syntax' }, 422);
      });

      const error = await captureError(executor.execute(frequencyRequest));

      expect(requests).toHaveLength(3);
      expect(error.statusCode).toBe(422);
      expect(error.message).toBe('Bad syntax');
    });

    it('surfaces a DNS failure immediately with status 0', async () => {
      const { executor, requests } = makeExecutor((config) => {
        throw dnsError(config);
      });

      const error = await captureError(executor.execute(frequencyRequest));

      expect(requests).toHaveLength(1);
      expect(error.statusCode).toBe(0);
      expect(error.message).toBe('getaddrinfo ENOTFOUND moab-apis.test');
      expect(error.type).toBe(SerpProErrorType.TRANSPORT);
      expect(error.isTransportError()).toBe(true);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('gives up after maxAttempts timeouts when a bound is configured', async () => {
      const { executor, requests } = makeExecutor(
        (config) => {
          throw timeoutError(config);
        },
        { retry: { mode: 'retry', maxAttempts: 3 } }
      );

      const error = await captureError(executor.execute(frequencyRequest));

      expect(requests).toHaveLength(3);
      expect(error.statusCode).toBe(0);
      expect(error.type).toBe(SerpProErrorType.TIMEOUT);
      expect(logger.warn).toHaveBeenCalledTimes(2);
    });

    it('waits delayMs between attempts', async () => {
      const started: number[] = [];
      const { executor } = makeExecutor(
        (config, callIndex) => {
          started.push(Date.now());
          if (callIndex === 0) throw timeoutError(config);
          return json({ frequency: 1 });
        },
        { retry: { mode: 'retry', maxAttempts: 2, delayMs: 20 } }
      );

      await expect(executor.execute(frequencyRequest)).resolves.toEqual({ frequency: 1 });
      expect(started).toHaveLength(2);
      expect(started[1] - started[0]).toBeGreaterThanOrEqual(15);
    });

    it('fails fast on the first timeout under the wordstat profile policy', async () => {
      const { executor, requests } = makeExecutor(
        (config) => {
          throw timeoutError(config);
        },
        { retry: PROFILES.wordstat.retry, timeoutMs: undefined }
      );

      const error = await captureError(executor.execute(frequencyRequest));

      expect(requests).toHaveLength(1);
      expect(error.statusCode).toBe(0);
      expect(error.message).toBe('timeout of 300000ms exceeded');
      expect(error.type).toBe(SerpProErrorType.TRANSPORT);
    });

    it('reports a single-attempt timeout the same way as a DNS failure', async () => {
      const { executor } = makeExecutor(
        (config, callIndex) => {
          throw callIndex === 0 ? timeoutError(config) : dnsError(config);
        },
        { retry: { mode: 'fail-fast' } }
      );

      const timeout = await captureError(executor.execute(frequencyRequest));
      const dns = await captureError(executor.execute(frequencyRequest));

      expect([timeout.statusCode, timeout.type]).toEqual([0, SerpProErrorType.TRANSPORT]);
      expect([dns.statusCode, dns.type]).toEqual([0, SerpProErrorType.TRANSPORT]);
      expect(timeout.isTransportError()).toBe(true);
    });
  });

  describe('isTimeoutError', () => {
    it('recognises connect and read timeouts only', () => {
      expect(isTimeoutError(new Error('timeout'))).toBe(false);
      expect(isTimeoutError(new AxiosError('timeout', AxiosError.ETIMEDOUT))).toBe(true);
      expect(isTimeoutError(new AxiosError('aborted', AxiosError.ECONNABORTED))).toBe(true);
      expect(isTimeoutError(new AxiosError('refused', 'ECONNREFUSED'))).toBe(false);
    });
  });
});
