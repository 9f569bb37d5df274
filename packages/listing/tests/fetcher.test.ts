import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import { ProviderRequestError } from '@minutely/contracts';
import type { Sleep } from '@minutely/contracts';
import { HttpPageFetcher } from '../src/fetcher.js';
import type { BinaryGetter } from '../src/fetcher.js';

function httpError(status: number): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(
    `Request failed with status code ${status}`,
    'ERR_BAD_RESPONSE',
    config,
    undefined,
    { data: {}, status, statusText: 'error', headers: {}, config }
  );
}

function networkError(): AxiosError {
  return new AxiosError('socket hang up', 'ECONNRESET', { headers: new AxiosHeaders() });
}

const URL_UNDER_TEST = 'http://pages.test/sum?sosok=0&page=1';

describe('HttpPageFetcher', () => {
  let get: Mock<BinaryGetter['get']>;
  let sleep: Mock<Sleep>;
  let fetcher: HttpPageFetcher;

  beforeEach(() => {
    get = vi.fn<BinaryGetter['get']>();
    sleep = vi.fn<Sleep>(async () => undefined);
    fetcher = new HttpPageFetcher({ http: { get }, sleep, maxAttempts: 3 });
  });

  it('should decode byte bodies', async () => {
    get.mockResolvedValueOnce({ data: Buffer.from('<a href="?code=005930">x</a>', 'ascii') });

    await expect(fetcher.fetchPage(URL_UNDER_TEST)).resolves.toBe('<a href="?code=005930">x</a>');
    expect(get).toHaveBeenCalledWith(URL_UNDER_TEST);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should retry server errors with growing delays', async () => {
    get
      .mockRejectedValueOnce(httpError(503))
      .mockRejectedValueOnce(networkError())
      .mockResolvedValueOnce({ data: Buffer.from('ok', 'ascii') });

    await expect(fetcher.fetchPage(URL_UNDER_TEST)).resolves.toBe('ok');
    expect(sleep.mock.calls).toEqual([[800], [1300]]);
  });

  it('should give up after the last attempt', async () => {
    get.mockRejectedValue(httpError(429));

    const failure = fetcher.fetchPage(URL_UNDER_TEST);

    await expect(failure).rejects.toBeInstanceOf(ProviderRequestError);
    await expect(failure).rejects.toThrow(`Page responded 429: ${URL_UNDER_TEST}`);
    expect(get).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should not retry client errors', async () => {
    get.mockRejectedValueOnce(httpError(404));

    await expect(fetcher.fetchPage(URL_UNDER_TEST)).rejects.toMatchObject({ statusCode: 404 });
    expect(get).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should reject bodies that are neither bytes nor text', async () => {
    get.mockResolvedValueOnce({ data: { unexpected: true } });

    await expect(fetcher.fetchPage(URL_UNDER_TEST)).rejects.toThrow(
      `Unexpected body type for ${URL_UNDER_TEST}`
    );
    expect(get).toHaveBeenCalledTimes(1);
  });

  it('should validate the attempt limit', () => {
    expect(() => new HttpPageFetcher({ http: { get }, maxAttempts: 0 })).toThrow(
      'maxAttempts must be a positive integer, got 0'
    );
  });
});
