import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Axios, AxiosError, AxiosHeaders, AxiosResponse } from 'axios';

import { ProviderError } from '@/infra/errors';
import { HttpClientService } from './http-client.service';

function response(status: number, data: unknown = null): AxiosResponse {
  return {
    data,
    status,
    statusText: String(status),
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

const failed = (status: number) =>
  new AxiosError(
    `Request failed with status code ${status}`,
    'ERR_BAD_RESPONSE',
    undefined,
    undefined,
    response(status),
  );

describe('HttpClientService', () => {
  let http: HttpClientService;
  let get: jest.SpyInstance;
  let timers: jest.SpyInstance;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Math, 'random').mockReturnValue(0);
    get = jest.spyOn(Axios.prototype, 'get');

    http = new HttpClientService(
      new ConfigService({
        market: {
          baseUrl: 'https://chart.example.test',
          timeoutMs: 1000,
          retry: 2,
          retryBackoffMs: 1,
        },
      }),
    );
    timers = jest.spyOn(global, 'setTimeout');
  });

  afterEach(() => jest.restoreAllMocks());

  const delays = () =>
    timers.mock.calls.map((call: unknown[]) => call[1]).filter((ms) => ms !== undefined);

  it('retries a retriable failure until attempts run out, doubling the wait', async () => {
    get.mockRejectedValue(failed(503));

    await expect(http.get('/v8/finance/chart/ACME')).rejects.toMatchObject({
      reason: 'bad_response',
      status: 503,
    });
    expect(get).toHaveBeenCalledTimes(3);
    expect(delays()).toEqual([1, 2]);
  });

  it('does not retry a missing symbol', async () => {
    get.mockRejectedValue(failed(404));

    const err = await http.get('/v8/finance/chart/NOPE').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ reason: 'not_found', retriable: false });
    expect(get).toHaveBeenCalledTimes(1);
    expect(delays()).toEqual([]);
  });

  it('returns the body once a retry succeeds', async () => {
    get
      .mockRejectedValueOnce(failed(429))
      .mockResolvedValueOnce(response(200, { chart: { result: [] } }));

    await expect(http.get('/v8/finance/chart/ACME', { interval: '1d' })).resolves.toEqual({
      chart: { result: [] },
    });
    expect(get).toHaveBeenCalledTimes(2);
    expect(get).toHaveBeenLastCalledWith('/v8/finance/chart/ACME', {
      params: { interval: '1d' },
    });
    expect(delays()).toEqual([1]);
  });
});
