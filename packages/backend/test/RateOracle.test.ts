import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import type { CoinPair } from '@convgate/core';
import type { RateSourceConfig } from '../src/config/gateway-config';
import { RateOracle } from '../src/services/RateOracle';

const SOURCES: Record<string, RateSourceConfig> = {
  feed: { type: 'http-json', url: 'https://rates.test/ltc-btc', path: 'data.price', cacheTtlMs: 60000, invert: false },
  inverse: { type: 'http-json', url: 'https://rates.test/btc-ltc', path: 'quotes.0.last', cacheTtlMs: 60000, invert: true },
};

function dynamicPair(source: string): CoinPair {
  return { from: 'LTC', to: 'BTC', rate: { type: 'dynamic', source }, feePercent: '0' };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('RateOracle', () => {
  let clock: number;
  let fetchMock: Mock<(url: string) => Promise<Response>>;
  let oracle: RateOracle;

  beforeEach(() => {
    clock = 1_000_000;
    fetchMock = vi.fn(async (_url: string) => jsonResponse({ data: { price: 0.0125 } }));
    vi.stubGlobal('fetch', fetchMock);
    oracle = new RateOracle(SOURCES, 1000, () => clock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns fixed rates without any request', async () => {
    const rate = await oracle.getRate({ from: 'LTC', to: 'BTC', rate: { type: 'fixed', value: '0.5' }, feePercent: '1' });

    expect(rate).toBe('0.5');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('fetches a dynamic rate and caches it for the source TTL', async () => {
    expect(await oracle.getRate(dynamicPair('feed'))).toBe('0.0125');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe('https://rates.test/ltc-btc');

    clock += 59999;
    expect(await oracle.getRate(dynamicPair('feed'))).toBe('0.0125');
    expect(fetchMock).toHaveBeenCalledTimes(1);

    clock += 1;
    await oracle.getRate(dynamicPair('feed'));
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('shares one request between concurrent lookups', async () => {
    const rates = await Promise.all([oracle.getRate(dynamicPair('feed')), oracle.getRate(dynamicPair('feed'))]);

    expect(rates).toEqual(['0.0125', '0.0125']);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('inverts rates quoted the other way round', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ quotes: [{ last: '80' }] }));

    expect(await oracle.getRate(dynamicPair('inverse'))).toBe('0.0125');
  });

  it('fails on unknown sources, HTTP errors and unusable values', async () => {
    await expect(oracle.getRate(dynamicPair('nope'))).rejects.toThrow('Unknown rate source "nope" for LTC -> BTC');

    fetchMock.mockImplementationOnce(async () => jsonResponse({ error: 'busy' }, 503));
    await expect(oracle.getRate(dynamicPair('feed'))).rejects.toThrow('Rate source feed answered HTTP 503');

    fetchMock.mockImplementationOnce(async () => jsonResponse({ data: { price: 'n/a' } }));
    await expect(oracle.getRate(dynamicPair('feed'))).rejects.toThrow('Rate source feed has no positive rate at "data.price" (got "n/a")');

    fetchMock.mockImplementationOnce(async () => jsonResponse({ data: {} }));
    await expect(oracle.getRate(dynamicPair('feed'))).rejects.toThrow('Rate source feed has no positive rate at "data.price" (got undefined)');
  });
});
