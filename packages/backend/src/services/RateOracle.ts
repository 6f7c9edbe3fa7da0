/**
 * @fileoverview Resolves the exchange rate of a coin pair at conversion time.
 * Fixed rates come straight from the pair; dynamic rates are fetched from a
 * configured JSON endpoint and cached for the source's TTL.
 */

import { Decimal, isPositiveAmount } from '@convgate/core';
import type { CoinPair } from '@convgate/core';
import type { RateSourceConfig } from '../config/gateway-config';

interface CachedRate {
  rate: string;
  fetchedAt: number;
}

/**
 * Walks a dot-separated path through parsed JSON.
 */
function pluck(value: unknown, path: string): unknown {
  let current = value;
  for (const key of path.split('.')) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    current = Array.isArray(current) ? current[Number(key)] : Object.entries(current).find(([k]) => k === key)?.[1];
  }
  return current;
}

export class RateOracle {
  private cache = new Map<string, CachedRate>();
  private inflight = new Map<string, Promise<string>>();

  constructor(
    private readonly sources: Record<string, RateSourceConfig>,
    private readonly timeoutMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Amount of `pair.to` per one `pair.from`, as a positive decimal string.
   *
   * @throws Error if a dynamic source is unknown, unreachable or returns no usable rate
   */
  async getRate(pair: CoinPair): Promise<string> {
    if (pair.rate.type === 'fixed') {
      return pair.rate.value;
    }

    const name = pair.rate.source;
    const source = this.sources[name];
    if (!source) {
      throw new Error(`Unknown rate source "${name}" for ${pair.from} -> ${pair.to}`);
    }

    const cached = this.cache.get(name);
    if (cached && this.now() - cached.fetchedAt < source.cacheTtlMs) {
      return cached.rate;
    }

    // Deposits converted in parallel share one request per source
    const pending = this.inflight.get(name);
    if (pending) {
      return pending;
    }
    const request = this.fetchRate(name, source).finally(() => {
      this.inflight.delete(name);
    });
    this.inflight.set(name, request);
    return request;
  }

  private async fetchRate(name: string, source: RateSourceConfig): Promise<string> {
    const response = await fetch(source.url, {
      method: 'GET',
      headers: { 'Accept': 'application/json' },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Rate source ${name} answered HTTP ${response.status}`);
    }

    const value = pluck(await response.json(), source.path);
    const text = typeof value === 'number' ? new Decimal(value).toString() : value;
    if (typeof text !== 'string' || !isPositiveAmount(text)) {
      throw new Error(`Rate source ${name} has no positive rate at "${source.path}" (got ${JSON.stringify(value)})`);
    }

    const rate = source.invert ? new Decimal(1).div(text).toString() : text;
    this.cache.set(name, { rate, fetchedAt: this.now() });
    console.log(`[RateOracle] Fetched rate from ${name}: ${rate}`);
    return rate;
  }
}
