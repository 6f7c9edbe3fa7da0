/**
 * @fileoverview In-memory handler for tests and local runs. Loads one coin at a
 * time and sends one payment at a time; all state lives in the instance.
 *
 * Options: `{ coins: ["LTC", "BTC"], networkFees?: { LTC: "0.001" } }`
 */

import { ConfigurationError, isDecimalString } from '@convgate/core';
import type { CoinSymbol, RawTransaction } from '@convgate/core';
import type { DepositLoader, PaymentManager, PaymentRequest, SendResult } from './CoinHandler';
import { DeadApiError } from './errors';

export interface MockHandlerOptions {
  coins: CoinSymbol[];
  /** Estimates returned by estimateNetworkFee; coins without one return null */
  networkFees?: Record<CoinSymbol, string>;
  /** Delay before each send resolves */
  sendDelayMs?: number;
}

/**
 * Parses a handler options block from the configuration file.
 *
 * @throws ConfigurationError
 */
export function parseMockOptions(options: Record<string, unknown>): MockHandlerOptions {
  const problems: string[] = [];
  const coins = options.coins;
  if (!Array.isArray(coins) || coins.length === 0 || !coins.every((c): c is string => typeof c === 'string')) {
    problems.push('options.coins must be a non-empty array of coin symbols');
  }

  const networkFees: Record<CoinSymbol, string> = {};
  const rawFees = options.networkFees;
  if (rawFees !== undefined) {
    if (typeof rawFees !== 'object' || rawFees === null || Array.isArray(rawFees)) {
      problems.push('options.networkFees must map coin symbols to decimal strings');
    } else {
      for (const [coin, fee] of Object.entries(rawFees)) {
        if (typeof fee !== 'string' || !isDecimalString(fee)) {
          problems.push(`options.networkFees.${coin} must be a decimal string`);
        } else {
          networkFees[coin] = fee;
        }
      }
    }
  }

  if (problems.length > 0 || !Array.isArray(coins)) {
    throw new ConfigurationError(problems);
  }
  return { coins: coins.map(String), networkFees };
}

export class MockHandler implements DepositLoader, PaymentManager {
  readonly name: string = 'mock';

  /** Every send that succeeded, in order */
  readonly sent: PaymentRequest[] = [];
  /** Number of loadDeposits calls, per coin */
  readonly loadCalls = new Map<CoinSymbol, number>();
  /** Number of healthCheck calls, per coin */
  readonly healthChecks = new Map<CoinSymbol, number>();

  sendDelayMs: number;

  private readonly coins: CoinSymbol[];
  private readonly networkFees: Record<CoinSymbol, string>;
  private readonly transactions = new Map<CoinSymbol, RawTransaction[]>();
  private readonly failingLoads = new Set<CoinSymbol>();
  private readonly rejectedDestinations = new Set<string>();
  private readonly downCoins = new Set<CoinSymbol>();
  private sendFailures = 0;
  private txCounter = 0;

  constructor(options: MockHandlerOptions) {
    this.coins = options.coins.map(c => c.toUpperCase());
    this.networkFees = options.networkFees ?? {};
    this.sendDelayMs = options.sendDelayMs ?? 0;
  }

  supportedCoins(): CoinSymbol[] {
    return [...this.coins];
  }

  /**
   * Makes `tx` visible to every later load of its coin.
   */
  addTransaction(tx: RawTransaction): void {
    const list = this.transactions.get(tx.coin) ?? [];
    list.push(tx);
    this.transactions.set(tx.coin, list);
  }

  /**
   * Loads of `coin` throw DeadApiError until cleared.
   */
  failLoadsFor(coin: CoinSymbol, failing = true): void {
    if (failing) {
      this.failingLoads.add(coin);
    } else {
      this.failingLoads.delete(coin);
    }
  }

  /**
   * validateDestination answers false for this destination.
   */
  rejectDestination(coin: CoinSymbol, destination: string): void {
    this.rejectedDestinations.add(`${coin}:${destination}`);
  }

  /**
   * healthCheck answers false for `coin` until it is set healthy again.
   */
  setHealthy(coin: CoinSymbol, healthy: boolean): void {
    if (healthy) {
      this.downCoins.delete(coin);
    } else {
      this.downCoins.add(coin);
    }
  }

  /**
   * The next `count` sends throw DeadApiError.
   */
  failSends(count: number): void {
    this.sendFailures = count;
  }

  async loadDeposits(coin: CoinSymbol): Promise<RawTransaction[]> {
    this.loadCalls.set(coin, (this.loadCalls.get(coin) ?? 0) + 1);
    if (this.failingLoads.has(coin)) {
      throw new DeadApiError(`mock ${coin} node is down`);
    }
    return (this.transactions.get(coin) ?? []).map(tx => ({ ...tx }));
  }

  async validateDestination(coin: CoinSymbol, destination: string): Promise<boolean> {
    return !this.rejectedDestinations.has(`${coin}:${destination}`);
  }

  async send(request: PaymentRequest): Promise<SendResult> {
    if (this.sendDelayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.sendDelayMs));
    }
    if (this.sendFailures > 0) {
      this.sendFailures--;
      throw new DeadApiError(`mock ${request.coin} node is down`);
    }
    this.sent.push({ ...request });
    this.txCounter++;
    return { ok: true, txid: `mock-${request.coin.toLowerCase()}-${this.txCounter}` };
  }

  async estimateNetworkFee(coin: CoinSymbol): Promise<string | null> {
    return this.networkFees[coin] ?? null;
  }

  async healthCheck(coin: CoinSymbol): Promise<boolean> {
    this.healthChecks.set(coin, (this.healthChecks.get(coin) ?? 0) + 1);
    return !this.downCoins.has(coin);
  }
}

/**
 * Handler factory registered as "mock".
 */
export function createMockHandler(options: Record<string, unknown>): MockHandler {
  return new MockHandler(parseMockOptions(options));
}
