/**
 * @fileoverview In-memory account+memo token ledger. Implements only the batch
 * capabilities, so it answers every coin of a run in one call.
 *
 * Options: `{ coins: ["SGTK"], balances?: { SGTK: "1000" } }`
 * A coin without a balance has unlimited funds.
 */

import { ConfigurationError, isDecimalString, parseAmount } from '@convgate/core';
import type { CoinSymbol, RawTransaction } from '@convgate/core';
import type { BatchDepositLoader, BatchPaymentManager, DestinationCheck, PaymentRequest, SendResult } from './CoinHandler';

export interface MockLedgerOptions {
  coins: CoinSymbol[];
  balances?: Record<CoinSymbol, string>;
}

/**
 * A transfer into one of our accounts.
 */
export interface LedgerTransfer {
  coin: CoinSymbol;
  txid: string;
  from?: string;
  to: string;
  memo?: string;
  amount: string;
}

export function parseMockLedgerOptions(options: Record<string, unknown>): MockLedgerOptions {
  const coins = options.coins;
  if (!Array.isArray(coins) || coins.length === 0 || !coins.every(c => typeof c === 'string')) {
    throw new ConfigurationError(['options.coins must be a non-empty array of token symbols']);
  }
  const balances: Record<CoinSymbol, string> = {};
  const rawBalances = options.balances;
  if (typeof rawBalances === 'object' && rawBalances !== null) {
    for (const [coin, balance] of Object.entries(rawBalances)) {
      if (typeof balance !== 'string' || !isDecimalString(balance)) {
        throw new ConfigurationError([`options.balances.${coin} must be a decimal string`]);
      }
      balances[coin] = balance;
    }
  }
  return { coins: coins.map(String), balances };
}

export class MockLedgerHandler implements BatchDepositLoader, BatchPaymentManager {
  readonly name: string = 'mock-ledger';

  readonly sent: PaymentRequest[] = [];
  readonly batchCalls = { load: 0, validate: 0, send: 0 };

  private readonly coins: CoinSymbol[];
  private readonly balances = new Map<CoinSymbol, string>();
  private readonly transfers: LedgerTransfer[] = [];
  private readonly missingAccounts = new Set<string>();
  private txCounter = 0;

  constructor(options: MockLedgerOptions) {
    this.coins = options.coins.map(c => c.toUpperCase());
    for (const [coin, balance] of Object.entries(options.balances ?? {})) {
      this.balances.set(coin, balance);
    }
  }

  supportedCoins(): CoinSymbol[] {
    return [...this.coins];
  }

  addTransfer(transfer: LedgerTransfer): void {
    this.transfers.push(transfer);
  }

  /**
   * Marks `account` as nonexistent: validation answers false and sends are refused.
   */
  rejectAccount(coin: CoinSymbol, account: string): void {
    this.missingAccounts.add(`${coin}:${account}`);
  }

  setBalance(coin: CoinSymbol, balance: string): void {
    this.balances.set(coin, balance);
  }

  async loadDepositsBatch(coins: CoinSymbol[]): Promise<RawTransaction[]> {
    this.batchCalls.load++;
    return this.transfers
      .filter(t => coins.includes(t.coin))
      .map(t => ({
        coin: t.coin,
        txid: t.txid,
        source: t.from,
        destination: t.to,
        memo: t.memo,
        amount: t.amount,
      }));
  }

  async validateDestinations(checks: DestinationCheck[]): Promise<boolean[]> {
    this.batchCalls.validate++;
    return checks.map(c => !this.missingAccounts.has(`${c.coin}:${c.destination}`));
  }

  async sendBatch(requests: PaymentRequest[]): Promise<SendResult[]> {
    this.batchCalls.send++;
    return requests.map((request): SendResult => {
      if (this.missingAccounts.has(`${request.coin}:${request.destination}`)) {
        return { ok: false, reason: `account ${request.destination} does not exist`, retryable: false };
      }
      const balance = this.balances.get(request.coin);
      if (balance !== undefined) {
        const remaining = parseAmount(balance).sub(parseAmount(request.amount));
        if (remaining.isNegative()) {
          return { ok: false, reason: `balance ${balance} ${request.coin} is below ${request.amount}`, retryable: true };
        }
        this.balances.set(request.coin, remaining.toString());
      }
      this.sent.push({ ...request });
      this.txCounter++;
      return { ok: true, txid: `ledger-${this.txCounter}` };
    });
  }
}

/**
 * Handler factory registered as "mock-ledger".
 */
export function createMockLedgerHandler(options: Record<string, unknown>): MockLedgerHandler {
  return new MockLedgerHandler(parseMockLedgerOptions(options));
}
