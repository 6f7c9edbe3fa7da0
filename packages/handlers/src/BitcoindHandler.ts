/**
 * @fileoverview Handler for bitcoind-compatible daemons (BTC, LTC, DOGE and
 * other forks) over their JSON-RPC HTTP interface.
 * Address-based: every deposit is one wallet output, identified by (txid, vout).
 * One daemon per coin, configured under the handler's `coins` option.
 */

import { ConfigurationError, Decimal } from '@convgate/core';
import type { CoinSymbol, RawTransaction } from '@convgate/core';
import type { PaymentManager, PaymentRequest, DepositLoader, SendResult } from './CoinHandler';
import { AccountNotFoundError, DeadApiError, HandlerError, NotEnoughBalanceError } from './errors';

/**
 * Connection and policy settings for one coin's daemon.
 */
export interface BitcoindCoinConfig {
  url: string;
  user: string;
  password: string;
  /** Confirmations needed before a deposit is reported */
  confirmations: number;
  /** Report unconfirmed transactions the daemon marks as trusted (our own change) */
  useTrusted: boolean;
  /** How many recent wallet transactions to scan per load */
  listCount: number;
  /** Assumed size of an outgoing transaction, for fee estimates */
  txSizeBytes: number;
  /** Block target passed to estimatesmartfee */
  confTarget: number;
  /** Per request */
  timeoutMs: number;
}

// bitcoind RPC error codes
const RPC_INVALID_ADDRESS_OR_KEY = -5;
const RPC_WALLET_INSUFFICIENT_FUNDS = -6;

type IntOption = 'confirmations' | 'listCount' | 'txSizeBytes' | 'confTarget' | 'timeoutMs';

const INT_DEFAULTS: Record<IntOption, number> = {
  confirmations: 6,
  listCount: 1000,
  txSizeBytes: 250,
  confTarget: 6,
  timeoutMs: 30000,
};

interface WalletTransaction {
  address: string;
  category: string;
  amount: number;
  confirmations: number;
  txid: string;
  vout: number;
  time?: number;
  generated?: boolean;
  trusted?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isWalletTransaction(value: unknown): value is WalletTransaction {
  return isRecord(value)
    && typeof value.address === 'string'
    && typeof value.category === 'string'
    && typeof value.amount === 'number'
    && typeof value.confirmations === 'number'
    && typeof value.txid === 'string'
    && typeof value.vout === 'number'
    && (value.time === undefined || typeof value.time === 'number');
}

/**
 * Parses the handler options block:
 * `{ coins: { LTC: { url, user, password?, confirmations?, ... } } }`.
 * A missing password is read from BITCOIND_<SYMBOL>_PASSWORD.
 *
 * @throws ConfigurationError listing every problem
 */
export function parseBitcoindOptions(
  options: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Map<CoinSymbol, BitcoindCoinConfig> {
  const problems: string[] = [];
  const configs = new Map<CoinSymbol, BitcoindCoinConfig>();

  if (!isRecord(options.coins) || Object.keys(options.coins).length === 0) {
    throw new ConfigurationError(['options.coins must map at least one coin symbol to its daemon settings']);
  }

  for (const [symbol, raw] of Object.entries(options.coins)) {
    if (!isRecord(raw)) {
      problems.push(`coins.${symbol} must be an object`);
      continue;
    }
    const url = raw.url;
    const user = raw.user;
    const password = typeof raw.password === 'string' ? raw.password : env[`BITCOIND_${symbol}_PASSWORD`];
    if (typeof url !== 'string' || url.length === 0) {
      problems.push(`coins.${symbol}.url is required`);
    }
    if (typeof user !== 'string' || user.length === 0) {
      problems.push(`coins.${symbol}.user is required`);
    }
    if (!password) {
      problems.push(`coins.${symbol}.password or BITCOIND_${symbol}_PASSWORD is required`);
    }

    const readInt = (key: IntOption, min: number): number => {
      const value = raw[key];
      if (value === undefined) {
        return INT_DEFAULTS[key];
      }
      if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
        problems.push(`coins.${symbol}.${key} must be an integer >= ${min}`);
        return INT_DEFAULTS[key];
      }
      return value;
    };
    const useTrusted = raw.useTrusted ?? false;
    if (typeof useTrusted !== 'boolean') {
      problems.push(`coins.${symbol}.useTrusted must be a boolean`);
    }

    if (typeof url === 'string' && typeof user === 'string' && password) {
      configs.set(symbol, {
        url,
        user,
        password,
        confirmations: readInt('confirmations', 0),
        useTrusted: useTrusted === true,
        listCount: readInt('listCount', 1),
        txSizeBytes: readInt('txSizeBytes', 1),
        confTarget: readInt('confTarget', 1),
        timeoutMs: readInt('timeoutMs', 1),
      });
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return configs;
}

/**
 * bitcoind RPC error with its numeric code.
 */
export class RpcError extends HandlerError {
  constructor(readonly code: number, message: string) {
    super(message);
    this.name = 'RpcError';
  }
}

export class BitcoindHandler implements DepositLoader, PaymentManager {
  readonly name = 'bitcoind';
  private requestId = 0;

  constructor(private readonly configs: Map<CoinSymbol, BitcoindCoinConfig>) {}

  supportedCoins(): CoinSymbol[] {
    return Array.from(this.configs.keys());
  }

  /**
   * Reports received wallet outputs with enough confirmations. Mining rewards
   * and sends are skipped. Returns everything in the scan window each time;
   * deduplication happens downstream.
   */
  async loadDeposits(coin: CoinSymbol): Promise<RawTransaction[]> {
    const config = this.configFor(coin);
    const result = await this.call(coin, 'listtransactions', ['*', config.listCount, 0, true]);
    if (!Array.isArray(result)) {
      throw new HandlerError(`${coin} listtransactions returned ${typeof result}, expected an array`);
    }

    const deposits: RawTransaction[] = [];
    for (const entry of result) {
      if (!isWalletTransaction(entry)) {
        console.warn(`[BitcoindHandler] Skipping malformed ${coin} wallet entry:`, JSON.stringify(entry));
        continue;
      }
      if (entry.category !== 'receive' || entry.generated === true) {
        continue;
      }
      const confirmed = entry.confirmations >= config.confirmations;
      const trusted = config.useTrusted && entry.trusted === true;
      if (!confirmed && !trusted) {
        continue;
      }
      deposits.push({
        coin,
        txid: entry.txid,
        vout: entry.vout,
        destination: entry.address,
        amount: new Decimal(entry.amount).toFixed(8),
        timestamp: entry.time !== undefined ? new Date(entry.time * 1000).toISOString() : undefined,
      });
    }
    return deposits;
  }

  async validateDestination(coin: CoinSymbol, destination: string): Promise<boolean> {
    const result = await this.call(coin, 'validateaddress', [destination]);
    return isRecord(result) && result.isvalid === true;
  }

  /**
   * Sends from the daemon's wallet. The fee is paid on top by the wallet, so
   * the receiver gets exactly `amount`.
   */
  async send(request: PaymentRequest): Promise<SendResult> {
    const result = await this.call(request.coin, 'sendtoaddress', [
      request.destination,
      request.amount,
      `convgate ${request.reference}`,
      '',
      false,
    ]);
    if (typeof result !== 'string') {
      throw new HandlerError(`${request.coin} sendtoaddress returned ${typeof result}, expected a txid`);
    }
    console.log(`[BitcoindHandler] Sent ${request.amount} ${request.coin} to ${request.destination}: ${result}`);
    return { ok: true, txid: result };
  }

  /**
   * estimatesmartfee feerate (per kB) scaled to the configured transaction
   * size, or null when the daemon has no estimate yet.
   */
  async estimateNetworkFee(coin: CoinSymbol): Promise<string | null> {
    const config = this.configFor(coin);
    const result = await this.call(coin, 'estimatesmartfee', [config.confTarget]);
    if (!isRecord(result) || typeof result.feerate !== 'number') {
      return null;
    }
    return new Decimal(result.feerate).mul(config.txSizeBytes).div(1000).toDecimalPlaces(8).toString();
  }

  /**
   * Down while the daemon is unreachable or still syncing the chain.
   */
  async healthCheck(coin: CoinSymbol): Promise<boolean> {
    const result = await this.call(coin, 'getblockchaininfo', []);
    if (!isRecord(result)) {
      return false;
    }
    if (result.initialblockdownload === true) {
      console.warn(`[BitcoindHandler] ${coin} daemon is still syncing (${String(result.blocks)} blocks)`);
      return false;
    }
    return true;
  }

  private configFor(coin: CoinSymbol): BitcoindCoinConfig {
    const config = this.configs.get(coin);
    if (!config) {
      throw new HandlerError(`bitcoind handler has no daemon configured for ${coin}`);
    }
    return config;
  }

  /**
   * One JSON-RPC call. bitcoind answers RPC errors with HTTP 500 and a JSON
   * body, so the body is parsed before the status is looked at.
   */
  private async call(coin: CoinSymbol, method: string, params: unknown[]): Promise<unknown> {
    const config = this.configFor(coin);
    const auth = Buffer.from(`${config.user}:${config.password}`).toString('base64');

    let response: Response;
    try {
      response = await fetch(config.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Basic ${auth}`,
        },
        body: JSON.stringify({ jsonrpc: '1.0', id: ++this.requestId, method, params }),
        signal: AbortSignal.timeout(config.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DeadApiError(`${coin} daemon unreachable (${method}): ${message}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new DeadApiError(`${coin} daemon answered ${method} with HTTP ${response.status} and no JSON body`);
    }
    if (!isRecord(body)) {
      throw new DeadApiError(`${coin} daemon answered ${method} with HTTP ${response.status} and an unexpected body`);
    }

    if (isRecord(body.error)) {
      const code = typeof body.error.code === 'number' ? body.error.code : 0;
      const message = `${coin} ${method} failed: ${String(body.error.message)}`;
      if (code === RPC_INVALID_ADDRESS_OR_KEY) {
        throw new AccountNotFoundError(message);
      }
      if (code === RPC_WALLET_INSUFFICIENT_FUNDS) {
        throw new NotEnoughBalanceError(message);
      }
      throw new RpcError(code, message);
    }
    if (!response.ok) {
      throw new DeadApiError(`${coin} daemon answered ${method} with HTTP ${response.status}`);
    }
    return body.result;
  }
}

/**
 * Handler factory registered as "bitcoind".
 */
export function createBitcoindHandler(options: Record<string, unknown>): BitcoindHandler {
  return new BitcoindHandler(parseBitcoindOptions(options));
}
