/**
 * @fileoverview Capability contracts for coin handler plugins.
 * A handler abstracts one ledger backend (a bitcoind-style UTXO daemon, a token
 * ledger node, ...) and implements any subset of the capabilities below. There
 * is no combined base class: the pipelines detect capabilities with the type
 * guards at the bottom of this file.
 */

import type { CoinSymbol, RawTransaction } from '@convgate/core';

/**
 * What every handler provides: a name and the coins it services.
 */
export interface CoinHandler {
  readonly name: string;

  /**
   * Optional one-time setup (connections, key loading). Called by the registry
   * before supportedCoins().
   */
  init?(): Promise<void>;

  /**
   * Upper-case symbols of the coins this handler services.
   */
  supportedCoins(): CoinSymbol[] | Promise<CoinSymbol[]>;
}

/**
 * Lists incoming transactions for one coin at a time.
 * Implementations may return transactions that were already reported; the
 * ingestion pipeline deduplicates, never the handler.
 */
export interface DepositLoader extends CoinHandler {
  loadDeposits(coin: CoinSymbol): Promise<RawTransaction[]>;
}

/**
 * Lists incoming transactions for many coins in one backend round-trip.
 */
export interface BatchDepositLoader extends CoinHandler {
  loadDepositsBatch(coins: CoinSymbol[]): Promise<RawTransaction[]>;
}

/**
 * A destination to validate before sending.
 */
export interface DestinationCheck {
  coin: CoinSymbol;
  destination: string;
  memo: string | null;
}

/**
 * An outgoing payment.
 */
export interface PaymentRequest extends DestinationCheck {
  amount: string;
  /** Id of the deposit being converted, for logs and backend-side idempotency */
  reference: string;
}

/**
 * Outcome of a send. A failure with retryable=false means the backend refused
 * the destination and retrying cannot help.
 */
export type SendResult =
  | { ok: true; txid: string | null; fee?: string }
  | { ok: false; reason: string; retryable: boolean };

/**
 * Validates destinations and sends funds, one request at a time.
 */
export interface PaymentManager extends CoinHandler {
  validateDestination(coin: CoinSymbol, destination: string, memo: string | null): Promise<boolean>;
  send(request: PaymentRequest): Promise<SendResult>;

  /**
   * Current network fee estimate for a send of `coin`, or null to fall back to
   * the coin's configured constant.
   */
  estimateNetworkFee?(coin: CoinSymbol): Promise<string | null>;

  /**
   * Whether sends of `coin` can go out right now. A coin that is down is
   * skipped by the conversion pipeline without using up attempts. Throwing
   * counts as down.
   */
  healthCheck?(coin: CoinSymbol): Promise<boolean>;
}

/**
 * Validates destinations and sends funds for many requests in one call.
 * Results are returned in request order, one per request.
 */
export interface BatchPaymentManager extends CoinHandler {
  validateDestinations(checks: DestinationCheck[]): Promise<boolean[]>;
  sendBatch(requests: PaymentRequest[]): Promise<SendResult[]>;
  estimateNetworkFee?(coin: CoinSymbol): Promise<string | null>;
  healthCheck?(coin: CoinSymbol): Promise<boolean>;
}

export type AnyDepositLoader = DepositLoader | BatchDepositLoader;
export type AnyPaymentManager = PaymentManager | BatchPaymentManager;

/**
 * Creates a handler from its options object in the configuration file.
 */
export type HandlerFactory = (options: Record<string, unknown>) => CoinHandler;

export function isBatchDepositLoader(handler: CoinHandler): handler is BatchDepositLoader {
  return 'loadDepositsBatch' in handler && typeof handler.loadDepositsBatch === 'function';
}

export function isDepositLoader(handler: CoinHandler): handler is DepositLoader {
  return 'loadDeposits' in handler && typeof handler.loadDeposits === 'function';
}

export function isBatchPaymentManager(handler: CoinHandler): handler is BatchPaymentManager {
  return 'sendBatch' in handler && typeof handler.sendBatch === 'function'
    && 'validateDestinations' in handler && typeof handler.validateDestinations === 'function';
}

export function isPaymentManager(handler: CoinHandler): handler is PaymentManager {
  return 'send' in handler && typeof handler.send === 'function'
    && 'validateDestination' in handler && typeof handler.validateDestination === 'function';
}

export function hasLoader(handler: CoinHandler): handler is AnyDepositLoader {
  return isBatchDepositLoader(handler) || isDepositLoader(handler);
}

export function hasManager(handler: CoinHandler): handler is AnyPaymentManager {
  return isBatchPaymentManager(handler) || isPaymentManager(handler);
}
