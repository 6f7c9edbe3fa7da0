/**
 * @fileoverview Core type definitions for the conversion gateway.
 * Coins, coin pairs, deposits, conversions and the raw transactions handlers
 * report. Amounts are always decimal strings, never JS numbers.
 */

/**
 * Upper-case coin or token symbol, unique across the gateway.
 * @example 'LTC' | 'BTC' | 'SGTK'
 */
export type CoinSymbol = string;

/**
 * How deposits of a coin are identified.
 * address: by destination address + output index (UTXO chains)
 * account: by destination account + memo (token ledgers)
 */
export type IdentificationMode = 'address' | 'account';

/**
 * Static reference data for one coin.
 */
export interface Coin {
  symbol: CoinSymbol;
  displayName: string;
  /** Name of the registered handler servicing this coin */
  handler: string;
  mode: IdentificationMode;
  /** Decimal places outgoing amounts are truncated to */
  decimals: number;
  /** Estimated network fee charged on sends of this coin (decimal string) */
  networkFee: string;
  enabled: boolean;
}

/**
 * Exchange rate specification for a pair.
 * fixed: a stored decimal rate (amount of `to` per one `from`)
 * dynamic: the named rate source is asked at conversion time
 */
export type RateSpec =
  | { type: 'fixed'; value: string }
  | { type: 'dynamic'; source: string };

/**
 * An ordered (from, to) conversion relationship.
 */
export interface CoinPair {
  from: CoinSymbol;
  to: CoinSymbol;
  rate: RateSpec;
  /** Exchange fee percentage taken from the converted amount, e.g. '1' = 1% */
  feePercent: string;
  /** Deposits below this amount are rejected (decimal string) */
  minAmount?: string;
}

/**
 * Lifecycle of a deposit.
 * new → processing → converted | invalid | error
 * invalid | error → refunding → refunded (or back where it came from)
 * @see validateDepositTransition in invariants.ts
 */
export type DepositStatus = 'new' | 'processing' | 'converted' | 'invalid' | 'error' | 'refunding' | 'refunded';

/**
 * A transaction as reported by a handler's loader, before deduplication.
 */
export interface RawTransaction {
  coin: CoinSymbol;
  txid: string;
  /** Output index, address-based coins only */
  vout?: number;
  /** Sending address or account, if known */
  source?: string;
  /** Our receiving address or account */
  destination: string;
  /** Account-based coins only */
  memo?: string;
  amount: string;
  /** ISO timestamp the transaction was observed on-chain */
  timestamp?: string;
}

/**
 * One incoming transaction recorded in the deposit ledger.
 */
export interface Deposit {
  id: string;
  coin: CoinSymbol;
  txid: string;
  vout: number | null;
  source: string | null;
  destination: string;
  memo: string | null;
  amount: string;
  txTimestamp: string | null;
  status: DepositStatus;
  errorReason: string | null;
  /** Number of times the conversion pipeline has claimed this deposit */
  attempts: number;
  claimId: string | null;
  claimedAt: string | null;
  processedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

/**
 * The outgoing payment made for one converted deposit.
 */
export interface Conversion {
  id: string;
  depositId: string;
  fromCoin: CoinSymbol;
  toCoin: CoinSymbol;
  fromAmount: string;
  destination: string;
  memo: string | null;
  rate: string;
  /** Amount sent, net of fees */
  amount: string;
  exchangeFee: string;
  networkFee: string;
  /** Outgoing transaction id; null when the backend confirms asynchronously */
  txid: string | null;
  createdAt: string;
  updatedAt: string;
}

/**
 * Funds of a deposit that could not be converted, returned to their sender.
 */
export interface Refund {
  id: string;
  depositId: string;
  coin: CoinSymbol;
  destination: string;
  memo: string | null;
  amount: string;
  reason: string;
  txid: string | null;
  createdAt: string;
}

/**
 * Maps a deposit address (and optionally memo) to where its funds should go.
 * Address-based deposits carry no memo, so they are routed through these.
 */
export interface DepositRoute {
  depositCoin: CoinSymbol;
  depositAddress: string;
  depositMemo: string | null;
  destinationCoin: CoinSymbol;
  destinationAddress: string;
  destinationMemo: string | null;
}
