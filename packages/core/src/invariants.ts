/**
 * @fileoverview Deposit ledger invariants.
 * Dedup keys that guarantee at-most-once insertion per real-world transaction,
 * the deposit lifecycle state machine, and validation of raw loader output.
 */

import type { CoinSymbol, DepositStatus, IdentificationMode, RawTransaction } from './types';
import { isPositiveAmount, normalizeAmount } from './decimal';

/**
 * Builds the uniqueness key of a deposit.
 * address mode: (coin, txid, vout); account mode: (coin, txid, memo).
 * A missing vout counts as output 0 and a missing memo as the empty memo.
 *
 * @example
 * depositDedupKey('address', { coin: 'LTC', txid: 'T', vout: 0 }) // '["LTC","T","vout",0]'
 * depositDedupKey('account', { coin: 'SGTK', txid: 'T', memo: 'M' }) // '["SGTK","T","memo","M"]'
 */
export function depositDedupKey(
  mode: IdentificationMode,
  tx: Pick<RawTransaction, 'coin' | 'txid' | 'vout' | 'memo'>,
): string {
  if (mode === 'address') {
    return JSON.stringify([tx.coin, tx.txid, 'vout', tx.vout ?? 0]);
  }
  return JSON.stringify([tx.coin, tx.txid, 'memo', tx.memo ?? '']);
}

/**
 * Validates that a deposit status transition is allowed by the lifecycle.
 * processing → processing is a re-claim of an abandoned deposit.
 *
 * @example
 * validateDepositTransition('new', 'processing')   // true
 * validateDepositTransition('invalid', 'processing') // false
 * validateDepositTransition('invalid', 'refunding') // true
 */
export function validateDepositTransition(current: DepositStatus, next: DepositStatus): boolean {
  const validTransitions: Record<DepositStatus, DepositStatus[]> = {
    'new': ['processing'],
    'processing': ['processing', 'converted', 'invalid', 'error'],
    'error': ['processing', 'refunding'],
    'invalid': ['refunding'],
    'refunding': ['refunded', 'invalid', 'error'],
    'converted': [],
    'refunded': [],
  };

  return validTransitions[current].includes(next);
}

export type RawTransactionCheck =
  | { ok: true; tx: RawTransaction }
  | { ok: false; reason: string };

/**
 * Checks a loader-reported transaction before it is stored and returns a
 * cleaned copy (trimmed strings, normalised amount, mode-specific fields).
 *
 * @param expectedCoins - Coins the loader was asked for; anything else is rejected
 */
export function checkRawTransaction(
  tx: RawTransaction,
  mode: IdentificationMode,
  expectedCoins: readonly CoinSymbol[],
): RawTransactionCheck {
  if (!expectedCoins.includes(tx.coin)) {
    return { ok: false, reason: `coin ${tx.coin} was not requested from this loader` };
  }
  const txid = tx.txid.trim();
  if (txid.length === 0) {
    return { ok: false, reason: 'txid is empty' };
  }
  const destination = tx.destination.trim();
  if (destination.length === 0) {
    return { ok: false, reason: 'destination is empty' };
  }
  if (!isPositiveAmount(tx.amount)) {
    return { ok: false, reason: `amount "${tx.amount}" is not a positive decimal` };
  }

  const cleaned: RawTransaction = {
    coin: tx.coin,
    txid,
    destination,
    amount: normalizeAmount(tx.amount),
    source: tx.source?.trim() || undefined,
    timestamp: tx.timestamp,
  };

  if (mode === 'address') {
    const vout = tx.vout ?? 0;
    if (!Number.isInteger(vout) || vout < 0) {
      return { ok: false, reason: `vout ${vout} is not a non-negative integer` };
    }
    cleaned.vout = vout;
  } else {
    const memo = tx.memo?.trim();
    cleaned.memo = memo ? memo : undefined;
  }

  return { ok: true, tx: cleaned };
}
