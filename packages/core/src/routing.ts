/**
 * @fileoverview Destination selection for deposits.
 * Decides which outgoing pair and which destination address/account a deposit
 * is converted to.
 *
 * Rules, in order:
 * 1. A stored DepositRoute for the deposit's address (and memo) wins.
 * 2. Address-based deposits without a route cannot be routed.
 * 3. Account-based deposits are routed by memo, split on whitespace:
 *    - "<SYMBOL> <destination> [memo...]" when the first word is the `to` symbol
 *      of one of the coin's outgoing pairs (case-insensitive);
 *    - "<destination> [memo...]" only when the coin has exactly one outgoing pair.
 */

import type { CoinPair, Deposit, DepositRoute, IdentificationMode } from './types';

export type DestinationResolution =
  | { ok: true; pair: CoinPair; destination: string; memo: string | null }
  | { ok: false; reason: string };

/**
 * Resolves pair and destination for a deposit.
 *
 * @param pairs - Outgoing pairs of the deposit's coin
 * @param route - The stored route for the deposit's address, if any
 */
export function resolveDestination(
  mode: IdentificationMode,
  deposit: Pick<Deposit, 'coin' | 'destination' | 'memo'>,
  pairs: readonly CoinPair[],
  route: DepositRoute | null,
): DestinationResolution {
  if (pairs.length === 0) {
    return { ok: false, reason: `No coin pairs with from coin ${deposit.coin}` };
  }

  if (route) {
    const pair = pairs.find(p => p.to === route.destinationCoin);
    if (!pair) {
      return { ok: false, reason: `No coin pair ${deposit.coin} -> ${route.destinationCoin} for mapped address ${route.depositAddress}` };
    }
    return { ok: true, pair, destination: route.destinationAddress, memo: route.destinationMemo };
  }

  if (mode === 'address') {
    return { ok: false, reason: `Deposit address ${deposit.destination} has no known destination mapped to it` };
  }

  const memo = deposit.memo?.trim() ?? '';
  if (memo.length === 0) {
    return { ok: false, reason: 'No memo - unable to route this deposit anywhere' };
  }

  const words = memo.split(/\s+/);
  const explicit = pairs.find(p => p.to === words[0].toUpperCase());
  if (explicit) {
    if (words.length < 2) {
      return { ok: false, reason: `Memo names ${explicit.to} but no destination` };
    }
    return { ok: true, pair: explicit, destination: words[1], memo: joinMemo(words.slice(2)) };
  }

  if (pairs.length === 1) {
    return { ok: true, pair: pairs[0], destination: words[0], memo: joinMemo(words.slice(1)) };
  }

  const symbols = pairs.map(p => p.to).join(', ');
  return { ok: false, reason: `Memo must start with a destination symbol (one of ${symbols})` };
}

function joinMemo(words: string[]): string | null {
  return words.length > 0 ? words.join(' ') : null;
}
