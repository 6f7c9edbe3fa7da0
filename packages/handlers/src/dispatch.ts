/**
 * @fileoverview Uniform calls into handlers. Hides the difference between
 * single and batch capabilities from the pipelines: every call gets a timeout,
 * single-item handlers are driven through a bounded pool, and a failure is
 * confined to the coin or request it belongs to.
 */

import { mapWithConcurrency, toError, withTimeout } from '@convgate/core';
import type { CoinSymbol, RawTransaction, Settled } from '@convgate/core';
import { isBatchDepositLoader, isBatchPaymentManager } from './CoinHandler';
import type {
  AnyDepositLoader,
  AnyPaymentManager,
  BatchPaymentManager,
  DepositLoader,
  DestinationCheck,
  PaymentManager,
  PaymentRequest,
  SendResult,
} from './CoinHandler';
import { AccountNotFoundError, NotEnoughBalanceError, RequestDroppedError } from './errors';
import type { HandlerLookup } from './HandlerRegistry';

export interface DispatchOptions {
  /** Per handler call */
  timeoutMs: number;
  /** Concurrent calls into one single-item handler */
  concurrency: number;
}

/**
 * Result of one handler call covering `coins`.
 */
export interface LoadOutcome {
  coins: CoinSymbol[];
  result: Settled<RawTransaction[]>;
}

/**
 * Asks a loader for the transactions of `coins`. A batch loader is called
 * once; a single loader once per coin.
 */
export async function loadFromHandler(
  handler: AnyDepositLoader,
  coins: CoinSymbol[],
  opts: DispatchOptions,
): Promise<LoadOutcome[]> {
  if (isBatchDepositLoader(handler)) {
    const label = `${handler.name}.loadDepositsBatch(${coins.join(',')})`;
    try {
      const txs = await withTimeout(handler.loadDepositsBatch(coins), opts.timeoutMs, label);
      return [{ coins, result: { ok: true, value: txs } }];
    } catch (err) {
      return [{ coins, result: { ok: false, error: toError(err) } }];
    }
  }

  const loader: DepositLoader = handler;
  const settled = await mapWithConcurrency(coins, opts.concurrency, coin =>
    withTimeout(loader.loadDeposits(coin), opts.timeoutMs, `${loader.name}.loadDeposits(${coin})`),
  );
  return coins.map((coin, i) => ({ coins: [coin], result: settled[i] }));
}

/**
 * Per-item callbacks around a dispatch.
 */
interface ItemHooks<T, R> {
  /** Runs right before the call carrying the item; false withdraws the item */
  before?: (item: T, index: number) => boolean;
  /** Runs as soon as the call carrying the item has settled */
  after?: (result: Settled<R>, index: number) => void;
}

/**
 * Groups item indexes by the manager of their coin, calls each group, and
 * scatters the answers back into input order. An item whose coin has no
 * manager fails on its own.
 */
async function dispatchToManagers<T extends { coin: CoinSymbol }, R>(
  lookup: HandlerLookup,
  items: readonly T[],
  opts: DispatchOptions,
  batchCall: (manager: BatchPaymentManager, group: T[]) => Promise<R[]>,
  singleCall: (manager: PaymentManager, item: T) => Promise<R>,
  label: string,
  hooks: ItemHooks<T, R> = {},
): Promise<Settled<R>[]> {
  const results = new Array<Settled<R>>(items.length);
  const groups = new Map<AnyPaymentManager, number[]>();

  const settle = (index: number, result: Settled<R>): void => {
    results[index] = result;
    hooks.after?.(result, index);
  };
  const withdrawn = (index: number): boolean => {
    if (!hooks.before || hooks.before(items[index], index)) {
      return false;
    }
    settle(index, { ok: false, error: new RequestDroppedError(`${label} for item ${index} was withdrawn`) });
    return true;
  };

  items.forEach((item, index) => {
    let manager: AnyPaymentManager;
    try {
      manager = lookup.managerFor(item.coin);
    } catch (err) {
      settle(index, { ok: false, error: toError(err) });
      return;
    }
    const indexes = groups.get(manager);
    if (indexes) {
      indexes.push(index);
    } else {
      groups.set(manager, [index]);
    }
  });

  await Promise.all(Array.from(groups.entries()).map(async ([manager, indexes]) => {
    if (isBatchPaymentManager(manager)) {
      const kept = indexes.filter(i => !withdrawn(i));
      if (kept.length === 0) {
        return;
      }
      const group = kept.map(i => items[i]);
      let answers: Settled<R[]>;
      try {
        const value = await withTimeout(batchCall(manager, group), opts.timeoutMs, `${manager.name}.${label}Batch`);
        if (value.length !== group.length) {
          throw new Error(`${manager.name}.${label}Batch returned ${value.length} results for ${group.length} requests`);
        }
        answers = { ok: true, value };
      } catch (err) {
        answers = { ok: false, error: toError(err) };
      }
      kept.forEach((itemIndex, i) => {
        settle(itemIndex, answers.ok ? { ok: true, value: answers.value[i] } : answers);
      });
      return;
    }

    const single: PaymentManager = manager;
    const calls = await mapWithConcurrency(indexes, opts.concurrency, async itemIndex => {
      if (withdrawn(itemIndex)) {
        return;
      }
      const item = items[itemIndex];
      let result: Settled<R>;
      try {
        result = { ok: true, value: await withTimeout(singleCall(single, item), opts.timeoutMs, `${single.name}.${label}(${item.coin})`) };
      } catch (err) {
        result = { ok: false, error: toError(err) };
      }
      settle(itemIndex, result);
    });
    // Only a throwing hook lands here
    for (const call of calls) {
      if (!call.ok) {
        throw call.error;
      }
    }
  }));

  return results;
}

/**
 * Validates destinations, one answer per check in input order. A check whose
 * handler failed comes back as a failure rather than `false`, so the caller can
 * tell a refused destination from an unreachable backend.
 */
export function validateDestinations(
  lookup: HandlerLookup,
  checks: readonly DestinationCheck[],
  opts: DispatchOptions,
): Promise<Settled<boolean>[]> {
  return dispatchToManagers(
    lookup,
    checks,
    opts,
    (manager, group) => manager.validateDestinations(group),
    (manager, check) => manager.validateDestination(check.coin, check.destination, check.memo),
    'validateDestination',
  );
}

function sendErrorToResult(err: Error): SendResult | null {
  if (err instanceof AccountNotFoundError) {
    return { ok: false, reason: err.message, retryable: false };
  }
  if (err instanceof NotEnoughBalanceError) {
    return { ok: false, reason: err.message, retryable: true };
  }
  return null;
}

function foldSendError(item: Settled<SendResult>): Settled<SendResult> {
  if (item.ok) {
    return item;
  }
  const folded = sendErrorToResult(item.error);
  return folded ? { ok: true, value: folded } : item;
}

/**
 * Callbacks around each request of sendPayments.
 */
export interface SendHooks {
  /**
   * Runs right before the call carrying `request` goes out. Returning false
   * withdraws the request; it is reported as a RequestDroppedError.
   */
  beforeSend?: (request: PaymentRequest, index: number) => boolean;
  /** Runs as soon as the call carrying the request has settled, before the other groups finish */
  onResult?: (result: Settled<SendResult>, index: number) => void;
}

/**
 * Sends payments, one result per request in input order. Thrown handler errors
 * with a known meaning are folded into a SendResult; anything else, including
 * a timeout, is reported as a failure of the request.
 */
export async function sendPayments(
  lookup: HandlerLookup,
  requests: readonly PaymentRequest[],
  opts: DispatchOptions,
  hooks: SendHooks = {},
): Promise<Settled<SendResult>[]> {
  const { beforeSend, onResult } = hooks;
  const settled = await dispatchToManagers(
    lookup,
    requests,
    opts,
    (manager, group) => manager.sendBatch(group),
    (manager, request) => manager.send(request),
    'send',
    {
      before: beforeSend,
      after: onResult ? (result, index) => onResult(foldSendError(result), index) : undefined,
    },
  );
  return settled.map(foldSendError);
}

/**
 * Asks the manager of `coin` whether it can send right now. A manager without
 * a health check is always up; one that throws or times out is down.
 */
export async function checkHealth(
  lookup: HandlerLookup,
  coin: CoinSymbol,
  opts: Pick<DispatchOptions, 'timeoutMs'>,
): Promise<boolean> {
  const manager = lookup.managerFor(coin);
  if (!manager.healthCheck) {
    return true;
  }
  try {
    return await withTimeout(manager.healthCheck(coin), opts.timeoutMs, `${manager.name}.healthCheck(${coin})`);
  } catch (err) {
    console.warn(`[Dispatch] Health check of ${coin} failed:`, toError(err).message);
    return false;
  }
}

/**
 * Live network fee estimate for `coin`, or null when the handler has none or
 * the estimate failed.
 */
export async function estimateNetworkFee(
  lookup: HandlerLookup,
  coin: CoinSymbol,
  opts: Pick<DispatchOptions, 'timeoutMs'>,
): Promise<string | null> {
  const manager = lookup.managerFor(coin);
  if (!manager.estimateNetworkFee) {
    return null;
  }
  try {
    return await withTimeout(manager.estimateNetworkFee(coin), opts.timeoutMs, `${manager.name}.estimateNetworkFee(${coin})`);
  } catch (err) {
    console.warn(`[Dispatch] Network fee estimate for ${coin} failed, using configured fee:`, toError(err).message);
    return null;
  }
}
