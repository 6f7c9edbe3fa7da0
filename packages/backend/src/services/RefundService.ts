/**
 * @fileoverview Returns deposits that could not be converted to their sender.
 * Only invalid and error deposits are refunded. The deposit is moved into
 * refunding before anything is sent, so neither a conversion run nor a second
 * refund can pick it up while the refund is in flight.
 */

import { v4 as uuidv4 } from 'uuid';
import { toError } from '@convgate/core';
import type { Coin, CoinSymbol, Deposit, Refund } from '@convgate/core';
import { sendPayments, validateDestinations } from '@convgate/handlers';
import type { DispatchOptions, HandlerLookup, PaymentRequest } from '@convgate/handlers';
import type { GatewayConfig } from '../config/gateway-config';
import type { DepositRepository, FinishStatus } from '../db/repositories/DepositRepository';
import type { RefundRepository } from '../db/repositories/RefundRepository';

/**
 * A refund that was not started: the deposit is unknown, already settled, or
 * has nowhere to go. Nothing was changed.
 */
export class RefundRefusedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RefundRefusedError';
  }
}

export interface RefundOptions {
  /** Sent as the memo on account coins; defaults to the deposit's error reason */
  reason?: string;
  /** Address or account to return to instead of the deposit's sender */
  returnTo?: string;
}

/**
 * A refund that was started. When it failed, the deposit is back in the
 * status it was refunded from.
 */
export type RefundOutcome =
  | { ok: true; refund: Refund; claimHeld: boolean }
  | { ok: false; reason: string };

export interface RefundDeps {
  config: Pick<GatewayConfig, 'coins' | 'handlerTimeoutMs' | 'handlerConcurrency'>;
  handlers: HandlerLookup;
  deposits: DepositRepository;
  refunds: RefundRepository;
  /** Clock, replaced in tests */
  now?: () => Date;
}

type SendOutcome = { ok: true; txid: string | null } | { ok: false; reason: string };

function defaultReason(deposit: Deposit): string {
  return deposit.errorReason ??
    `Returned to sender after an unknown error processing deposit of ${deposit.amount} ${deposit.coin} with txid ${deposit.txid}`;
}

export class RefundService {
  private readonly coinBySymbol: Map<CoinSymbol, Coin>;
  private readonly dispatch: DispatchOptions;

  constructor(private readonly deps: RefundDeps) {
    this.coinBySymbol = new Map(deps.config.coins.map(c => [c.symbol, c]));
    this.dispatch = { timeoutMs: deps.config.handlerTimeoutMs, concurrency: deps.config.handlerConcurrency };
  }

  /**
   * Sends the full deposit amount back through the deposit coin's manager and
   * records the refund.
   *
   * @throws RefundRefusedError when the deposit cannot be refunded at all
   */
  async refund(depositId: string, options: RefundOptions = {}): Promise<RefundOutcome> {
    const { deposits } = this.deps;
    const deposit = deposits.getById(depositId);
    if (!deposit) {
      throw new RefundRefusedError(`No deposit ${depositId}`);
    }
    if (deposit.status === 'refunded') {
      throw new RefundRefusedError(`Deposit ${depositId} is already refunded`);
    }
    if (deposit.status === 'converted') {
      throw new RefundRefusedError(`Deposit ${depositId} is already converted`);
    }
    if (deposit.status !== 'invalid' && deposit.status !== 'error') {
      throw new RefundRefusedError(`Deposit ${depositId} is ${deposit.status}; only invalid or error deposits can be refunded`);
    }
    const previous: FinishStatus = deposit.status;

    const coin = this.coinBySymbol.get(deposit.coin);
    if (!coin) {
      throw new RefundRefusedError(`Coin ${deposit.coin} is not configured`);
    }
    const destination = options.returnTo ?? deposit.source;
    if (!destination) {
      throw new RefundRefusedError(`Deposit ${depositId} has no known sender; give an address to return it to`);
    }

    const claimId = uuidv4();
    if (!deposits.claimForRefund(depositId, claimId, this.now())) {
      throw new RefundRefusedError(`Deposit ${depositId} changed status before its refund started`);
    }

    const reason = options.reason ?? defaultReason(deposit);
    const memo = coin.mode === 'account' ? reason : null;
    console.log(`[RefundService] Returning ${deposit.amount} ${deposit.coin} of deposit ${depositId} to ${destination}: ${reason}`);

    let sent: SendOutcome;
    try {
      sent = await this.send({ coin: deposit.coin, destination, memo, amount: deposit.amount, reference: deposit.id });
    } catch (error) {
      this.release(deposit, claimId, previous, `Refund failed: ${toError(error).message}`);
      throw error;
    }
    if (!sent.ok) {
      this.release(deposit, claimId, previous, sent.reason);
      return { ok: false, reason: sent.reason };
    }

    const { refund, claimHeld } = this.deps.refunds.record(
      { depositId, coin: deposit.coin, destination, memo, amount: deposit.amount, reason, txid: sent.txid },
      claimId,
      this.now(),
    );
    if (!claimHeld) {
      console.warn(`[RefundService] Refund claim on deposit ${depositId} was lost while sending; recorded the refund anyway`);
    }
    console.log(`[RefundService] Refunded deposit ${depositId} in tx ${refund.txid ?? '(none)'}`);
    return { ok: true, refund, claimHeld };
  }

  /**
   * Checks the return destination, then sends to it.
   */
  private async send(request: PaymentRequest): Promise<SendOutcome> {
    const { handlers } = this.deps;
    const [valid] = await validateDestinations(handlers, [request], this.dispatch);
    if (!valid.ok) {
      return { ok: false, reason: `Could not validate return destination: ${valid.error.message}` };
    }
    if (!valid.value) {
      return { ok: false, reason: `Return destination ${request.destination} is not a valid ${request.coin} address` };
    }

    const [result] = await sendPayments(handlers, [request], this.dispatch);
    if (!result.ok) {
      // A timed out send may still have gone through; check before refunding again
      return { ok: false, reason: `Refund send failed: ${result.error.message}` };
    }
    if (!result.value.ok) {
      return { ok: false, reason: `Refund send refused: ${result.value.reason}` };
    }
    return { ok: true, txid: result.value.txid };
  }

  /**
   * Puts the deposit back where it was refunded from, with its original error
   * reason.
   */
  private release(deposit: Deposit, claimId: string, status: FinishStatus, why: string): void {
    console.error(`[RefundService] Refund of deposit ${deposit.id} failed: ${why}`);
    if (!this.deps.deposits.releaseRefund(deposit.id, claimId, status, deposit.errorReason, this.now())) {
      console.warn(`[RefundService] Refund claim on deposit ${deposit.id} was lost before it could be released`);
    }
  }

  private now(): string {
    return (this.deps.now ? this.deps.now() : new Date()).toISOString();
  }
}
