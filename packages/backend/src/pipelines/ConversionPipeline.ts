/**
 * @fileoverview Conversion pipeline (convert-coins).
 * Claims convertible deposits, works out pair, destination, rate and fees,
 * validates the destination and sends the converted amount. Every deposit
 * ends the run converted, invalid (never retried) or error (retried by a later
 * run until it runs out of attempts).
 *
 * A deposit is claimed right before it is priced, its claim is renewed right
 * before it is sent, and all terminal updates are conditional on still holding
 * that claim, so concurrent runs never send for the same deposit twice.
 * Deposits whose destination coin reports itself down are left unclaimed.
 */

import { v4 as uuidv4 } from 'uuid';
import { calculateConversion, compareAmounts, mapWithConcurrency, resolveDestination, toError } from '@convgate/core';
import type { Coin, CoinPair, CoinSymbol, Conversion, ConversionQuote, Deposit, Settled } from '@convgate/core';
import { checkHealth, estimateNetworkFee, RequestDroppedError, sendPayments, validateDestinations } from '@convgate/handlers';
import type { DispatchOptions, HandlerLookup, PaymentRequest, SendResult } from '@convgate/handlers';
import { pairsFrom } from '../config/gateway-config';
import type { GatewayConfig } from '../config/gateway-config';
import type { ConversionRepository } from '../db/repositories/ConversionRepository';
import type { ClaimWindow, DepositRepository, FinishStatus } from '../db/repositories/DepositRepository';
import type { RouteRepository } from '../db/repositories/RouteRepository';
import type { RateOracle } from '../services/RateOracle';
import { selectCoins } from './DepositIngestion';

export interface ConversionOptions {
  coins?: CoinSymbol[];
  /** Work out and log what would be sent without claiming or sending anything */
  dryRun?: boolean;
}

/**
 * Everything needed to send for one deposit.
 */
export interface ConversionPlan {
  deposit: Deposit;
  pair: CoinPair;
  destination: string;
  memo: string | null;
  rate: string;
  quote: ConversionQuote;
}

export type DepositOutcome =
  | { depositId: string; coin: CoinSymbol; status: 'converted'; conversion: Conversion }
  | { depositId: string; coin: CoinSymbol; status: FinishStatus; reason: string }
  | { depositId: string; coin: CoinSymbol; status: 'planned'; plan: ConversionPlan }
  | { depositId: string; coin: CoinSymbol; status: 'skipped'; reason: string };

export interface ConversionSummary {
  runId: string;
  dryRun: boolean;
  candidates: number;
  /** Processing deposits with no attempts left, moved to error at the start of the run */
  abandoned: number;
  converted: number;
  invalid: number;
  errors: number;
  skipped: number;
  planned: number;
  outcomes: DepositOutcome[];
  /** True when any deposit ended invalid or error in this run, abandoned ones included (never for dry runs) */
  hasFailures: boolean;
}

export interface ConversionDeps {
  config: Pick<
    GatewayConfig,
    'coins' | 'pairs' | 'handlerTimeoutMs' | 'handlerConcurrency' | 'staleClaimMs' | 'maxConvertAttempts' | 'convertBatchSize'
  >;
  handlers: HandlerLookup;
  deposits: DepositRepository;
  conversions: ConversionRepository;
  routes: RouteRepository;
  rates: RateOracle;
  /** Clock, replaced in tests */
  now?: () => Date;
}

interface Failed {
  ok: false;
  status: FinishStatus;
  reason: string;
}

/**
 * Where a deposit goes, worked out from configuration and routes alone.
 */
interface Route {
  pair: CoinPair;
  toCoin: Coin;
  destination: string;
  memo: string | null;
}

type Resolved = { ok: true; route: Route } | Failed;
type Prepared = { ok: true; plan: ConversionPlan } | Failed;

/**
 * Result of the per-deposit stage: a plan ready to validate and send, or an
 * outcome that ends the deposit's part in this run.
 */
type Step =
  | { kind: 'plan'; plan: ConversionPlan }
  | { kind: 'done'; outcome: DepositOutcome };

function invalid(reason: string): Failed {
  return { ok: false, status: 'invalid', reason };
}

function transient(reason: string): Failed {
  return { ok: false, status: 'error', reason };
}

function done(outcome: DepositOutcome): Step {
  return { kind: 'done', outcome };
}

function skipped(deposit: Deposit, reason: string): DepositOutcome {
  return { depositId: deposit.id, coin: deposit.coin, status: 'skipped', reason };
}

export class ConversionPipeline {
  private readonly coinBySymbol: Map<CoinSymbol, Coin>;
  private readonly dispatch: DispatchOptions;

  constructor(private readonly deps: ConversionDeps) {
    this.coinBySymbol = new Map(deps.config.coins.map(c => [c.symbol, c]));
    this.dispatch = { timeoutMs: deps.config.handlerTimeoutMs, concurrency: deps.config.handlerConcurrency };
  }

  async run(options: ConversionOptions = {}): Promise<ConversionSummary> {
    const { config, deposits } = this.deps;
    const runId = uuidv4();
    const dryRun = options.dryRun === true;
    const now = this.now();
    const window: ClaimWindow = {
      staleBefore: new Date(now.getTime() - config.staleClaimMs).toISOString(),
      maxAttempts: config.maxConvertAttempts,
    };

    const coins = selectCoins(config.coins, options.coins, 'ConversionPipeline').map(c => c.symbol);
    const abandoned = dryRun ? 0 : deposits.abandonExhausted(window, now.toISOString());
    if (abandoned > 0) {
      console.error(`[ConversionPipeline] Gave up on ${abandoned} deposits whose last allowed attempt never finished`);
    }

    const candidates = deposits.findConvertible({ ...window, coins, limit: config.convertBatchSize });
    console.log(`[ConversionPipeline] Run ${runId}${dryRun ? ' (dry)' : ''}: ${candidates.length} convertible deposits`);

    const health = new Map<CoinSymbol, Promise<boolean>>();
    const settled = await mapWithConcurrency(candidates, config.handlerConcurrency, deposit =>
      this.claimAndPrepare(deposit, runId, window, dryRun, health),
    );

    const outcomes: DepositOutcome[] = [];
    const plans: ConversionPlan[] = [];
    candidates.forEach((deposit, i) => {
      const step = settled[i];
      if (!step.ok) {
        outcomes.push(this.finish(deposit, runId, 'error', `Unexpected failure: ${step.error.message}`));
      } else if (step.value.kind === 'plan') {
        plans.push(step.value.plan);
      } else {
        outcomes.push(step.value.outcome);
      }
    });

    if (!dryRun) {
      const sendable = await this.checkDestinations(plans, runId, outcomes);
      outcomes.push(...await this.sendAll(sendable, runId));
    }

    return this.summarize(runId, dryRun, candidates.length, abandoned, outcomes);
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  /**
   * Resolves the destination, skips it while the destination coin is down,
   * claims it and prices it. A dry run plans without claiming.
   */
  private async claimAndPrepare(
    deposit: Deposit,
    runId: string,
    window: ClaimWindow,
    dryRun: boolean,
    health: Map<CoinSymbol, Promise<boolean>>,
  ): Promise<Step> {
    const resolved = this.resolve(deposit);
    if (resolved.ok && !(await this.isHealthy(resolved.route.pair.to, health))) {
      console.warn(`[ConversionPipeline] Destination coin ${resolved.route.pair.to} is down, leaving deposit ${deposit.id} for a later run`);
      return done(skipped(deposit, `Destination coin ${resolved.route.pair.to} is down`));
    }

    if (dryRun) {
      const prepared = resolved.ok ? await this.price(deposit, resolved.route) : resolved;
      if (!prepared.ok) {
        console.log(`[ConversionPipeline] [dry] Deposit ${deposit.id} would be ${prepared.status}: ${prepared.reason}`);
        return done({ depositId: deposit.id, coin: deposit.coin, status: prepared.status, reason: prepared.reason });
      }
      const { plan } = prepared;
      console.log(
        `[ConversionPipeline] [dry] Would send ${plan.quote.finalAmount} ${plan.pair.to} to ${plan.destination}` +
        ` for deposit ${deposit.id} (${deposit.amount} ${deposit.coin} @ ${plan.rate})`,
      );
      return done({ depositId: deposit.id, coin: deposit.coin, status: 'planned', plan });
    }

    if (!this.deps.deposits.claim(deposit.id, runId, window, this.now().toISOString())) {
      return done(skipped(deposit, 'claimed by another run'));
    }

    const prepared = resolved.ok ? await this.price(deposit, resolved.route) : resolved;
    if (!prepared.ok) {
      return done(this.finish(deposit, runId, prepared.status, prepared.reason));
    }
    return { kind: 'plan', plan: prepared.plan };
  }

  /**
   * One health check per destination coin and run.
   */
  private isHealthy(coin: CoinSymbol, health: Map<CoinSymbol, Promise<boolean>>): Promise<boolean> {
    let pending = health.get(coin);
    if (!pending) {
      pending = checkHealth(this.deps.handlers, coin, this.dispatch).catch((error: unknown) => {
        // A coin without a manager fails later, when it is priced
        console.warn(`[ConversionPipeline] Cannot check health of ${coin}:`, toError(error).message);
        return true;
      });
      health.set(coin, pending);
    }
    return pending;
  }

  /**
   * Pair, destination and minimum of one deposit.
   */
  private resolve(deposit: Deposit): Resolved {
    const fromCoin = this.coinBySymbol.get(deposit.coin);
    if (!fromCoin) {
      return transient(`Coin ${deposit.coin} is not configured`);
    }

    const stored = this.deps.routes.find(deposit.coin, deposit.destination, deposit.memo);
    const resolved = resolveDestination(fromCoin.mode, deposit, pairsFrom(this.deps.config, deposit.coin), stored);
    if (!resolved.ok) {
      return invalid(resolved.reason);
    }
    const { pair } = resolved;

    const toCoin = this.coinBySymbol.get(pair.to);
    if (!toCoin) {
      return invalid(`Destination coin ${pair.to} is not configured`);
    }
    if (!toCoin.enabled) {
      return transient(`Destination coin ${pair.to} is disabled`);
    }

    if (pair.minAmount && compareAmounts(deposit.amount, pair.minAmount) < 0) {
      return invalid(`Deposit of ${deposit.amount} ${deposit.coin} is below the minimum ${pair.minAmount} for ${pair.from} -> ${pair.to}`);
    }

    return { ok: true, route: { pair, toCoin, destination: resolved.destination, memo: resolved.memo } };
  }

  /**
   * Rate, network fee and final amount of one deposit.
   */
  private async price(deposit: Deposit, route: Route): Promise<Prepared> {
    const { pair, toCoin } = route;
    let rate: string;
    let networkFee: string;
    try {
      rate = await this.deps.rates.getRate(pair);
      networkFee = await estimateNetworkFee(this.deps.handlers, pair.to, this.dispatch) ?? toCoin.networkFee;
    } catch (error) {
      return transient(`Could not price ${pair.from} -> ${pair.to}: ${toError(error).message}`);
    }

    const result = calculateConversion({
      amount: deposit.amount,
      rate,
      feePercent: pair.feePercent,
      networkFee,
      decimals: toCoin.decimals,
    });
    if (!result.ok) {
      return invalid(result.reason);
    }

    return {
      ok: true,
      plan: { deposit, pair, destination: route.destination, memo: route.memo, rate, quote: result.quote },
    };
  }

  /**
   * Keeps the plans whose destination the manager accepts; finishes the rest.
   */
  private async checkDestinations(plans: ConversionPlan[], runId: string, outcomes: DepositOutcome[]): Promise<ConversionPlan[]> {
    const checks = plans.map(p => ({ coin: p.pair.to, destination: p.destination, memo: p.memo }));
    const answers = await validateDestinations(this.deps.handlers, checks, this.dispatch);

    const sendable: ConversionPlan[] = [];
    plans.forEach((plan, i) => {
      const answer = answers[i];
      if (!answer.ok) {
        outcomes.push(this.finish(plan.deposit, runId, 'error', `Could not validate destination: ${answer.error.message}`));
      } else if (!answer.value) {
        outcomes.push(this.finish(plan.deposit, runId, 'invalid', `Destination ${plan.destination} is not a valid ${plan.pair.to} address`));
      } else {
        sendable.push(plan);
      }
    });
    return sendable;
  }

  /**
   * Sends every plan. Each claim is renewed right before its send and each
   * result is recorded as soon as its own call settles, so a deposit never
   * sits sent but unrecorded while the rest of the run is still sending.
   */
  private async sendAll(plans: ConversionPlan[], runId: string): Promise<DepositOutcome[]> {
    const requests: PaymentRequest[] = plans.map(p => ({
      coin: p.pair.to,
      destination: p.destination,
      memo: p.memo,
      amount: p.quote.finalAmount,
      reference: p.deposit.id,
    }));

    const outcomes: DepositOutcome[] = [];
    await sendPayments(this.deps.handlers, requests, this.dispatch, {
      beforeSend: (_request, i) => this.deps.deposits.renewClaim(plans[i].deposit.id, runId, this.now().toISOString()),
      onResult: (result, i) => {
        outcomes.push(this.settle(plans[i], runId, result));
      },
    });
    return outcomes;
  }

  private settle(plan: ConversionPlan, runId: string, result: Settled<SendResult>): DepositOutcome {
    const { deposit } = plan;
    if (!result.ok) {
      if (result.error instanceof RequestDroppedError) {
        console.warn(`[ConversionPipeline] Claim on deposit ${deposit.id} was lost before sending, left to the run holding it`);
        return skipped(deposit, 'claim lost before sending');
      }
      // A timed out send may still have gone through; it is retried like any transient failure
      return this.finish(deposit, runId, 'error', `Send failed: ${result.error.message}`);
    }
    if (!result.value.ok) {
      const status: FinishStatus = result.value.retryable ? 'error' : 'invalid';
      return this.finish(deposit, runId, status, `Send refused: ${result.value.reason}`);
    }
    return this.record(plan, runId, result.value.txid);
  }

  private record(plan: ConversionPlan, runId: string, txid: string | null): DepositOutcome {
    const { deposit, pair, quote } = plan;
    try {
      const { conversion, claimHeld } = this.deps.conversions.record({
        depositId: deposit.id,
        fromCoin: deposit.coin,
        toCoin: pair.to,
        fromAmount: deposit.amount,
        destination: plan.destination,
        memo: plan.memo,
        rate: plan.rate,
        amount: quote.finalAmount,
        exchangeFee: quote.exchangeFee,
        networkFee: quote.networkFee,
        txid,
      }, runId, this.now().toISOString());

      if (!claimHeld) {
        console.warn(`[ConversionPipeline] Deposit ${deposit.id} was sent after its claim went stale; recorded anyway`);
      }
      console.log(
        `[ConversionPipeline] Converted deposit ${deposit.id}: ${deposit.amount} ${deposit.coin} -> ` +
        `${quote.finalAmount} ${pair.to} to ${plan.destination} (tx ${txid ?? 'pending'})`,
      );
      return { depositId: deposit.id, coin: deposit.coin, status: 'converted', conversion };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ConversionPipeline] CRITICAL: sent ${quote.finalAmount} ${pair.to} for deposit ${deposit.id} (tx ${txid ?? 'pending'}) but could not record it:`, message);
      return { depositId: deposit.id, coin: deposit.coin, status: 'error', reason: `Sent but not recorded: ${message}` };
    }
  }

  private finish(deposit: Deposit, runId: string, status: FinishStatus, reason: string): DepositOutcome {
    const held = this.deps.deposits.finish(deposit.id, runId, status, reason, this.now().toISOString());
    const log = status === 'invalid' ? console.warn : console.error;
    log(`[ConversionPipeline] Deposit ${deposit.id} (${deposit.amount} ${deposit.coin}) ${status}: ${reason}`);
    if (!held) {
      console.warn(`[ConversionPipeline] Claim on deposit ${deposit.id} was lost before it could be marked ${status}`);
    }
    return { depositId: deposit.id, coin: deposit.coin, status, reason };
  }

  private summarize(runId: string, dryRun: boolean, candidates: number, abandoned: number, outcomes: DepositOutcome[]): ConversionSummary {
    const count = (status: DepositOutcome['status']) => outcomes.filter(o => o.status === status).length;
    const summary: ConversionSummary = {
      runId,
      dryRun,
      candidates,
      abandoned,
      converted: count('converted'),
      invalid: count('invalid'),
      errors: count('error'),
      skipped: count('skipped'),
      planned: count('planned'),
      outcomes,
      hasFailures: false,
    };
    summary.hasFailures = !dryRun && (summary.invalid > 0 || summary.errors > 0 || abandoned > 0);

    console.log(
      `[ConversionPipeline] Run ${runId} finished: ${summary.converted} converted, ${summary.invalid} invalid, ` +
      `${summary.errors} error, ${summary.skipped} skipped` +
      `${abandoned > 0 ? `, ${abandoned} abandoned` : ''}${dryRun ? `, ${summary.planned} planned` : ''}`,
    );
    return summary;
  }
}
