/**
 * @fileoverview Deposit ingestion (load-deposits).
 * Asks every loader-capable handler for recent incoming transactions and
 * records each new one as a deposit in status "new". Running it again over the
 * same transactions inserts nothing: the dedup key is unique in the store.
 */

import { checkRawTransaction, mapWithConcurrency } from '@convgate/core';
import type { Coin, CoinSymbol, RawTransaction } from '@convgate/core';
import { loadFromHandler } from '@convgate/handlers';
import type { HandlerLookup, LoadOutcome } from '@convgate/handlers';
import type { GatewayConfig } from '../config/gateway-config';
import type { DepositRepository } from '../db/repositories/DepositRepository';

export interface IngestionOptions {
  /** Only load these coins */
  coins?: CoinSymbol[];
}

export interface CoinIngestion {
  coin: CoinSymbol;
  loaded: number;
  inserted: number;
  duplicates: number;
  rejected: number;
  /** Error of the handler call, when loading this coin failed */
  error?: string;
}

export interface IngestionSummary {
  coins: CoinIngestion[];
  /** Transactions a handler reported for coins it was not asked about */
  foreign: number;
  /** True when a coin failed to load or a transaction was rejected */
  hasFailures: boolean;
}

export interface IngestionDeps {
  config: Pick<GatewayConfig, 'coins' | 'handlerTimeoutMs' | 'handlerConcurrency'>;
  handlers: HandlerLookup;
  deposits: DepositRepository;
}

/**
 * Enabled coins, narrowed to `requested` when given. Unknown or disabled
 * requested coins are reported and left out.
 */
export function selectCoins(coins: readonly Coin[], requested: CoinSymbol[] | undefined, component: string): Coin[] {
  const enabled = coins.filter(c => c.enabled);
  if (!requested) {
    return enabled;
  }
  for (const symbol of requested) {
    if (!enabled.some(c => c.symbol === symbol)) {
      console.warn(`[${component}] Ignoring unknown or disabled coin ${symbol}`);
    }
  }
  return enabled.filter(c => requested.includes(c.symbol));
}

export class DepositIngestion {
  constructor(private readonly deps: IngestionDeps) {}

  async run(options: IngestionOptions = {}): Promise<IngestionSummary> {
    const { config, handlers } = this.deps;
    const coins = selectCoins(config.coins, options.coins, 'DepositIngestion');
    const modes = new Map(coins.map(c => [c.symbol, c.mode]));
    const stats = new Map<CoinSymbol, CoinIngestion>(
      coins.map(c => [c.symbol, { coin: c.symbol, loaded: 0, inserted: 0, duplicates: 0, rejected: 0 }]),
    );
    const summary: IngestionSummary = { coins: Array.from(stats.values()), foreign: 0, hasFailures: false };

    const groups = handlers.loaderGroups(coins.map(c => c.symbol));
    const covered = new Set(groups.flatMap(g => g.coins));
    for (const coin of coins) {
      if (!covered.has(coin.symbol)) {
        console.log(`[DepositIngestion] ${coin.symbol}: handler ${coin.handler} cannot load deposits, skipping`);
      }
    }

    const dispatch = { timeoutMs: config.handlerTimeoutMs, concurrency: config.handlerConcurrency };
    const settled = await mapWithConcurrency(groups, config.handlerConcurrency, group =>
      loadFromHandler(group.handler, group.coins, dispatch),
    );

    for (const outcomes of settled) {
      // loadFromHandler reports failures per outcome and never rejects
      if (!outcomes.ok) {
        throw outcomes.error;
      }
      for (const outcome of outcomes.value) {
        this.ingestOutcome(outcome, modes, stats, summary);
      }
    }

    for (const entry of summary.coins) {
      if (entry.error) {
        continue;
      }
      console.log(
        `[DepositIngestion] ${entry.coin}: loaded ${entry.loaded}, inserted ${entry.inserted}, ` +
        `duplicates ${entry.duplicates}, rejected ${entry.rejected}`,
      );
    }
    summary.hasFailures = summary.coins.some(c => c.error !== undefined || c.rejected > 0);
    return summary;
  }

  private ingestOutcome(
    outcome: LoadOutcome,
    modes: Map<CoinSymbol, Coin['mode']>,
    stats: Map<CoinSymbol, CoinIngestion>,
    summary: IngestionSummary,
  ): void {
    if (!outcome.result.ok) {
      const message = outcome.result.error.message;
      for (const coin of outcome.coins) {
        const entry = stats.get(coin);
        if (entry) {
          entry.error = message;
        }
        console.error(`[DepositIngestion] ${coin}: loading failed, will retry next run:`, message);
      }
      return;
    }

    for (const tx of outcome.result.value) {
      const entry = stats.get(tx.coin);
      const mode = modes.get(tx.coin);
      if (!entry || !mode || !outcome.coins.includes(tx.coin)) {
        summary.foreign++;
        console.warn(`[DepositIngestion] Ignoring transaction ${tx.txid} for coin ${tx.coin} that was not requested`);
        continue;
      }
      entry.loaded++;
      this.ingestTransaction(tx, mode, outcome.coins, entry);
    }
  }

  private ingestTransaction(tx: RawTransaction, mode: Coin['mode'], expected: CoinSymbol[], entry: CoinIngestion): void {
    const check = checkRawTransaction(tx, mode, expected);
    if (!check.ok) {
      entry.rejected++;
      console.warn(`[DepositIngestion] ${tx.coin}: rejected transaction ${tx.txid}: ${check.reason}`);
      return;
    }

    if (this.deps.deposits.insertIfAbsent(check.tx, mode)) {
      entry.inserted++;
      console.log(`[DepositIngestion] ${tx.coin}: new deposit ${check.tx.txid} of ${check.tx.amount} to ${check.tx.destination}`);
    } else {
      entry.duplicates++;
    }
  }
}
