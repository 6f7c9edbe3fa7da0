/**
 * @fileoverview Registry mapping coin symbols to the handler servicing them.
 * Built once at startup from the list of enabled handler names and the coin
 * configuration, then passed to the pipelines. Read-only afterwards.
 */

import { ConfigurationError } from '@convgate/core';
import type { Coin, CoinSymbol } from '@convgate/core';
import { hasLoader, hasManager } from './CoinHandler';
import type { AnyDepositLoader, AnyPaymentManager, CoinHandler, HandlerFactory } from './CoinHandler';

/**
 * Inputs for building the registry.
 */
export interface RegistryConfig {
  /** Handler names to enable, in order */
  enabled: string[];
  /** Per-handler options, keyed by handler name */
  options: Record<string, Record<string, unknown>>;
  /** Configured coins and the handler each is bound to */
  coins: Pick<Coin, 'symbol' | 'handler'>[];
}

/**
 * A loader-capable handler together with the coins it should be asked about.
 */
export interface LoaderGroup {
  handler: AnyDepositLoader;
  coins: CoinSymbol[];
}

/**
 * The lookups the pipelines need. Tests inject fakes through this interface.
 */
export interface HandlerLookup {
  /** Groups `coins` (default: every registered coin) by their loader-capable handler; coins without a loader are left out */
  loaderGroups(coins?: CoinSymbol[]): LoaderGroup[];
  /** @throws Error if the coin has no handler or its handler cannot send */
  managerFor(coin: CoinSymbol): AnyPaymentManager;
}

/**
 * Process-wide table of coin → handler.
 */
export class HandlerRegistry implements HandlerLookup {
  private readonly handlers = new Map<string, CoinHandler>();
  private readonly coinHandlers = new Map<CoinSymbol, string>();

  /**
   * Instantiates, initializes and registers every enabled handler, then checks
   * the coin bindings against what the handlers claim.
   *
   * @param factories - Available handler factories keyed by handler name
   * @throws ConfigurationError listing every problem found; nothing is registered then
   */
  static async build(config: RegistryConfig, factories: Record<string, HandlerFactory>): Promise<HandlerRegistry> {
    const registry = new HandlerRegistry();
    const problems: string[] = [];

    for (const name of config.enabled) {
      const factory = factories[name];
      if (!factory) {
        problems.push(`Handler "${name}" is enabled but no such handler exists (known: ${Object.keys(factories).join(', ')})`);
        continue;
      }
      if (registry.handlers.has(name)) {
        problems.push(`Handler "${name}" is enabled twice`);
        continue;
      }

      let claimed: CoinSymbol[];
      let handler: CoinHandler;
      try {
        handler = factory(config.options[name] ?? {});
        if (handler.init) {
          await handler.init();
        }
        claimed = await handler.supportedCoins();
      } catch (error) {
        if (error instanceof ConfigurationError) {
          problems.push(...error.problems.map(p => `${name}: ${p}`));
        } else {
          problems.push(`Handler "${name}" failed to start: ${error instanceof Error ? error.message : String(error)}`);
        }
        continue;
      }

      registry.handlers.set(name, handler);
      for (const symbol of claimed) {
        const owner = registry.coinHandlers.get(symbol);
        if (owner) {
          problems.push(`Coin ${symbol} is claimed by both "${owner}" and "${name}"`);
        } else {
          registry.coinHandlers.set(symbol, name);
        }
      }
      console.log(`[HandlerRegistry] Registered ${name} for coins: ${claimed.join(', ') || '(none)'}`);
    }

    for (const coin of config.coins) {
      if (!registry.handlers.has(coin.handler)) {
        problems.push(`Coin ${coin.symbol} references handler "${coin.handler}" which is not registered`);
        continue;
      }
      const owner = registry.coinHandlers.get(coin.symbol);
      if (owner !== coin.handler) {
        problems.push(`Coin ${coin.symbol} is bound to "${coin.handler}" but ${owner ? `"${owner}" claims it` : 'no handler claims it'}`);
      }
    }

    if (problems.length > 0) {
      throw new ConfigurationError(problems);
    }
    return registry;
  }

  /**
   * Handler servicing `coin`, if any.
   */
  handlerFor(coin: CoinSymbol): CoinHandler | undefined {
    const name = this.coinHandlers.get(coin);
    return name ? this.handlers.get(name) : undefined;
  }

  /**
   * All coins claimed by a registered handler.
   */
  coins(): CoinSymbol[] {
    return Array.from(this.coinHandlers.keys());
  }

  loaderGroups(coins: CoinSymbol[] = this.coins()): LoaderGroup[] {
    const groups = new Map<string, LoaderGroup>();
    for (const coin of coins) {
      const name = this.coinHandlers.get(coin);
      const handler = name ? this.handlers.get(name) : undefined;
      if (!name || !handler || !hasLoader(handler)) {
        continue;
      }
      const group = groups.get(name);
      if (group) {
        group.coins.push(coin);
      } else {
        groups.set(name, { handler, coins: [coin] });
      }
    }
    return Array.from(groups.values());
  }

  managerFor(coin: CoinSymbol): AnyPaymentManager {
    const handler = this.handlerFor(coin);
    if (!handler) {
      throw new Error(`No handler registered for coin ${coin}`);
    }
    if (!hasManager(handler)) {
      throw new Error(`Handler ${handler.name} for coin ${coin} cannot send funds`);
    }
    return handler;
  }
}
