/**
 * @fileoverview Wires a validated configuration into a running gateway:
 * handler registry, deposit store, repositories, rate oracle, pipelines and
 * refunds.
 */

import { builtinHandlerFactories, HandlerRegistry } from '@convgate/handlers';
import type { HandlerFactory } from '@convgate/handlers';
import type { GatewayConfig } from './config/gateway-config';
import { DB } from './db/database';
import { runMigrations } from './db/migrate';
import { ConversionRepository } from './db/repositories/ConversionRepository';
import { DepositRepository } from './db/repositories/DepositRepository';
import { RefundRepository } from './db/repositories/RefundRepository';
import { RouteRepository } from './db/repositories/RouteRepository';
import { ConversionPipeline } from './pipelines/ConversionPipeline';
import { DepositIngestion } from './pipelines/DepositIngestion';
import { RateOracle } from './services/RateOracle';
import { RefundService } from './services/RefundService';

export interface Gateway {
  config: GatewayConfig;
  db: DB;
  registry: HandlerRegistry;
  deposits: DepositRepository;
  conversions: ConversionRepository;
  routes: RouteRepository;
  refunds: RefundRepository;
  rates: RateOracle;
  ingestion: DepositIngestion;
  conversion: ConversionPipeline;
  refunder: RefundService;
  close(): void;
}

export interface GatewayOptions {
  factories?: Record<string, HandlerFactory>;
  /** An already open database; otherwise config.dbPath is opened */
  db?: DB;
}

/**
 * Builds the handler registry first, so a handler configuration problem
 * aborts before the deposit store is opened.
 *
 * @throws ConfigurationError
 */
export async function createGateway(config: GatewayConfig, options: GatewayOptions = {}): Promise<Gateway> {
  const registry = await HandlerRegistry.build({
    enabled: config.handlers.enabled,
    options: config.handlers.options,
    coins: config.coins.filter(c => c.enabled),
  }, options.factories ?? builtinHandlerFactories);

  const db = options.db ?? new DB(config.dbPath);
  runMigrations(db);

  const deposits = new DepositRepository(db);
  const conversions = new ConversionRepository(db);
  const routes = new RouteRepository(db);
  const refunds = new RefundRepository(db);
  const rates = new RateOracle(config.rateSources, config.handlerTimeoutMs);

  return {
    config,
    db,
    registry,
    deposits,
    conversions,
    routes,
    refunds,
    rates,
    ingestion: new DepositIngestion({ config, handlers: registry, deposits }),
    conversion: new ConversionPipeline({ config, handlers: registry, deposits, conversions, routes, rates }),
    refunder: new RefundService({ config, handlers: registry, deposits, refunds }),
    close: () => db.close(),
  };
}
