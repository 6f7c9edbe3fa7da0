import type { HandlerFactory } from './CoinHandler';
import { createBitcoindHandler } from './BitcoindHandler';
import { createMockHandler } from './MockHandler';
import { createMockLedgerHandler } from './MockLedgerHandler';

/**
 * Handlers shipped with the gateway, by the name used in `handlers.enabled`.
 */
export const builtinHandlerFactories: Record<string, HandlerFactory> = {
  'bitcoind': createBitcoindHandler,
  'mock': createMockHandler,
  'mock-ledger': createMockLedgerHandler,
};
