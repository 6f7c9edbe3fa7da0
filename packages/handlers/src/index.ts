/**
 * @fileoverview Main entry point for the @convgate/handlers module.
 * Capability contracts, the handler registry, batch/single dispatch and the
 * built-in handlers.
 */

export * from './CoinHandler';
export * from './errors';
export * from './HandlerRegistry';
export * from './dispatch';
export * from './BitcoindHandler';
export * from './MockHandler';
export * from './MockLedgerHandler';
export * from './factories';
