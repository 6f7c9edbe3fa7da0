/**
 * @fileoverview Main entry point for the @convgate/core module.
 * Re-exports domain types, decimal mathematics, the rate and fee engine,
 * deposit invariants, destination routing, async helpers and the
 * configuration error type.
 */

export * from './types';
export * from './decimal';
export * from './fees';
export * from './invariants';
export * from './routing';
export * from './async';
export * from './errors';
