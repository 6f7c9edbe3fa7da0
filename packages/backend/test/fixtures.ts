import { MockHandler, MockLedgerHandler } from '@convgate/handlers';
import type { GatewayConfig } from '../src/config/gateway-config';
import { DB, IN_MEMORY } from '../src/db/database';
import { createGateway } from '../src/gateway';
import type { Gateway } from '../src/gateway';

/**
 * LTC and BTC on the mock handler, SGTK on the mock ledger.
 * LTC routes through deposit_routes; SGTK through memos.
 */
export function testConfig(overrides: Partial<GatewayConfig> = {}): GatewayConfig {
  return {
    dbPath: IN_MEMORY,
    defaultFeePercent: '0',
    handlerTimeoutMs: 1000,
    handlerConcurrency: 2,
    staleClaimMs: 600000,
    maxConvertAttempts: 5,
    convertBatchSize: 100,
    coins: [
      { symbol: 'LTC', displayName: 'Litecoin', handler: 'mock', mode: 'address', decimals: 8, networkFee: '0.001', enabled: true },
      { symbol: 'BTC', displayName: 'Bitcoin', handler: 'mock', mode: 'address', decimals: 8, networkFee: '0.2', enabled: true },
      { symbol: 'SGTK', displayName: 'Sample token', handler: 'mock-ledger', mode: 'account', decimals: 4, networkFee: '0', enabled: true },
    ],
    pairs: [
      { from: 'LTC', to: 'BTC', rate: { type: 'fixed', value: '0.5' }, feePercent: '1' },
      { from: 'LTC', to: 'SGTK', rate: { type: 'fixed', value: '100' }, feePercent: '0' },
      { from: 'SGTK', to: 'LTC', rate: { type: 'fixed', value: '2' }, feePercent: '0' },
      { from: 'SGTK', to: 'BTC', rate: { type: 'fixed', value: '0.0001' }, feePercent: '0' },
    ],
    rateSources: {},
    handlers: { enabled: ['mock', 'mock-ledger'], options: {} },
    ...overrides,
  };
}

export interface TestGateway extends Gateway {
  mock: MockHandler;
  ledger: MockLedgerHandler;
}

/**
 * A gateway over a fresh in-memory database whose handlers are the returned
 * mock instances.
 */
export async function createTestGateway(overrides: Partial<GatewayConfig> = {}): Promise<TestGateway> {
  const mock = new MockHandler({ coins: ['LTC', 'BTC'] });
  const ledger = new MockLedgerHandler({ coins: ['SGTK'] });
  const gateway = await createGateway(testConfig(overrides), {
    db: new DB(IN_MEMORY),
    factories: {
      'mock': () => mock,
      'mock-ledger': () => ledger,
    },
  });
  return { ...gateway, mock, ledger };
}
