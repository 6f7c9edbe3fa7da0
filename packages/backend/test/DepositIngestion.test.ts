import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestGateway } from './fixtures';
import type { TestGateway } from './fixtures';

describe('DepositIngestion', () => {
  let gw: TestGateway;

  beforeEach(async () => {
    gw = await createTestGateway();
  });

  afterEach(() => {
    gw.close();
  });

  it('records each transaction once however often it is loaded', async () => {
    gw.mock.addTransaction({ coin: 'LTC', txid: 'ltc-tx-1', vout: 0, destination: 'ltc-in', amount: '1.50' });
    gw.mock.addTransaction({ coin: 'LTC', txid: 'ltc-tx-1', vout: 1, destination: 'ltc-in', amount: '2' });

    const first = await gw.ingestion.run();
    const second = await gw.ingestion.run();

    expect(first.coins.find(c => c.coin === 'LTC')).toEqual({ coin: 'LTC', loaded: 2, inserted: 2, duplicates: 0, rejected: 0 });
    expect(second.coins.find(c => c.coin === 'LTC')).toEqual({ coin: 'LTC', loaded: 2, inserted: 0, duplicates: 2, rejected: 0 });
    expect(second.hasFailures).toBe(false);

    const stored = gw.deposits.find({ coin: 'LTC' });
    expect(stored.map(d => [d.txid, d.vout, d.amount, d.status]).sort()).toEqual([
      ['ltc-tx-1', 0, '1.5', 'new'],
      ['ltc-tx-1', 1, '2', 'new'],
    ]);
  });

  it('keeps loading other coins when one coin fails', async () => {
    gw.mock.addTransaction({ coin: 'BTC', txid: 'btc-tx-1', destination: 'btc-in', amount: '0.1' });
    gw.mock.failLoadsFor('LTC');

    const summary = await gw.ingestion.run();

    expect(summary.hasFailures).toBe(true);
    expect(summary.coins.find(c => c.coin === 'LTC')?.error).toBe('mock LTC node is down');
    expect(summary.coins.find(c => c.coin === 'BTC')).toEqual({ coin: 'BTC', loaded: 1, inserted: 1, duplicates: 0, rejected: 0 });
    expect(gw.deposits.find().map(d => d.txid)).toEqual(['btc-tx-1']);
  });

  it('loads batch handlers in one call and single handlers per coin', async () => {
    gw.ledger.addTransfer({ coin: 'SGTK', txid: 'sg-1', from: 'alice', to: 'gateway', memo: 'LTC ltc-user', amount: '10' });
    gw.ledger.addTransfer({ coin: 'SGTK', txid: 'sg-1', from: 'alice', to: 'gateway', memo: 'BTC btc-user', amount: '5' });

    await gw.ingestion.run();

    expect(gw.ledger.batchCalls.load).toBe(1);
    expect(gw.mock.loadCalls.get('LTC')).toBe(1);
    expect(gw.mock.loadCalls.get('BTC')).toBe(1);
    expect(gw.deposits.find({ coin: 'SGTK' }).map(d => [d.memo, d.source, d.amount]).sort()).toEqual([
      ['BTC btc-user', 'alice', '5'],
      ['LTC ltc-user', 'alice', '10'],
    ]);
  });

  it('rejects malformed transactions without storing them', async () => {
    gw.mock.addTransaction({ coin: 'LTC', txid: 'ltc-bad', destination: 'ltc-in', amount: '0' });
    gw.mock.addTransaction({ coin: 'LTC', txid: ' ', destination: 'ltc-in', amount: '1' });
    gw.mock.addTransaction({ coin: 'LTC', txid: 'ltc-good', destination: 'ltc-in', amount: '1' });

    const summary = await gw.ingestion.run();

    expect(summary.coins.find(c => c.coin === 'LTC')).toEqual({ coin: 'LTC', loaded: 3, inserted: 1, duplicates: 0, rejected: 2 });
    expect(summary.hasFailures).toBe(true);
    expect(gw.deposits.find().map(d => d.txid)).toEqual(['ltc-good']);
  });

  it('only loads the requested coins', async () => {
    const summary = await gw.ingestion.run({ coins: ['BTC', 'DOGE'] });

    expect(summary.coins.map(c => c.coin)).toEqual(['BTC']);
    expect(gw.mock.loadCalls.get('LTC')).toBeUndefined();
    expect(gw.ledger.batchCalls.load).toBe(0);
  });
});
