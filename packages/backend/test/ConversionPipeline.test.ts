import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Deposit, IdentificationMode, RawTransaction } from '@convgate/core';
import { ConversionPipeline } from '../src/pipelines/ConversionPipeline';
import type { ConversionSummary } from '../src/pipelines/ConversionPipeline';
import { createTestGateway, testConfig } from './fixtures';
import type { TestGateway } from './fixtures';

describe('ConversionPipeline', () => {
  let gw: TestGateway;

  beforeEach(async () => {
    gw = await createTestGateway();
  });

  afterEach(() => {
    gw.close();
    vi.unstubAllGlobals();
  });

  function addDeposit(tx: RawTransaction, mode: IdentificationMode = 'address'): void {
    gw.deposits.insertIfAbsent(tx, mode);
  }

  function depositByTxid(txid: string): Deposit {
    const deposit = gw.deposits.find().find(d => d.txid === txid);
    if (!deposit) {
      throw new Error(`no deposit ${txid}`);
    }
    return deposit;
  }

  function routeLtc(address: string, destinationCoin: string, destinationAddress: string): void {
    gw.routes.upsert({
      depositCoin: 'LTC',
      depositAddress: address,
      depositMemo: null,
      destinationCoin,
      destinationAddress,
      destinationMemo: null,
    });
  }

  it('converts a routed deposit net of exchange and network fees', async () => {
    gw.mock.addTransaction({ coin: 'LTC', txid: 'ltc-tx-1', vout: 0, destination: 'ltc-in', amount: '100' });
    routeLtc('ltc-in', 'BTC', 'btc-out');
    await gw.ingestion.run();

    const summary = await gw.conversion.run();

    expect(summary).toMatchObject({ candidates: 1, converted: 1, invalid: 0, errors: 0, skipped: 0, hasFailures: false });
    expect(gw.mock.sent).toEqual([
      { coin: 'BTC', destination: 'btc-out', memo: null, amount: '49.3', reference: depositByTxid('ltc-tx-1').id },
    ]);

    const deposit = depositByTxid('ltc-tx-1');
    expect(deposit.status).toBe('converted');
    expect(gw.conversions.getByDepositId(deposit.id)).toMatchObject({
      fromCoin: 'LTC',
      toCoin: 'BTC',
      fromAmount: '100',
      destination: 'btc-out',
      memo: null,
      rate: '0.5',
      amount: '49.3',
      exchangeFee: '0.5',
      networkFee: '0.2',
      txid: 'mock-btc-1',
    });

    const again = await gw.conversion.run();
    expect(again.candidates).toBe(0);
    expect(gw.mock.sent).toHaveLength(1);
  });

  it('routes account deposits by memo', async () => {
    addDeposit({ coin: 'SGTK', txid: 'sg-1', destination: 'gateway', memo: 'LTC ltc-user', amount: '10' }, 'account');
    addDeposit({ coin: 'SGTK', txid: 'sg-2', destination: 'gateway', memo: 'btc btc-user note here', amount: '5000' }, 'account');
    addDeposit({ coin: 'SGTK', txid: 'sg-3', destination: 'gateway', memo: 'ltc-user', amount: '10' }, 'account');

    const summary = await gw.conversion.run();

    expect(summary).toMatchObject({ converted: 2, invalid: 1, hasFailures: true });
    expect(gw.conversions.getByDepositId(depositByTxid('sg-1').id)).toMatchObject({
      toCoin: 'LTC', destination: 'ltc-user', memo: null, amount: '19.999', exchangeFee: '0', networkFee: '0.001',
    });
    expect(gw.conversions.getByDepositId(depositByTxid('sg-2').id)).toMatchObject({
      toCoin: 'BTC', destination: 'btc-user', memo: 'note here', amount: '0.3',
    });
    expect(depositByTxid('sg-3')).toMatchObject({
      status: 'invalid',
      errorReason: 'Memo must start with a destination symbol (one of LTC, BTC)',
    });
  });

  it('marks deposits without a pair or route invalid and never retries them', async () => {
    addDeposit({ coin: 'BTC', txid: 'btc-tx-1', destination: 'btc-in', amount: '1' });
    addDeposit({ coin: 'LTC', txid: 'ltc-tx-1', destination: 'ltc-unmapped', amount: '1' });

    const summary = await gw.conversion.run();

    expect(summary).toMatchObject({ invalid: 2, hasFailures: true });
    expect(depositByTxid('btc-tx-1').errorReason).toBe('No coin pairs with from coin BTC');
    expect(depositByTxid('ltc-tx-1').errorReason).toBe('Deposit address ltc-unmapped has no known destination mapped to it');
    expect((await gw.conversion.run()).candidates).toBe(0);
  });

  it('marks deposits below the pair minimum invalid', async () => {
    gw.close();
    gw = await createTestGateway({
      pairs: [{ from: 'LTC', to: 'BTC', rate: { type: 'fixed', value: '0.5' }, feePercent: '1', minAmount: '10' }],
    });
    routeLtc('ltc-in', 'BTC', 'btc-out');
    addDeposit({ coin: 'LTC', txid: 'ltc-small', destination: 'ltc-in', amount: '5' });

    await gw.conversion.run();

    expect(depositByTxid('ltc-small')).toMatchObject({
      status: 'invalid',
      errorReason: 'Deposit of 5 LTC is below the minimum 10 for LTC -> BTC',
    });
    expect(gw.mock.sent).toEqual([]);
  });

  it('marks deposits that fees would consume invalid', async () => {
    routeLtc('ltc-in', 'BTC', 'btc-out');
    addDeposit({ coin: 'LTC', txid: 'ltc-dust', destination: 'ltc-in', amount: '0.2' });

    await gw.conversion.run();

    expect(depositByTxid('ltc-dust')).toMatchObject({
      status: 'invalid',
      errorReason: 'Converted amount -0.101 is not positive after fees (gross 0.1, exchange fee 0.001, network fee 0.2)',
    });
  });

  it('marks a refused destination invalid without sending', async () => {
    routeLtc('ltc-in', 'BTC', 'btc-bad');
    gw.mock.rejectDestination('BTC', 'btc-bad');
    addDeposit({ coin: 'LTC', txid: 'ltc-tx-1', destination: 'ltc-in', amount: '1' });

    await gw.conversion.run();

    expect(depositByTxid('ltc-tx-1')).toMatchObject({
      status: 'invalid',
      errorReason: 'Destination btc-bad is not a valid BTC address',
    });
    expect(gw.mock.sent).toEqual([]);
  });

  it('retries a failed send on the next run', async () => {
    routeLtc('ltc-in', 'BTC', 'btc-out');
    addDeposit({ coin: 'LTC', txid: 'ltc-tx-1', destination: 'ltc-in', amount: '100' });
    gw.mock.failSends(1);

    const first = await gw.conversion.run();

    expect(first).toMatchObject({ errors: 1, hasFailures: true });
    expect(depositByTxid('ltc-tx-1')).toMatchObject({
      status: 'error',
      errorReason: 'Send failed: mock BTC node is down',
      attempts: 1,
    });

    const second = await gw.conversion.run();

    expect(second).toMatchObject({ converted: 1, hasFailures: false });
    expect(depositByTxid('ltc-tx-1')).toMatchObject({ status: 'converted', errorReason: null, attempts: 2 });
    expect(gw.mock.sent).toHaveLength(1);
  });

  it('treats a send that times out as a transient error', async () => {
    gw.close();
    gw = await createTestGateway({ handlerTimeoutMs: 10 });
    gw.mock.sendDelayMs = 50;
    routeLtc('ltc-in', 'BTC', 'btc-out');
    addDeposit({ coin: 'LTC', txid: 'ltc-tx-1', destination: 'ltc-in', amount: '100' });

    await gw.conversion.run();

    expect(depositByTxid('ltc-tx-1')).toMatchObject({
      status: 'error',
      errorReason: 'Send failed: mock.send(BTC) timed out after 10ms',
    });
  });

  it('validates and sends batch destinations in one call each', async () => {
    routeLtc('ltc-in-a', 'SGTK', 'carol');
    routeLtc('ltc-in-b', 'SGTK', 'dave');
    gw.ledger.rejectAccount('SGTK', 'dave');
    addDeposit({ coin: 'LTC', txid: 'ltc-a', destination: 'ltc-in-a', amount: '1' });
    addDeposit({ coin: 'LTC', txid: 'ltc-b', destination: 'ltc-in-b', amount: '1' });

    await gw.conversion.run();

    expect(gw.ledger.batchCalls).toEqual({ load: 0, validate: 1, send: 1 });
    expect(gw.conversions.getByDepositId(depositByTxid('ltc-a').id)).toMatchObject({
      toCoin: 'SGTK', destination: 'carol', amount: '100', txid: 'ledger-1',
    });
    expect(depositByTxid('ltc-b')).toMatchObject({
      status: 'invalid',
      errorReason: 'Destination dave is not a valid SGTK address',
    });
  });

  it('keeps a deposit for retry when the hot wallet is short', async () => {
    routeLtc('ltc-in', 'SGTK', 'carol');
    gw.ledger.setBalance('SGTK', '50');
    addDeposit({ coin: 'LTC', txid: 'ltc-tx-1', destination: 'ltc-in', amount: '1' });

    await gw.conversion.run();

    expect(depositByTxid('ltc-tx-1')).toMatchObject({
      status: 'error',
      errorReason: 'Send refused: balance 50 SGTK is below 100',
    });
  });

  it('leaves deposits for a disabled destination coin to a later run', async () => {
    gw.close();
    const coins = testConfig().coins.map(c => (c.symbol === 'BTC' ? { ...c, enabled: false } : c));
    gw = await createTestGateway({ coins });
    routeLtc('ltc-in', 'BTC', 'btc-out');
    addDeposit({ coin: 'LTC', txid: 'ltc-tx-1', destination: 'ltc-in', amount: '1' });

    await gw.conversion.run();

    expect(depositByTxid('ltc-tx-1')).toMatchObject({
      status: 'error',
      errorReason: 'Destination coin BTC is disabled',
    });
  });

  it('reports a rate source outage as a transient error', async () => {
    gw.close();
    gw = await createTestGateway({
      rateSources: {
        feed: { type: 'http-json', url: 'https://rates.test/ltc-btc', path: 'price', cacheTtlMs: 60000, invert: false },
      },
      pairs: [{ from: 'LTC', to: 'BTC', rate: { type: 'dynamic', source: 'feed' }, feePercent: '1' }],
    });
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new Error('connect ECONNREFUSED');
    }));
    routeLtc('ltc-in', 'BTC', 'btc-out');
    addDeposit({ coin: 'LTC', txid: 'ltc-tx-1', destination: 'ltc-in', amount: '1' });

    await gw.conversion.run();

    expect(depositByTxid('ltc-tx-1')).toMatchObject({
      status: 'error',
      errorReason: 'Could not price LTC -> BTC: connect ECONNREFUSED',
    });
  });

  it('plans without claiming or sending on a dry run', async () => {
    routeLtc('ltc-in', 'BTC', 'btc-out');
    addDeposit({ coin: 'LTC', txid: 'ltc-tx-1', destination: 'ltc-in', amount: '100' });
    addDeposit({ coin: 'LTC', txid: 'ltc-tx-2', destination: 'ltc-unmapped', amount: '1' });

    const summary = await gw.conversion.run({ dryRun: true });

    expect(summary).toMatchObject({ dryRun: true, planned: 1, invalid: 1, hasFailures: false });
    const planned = summary.outcomes.find(o => o.status === 'planned');
    expect(planned?.status === 'planned' && planned.plan.quote.finalAmount).toBe('49.3');
    expect(gw.mock.sent).toEqual([]);
    expect(gw.deposits.find().map(d => [d.status, d.attempts])).toEqual([['new', 0], ['new', 0]]);
  });

  it('only converts the requested coins', async () => {
    addDeposit({ coin: 'SGTK', txid: 'sg-1', destination: 'gateway', memo: 'LTC ltc-user', amount: '10' }, 'account');

    const summary = await gw.conversion.run({ coins: ['LTC'] });

    expect(summary.candidates).toBe(0);
    expect(depositByTxid('sg-1').status).toBe('new');
  });

  it('sends once when two runs race over the same deposits', async () => {
    routeLtc('ltc-in', 'BTC', 'btc-out');
    addDeposit({ coin: 'LTC', txid: 'ltc-tx-1', destination: 'ltc-in', amount: '100' });
    const rival = new ConversionPipeline({
      config: gw.config,
      handlers: gw.registry,
      deposits: gw.deposits,
      conversions: gw.conversions,
      routes: gw.routes,
      rates: gw.rates,
    });

    const [a, b] = await Promise.all([gw.conversion.run(), rival.run()]);

    expect(a.converted + b.converted).toBe(1);
    expect(gw.mock.sent).toHaveLength(1);
    expect(gw.conversions.list()).toHaveLength(1);
  });

  it('skips deposits another run claimed after they were listed', async () => {
    routeLtc('ltc-in', 'BTC', 'btc-out');
    addDeposit({ coin: 'LTC', txid: 'ltc-tx-1', destination: 'ltc-in', amount: '100' });
    const findConvertible = gw.deposits.findConvertible.bind(gw.deposits);
    vi.spyOn(gw.deposits, 'findConvertible').mockImplementationOnce(query => {
      const found = findConvertible(query);
      for (const deposit of found) {
        gw.deposits.claim(deposit.id, 'other-run', query);
      }
      return found;
    });

    const summary = await gw.conversion.run();

    expect(summary).toMatchObject({ candidates: 1, skipped: 1, converted: 0, hasFailures: false });
    expect(summary.outcomes).toEqual([
      { depositId: depositByTxid('ltc-tx-1').id, coin: 'LTC', status: 'skipped', reason: 'claimed by another run' },
    ]);
    expect(depositByTxid('ltc-tx-1').claimId).toBe('other-run');
    expect(gw.mock.sent).toEqual([]);
  });

  function rivalOf(gateway: TestGateway): ConversionPipeline {
    return new ConversionPipeline({
      config: gateway.config,
      handlers: gateway.registry,
      deposits: gateway.deposits,
      conversions: gateway.conversions,
      routes: gateway.routes,
      rates: gateway.rates,
    });
  }

  it('keeps claims fresh while earlier deposits are still sending', async () => {
    gw.close();
    gw = await createTestGateway({ handlerConcurrency: 1, staleClaimMs: 150 });
    gw.mock.sendDelayMs = 80;
    routeLtc('ltc-in', 'BTC', 'btc-out');
    for (const txid of ['ltc-tx-1', 'ltc-tx-2', 'ltc-tx-3']) {
      addDeposit({ coin: 'LTC', txid, destination: 'ltc-in', amount: '100' });
    }

    // Starts while the third deposit is being sent, well after its first claim went stale
    const rival = rivalOf(gw);
    const late = new Promise<ConversionSummary>((resolve, reject) => {
      setTimeout(() => {
        rival.run().then(resolve, reject);
      }, 175);
    });
    const [first, second] = await Promise.all([gw.conversion.run(), late]);

    expect(first.converted).toBe(3);
    expect(second.candidates).toBe(0);
    expect(gw.mock.sent).toHaveLength(3);
    expect(gw.conversions.list()).toHaveLength(3);
  });

  it('reclaims and converts a deposit whose run died mid-conversion', async () => {
    routeLtc('ltc-in', 'BTC', 'btc-out');
    addDeposit({ coin: 'LTC', txid: 'ltc-tx-1', destination: 'ltc-in', amount: '100' });
    const { id } = depositByTxid('ltc-tx-1');
    gw.deposits.claim(id, 'crashed-run', { staleBefore: '2020-01-01T00:00:00.000Z', maxAttempts: 5 }, '2020-01-01T00:00:00.000Z');

    const summary = await gw.conversion.run();

    expect(summary).toMatchObject({ candidates: 1, converted: 1, abandoned: 0 });
    expect(depositByTxid('ltc-tx-1')).toMatchObject({ status: 'converted', claimId: summary.runId, attempts: 2 });
    expect(gw.mock.sent).toHaveLength(1);
  });

  it('moves a dead claim with no attempts left to error', async () => {
    gw.close();
    gw = await createTestGateway({ maxConvertAttempts: 1 });
    routeLtc('ltc-in', 'BTC', 'btc-out');
    addDeposit({ coin: 'LTC', txid: 'ltc-tx-1', destination: 'ltc-in', amount: '100' });
    const { id } = depositByTxid('ltc-tx-1');
    gw.deposits.claim(id, 'crashed-run', { staleBefore: '2020-01-01T00:00:00.000Z', maxAttempts: 1 }, '2020-01-01T00:00:00.000Z');

    const summary = await gw.conversion.run();

    expect(summary).toMatchObject({ candidates: 0, abandoned: 1, hasFailures: true });
    expect(depositByTxid('ltc-tx-1')).toMatchObject({
      status: 'error',
      errorReason: 'Claim abandoned after 1 attempt',
      attempts: 1,
    });
    expect(depositByTxid('ltc-tx-1').processedAt).not.toBeNull();
    expect(gw.mock.sent).toEqual([]);

    expect(await gw.conversion.run()).toMatchObject({ candidates: 0, abandoned: 0, hasFailures: false });
  });

  it('leaves a dead claim alone on a dry run', async () => {
    gw.close();
    gw = await createTestGateway({ maxConvertAttempts: 1 });
    addDeposit({ coin: 'LTC', txid: 'ltc-tx-1', destination: 'ltc-in', amount: '100' });
    const { id } = depositByTxid('ltc-tx-1');
    gw.deposits.claim(id, 'crashed-run', { staleBefore: '2020-01-01T00:00:00.000Z', maxAttempts: 1 }, '2020-01-01T00:00:00.000Z');

    expect(await gw.conversion.run({ dryRun: true })).toMatchObject({ abandoned: 0 });
    expect(depositByTxid('ltc-tx-1').status).toBe('processing');
  });

  it('skips deposits bound for a coin that is down without using an attempt', async () => {
    routeLtc('ltc-in', 'BTC', 'btc-out');
    addDeposit({ coin: 'LTC', txid: 'ltc-tx-1', destination: 'ltc-in', amount: '100' });
    addDeposit({ coin: 'LTC', txid: 'ltc-tx-2', destination: 'ltc-in', amount: '10' });
    addDeposit({ coin: 'SGTK', txid: 'sg-1', destination: 'gateway', memo: 'LTC ltc-user', amount: '10' }, 'account');
    gw.mock.setHealthy('BTC', false);

    const down = await gw.conversion.run();

    expect(down).toMatchObject({ candidates: 3, converted: 1, skipped: 2, hasFailures: false });
    const skipped = down.outcomes.filter(o => o.status === 'skipped');
    expect(skipped.map(o => o.status === 'skipped' && o.reason)).toEqual(['Destination coin BTC is down', 'Destination coin BTC is down']);
    expect(skipped.map(o => o.depositId).sort()).toEqual([depositByTxid('ltc-tx-1').id, depositByTxid('ltc-tx-2').id].sort());
    expect(gw.mock.healthChecks.get('BTC')).toBe(1);
    expect(depositByTxid('ltc-tx-1')).toMatchObject({ status: 'new', attempts: 0, claimId: null });
    expect(gw.mock.sent.map(p => p.coin)).toEqual(['LTC']);

    gw.mock.setHealthy('BTC', true);
    const up = await gw.conversion.run();

    expect(up).toMatchObject({ candidates: 2, converted: 2 });
    expect(depositByTxid('ltc-tx-1')).toMatchObject({ status: 'converted', attempts: 1 });
  });
});
