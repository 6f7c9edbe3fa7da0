import { describe, it, expect } from 'vitest';
import { resolveDestination } from '../src/routing';
import type { CoinPair, DepositRoute } from '../src/types';

const toLtc: CoinPair = { from: 'SGTK', to: 'LTC', rate: { type: 'fixed', value: '0.5' }, feePercent: '1' };
const toBtc: CoinPair = { from: 'SGTK', to: 'BTC', rate: { type: 'fixed', value: '0.01' }, feePercent: '1' };

describe('resolveDestination', () => {
  it('rejects a coin without outgoing pairs', () => {
    const result = resolveDestination('account', { coin: 'SGTK', destination: 'gw', memo: 'LTC Laddr' }, [], null);
    expect(result).toEqual({ ok: false, reason: 'No coin pairs with from coin SGTK' });
  });

  it('routes an explicit symbol memo to the matching pair', () => {
    const result = resolveDestination(
      'account',
      { coin: 'SGTK', destination: 'gw', memo: 'btc 1BitAddr thanks a lot' },
      [toLtc, toBtc],
      null,
    );

    expect(result).toEqual({ ok: true, pair: toBtc, destination: '1BitAddr', memo: 'thanks a lot' });
  });

  it('uses the only pair when the memo has no symbol', () => {
    const result = resolveDestination('account', { coin: 'SGTK', destination: 'gw', memo: 'Laddr' }, [toLtc], null);
    expect(result).toEqual({ ok: true, pair: toLtc, destination: 'Laddr', memo: null });
  });

  it('refuses to guess between several pairs', () => {
    const result = resolveDestination('account', { coin: 'SGTK', destination: 'gw', memo: 'Laddr' }, [toLtc, toBtc], null);
    expect(result).toEqual({ ok: false, reason: 'Memo must start with a destination symbol (one of LTC, BTC)' });
  });

  it('rejects a symbol without destination', () => {
    const result = resolveDestination('account', { coin: 'SGTK', destination: 'gw', memo: 'LTC' }, [toLtc, toBtc], null);
    expect(result).toEqual({ ok: false, reason: 'Memo names LTC but no destination' });
  });

  it('rejects an empty memo', () => {
    const result = resolveDestination('account', { coin: 'SGTK', destination: 'gw', memo: '   ' }, [toLtc], null);
    expect(result.ok).toBe(false);
  });

  it('requires a route for address-based deposits', () => {
    const pair: CoinPair = { from: 'LTC', to: 'SGTK', rate: { type: 'fixed', value: '2' }, feePercent: '1' };
    const result = resolveDestination('address', { coin: 'LTC', destination: 'Ldep', memo: null }, [pair], null);
    expect(result).toEqual({ ok: false, reason: 'Deposit address Ldep has no known destination mapped to it' });
  });

  it('follows a stored route', () => {
    const pair: CoinPair = { from: 'LTC', to: 'SGTK', rate: { type: 'fixed', value: '2' }, feePercent: '1' };
    const route: DepositRoute = {
      depositCoin: 'LTC',
      depositAddress: 'Ldep',
      depositMemo: null,
      destinationCoin: 'SGTK',
      destinationAddress: 'alice',
      destinationMemo: 'from LTC',
    };

    const result = resolveDestination('address', { coin: 'LTC', destination: 'Ldep', memo: null }, [pair], route);
    expect(result).toEqual({ ok: true, pair, destination: 'alice', memo: 'from LTC' });
  });

  it('rejects a route whose destination coin has no pair', () => {
    const route: DepositRoute = {
      depositCoin: 'SGTK',
      depositAddress: 'gw',
      depositMemo: null,
      destinationCoin: 'DOGE',
      destinationAddress: 'Daddr',
      destinationMemo: null,
    };

    const result = resolveDestination('account', { coin: 'SGTK', destination: 'gw', memo: null }, [toLtc], route);
    expect(result).toEqual({ ok: false, reason: 'No coin pair SGTK -> DOGE for mapped address gw' });
  });
});
