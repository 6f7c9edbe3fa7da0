/**
 * @fileoverview Repository for deposit routes: where funds arriving at one of
 * our addresses (optionally with a given memo) should be converted to.
 */

import type { CoinSymbol, DepositRoute } from '@convgate/core';
import { DB } from '../database';

interface RouteRow {
  depositCoin: CoinSymbol;
  depositAddress: string;
  depositMemo: string;
  destinationCoin: CoinSymbol;
  destinationAddress: string;
  destinationMemo: string | null;
}

// A memo-less route is stored with depositMemo = ''
function toRoute(row: RouteRow): DepositRoute {
  return { ...row, depositMemo: row.depositMemo === '' ? null : row.depositMemo };
}

export class RouteRepository {
  constructor(private db: DB) {}

  /**
   * Creates the route or replaces the destination of an existing one.
   */
  upsert(route: DepositRoute, now: string = new Date().toISOString()): void {
    this.db.prepare(`
      INSERT INTO deposit_routes (
        depositCoin, depositAddress, depositMemo,
        destinationCoin, destinationAddress, destinationMemo, createdAt, updatedAt
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(depositCoin, depositAddress, depositMemo) DO UPDATE SET
        destinationCoin = excluded.destinationCoin,
        destinationAddress = excluded.destinationAddress,
        destinationMemo = excluded.destinationMemo,
        updatedAt = excluded.updatedAt
    `).run(
      route.depositCoin,
      route.depositAddress,
      route.depositMemo ?? '',
      route.destinationCoin,
      route.destinationAddress,
      route.destinationMemo,
      now,
      now,
    );
  }

  /**
   * The route for a deposit: one for its exact memo first, then the
   * address-wide one.
   */
  find(coin: CoinSymbol, address: string, memo: string | null): DepositRoute | null {
    const row = this.db.prepare<RouteRow>(`
      SELECT depositCoin, depositAddress, depositMemo, destinationCoin, destinationAddress, destinationMemo
      FROM deposit_routes
      WHERE depositCoin = ? AND depositAddress = ? AND depositMemo IN (?, '')
      ORDER BY depositMemo = '' ASC
      LIMIT 1
    `).get(coin, address, memo ?? '');
    return row ? toRoute(row) : null;
  }

  list(coin?: CoinSymbol): DepositRoute[] {
    const sql = `
      SELECT depositCoin, depositAddress, depositMemo, destinationCoin, destinationAddress, destinationMemo
      FROM deposit_routes
      ${coin ? 'WHERE depositCoin = ?' : ''}
      ORDER BY depositCoin, depositAddress, depositMemo
    `;
    const rows = coin ? this.db.prepare<RouteRow>(sql).all(coin) : this.db.prepare<RouteRow>(sql).all();
    return rows.map(toRoute);
  }
}
