/**
 * @fileoverview Repository for outgoing conversions. One row per deposit.
 */

import { v4 as uuidv4 } from 'uuid';
import { sumAmounts } from '@convgate/core';
import type { CoinSymbol, Conversion } from '@convgate/core';
import { DB } from '../database';

const COLUMNS = `
  id, depositId, fromCoin, toCoin, fromAmount, destination, memo, rate,
  amount, exchangeFee, networkFee, txid, createdAt, updatedAt
`;

export type NewConversion = Omit<Conversion, 'id' | 'createdAt' | 'updatedAt'>;

export interface RecordedConversion {
  conversion: Conversion;
  /** False when the run no longer held the deposit's claim at record time */
  claimHeld: boolean;
}

export interface PairTotal {
  fromCoin: CoinSymbol;
  toCoin: CoinSymbol;
  count: number;
  /** Sum of amounts received, in fromCoin */
  received: string;
  /** Sum of amounts sent, in toCoin */
  sent: string;
}

export class ConversionRepository {
  constructor(private db: DB) {}

  /**
   * Stores the conversion and marks its deposit converted in one transaction.
   * The funds have left already, so the deposit is marked converted even if
   * the claim was lost meanwhile; the caller is told so it can warn.
   *
   * @throws Error if the deposit already has a conversion (UNIQUE depositId)
   */
  record(input: NewConversion, claimId: string, now: string = new Date().toISOString()): RecordedConversion {
    const conversion: Conversion = { id: uuidv4(), ...input, createdAt: now, updatedAt: now };

    return this.db.runInTransaction(() => {
      this.db.prepare(`
        INSERT INTO conversions (${COLUMNS})
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        conversion.id,
        conversion.depositId,
        conversion.fromCoin,
        conversion.toCoin,
        conversion.fromAmount,
        conversion.destination,
        conversion.memo,
        conversion.rate,
        conversion.amount,
        conversion.exchangeFee,
        conversion.networkFee,
        conversion.txid,
        now,
        now,
      );

      const claimed = this.db.prepare(`
        UPDATE deposits
        SET status = 'converted', errorReason = NULL, processedAt = ?, updatedAt = ?
        WHERE id = ? AND status = 'processing' AND claimId = ?
      `).run(now, now, input.depositId, claimId);

      if (claimed.changes > 0) {
        return { conversion, claimHeld: true };
      }

      this.db.prepare(`
        UPDATE deposits
        SET status = 'converted', errorReason = NULL, processedAt = ?, updatedAt = ?
        WHERE id = ?
      `).run(now, now, input.depositId);
      return { conversion, claimHeld: false };
    });
  }

  getByDepositId(depositId: string): Conversion | null {
    return this.db.prepare<Conversion>(`SELECT ${COLUMNS} FROM conversions WHERE depositId = ?`).get(depositId) ?? null;
  }

  /**
   * Newest first.
   */
  list(limit = 100): Conversion[] {
    return this.db.prepare<Conversion>(`
      SELECT ${COLUMNS} FROM conversions
      ORDER BY createdAt DESC, id DESC
      LIMIT ?
    `).all(limit);
  }

  /**
   * Count and volume per pair. Amounts are summed with decimal maths, not SQL.
   */
  totalsByPair(): PairTotal[] {
    const rows = this.db.prepare<Pick<Conversion, 'fromCoin' | 'toCoin' | 'fromAmount' | 'amount'>>(`
      SELECT fromCoin, toCoin, fromAmount, amount FROM conversions ORDER BY fromCoin, toCoin
    `).all();

    const totals = new Map<string, { fromCoin: CoinSymbol; toCoin: CoinSymbol; received: string[]; sent: string[] }>();
    for (const row of rows) {
      const key = `${row.fromCoin}:${row.toCoin}`;
      const entry = totals.get(key) ?? { fromCoin: row.fromCoin, toCoin: row.toCoin, received: [], sent: [] };
      entry.received.push(row.fromAmount);
      entry.sent.push(row.amount);
      totals.set(key, entry);
    }

    return Array.from(totals.values()).map(t => ({
      fromCoin: t.fromCoin,
      toCoin: t.toCoin,
      count: t.sent.length,
      received: sumAmounts(t.received),
      sent: sumAmounts(t.sent),
    }));
  }
}
