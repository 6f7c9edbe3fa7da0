/**
 * @fileoverview Repository for refunds. One row per refunded deposit.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Refund } from '@convgate/core';
import { DB } from '../database';

const COLUMNS = 'id, depositId, coin, destination, memo, amount, reason, txid, createdAt';

export type NewRefund = Omit<Refund, 'id' | 'createdAt'>;

export interface RecordedRefund {
  refund: Refund;
  /** False when the refund claim was lost before recording */
  claimHeld: boolean;
}

export class RefundRepository {
  constructor(private db: DB) {}

  /**
   * Stores the refund and marks its deposit refunded in one transaction.
   * Like conversions, the funds have already left, so the deposit is marked
   * refunded even when the claim was lost.
   *
   * @throws Error if the deposit already has a refund (UNIQUE depositId)
   */
  record(input: NewRefund, claimId: string, now: string = new Date().toISOString()): RecordedRefund {
    const refund: Refund = { id: uuidv4(), ...input, createdAt: now };

    return this.db.runInTransaction(() => {
      this.db.prepare(`
        INSERT INTO refunds (${COLUMNS})
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        refund.id,
        refund.depositId,
        refund.coin,
        refund.destination,
        refund.memo,
        refund.amount,
        refund.reason,
        refund.txid,
        now,
      );

      const held = this.db.prepare(`
        UPDATE deposits
        SET status = 'refunded', processedAt = ?, updatedAt = ?
        WHERE id = ? AND status = 'refunding' AND claimId = ?
      `).run(now, now, input.depositId, claimId);

      if (held.changes > 0) {
        return { refund, claimHeld: true };
      }
      this.db.prepare(`
        UPDATE deposits SET status = 'refunded', processedAt = ?, updatedAt = ? WHERE id = ?
      `).run(now, now, input.depositId);
      return { refund, claimHeld: false };
    });
  }

  getByDepositId(depositId: string): Refund | null {
    return this.db.prepare<Refund>(`SELECT ${COLUMNS} FROM refunds WHERE depositId = ?`).get(depositId) ?? null;
  }
}
