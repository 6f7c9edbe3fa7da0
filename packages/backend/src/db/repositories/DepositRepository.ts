/**
 * @fileoverview Repository for the deposit ledger.
 * Inserts each real-world transaction at most once (unique dedup key) and
 * moves deposits through their lifecycle with conditional updates, so two
 * concurrent conversion runs can never both own the same deposit.
 */

import { v4 as uuidv4 } from 'uuid';
import { depositDedupKey, validateDepositTransition } from '@convgate/core';
import type { CoinSymbol, Deposit, DepositStatus, IdentificationMode, RawTransaction } from '@convgate/core';
import { DB } from '../database';

const COLUMNS = `
  id, coin, txid, vout, source, destination, memo, amount, txTimestamp,
  status, errorReason, attempts, claimId, claimedAt, processedAt, createdAt, updatedAt
`;

// A deposit may be claimed from these, or from a processing claim older than staleBefore
const CLAIMABLE = `(status IN ('new', 'error') OR (status = 'processing' AND claimedAt < ?))`;

/**
 * Which deposits the conversion pipeline may pick up.
 */
export interface ClaimWindow {
  /** ISO time; processing claims made before it are considered abandoned */
  staleBefore: string;
  /** Deposits claimed this many times are left alone */
  maxAttempts: number;
}

export interface ConvertibleQuery extends ClaimWindow {
  coins?: CoinSymbol[];
  limit: number;
}

export interface DepositFilter {
  coin?: CoinSymbol;
  status?: DepositStatus;
  limit?: number;
}

export interface StatusCount {
  coin: CoinSymbol;
  status: DepositStatus;
  count: number;
}

/**
 * Statuses a claimed deposit can be finished in.
 */
export type FinishStatus = Extract<DepositStatus, 'invalid' | 'error'>;

export class DepositRepository {
  constructor(private db: DB) {}

  /**
   * Records a loader-reported transaction unless one with the same dedup key
   * already exists.
   * @returns true when a new deposit row was created
   */
  insertIfAbsent(tx: RawTransaction, mode: IdentificationMode, now: string = new Date().toISOString()): boolean {
    const result = this.db.prepare(`
      INSERT INTO deposits (
        id, dedupKey, coin, txid, vout, source, destination, memo, amount,
        txTimestamp, status, attempts, createdAt, updatedAt
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'new', 0, ?, ?)
      ON CONFLICT(dedupKey) DO NOTHING
    `).run(
      uuidv4(),
      depositDedupKey(mode, tx),
      tx.coin,
      tx.txid,
      mode === 'address' ? tx.vout ?? 0 : null,
      tx.source ?? null,
      tx.destination,
      mode === 'account' ? tx.memo ?? null : null,
      tx.amount,
      tx.timestamp ?? null,
      now,
      now,
    );
    return result.changes > 0;
  }

  getById(id: string): Deposit | null {
    return this.db.prepare<Deposit>(`SELECT ${COLUMNS} FROM deposits WHERE id = ?`).get(id) ?? null;
  }

  /**
   * Oldest deposits that could be claimed right now.
   */
  findConvertible(query: ConvertibleQuery): Deposit[] {
    if (query.coins && query.coins.length === 0) {
      return [];
    }
    const coinFilter = query.coins ? `AND coin IN (${query.coins.map(() => '?').join(', ')})` : '';
    return this.db.prepare<Deposit>(`
      SELECT ${COLUMNS} FROM deposits
      WHERE ${CLAIMABLE} AND attempts < ? ${coinFilter}
      ORDER BY createdAt ASC, id ASC
      LIMIT ?
    `).all(query.staleBefore, query.maxAttempts, ...(query.coins ?? []), query.limit);
  }

  /**
   * Atomically moves a deposit into processing for `claimId`.
   * @returns false when another run holds it, it is finished, or it ran out of attempts
   */
  claim(id: string, claimId: string, window: ClaimWindow, now: string = new Date().toISOString()): boolean {
    const result = this.db.prepare(`
      UPDATE deposits
      SET status = 'processing', claimId = ?, claimedAt = ?, attempts = attempts + 1, updatedAt = ?
      WHERE id = ? AND ${CLAIMABLE} AND attempts < ?
    `).run(claimId, now, now, id, window.staleBefore, window.maxAttempts);
    return result.changes > 0;
  }

  /**
   * Re-stamps the claim of a deposit this run still holds, so it does not go
   * stale while the deposit is being sent.
   * @returns false when the claim was lost
   */
  renewClaim(id: string, claimId: string, now: string = new Date().toISOString()): boolean {
    const result = this.db.prepare(`
      UPDATE deposits
      SET claimedAt = ?, updatedAt = ?
      WHERE id = ? AND status = 'processing' AND claimId = ?
    `).run(now, now, id, claimId);
    return result.changes > 0;
  }

  /**
   * Moves stale processing deposits that have no attempts left to error.
   * Neither findConvertible nor claim would ever pick them up again.
   * @returns number of deposits given up on
   */
  abandonExhausted(window: ClaimWindow, now: string = new Date().toISOString()): number {
    const result = this.db.prepare(`
      UPDATE deposits
      SET status = 'error',
          errorReason = 'Claim abandoned after ' || attempts || CASE attempts WHEN 1 THEN ' attempt' ELSE ' attempts' END,
          processedAt = ?, updatedAt = ?
      WHERE status = 'processing' AND claimedAt < ? AND attempts >= ?
    `).run(now, now, window.staleBefore, window.maxAttempts);
    return result.changes;
  }

  /**
   * Moves an invalid or error deposit into refunding for `claimId`. The
   * conversion pipeline never claims refunding deposits.
   * @returns false when the deposit is in any other status
   */
  claimForRefund(id: string, claimId: string, now: string = new Date().toISOString()): boolean {
    const result = this.db.prepare(`
      UPDATE deposits
      SET status = 'refunding', claimId = ?, claimedAt = ?, updatedAt = ?
      WHERE id = ? AND status IN ('invalid', 'error')
    `).run(claimId, now, now, id);
    return result.changes > 0;
  }

  /**
   * Puts a deposit whose refund did not go out back into the status it was
   * refunded from.
   * @returns false when the refund claim was lost
   */
  releaseRefund(id: string, claimId: string, status: FinishStatus, reason: string | null, now: string = new Date().toISOString()): boolean {
    if (!validateDepositTransition('refunding', status)) {
      throw new Error(`Invalid deposit transition: refunding -> ${status}`);
    }
    const result = this.db.prepare(`
      UPDATE deposits
      SET status = ?, errorReason = ?, updatedAt = ?
      WHERE id = ? AND status = 'refunding' AND claimId = ?
    `).run(status, reason, now, id, claimId);
    return result.changes > 0;
  }

  /**
   * Finishes a claimed deposit as invalid or error. Only the run holding the
   * claim can do this; the converted transition goes through
   * ConversionRepository.record instead.
   * @returns false when the claim was lost
   */
  finish(id: string, claimId: string, status: FinishStatus, reason: string, now: string = new Date().toISOString()): boolean {
    if (!validateDepositTransition('processing', status)) {
      throw new Error(`Invalid deposit transition: processing -> ${status}`);
    }
    const result = this.db.prepare(`
      UPDATE deposits
      SET status = ?, errorReason = ?, processedAt = ?, updatedAt = ?
      WHERE id = ? AND status = 'processing' AND claimId = ?
    `).run(status, reason, now, now, id, claimId);
    return result.changes > 0;
  }

  /**
   * Newest first.
   */
  find(filter: DepositFilter = {}): Deposit[] {
    const clauses: string[] = [];
    const params: unknown[] = [];
    if (filter.coin) {
      clauses.push('coin = ?');
      params.push(filter.coin);
    }
    if (filter.status) {
      clauses.push('status = ?');
      params.push(filter.status);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    return this.db.prepare<Deposit>(`
      SELECT ${COLUMNS} FROM deposits ${where}
      ORDER BY createdAt DESC, id DESC
      LIMIT ?
    `).all(...params, filter.limit ?? 100);
  }

  countByStatus(): StatusCount[] {
    return this.db.prepare<StatusCount>(`
      SELECT coin, status, COUNT(*) AS count
      FROM deposits
      GROUP BY coin, status
      ORDER BY coin, status
    `).all();
  }
}
