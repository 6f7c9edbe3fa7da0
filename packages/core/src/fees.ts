/**
 * @fileoverview Exchange rate and fee engine.
 * Pure computation of the amount sent for a deposit: no I/O. Dynamic rates are
 * resolved by the caller before this runs.
 */

import { Decimal, parseAmount, truncateAmount } from './decimal';

/**
 * Inputs for converting one deposit.
 */
export interface ConversionInput {
  /** Deposit amount in the `from` coin */
  amount: string;
  /** Amount of `to` per one `from` */
  rate: string;
  /** Exchange fee as a flat percentage, e.g. '1' means 1% */
  feePercent: string;
  /** Estimated network fee in the `to` coin */
  networkFee: string;
  /** Decimal places of the `to` coin; the final amount is truncated to these */
  decimals: number;
}

/**
 * Breakdown of a conversion. All values are decimal strings in the `to` coin.
 */
export interface ConversionQuote {
  gross: string;
  exchangeFee: string;
  networkFee: string;
  finalAmount: string;
}

export type ConversionResult =
  | { ok: true; quote: ConversionQuote }
  | { ok: false; reason: string; quote: ConversionQuote };

/**
 * Computes gross, exchange fee, network fee and the final amount to send.
 *
 *   gross  = amount * rate
 *   exFee  = gross * feePercent / 100
 *   final  = gross - exFee - networkFee   (truncated to `decimals`)
 *
 * A non-positive final amount is reported as a failed result, not thrown.
 *
 * @example
 * calculateConversion({ amount: '100', rate: '0.5', feePercent: '1', networkFee: '0.2', decimals: 8 })
 * // { ok: true, quote: { gross: '50', exchangeFee: '0.5', networkFee: '0.2', finalAmount: '49.3' } }
 */
export function calculateConversion(input: ConversionInput): ConversionResult {
  const rate = parseAmount(input.rate);
  if (!rate.gt(0)) {
    throw new Error(`Exchange rate must be positive, got ${input.rate}`);
  }

  const gross = parseAmount(input.amount).mul(rate);
  const exchangeFee = gross.mul(parseAmount(input.feePercent)).div(100);
  const networkFee = parseAmount(input.networkFee);
  const final = gross.sub(exchangeFee).sub(networkFee);

  const quote: ConversionQuote = {
    gross: gross.toString(),
    exchangeFee: exchangeFee.toString(),
    networkFee: networkFee.toString(),
    finalAmount: final.gt(0) ? truncateAmount(final, input.decimals) : final.toString(),
  };

  if (!new Decimal(quote.finalAmount).gt(0)) {
    return {
      ok: false,
      reason: `Converted amount ${quote.finalAmount} is not positive after fees (gross ${quote.gross}, exchange fee ${quote.exchangeFee}, network fee ${quote.networkFee})`,
      quote,
    };
  }

  return { ok: true, quote };
}
