/**
 * Currency normalization
 *
 * Rule thresholds are expressed in the reference currency, so amounts are
 * converted before evaluation.
 */

import { ValidationError } from './errors.js';
import type { Transaction } from './types.js';

/**
 * Value of one unit of each currency, expressed in EUR
 */
export const DEFAULT_EXCHANGE_RATES: Readonly<Record<string, number>> = Object.freeze({
  EUR: 1,
  USD: 0.92,
  GBP: 1.17,
  CHF: 1.04,
  JPY: 0.0062,
});

export interface NormalizationOptions {
  /** Defaults to EUR */
  referenceCurrency?: string;
  /** Unit values against a common base; defaults to DEFAULT_EXCHANGE_RATES */
  rates?: Readonly<Record<string, number>>;
}

function rateOf(rates: Readonly<Record<string, number>>, currency: string, transactionId?: string): number {
  const rate = rates[currency];
  if (rate === undefined || !(rate > 0)) {
    throw new ValidationError(`No exchange rate for currency ${currency}`, {
      field: 'currency',
      currency,
      ...(transactionId !== undefined ? { transactionId } : {}),
    });
  }
  return rate;
}

function roundToCents(amount: number): number {
  return Math.round(amount * 100) / 100;
}

/**
 * Convert every transaction into the reference currency.
 *
 * Transactions already in the reference currency are returned unchanged.
 *
 * @throws ValidationError when a currency has no rate
 */
export function normalizeTransactions(
  transactions: readonly Transaction[],
  options: NormalizationOptions = {}
): Transaction[] {
  const referenceCurrency = (options.referenceCurrency ?? 'EUR').toUpperCase();
  const rates = options.rates ?? DEFAULT_EXCHANGE_RATES;
  const referenceRate = rateOf(rates, referenceCurrency);

  return transactions.map((transaction) => {
    const currency = transaction.currency.toUpperCase();
    if (currency === referenceCurrency) {
      return transaction;
    }
    const rate = rateOf(rates, currency, transaction.transactionId);
    return {
      ...transaction,
      amount: roundToCents((transaction.amount * rate) / referenceRate),
      currency: referenceCurrency,
    };
  });
}
