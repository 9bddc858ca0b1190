/**
 * Transaction intake
 *
 * Validates external transaction records and defines the source the engine
 * pulls transactions from.
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';
import { RISK_CATEGORIES, type RiskCategory, type Transaction } from './types.js';

const upperCased = (schema: z.ZodString) => schema.transform((value) => value.toUpperCase());

export const TransactionSchema = z.object({
  transactionId: z.string().min(1),
  amount: z.number().finite().nonnegative(),
  currency: upperCased(z.string().length(3, 'currency must be a 3-letter ISO-4217 code')),
  country: z.string().min(1),
  paymentMethod: upperCased(z.string().min(1)),
  riskCategory: upperCased(z.string()).pipe(z.enum(RISK_CATEGORIES)),
  timestamp: z.string().datetime({ offset: true }),
  supplierName: z.string().min(1),
  description: z.string().optional(),
});

const TransactionListSchema = z.array(TransactionSchema);

function describeIssues(error: z.ZodError): Array<{ field: string; message: string }> {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Validate a batch of external transaction records.
 *
 * Currency, payment method and risk category are upper-cased.
 *
 * @throws ValidationError listing every offending field
 */
export function parseTransactions(input: unknown): Transaction[] {
  const parsed = TransactionListSchema.safeParse(input);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    const first = issues[0];
    throw new ValidationError(
      first ? `Invalid transaction data at ${first.field || '<root>'}: ${first.message}` : 'Invalid transaction data',
      { issues }
    );
  }
  return parsed.data;
}

/**
 * Check records handed over by a transaction source before they are evaluated
 *
 * @throws ValidationError naming the first offending transaction
 */
export function checkSourceTransactions(transactions: readonly Transaction[]): Transaction[] {
  return transactions.map((transaction, index) => {
    const parsed = TransactionSchema.safeParse(transaction);
    if (parsed.success) {
      return parsed.data;
    }
    const issues = describeIssues(parsed.error);
    const first = issues[0];
    throw new ValidationError(
      `Invalid transaction ${transaction.transactionId}` + (first ? ` at ${first.field}: ${first.message}` : ''),
      { transactionId: transaction.transactionId, index, issues }
    );
  });
}

export const DEFAULT_TRANSACTION_LIMIT = 100;

export interface TransactionFilter {
  /** Case-insensitive substring match */
  supplierName?: string;
  minAmount?: number;
  maxAmount?: number;
  /** Inclusive ISO-8601 bound */
  startDate?: string;
  /** Inclusive ISO-8601 bound */
  endDate?: string;
  riskCategory?: RiskCategory;
  country?: string;
  /** Defaults to 100 */
  limit?: number;
}

/**
 * Where the engine fetches transactions from
 */
export interface TransactionSource {
  fetchTransactions(filter: TransactionFilter): Promise<Transaction[]>;
}

/**
 * Human-readable description of a filter, recorded as a run's scope
 */
export function describeFilter(filter: TransactionFilter): string {
  const parts = Object.entries(filter)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`);
  return parts.length > 0 ? parts.join('; ') : 'all transactions';
}

export function matchesFilter(transaction: Transaction, filter: TransactionFilter): boolean {
  if (
    filter.supplierName !== undefined &&
    !transaction.supplierName.toLowerCase().includes(filter.supplierName.toLowerCase())
  ) {
    return false;
  }
  if (filter.minAmount !== undefined && transaction.amount < filter.minAmount) return false;
  if (filter.maxAmount !== undefined && transaction.amount > filter.maxAmount) return false;

  const time = Date.parse(transaction.timestamp);
  if (filter.startDate !== undefined && time < Date.parse(filter.startDate)) return false;
  if (filter.endDate !== undefined && time > Date.parse(filter.endDate)) return false;

  if (filter.riskCategory !== undefined && transaction.riskCategory !== filter.riskCategory) return false;
  if (filter.country !== undefined && transaction.country !== filter.country) return false;
  return true;
}

/**
 * Transaction source over an in-process list, in insertion order
 */
export class InMemoryTransactionSource implements TransactionSource {
  private readonly transactions: Transaction[];

  constructor(transactions: readonly Transaction[] = []) {
    this.transactions = [...transactions];
  }

  add(...transactions: Transaction[]): void {
    for (const transaction of transactions) {
      this.transactions.push(transaction);
    }
  }

  async fetchTransactions(filter: TransactionFilter = {}): Promise<Transaction[]> {
    const limit = filter.limit ?? DEFAULT_TRANSACTION_LIMIT;
    return this.transactions.filter((transaction) => matchesFilter(transaction, filter)).slice(0, limit);
  }
}
