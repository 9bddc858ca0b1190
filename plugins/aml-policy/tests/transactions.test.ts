/**
 * Transaction intake tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../src/errors.js';
import {
  InMemoryTransactionSource,
  checkSourceTransactions,
  describeFilter,
  parseTransactions,
  type TransactionFilter,
} from '../src/transactions.js';
import { makeTransaction } from './fixtures.js';

describe('parseTransactions', () => {
  it('should accept valid records and upper-case coded fields', () => {
    const [parsed] = parseTransactions([
      {
        transactionId: 'TX-1',
        amount: 2500,
        currency: 'usd',
        country: 'Canada',
        paymentMethod: 'wire',
        riskCategory: 'pep',
        timestamp: '2024-03-01T10:00:00Z',
        supplierName: 'Northwind Traders',
      },
    ]);

    expect(parsed).toEqual({
      transactionId: 'TX-1',
      amount: 2500,
      currency: 'USD',
      country: 'Canada',
      paymentMethod: 'WIRE',
      riskCategory: 'PEP',
      timestamp: '2024-03-01T10:00:00Z',
      supplierName: 'Northwind Traders',
    });
  });

  it('should list every offending field', () => {
    try {
      parseTransactions([{ ...makeTransaction(), amount: -5, supplierName: undefined }]);
      expect.fail('expected a ValidationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe('Invalid transaction data at 0.amount: Number must be greater than or equal to 0');
        expect(error.details).toEqual({
          issues: [
            { field: '0.amount', message: 'Number must be greater than or equal to 0' },
            { field: '0.supplierName', message: 'Required' },
          ],
        });
      }
    }
  });

  it('should reject an unknown risk category', () => {
    expect(() => parseTransactions([{ ...makeTransaction(), riskCategory: 'EXTREME' }])).toThrow(ValidationError);
  });

  it('should reject input that is not a list', () => {
    expect(() => parseTransactions({ transactionId: 'TX-1' })).toThrow(
      'Invalid transaction data at <root>: Expected array, received object'
    );
  });
});

describe('checkSourceTransactions', () => {
  it('should pass valid records through with coded fields upper-cased', () => {
    expect(checkSourceTransactions([makeTransaction({ paymentMethod: 'cash' })])).toEqual([
      makeTransaction({ paymentMethod: 'CASH' }),
    ]);
  });

  it('should name the offending transaction', () => {
    const records = [makeTransaction(), makeTransaction({ transactionId: 'TX-2', amount: -5 })];

    expect(() => checkSourceTransactions(records)).toThrow('Invalid transaction TX-2 at amount');
  });
});

describe('describeFilter', () => {
  it('should describe the set filter keys', () => {
    expect(describeFilter({ supplierName: 'acme', minAmount: 1000 })).toBe('supplierName=acme; minAmount=1000');
  });

  it('should describe an empty filter', () => {
    expect(describeFilter({})).toBe('all transactions');
    expect(describeFilter({ country: undefined })).toBe('all transactions');
  });
});

describe('InMemoryTransactionSource', () => {
  const source = new InMemoryTransactionSource([
    makeTransaction({
      transactionId: 'T1',
      supplierName: 'Acme Supplies GmbH',
      amount: 500,
      timestamp: '2024-03-01T10:00:00.000Z',
    }),
    makeTransaction({
      transactionId: 'T2',
      supplierName: 'ACME Logistics',
      amount: 15000,
      timestamp: '2024-03-10T10:00:00.000Z',
      riskCategory: 'HIGH',
      country: 'Iran',
    }),
    makeTransaction({
      transactionId: 'T3',
      supplierName: 'Globex',
      amount: 120000,
      timestamp: '2024-03-20T10:00:00.000Z',
      riskCategory: 'PEP',
      country: 'USA',
    }),
    makeTransaction({
      transactionId: 'T4',
      supplierName: 'Initech',
      amount: 7000,
      timestamp: '2024-04-02T10:00:00.000Z',
    }),
  ]);

  const ids = async (filter: TransactionFilter) =>
    (await source.fetchTransactions(filter)).map((transaction) => transaction.transactionId);

  it('should match supplier names case-insensitively', async () => {
    expect(await ids({ supplierName: 'acme' })).toEqual(['T1', 'T2']);
  });

  it('should apply inclusive amount bounds', async () => {
    expect(await ids({ minAmount: 7000, maxAmount: 120000 })).toEqual(['T2', 'T3', 'T4']);
  });

  it('should apply inclusive date bounds', async () => {
    expect(await ids({ startDate: '2024-03-10T00:00:00Z', endDate: '2024-03-20T10:00:00Z' })).toEqual(['T2', 'T3']);
  });

  it('should filter by risk category and country', async () => {
    expect(await ids({ riskCategory: 'LOW', country: 'Germany' })).toEqual(['T1', 'T4']);
  });

  it('should honor the limit', async () => {
    expect(await ids({ limit: 2 })).toEqual(['T1', 'T2']);
  });

  it('should default the limit to 100', async () => {
    const large = new InMemoryTransactionSource(
      Array.from({ length: 150 }, (_, index) => makeTransaction({ transactionId: `TX-${index}` }))
    );
    expect(await large.fetchTransactions({})).toHaveLength(100);
  });
});
