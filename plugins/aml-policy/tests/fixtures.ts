import type { ComplianceStatus, Transaction, Violation } from '../src/types.js';

export function makeTransaction(overrides: Partial<Transaction> = {}): Transaction {
  return {
    transactionId: 'TX-1',
    amount: 500,
    currency: 'EUR',
    country: 'Germany',
    paymentMethod: 'WIRE',
    riskCategory: 'LOW',
    timestamp: '2024-03-01T10:00:00.000Z',
    supplierName: 'Acme Supplies GmbH',
    ...overrides,
  };
}

export function makeViolation(overrides: Partial<Violation> = {}): Violation {
  return {
    transactionId: 'TX-1',
    ruleId: 'AML-001',
    ruleName: 'High Value Transaction',
    severity: 'HIGH',
    explanation: 'High Value Transaction: amount EUR 150,000.00 exceeds EUR 100,000.00',
    remediation: 'Obtain additional documentation and management approval',
    amount: 150000,
    currency: 'EUR',
    country: 'Germany',
    paymentMethod: 'WIRE',
    riskCategory: 'LOW',
    supplierName: 'Acme Supplies GmbH',
    ...overrides,
  };
}

export const COMPLIANT_STATUS: ComplianceStatus = {
  overallStatus: 'COMPLIANT',
  totalTransactions: 1,
  totalViolations: 0,
  severityCounts: { LOW: 0, MEDIUM: 0, HIGH: 0, CRITICAL: 0 },
};

export const FIXED_NOW = (): Date => new Date('2024-04-01T09:30:00.000Z');
