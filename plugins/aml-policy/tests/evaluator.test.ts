/**
 * Rule evaluator tests
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { loadDefaultRuleCatalog, type RuleCatalog } from '../src/catalog.js';
import { evaluateRule, formatAmount } from '../src/evaluator.js';
import type { ComplianceRule } from '../src/types.js';
import { makeTransaction } from './fixtures.js';

describe('formatAmount', () => {
  it('should format with grouping and two decimals', () => {
    expect(formatAmount(150000, 'EUR')).toBe('EUR 150,000.00');
    expect(formatAmount(3000.5, 'USD')).toBe('USD 3,000.50');
  });
});

describe('evaluateRule', () => {
  let catalog: RuleCatalog;

  const rule = (ruleId: string): ComplianceRule => {
    const found = catalog.getRule(ruleId);
    if (!found) throw new Error(`missing bundled rule ${ruleId}`);
    return found;
  };

  beforeAll(async () => {
    catalog = await loadDefaultRuleCatalog();
  });

  it('should flag an amount strictly above the threshold', () => {
    const violation = evaluateRule(rule('AML-001'), makeTransaction({ transactionId: 'TX-9', amount: 150000 }));

    expect(violation).toEqual({
      transactionId: 'TX-9',
      ruleId: 'AML-001',
      ruleName: 'High Value Transaction',
      severity: 'HIGH',
      explanation: 'High Value Transaction: amount EUR 150,000.00 exceeds EUR 100,000.00',
      remediation: 'Obtain additional documentation and management approval',
      recommendation: 'Implement enhanced due diligence procedures for high-value transactions',
      amount: 150000,
      currency: 'EUR',
      country: 'Germany',
      paymentMethod: 'WIRE',
      riskCategory: 'LOW',
      supplierName: 'Acme Supplies GmbH',
    });
  });

  it('should not flag an amount equal to a strict threshold', () => {
    expect(evaluateRule(rule('AML-001'), makeTransaction({ amount: 100000 }))).toBeNull();
  });

  it('should flag an amount equal to an inclusive threshold', () => {
    const violation = evaluateRule(rule('AML-004'), makeTransaction({ amount: 1000, riskCategory: 'PEP' }));

    expect(violation?.explanation).toBe(
      'PEP Transaction: risk category PEP is covered; amount EUR 1,000.00 meets or exceeds EUR 1,000.00'
    );
  });

  it('should omit the recommendation when the rule has none', () => {
    const violation = evaluateRule(rule('AML-004'), makeTransaction({ amount: 2000, riskCategory: 'PEP' }));

    expect(violation).not.toBeNull();
    expect(violation && 'recommendation' in violation).toBe(false);
  });

  it('should require every condition to match', () => {
    expect(evaluateRule(rule('AML-002'), makeTransaction({ amount: 6000, paymentMethod: 'WIRE' }))).toBeNull();
    expect(evaluateRule(rule('AML-002'), makeTransaction({ amount: 4000, paymentMethod: 'CASH' }))).toBeNull();
    expect(evaluateRule(rule('AML-002'), makeTransaction({ amount: 6000, paymentMethod: 'CASH' }))?.explanation).toBe(
      'CTR Threshold: payment method CASH is covered; amount EUR 6,000.00 exceeds EUR 5,000.00'
    );
  });

  it('should match listed countries', () => {
    expect(evaluateRule(rule('AML-005'), makeTransaction({ country: 'Iran' }))?.explanation).toBe(
      'High Risk Country: country Iran is listed'
    );
    expect(evaluateRule(rule('AML-005'), makeTransaction({ country: 'USA' }))).toBeNull();
  });

  it('should return frozen violations', () => {
    const violation = evaluateRule(rule('AML-005'), makeTransaction({ country: 'Syria' }));
    expect(Object.isFrozen(violation)).toBe(true);
  });
});
