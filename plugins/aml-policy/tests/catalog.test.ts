/**
 * Rule catalog tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CatalogHolder,
  RuleCatalog,
  loadDefaultRuleCatalog,
  loadRuleCatalogFile,
  type RuleCatalogDocument,
} from '../src/catalog.js';
import { CatalogError } from '../src/errors.js';
import { evaluateRule } from '../src/evaluator.js';
import { parseTransactions } from '../src/transactions.js';

function ruleDefinition(ruleId: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    ruleId,
    name: `Rule ${ruleId}`,
    policyType: 'AML',
    severity: 'LOW',
    conditions: [{ type: 'amount_threshold', threshold: 10 }],
    remediation: 'Review',
    ...extra,
  };
}

describe('RuleCatalog', () => {
  let bundled: RuleCatalog;

  beforeAll(async () => {
    bundled = await loadDefaultRuleCatalog();
  });

  describe('bundled rules', () => {
    it('should load every bundled rule', () => {
      expect(bundled.version).toBe('2024.1');
      expect(bundled.size).toBe(9);
    });

    it('should partition rules by policy type in identifier order', () => {
      expect(bundled.rulesFor('AML').map((rule) => rule.ruleId)).toEqual([
        'AML-001',
        'AML-002',
        'AML-003',
        'AML-004',
        'AML-005',
      ]);
      expect(bundled.rulesFor('FINANCIAL').map((rule) => rule.ruleId)).toEqual(['FIN-001', 'FIN-002']);
      expect(bundled.rulesFor('REGULATORY').map((rule) => rule.ruleId)).toEqual(['REG-001', 'REG-002']);
    });

    it('should look up rules by identifier', () => {
      expect(bundled.getRule('AML-005')?.severity).toBe('CRITICAL');
      expect(bundled.getRule('AML-999')).toBeUndefined();
    });

    it('should freeze rules and their conditions', () => {
      const rule = bundled.getRule('AML-002');
      expect(Object.isFrozen(rule)).toBe(true);
      expect(Object.isFrozen(rule?.conditions)).toBe(true);
      expect(Object.isFrozen(rule?.conditions[0])).toBe(true);
    });

    it('should group rules by their first matching category', () => {
      const ids = Object.fromEntries(
        Object.entries(bundled.getRulesByCategory()).map(([category, rules]) => [
          category,
          rules.map((rule) => rule.ruleId),
        ])
      );

      expect(ids).toEqual({
        'sanctions': ['REG-001'],
        'reporting': ['AML-002', 'AML-003'],
        'pep': ['AML-004', 'REG-002'],
        'country-risk': ['AML-005'],
        'payment-method': ['FIN-001', 'FIN-002'],
        'thresholds': ['AML-001'],
      });
    });
  });

  describe('load', () => {
    it('should sort rules by identifier regardless of document order', () => {
      const catalog = RuleCatalog.load({ version: 'v1', rules: [ruleDefinition('B-1'), ruleDefinition('A-1')] });
      expect(catalog.allRules().map((rule) => rule.ruleId)).toEqual(['A-1', 'B-1']);
    });

    it('should default the comparator to strictly greater than', () => {
      const catalog = RuleCatalog.load({ rules: [ruleDefinition('A-1')] });
      expect(catalog.version).toBe('unversioned');
      expect(catalog.getRule('A-1')?.conditions).toEqual([
        { type: 'amount_threshold', comparator: '>', threshold: 10 },
      ]);
    });

    it('should upper-case payment methods so they match parsed transactions', () => {
      const catalog = RuleCatalog.load({
        rules: [ruleDefinition('A-1', { conditions: [{ type: 'payment_method_in', methods: ['cash', 'Check'] }] })],
      });
      const rule = catalog.getRule('A-1');
      const [transaction] = parseTransactions([
        {
          transactionId: 'TX-1',
          amount: 50,
          currency: 'eur',
          country: 'Germany',
          paymentMethod: 'cash',
          riskCategory: 'low',
          timestamp: '2024-03-01T10:00:00.000Z',
          supplierName: 'Acme Supplies GmbH',
        },
      ]);

      expect(rule?.conditions).toEqual([{ type: 'payment_method_in', methods: ['CASH', 'CHECK'] }]);
      expect(rule && transaction ? evaluateRule(rule, transaction)?.ruleId : undefined).toBe('A-1');
    });

    it('should accept an empty rule set', () => {
      const document: RuleCatalogDocument = { version: 'empty', rules: [] };
      expect(RuleCatalog.load(document).rulesFor('AML')).toEqual([]);
    });

    it('should reject an amount condition without a threshold', () => {
      const document = { rules: [ruleDefinition('A-1', { conditions: [{ type: 'amount_threshold' }] })] };
      expect(() => RuleCatalog.load(document)).toThrow(
        'Invalid rule catalog at rules.0.conditions.0.threshold: amount_threshold condition requires a threshold'
      );
    });

    it('should reject an unknown severity', () => {
      const document = { rules: [ruleDefinition('A-1', { severity: 'URGENT' })] };
      expect(() => RuleCatalog.load(document)).toThrow(
        'Invalid rule catalog at rules.0.severity: Unknown severity, expected one of LOW, MEDIUM, HIGH, CRITICAL'
      );
    });

    it('should reject a rule without conditions', () => {
      const document = { rules: [ruleDefinition('A-1', { conditions: [] })] };
      expect(() => RuleCatalog.load(document)).toThrow('Rule must declare at least one condition');
    });

    it('should reject duplicate rule identifiers', () => {
      const document = { rules: [ruleDefinition('A-1'), ruleDefinition('A-1')] };
      try {
        RuleCatalog.load(document);
        expect.fail('expected a CatalogError');
      } catch (error) {
        expect(error).toBeInstanceOf(CatalogError);
        if (error instanceof CatalogError) {
          expect(error.message).toBe('Invalid rule catalog at rules.1.ruleId: Duplicate rule identifier: A-1');
          expect(error.details).toEqual({
            issues: [{ path: 'rules.1.ruleId', message: 'Duplicate rule identifier: A-1' }],
          });
        }
      }
    });
  });

  describe('loadRuleCatalogFile', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'rule-catalog-'));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should load a catalog from disk', async () => {
      const path = join(dir, 'rules.json');
      await writeFile(path, JSON.stringify({ version: 'disk', rules: [ruleDefinition('D-1')] }));

      const catalog = await loadRuleCatalogFile(path);
      expect(catalog.version).toBe('disk');
      expect(catalog.size).toBe(1);
    });

    it('should raise a CatalogError for a missing file', async () => {
      await expect(loadRuleCatalogFile(join(dir, 'missing.json'))).rejects.toBeInstanceOf(CatalogError);
    });

    it('should raise a CatalogError for malformed JSON', async () => {
      const path = join(dir, 'broken.json');
      await writeFile(path, '{ "rules": [');
      await expect(loadRuleCatalogFile(path)).rejects.toThrow(`Rule catalog ${path} is not valid JSON`);
    });
  });
});

describe('CatalogHolder', () => {
  it('should swap catalogs and return the previous one', () => {
    const first = RuleCatalog.load({ version: 'one', rules: [] });
    const second = RuleCatalog.load({ version: 'two', rules: [] });
    const holder = new CatalogHolder(first);

    expect(holder.replace(second)).toBe(first);
    expect(holder.get()).toBe(second);
  });
});
