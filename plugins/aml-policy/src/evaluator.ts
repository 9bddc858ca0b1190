/**
 * Rule Evaluator
 *
 * Applies one rule to one transaction. Conditions are AND-combined; each
 * condition type has a handler in the registry below, so a new condition
 * type only needs a registry entry.
 */

import type {
  AmountThresholdCondition,
  ComplianceRule,
  CountryCondition,
  PaymentMethodCondition,
  RiskCategoryCondition,
  RuleCondition,
  Transaction,
  Violation,
} from './types.js';

interface ConditionVariants {
  amount_threshold: AmountThresholdCondition;
  country_in: CountryCondition;
  payment_method_in: PaymentMethodCondition;
  risk_category_in: RiskCategoryCondition;
}

export interface ConditionHandler<C> {
  matches(condition: C, transaction: Transaction): boolean;
  describe(condition: C, transaction: Transaction): string;
}

type ConditionHandlers = { [K in keyof ConditionVariants]: ConditionHandler<ConditionVariants[K]> };

const amountFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatAmount(amount: number, currency: string): string {
  return `${currency} ${amountFormat.format(amount)}`;
}

export const conditionHandlers: ConditionHandlers = {
  amount_threshold: {
    matches: (condition, transaction) =>
      condition.comparator === '>'
        ? transaction.amount > condition.threshold
        : transaction.amount >= condition.threshold,
    describe: (condition, transaction) =>
      `amount ${formatAmount(transaction.amount, transaction.currency)} ${
        condition.comparator === '>' ? 'exceeds' : 'meets or exceeds'
      } ${formatAmount(condition.threshold, transaction.currency)}`,
  },
  country_in: {
    matches: (condition, transaction) => condition.countries.includes(transaction.country),
    describe: (_condition, transaction) => `country ${transaction.country} is listed`,
  },
  payment_method_in: {
    matches: (condition, transaction) => condition.methods.includes(transaction.paymentMethod),
    describe: (_condition, transaction) => `payment method ${transaction.paymentMethod} is covered`,
  },
  risk_category_in: {
    matches: (condition, transaction) => condition.categories.includes(transaction.riskCategory),
    describe: (_condition, transaction) => `risk category ${transaction.riskCategory} is covered`,
  },
};

function handlerFor<K extends keyof ConditionVariants>(type: K): ConditionHandler<ConditionVariants[K]> {
  return conditionHandlers[type];
}

function conditionMatches(condition: RuleCondition, transaction: Transaction): boolean {
  return handlerFor(condition.type).matches(condition, transaction);
}

function describeCondition(condition: RuleCondition, transaction: Transaction): string {
  return handlerFor(condition.type).describe(condition, transaction);
}

/**
 * Evaluate a rule against a transaction.
 *
 * @returns the violation when every condition matches, otherwise null
 */
export function evaluateRule(rule: ComplianceRule, transaction: Transaction): Violation | null {
  if (!rule.conditions.every((condition) => conditionMatches(condition, transaction))) {
    return null;
  }

  const reasons = rule.conditions.map((condition) => describeCondition(condition, transaction));

  return Object.freeze({
    transactionId: transaction.transactionId,
    ruleId: rule.ruleId,
    ruleName: rule.name,
    severity: rule.severity,
    explanation: `${rule.name}: ${reasons.join('; ')}`,
    remediation: rule.remediation,
    ...(rule.recommendation !== undefined ? { recommendation: rule.recommendation } : {}),
    amount: transaction.amount,
    currency: transaction.currency,
    country: transaction.country,
    paymentMethod: transaction.paymentMethod,
    riskCategory: transaction.riskCategory,
    supplierName: transaction.supplierName,
  });
}
