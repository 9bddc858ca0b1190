/**
 * Rule Catalog
 *
 * Immutable, validated set of compliance rules loaded from a versioned JSON
 * document. Lookups are pure reads; a reload builds a new catalog and swaps
 * the reference held by a CatalogHolder.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createLogger, getErrorMessage } from '@ledgerproof/utils';
import { CatalogError } from './errors.js';
import {
  POLICY_TYPES,
  RISK_CATEGORIES,
  SEVERITY_ORDER,
  type ComplianceRule,
  type PolicyType,
  type RuleCondition,
} from './types.js';

const logger = createLogger({ service: 'rule-catalog' });

/**
 * Location of the rule document bundled with this package
 */
export const DEFAULT_RULES_PATH = fileURLToPath(new URL('../config/rules.json', import.meta.url));

const AmountThresholdSchema = z.object({
  type: z.literal('amount_threshold'),
  comparator: z.enum(['>', '>=']).default('>'),
  threshold: z
    .number({
      required_error: 'amount_threshold condition requires a threshold',
      invalid_type_error: 'amount_threshold condition requires a numeric threshold',
    })
    .finite()
    .nonnegative(),
});

const CountryConditionSchema = z.object({
  type: z.literal('country_in'),
  countries: z.array(z.string().min(1)).min(1, 'country_in condition requires at least one country'),
});

const PaymentMethodConditionSchema = z.object({
  type: z.literal('payment_method_in'),
  // Transactions carry upper-cased methods
  methods: z
    .array(z.string().min(1).transform((method) => method.toUpperCase()))
    .min(1, 'payment_method_in condition requires at least one method'),
});

const RiskCategoryConditionSchema = z.object({
  type: z.literal('risk_category_in'),
  categories: z.array(z.enum(RISK_CATEGORIES)).min(1, 'risk_category_in condition requires at least one category'),
});

const RuleConditionSchema = z.discriminatedUnion('type', [
  AmountThresholdSchema,
  CountryConditionSchema,
  PaymentMethodConditionSchema,
  RiskCategoryConditionSchema,
]);

const RuleDefinitionSchema = z.object({
  ruleId: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(''),
  policyType: z.enum(POLICY_TYPES, {
    errorMap: () => ({ message: `policyType must be one of ${POLICY_TYPES.join(', ')}` }),
  }),
  severity: z.enum(SEVERITY_ORDER, {
    errorMap: () => ({ message: `Unknown severity, expected one of ${SEVERITY_ORDER.join(', ')}` }),
  }),
  conditions: z.array(RuleConditionSchema).min(1, 'Rule must declare at least one condition'),
  remediation: z.string().min(1),
  recommendation: z.string().min(1).optional(),
  tags: z.array(z.string()).default([]),
});

const CatalogDocumentSchema = z
  .object({
    version: z.string().min(1).default('unversioned'),
    rules: z.array(RuleDefinitionSchema),
  })
  .superRefine((document, ctx) => {
    const seen = new Set<string>();
    document.rules.forEach((rule, index) => {
      if (seen.has(rule.ruleId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rules', index, 'ruleId'],
          message: `Duplicate rule identifier: ${rule.ruleId}`,
        });
      }
      seen.add(rule.ruleId);
    });
  });

export type RuleCatalogDocument = z.input<typeof CatalogDocumentSchema>;

/**
 * Tag-based rule groupings, checked in this order
 */
export const RULE_CATEGORIES = [
  'sanctions',
  'reporting',
  'pep',
  'country-risk',
  'payment-method',
  'thresholds',
] as const;

export type RuleCategory = (typeof RULE_CATEGORIES)[number];

function compareRuleIds(a: ComplianceRule, b: ComplianceRule): number {
  if (a.ruleId < b.ruleId) return -1;
  if (a.ruleId > b.ruleId) return 1;
  return 0;
}

function freezeCondition(condition: RuleCondition): RuleCondition {
  switch (condition.type) {
    case 'amount_threshold':
      return Object.freeze({ ...condition });
    case 'country_in':
      return Object.freeze({ ...condition, countries: Object.freeze([...condition.countries]) });
    case 'payment_method_in':
      return Object.freeze({ ...condition, methods: Object.freeze([...condition.methods]) });
    case 'risk_category_in':
      return Object.freeze({ ...condition, categories: Object.freeze([...condition.categories]) });
  }
}

function freezeRule(rule: ComplianceRule): ComplianceRule {
  return Object.freeze({
    ...rule,
    conditions: Object.freeze(rule.conditions.map(freezeCondition)),
    tags: Object.freeze([...rule.tags]),
  });
}

export class RuleCatalog {
  readonly version: string;
  private readonly rules: readonly ComplianceRule[];
  private readonly byId: ReadonlyMap<string, ComplianceRule>;
  private readonly byPolicy: ReadonlyMap<PolicyType, readonly ComplianceRule[]>;

  private constructor(version: string, rules: ComplianceRule[]) {
    this.version = version;
    this.rules = Object.freeze(rules.map(freezeRule).sort(compareRuleIds));
    this.byId = new Map(this.rules.map((rule) => [rule.ruleId, rule]));
    this.byPolicy = new Map(
      POLICY_TYPES.map((policyType) => [
        policyType,
        Object.freeze(this.rules.filter((rule) => rule.policyType === policyType)),
      ])
    );
  }

  /**
   * Validate a raw catalog document and build an immutable catalog.
   *
   * @throws CatalogError when any rule definition is malformed
   */
  static load(document: unknown): RuleCatalog {
    const parsed = CatalogDocumentSchema.safeParse(document);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      const first = issues[0];
      throw new CatalogError(
        first ? `Invalid rule catalog at ${first.path || '<root>'}: ${first.message}` : 'Invalid rule catalog',
        { issues }
      );
    }
    return new RuleCatalog(parsed.data.version, parsed.data.rules);
  }

  /**
   * Rules of a policy type in ascending rule-identifier order
   */
  rulesFor(policyType: PolicyType): readonly ComplianceRule[] {
    return this.byPolicy.get(policyType) ?? [];
  }

  getRule(ruleId: string): ComplianceRule | undefined {
    return this.byId.get(ruleId);
  }

  allRules(): readonly ComplianceRule[] {
    return this.rules;
  }

  get size(): number {
    return this.rules.length;
  }

  /**
   * Group rules by their first matching tag category
   */
  getRulesByCategory(): Record<RuleCategory, ComplianceRule[]> {
    const categories: Record<RuleCategory, ComplianceRule[]> = {
      'sanctions': [],
      'reporting': [],
      'pep': [],
      'country-risk': [],
      'payment-method': [],
      'thresholds': [],
    };

    for (const rule of this.rules) {
      const category = RULE_CATEGORIES.find((candidate) => rule.tags.includes(candidate));
      if (category) {
        categories[category].push(rule);
      }
    }

    return categories;
  }
}

/**
 * Load a catalog from a JSON document on disk.
 *
 * @throws CatalogError when the file is missing, unreadable or malformed
 */
export async function loadRuleCatalogFile(path: string): Promise<RuleCatalog> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new CatalogError(`Cannot read rule catalog ${path}: ${getErrorMessage(error)}`, { path }, { cause: error });
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new CatalogError(`Rule catalog ${path} is not valid JSON: ${getErrorMessage(error)}`, { path }, { cause: error });
  }

  const catalog = RuleCatalog.load(document);
  logger.info('Rule catalog loaded', { path, version: catalog.version, rules: catalog.size });
  return catalog;
}

export function loadDefaultRuleCatalog(): Promise<RuleCatalog> {
  return loadRuleCatalogFile(DEFAULT_RULES_PATH);
}

/**
 * Holds the current catalog. Runs read the reference once at their start, so
 * replacing it never affects an evaluation already in progress.
 */
export class CatalogHolder {
  private current: RuleCatalog;

  constructor(initial: RuleCatalog) {
    this.current = initial;
  }

  get(): RuleCatalog {
    return this.current;
  }

  /**
   * Swap in a new catalog and return the previous one
   */
  replace(next: RuleCatalog): RuleCatalog {
    const previous = this.current;
    this.current = next;
    logger.info('Rule catalog replaced', { from: previous.version, to: next.version, rules: next.size });
    return previous;
  }
}
