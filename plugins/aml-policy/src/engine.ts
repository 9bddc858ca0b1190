/**
 * Compliance Engine
 *
 * Orchestrates a run: capture the catalog, validate, synthesize the report
 * and hand it to the audit archive.
 */

import { createLogger, setLogLevel, type Settings } from '@ledgerproof/utils';
import {
  CatalogHolder,
  RuleCatalog,
  loadDefaultRuleCatalog,
  loadRuleCatalogFile,
  type RuleCategory,
} from './catalog.js';
import { StoreError, ValidationError } from './errors.js';
import { normalizeTransactions } from './normalize.js';
import { DEFAULT_ESCALATION_THRESHOLD, synthesizeReport } from './report.js';
import {
  checkSourceTransactions,
  describeFilter,
  type TransactionFilter,
  type TransactionSource,
} from './transactions.js';
import {
  SEVERITY_ORDER,
  isReportType,
  isSeverity,
  type AuditArchive,
  type AuditReport,
  type AuditTrailEntry,
  type ComplianceRule,
  type ComplianceStatus,
  type PolicyType,
  type ReportType,
  type ReportingPeriod,
  type Severity,
  type Transaction,
  type ValidationOutcome,
  type Violation,
} from './types.js';
import { ComplianceValidator, computeComplianceStatus, filterBySeverity, parsePolicyType } from './validator.js';

const logger = createLogger({ service: 'compliance-engine' });

export interface ComplianceEngineOptions {
  catalog: RuleCatalog;
  archive: AuditArchive;
  escalationThreshold?: number;
  /** Currency amounts are converted into before evaluation; defaults to EUR */
  referenceCurrency?: string;
  exchangeRates?: Readonly<Record<string, number>>;
  now?: () => Date;
  idGenerator?: () => string;
}

export interface AuditRequest {
  transactions: readonly Transaction[];
  policyType: PolicyType | string;
  /** Defaults to the report type named like the policy type */
  reportType?: ReportType | string;
  period: ReportingPeriod;
  scope?: string;
}

export interface SourceAuditRequest {
  policyType: PolicyType | string;
  reportType?: ReportType | string;
  /** Defaults to the filter's dates, else the span of the fetched transactions */
  period?: ReportingPeriod;
}

export type AuditRunResult =
  | { archived: true; report: AuditReport; entry: AuditTrailEntry }
  | { archived: false; report: AuditReport; error: StoreError };

export interface StatusCheck {
  minimumSeverity: Severity;
  violations: Violation[];
  status: ComplianceStatus;
}

function parseReportType(value: ReportType | string): ReportType {
  const normalized = value.trim().toUpperCase();
  if (!isReportType(normalized)) {
    throw new ValidationError(`Unknown report type: ${value}`, { field: 'reportType' });
  }
  return normalized;
}

function parseSeverity(value: Severity | string): Severity {
  const normalized = value.trim().toUpperCase();
  if (!isSeverity(normalized)) {
    throw new ValidationError(`Unknown severity: ${value}`, {
      field: 'minimumSeverity',
      allowed: [...SEVERITY_ORDER],
    });
  }
  return normalized;
}

function spanOf(transactions: readonly Transaction[]): ReportingPeriod {
  let earliest = Number.POSITIVE_INFINITY;
  let latest = Number.NEGATIVE_INFINITY;
  for (const transaction of transactions) {
    const time = Date.parse(transaction.timestamp);
    earliest = Math.min(earliest, time);
    latest = Math.max(latest, time);
  }
  return { from: new Date(earliest).toISOString(), to: new Date(latest).toISOString() };
}

/**
 * Period covered by a filtered fetch: the filter's dates, else the span of
 * the transactions
 */
function periodOf(filter: TransactionFilter, transactions: readonly Transaction[]): ReportingPeriod {
  if (filter.startDate !== undefined && filter.endDate !== undefined) {
    return { from: filter.startDate, to: filter.endDate };
  }
  const span = spanOf(transactions);
  return { from: filter.startDate ?? span.from, to: filter.endDate ?? span.to };
}

export class ComplianceEngine {
  private readonly catalogs: CatalogHolder;
  private readonly validator: ComplianceValidator;
  private readonly archive: AuditArchive;
  private readonly escalationThreshold: number;
  private readonly referenceCurrency: string;
  private readonly exchangeRates?: Readonly<Record<string, number>>;
  private readonly now?: () => Date;
  private readonly idGenerator?: () => string;

  constructor(options: ComplianceEngineOptions) {
    this.catalogs = new CatalogHolder(options.catalog);
    this.validator = new ComplianceValidator(this.catalogs);
    this.archive = options.archive;
    this.escalationThreshold = options.escalationThreshold ?? DEFAULT_ESCALATION_THRESHOLD;
    this.referenceCurrency = options.referenceCurrency ?? 'EUR';
    this.exchangeRates = options.exchangeRates;
    this.now = options.now;
    this.idGenerator = options.idGenerator;
  }

  get catalog(): RuleCatalog {
    return this.catalogs.get();
  }

  validate(transactions: readonly Transaction[], policyType: PolicyType | string): ValidationOutcome {
    return this.validator.validate(transactions, policyType);
  }

  /**
   * Compliance status counting only violations at or above a severity
   */
  checkStatus(
    transactions: readonly Transaction[],
    policyType: PolicyType | string,
    minimumSeverity: Severity | string = 'MEDIUM'
  ): StatusCheck {
    const threshold = parseSeverity(minimumSeverity);
    const outcome = this.validator.validate(transactions, policyType);
    const violations = filterBySeverity(outcome.violations, threshold);
    return {
      minimumSeverity: threshold,
      violations,
      status: computeComplianceStatus(violations, transactions.length),
    };
  }

  /**
   * Validate, build the report and archive it. An archive failure still
   * returns the report; validation failures throw and nothing is recorded.
   */
  async runAudit(request: AuditRequest): Promise<AuditRunResult> {
    const policyType = parsePolicyType(request.policyType);
    const reportType = parseReportType(request.reportType ?? policyType);
    const outcome = this.validator.validate(request.transactions, policyType);

    const report = synthesizeReport(outcome.violations, outcome.status, reportType, request.period, {
      escalationThreshold: this.escalationThreshold,
      scope: request.scope,
      now: this.now,
      idGenerator: this.idGenerator,
    });

    logger.info('Audit run evaluated', {
      reportId: report.reportId,
      policyType,
      catalogVersion: outcome.catalogVersion,
      transactions: outcome.status.totalTransactions,
      violations: outcome.status.totalViolations,
      overallStatus: outcome.status.overallStatus,
    });

    try {
      const entry = await this.archive.record(report);
      logger.debug('Audit run archived', { reportId: report.reportId, runId: entry.runId });
      return { archived: true, report, entry };
    } catch (error) {
      if (error instanceof StoreError) {
        logger.error('Audit run could not be archived', error);
        return { archived: false, report, error };
      }
      throw error;
    }
  }

  /**
   * Fetch transactions from a source, normalize their currency and audit them.
   * The filter becomes the run's scope.
   */
  async auditFromSource(
    source: TransactionSource,
    filter: TransactionFilter,
    request: SourceAuditRequest
  ): Promise<AuditRunResult> {
    const scope = describeFilter(filter);
    const fetched = await source.fetchTransactions(filter);
    if (fetched.length === 0) {
      throw new ValidationError('No transactions matched the filter', { field: 'transactions', scope });
    }

    const transactions = normalizeTransactions(checkSourceTransactions(fetched), {
      referenceCurrency: this.referenceCurrency,
      rates: this.exchangeRates,
    });
    const period = request.period ?? periodOf(filter, transactions);

    return this.runAudit({
      transactions,
      policyType: request.policyType,
      reportType: request.reportType,
      period,
      scope,
    });
  }

  /**
   * Swap in a new catalog. Runs already in progress keep the previous one.
   */
  reloadCatalog(catalog: RuleCatalog): RuleCatalog {
    return this.catalogs.replace(catalog);
  }

  async reloadCatalogFromFile(path: string): Promise<RuleCatalog> {
    return this.reloadCatalog(await loadRuleCatalogFile(path));
  }

  getRulesByCategory(): Record<RuleCategory, ComplianceRule[]> {
    return this.catalogs.get().getRulesByCategory();
  }
}

/**
 * Build an engine from process settings
 */
export async function createComplianceEngine(settings: Settings, archive: AuditArchive): Promise<ComplianceEngine> {
  setLogLevel(settings.logLevel);
  const catalog = settings.ruleCatalogPath
    ? await loadRuleCatalogFile(settings.ruleCatalogPath)
    : await loadDefaultRuleCatalog();

  logger.info('Compliance engine ready', {
    catalogVersion: catalog.version,
    rules: catalog.size,
    escalationThreshold: settings.escalationThreshold,
    referenceCurrency: settings.referenceCurrency,
  });

  return new ComplianceEngine({
    catalog,
    archive,
    escalationThreshold: settings.escalationThreshold,
    referenceCurrency: settings.referenceCurrency,
  });
}
