import { v4 as uuidv4 } from 'uuid';
import {
  ConfigurationError,
  buildLedgers,
  classifyCaseOutcome,
  classifyTimeline,
  createLedgerAccumulator,
  extractCases,
  filterCases,
  foldDeltas,
  mergeLedgerAccumulators,
  profileDateColumns,
  resolveCaseSchema,
  selectDeadStock,
  selectLongLeadTimeCases,
  summarizeDeadStockByBand,
  summarizeDeadStockByWarehouse,
  summarizeLeadTimeByWarehouse,
  summarizePeriod,
  summarizeStatuses,
  type CaseFlowWarning,
  type CaseOutcome,
  type CaseRecord,
  type CaseTimeline,
  type ColumnProfile,
  type DeadStockBandSummary,
  type DeadStockRecord,
  type DeadStockWarehouseSummary,
  type LeadTimeWarehouseStats,
  type LedgerAccumulator,
  type LongLeadTimeCase,
  type MonthRange,
  type PeriodSummary,
  type SiteLedger,
  type StatusSummary,
  type TransitionPolicies,
  type WarehouseLedger
} from '../domains/caseFlow';
import type { CaseRow } from '../domains/caseFlow/types';
import { formatDate } from '../lib/dates';
import {
  CASE_FLOW_EVENT,
  emitCaseFlowEvent,
  emitWarningSummary,
  type CaseFlowEventLogger
} from '../observability/caseFlow.events';
import {
  caseFlowRunOptionsSchema,
  type CaseFilters,
  type CaseFlowRunOptions,
  type CaseFlowRunOptionsInput,
  type LocationCatalog
} from '../schemas/caseFlow.schema';

export type CaseFlowReport = {
  range: MonthRange;
  now: string;
  policies: TransitionPolicies;
  filters: CaseFilters;
  warehouses: WarehouseLedger[];
  sites: SiteLedger[];
  cases: CaseOutcome[];
  statuses: StatusSummary;
  deadStock: {
    thresholdDays: number;
    records: DeadStockRecord[];
    byWarehouse: DeadStockWarehouseSummary[];
    byBand: DeadStockBandSummary[];
  };
  leadTime: {
    longLeadTimeDays: number;
    byWarehouse: LeadTimeWarehouseStats[];
    longLeadTimeCases: LongLeadTimeCase[];
  };
  period: PeriodSummary;
  columnProfile: ColumnProfile[];
  warnings: CaseFlowWarning[];
};

export type CaseFlowRunDependencies = {
  logger?: CaseFlowEventLogger;
  runId?: string;
  chunkSize?: number;
};

type CaseEntry = {
  record: CaseRecord;
  timeline: CaseTimeline;
  outcome: CaseOutcome;
};

const DEFAULT_CHUNK_SIZE = 1000;

export function parseRunOptions(input: CaseFlowRunOptionsInput): CaseFlowRunOptions {
  const parsed = caseFlowRunOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError('CASE_FLOW_OPTIONS_INVALID', 'Run options failed validation', {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    });
  }
  return parsed.data;
}

function foldInChunks(entries: CaseEntry[], chunkSize: number): LedgerAccumulator {
  let accumulator = createLedgerAccumulator();
  for (let offset = 0; offset < entries.length; offset += chunkSize) {
    const chunk = entries.slice(offset, offset + chunkSize).flatMap((entry) => entry.timeline.deltas);
    accumulator = mergeLedgerAccumulators(accumulator, foldDeltas(createLedgerAccumulator(), chunk));
  }
  return accumulator;
}

/**
 * Runs the whole pipeline over an in-memory case table. The report depends
 * only on the inputs, so the same table and options serialize identically.
 */
export function runCaseFlow(
  table: { columns: string[]; rows: CaseRow[] },
  catalog: LocationCatalog,
  input: CaseFlowRunOptionsInput,
  deps: CaseFlowRunDependencies = {}
): CaseFlowReport {
  const startedAt = Date.now();
  const runId = deps.runId ?? uuidv4();
  const logger = deps.logger;

  try {
    const options = parseRunOptions(input);
    const { schema, warnings: schemaWarnings } = resolveCaseSchema(table.columns, catalog, {
      onUnresolved: options.unresolvedColumns,
      logger
    });

    const extracted = extractCases(table.rows, schema);
    const entries: CaseEntry[] = extracted.cases.map((record) => {
      const timeline = classifyTimeline(record, options.policies);
      return { record, timeline, outcome: classifyCaseOutcome(record, timeline, options.now) };
    });
    const selected = filterCases(entries, schema, options.filters);

    const ledgers = buildLedgers(
      foldInChunks(selected, deps.chunkSize ?? DEFAULT_CHUNK_SIZE),
      options.range,
      schema
    );
    const outcomes = selected.map((entry) => entry.outcome);
    const deadStock = selectDeadStock(outcomes, {
      thresholdDays: options.deadStockThresholdDays,
      tiers: options.deadStockTiers
    });

    const warnings: CaseFlowWarning[] = [
      ...schemaWarnings,
      ...extracted.warnings,
      ...entries.flatMap((entry) => entry.timeline.anomalies)
    ];

    const report: CaseFlowReport = {
      range: ledgers.range,
      now: formatDate(options.now),
      policies: options.policies,
      filters: options.filters,
      warehouses: ledgers.warehouses,
      sites: ledgers.sites,
      cases: outcomes,
      statuses: summarizeStatuses(outcomes),
      deadStock: {
        thresholdDays: options.deadStockThresholdDays,
        records: deadStock,
        byWarehouse: summarizeDeadStockByWarehouse(deadStock),
        byBand: summarizeDeadStockByBand(deadStock)
      },
      leadTime: {
        longLeadTimeDays: options.longLeadTimeDays,
        byWarehouse: summarizeLeadTimeByWarehouse(outcomes),
        longLeadTimeCases: selectLongLeadTimeCases(outcomes, options.longLeadTimeDays)
      },
      period: summarizePeriod(ledgers, options.summaryMonths),
      columnProfile: profileDateColumns(table.rows, schema),
      warnings
    };

    emitWarningSummary(runId, warnings, logger);
    emitCaseFlowEvent(
      CASE_FLOW_EVENT.RUN_COMPLETED,
      {
        runId,
        caseCount: outcomes.length,
        deltaCount: selected.reduce((sum, entry) => sum + entry.timeline.deltas.length, 0),
        warningCount: warnings.length,
        deadStockCount: deadStock.length,
        statusCounts: {
          not_received: report.statuses.not_received.cases,
          pending: report.statuses.pending.cases,
          completed: report.statuses.completed.cases
        },
        durationMs: Date.now() - startedAt
      },
      logger
    );
    return report;
  } catch (error) {
    emitCaseFlowEvent(
      CASE_FLOW_EVENT.RUN_FAILED,
      {
        runId,
        error: {
          code: error instanceof ConfigurationError ? error.code : null,
          message: error instanceof Error ? error.message : String(error)
        }
      },
      logger
    );
    throw error;
  }
}

export function serializeReport(report: CaseFlowReport): string {
  return JSON.stringify(report, null, 2);
}
