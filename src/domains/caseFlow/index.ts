export {
  classifyColumns,
  locationColumns,
  profileDateColumns,
  resolveCaseSchema,
  type ColumnProfile,
  type ResolvedCaseSchema,
  type UnresolvedColumnPolicy
} from './internal/schemaClassifier';

export { cellToText, extractCaseEvents, extractCases, type ExtractedCases } from './internal/eventExtractor';

export {
  DEFAULT_TRANSITION_POLICIES,
  classifyTimeline,
  compareEvents,
  sortEvents,
  stepTimeline,
  type TransitionContext,
  type TransitionStep
} from './internal/transitionClassifier';

export {
  aggregateMonthlyLedgers,
  assertMonthRange,
  buildLedgers,
  createLedgerAccumulator,
  foldDeltas,
  mergeLedgerAccumulators,
  type LedgerAccumulator
} from './internal/monthlyLedger';

export { classifyCaseOutcome, classifyStatus, summarizeStatuses, type StatusSummary } from './internal/caseStatus';

export {
  BASE_DEAD_STOCK_TIER,
  DEFAULT_DEAD_STOCK_THRESHOLD_DAYS,
  DEFAULT_DEAD_STOCK_TIERS,
  resolveTier,
  selectDeadStock,
  summarizeDeadStockByBand,
  summarizeDeadStockByWarehouse,
  type DeadStockBand,
  type DeadStockBandSummary,
  type DeadStockOptions,
  type DeadStockWarehouseSummary
} from './internal/deadStock';

export {
  DEFAULT_LONG_LEAD_TIME_DAYS,
  selectLongLeadTimeCases,
  summarizeLeadTimeByWarehouse,
  type LeadTimeWarehouseStats,
  type LongLeadTimeCase
} from './internal/leadTimeStats';

export { filterCases, matchesFilters, type FilterableCase } from './internal/caseFilters';

export {
  DEFAULT_SUMMARY_MONTHS,
  summarizePeriod,
  type PeriodSummary,
  type SitePeriodSummary,
  type WarehousePeriodSummary
} from './internal/periodSummary';

export { ConfigurationError, isConfigurationError, type ConfigurationErrorCode } from './errors';

export type * from './types';
