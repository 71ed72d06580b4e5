import type { CaseFlowWarning, LocationClass } from '../domains/caseFlow/types';

export const CASE_FLOW_EVENT = {
  COLUMNS_UNRESOLVED: 'CASE_FLOW_COLUMNS_UNRESOLVED',
  WARNINGS_RECORDED: 'CASE_FLOW_WARNINGS_RECORDED',
  RUN_COMPLETED: 'CASE_FLOW_RUN_COMPLETED',
  RUN_FAILED: 'CASE_FLOW_RUN_FAILED'
} as const;

export type CaseFlowEventName = (typeof CASE_FLOW_EVENT)[keyof typeof CASE_FLOW_EVENT];

const SAMPLE_LIMIT = 5;

export type ColumnsUnresolvedPayload = {
  unresolved: Array<{ locationClass: LocationClass; name: string; column: string }>;
  unresolvedMetadata: Array<{ role: 'quantity' | 'category'; column: string }>;
  resolvedWarehouses: number;
  resolvedSites: number;
};

export type WarningsRecordedPayload = {
  runId: string;
  code: CaseFlowWarning['code'];
  count: number;
  sample: CaseFlowWarning[];
};

export type RunCompletedPayload = {
  runId: string;
  caseCount: number;
  deltaCount: number;
  warningCount: number;
  deadStockCount: number;
  statusCounts: Record<string, number>;
  durationMs: number;
};

export type RunFailedPayload = {
  runId: string | null;
  error: {
    code: string | null;
    message: string;
  };
};

export type CaseFlowEventPayloadMap = {
  [CASE_FLOW_EVENT.COLUMNS_UNRESOLVED]: ColumnsUnresolvedPayload;
  [CASE_FLOW_EVENT.WARNINGS_RECORDED]: WarningsRecordedPayload;
  [CASE_FLOW_EVENT.RUN_COMPLETED]: RunCompletedPayload;
  [CASE_FLOW_EVENT.RUN_FAILED]: RunFailedPayload;
};

export type CaseFlowEventLogger = (eventName: string, payload: unknown) => void;

export function emitCaseFlowEvent<T extends CaseFlowEventName>(
  event: T,
  payload: CaseFlowEventPayloadMap[T],
  logger: CaseFlowEventLogger = console.warn
): void {
  logger(event, payload);
}

/** One event per warning code, carrying the count and the first few warnings. */
export function emitWarningSummary(
  runId: string,
  warnings: CaseFlowWarning[],
  logger: CaseFlowEventLogger = console.warn
): void {
  const grouped = new Map<CaseFlowWarning['code'], CaseFlowWarning[]>();
  for (const warning of warnings) {
    const bucket = grouped.get(warning.code);
    if (bucket) {
      bucket.push(warning);
    } else {
      grouped.set(warning.code, [warning]);
    }
  }
  for (const [code, bucket] of grouped) {
    emitCaseFlowEvent(
      CASE_FLOW_EVENT.WARNINGS_RECORDED,
      { runId, code, count: bucket.length, sample: bucket.slice(0, SAMPLE_LIMIT) },
      logger
    );
  }
}
