import { mean, median, roundTo, sampleStdDev } from '../../../lib/numbers';
import type { CaseOutcome } from '../types';

export const DEFAULT_LONG_LEAD_TIME_DAYS = 90;

export type LeadTimeWarehouseStats = {
  warehouse: string;
  cases: number;
  meanDays: number;
  medianDays: number;
  stdDevDays: number | null;
  minDays: number;
  maxDays: number;
};

export type LongLeadTimeCase = {
  caseId: string;
  initialWarehouse: string | null;
  deliveredAt: Date | null;
  leadTimeDays: number;
  quantity: number;
};

type CompletedWithLeadTime = CaseOutcome & { leadTimeDays: number };

function hasLeadTime(outcome: CaseOutcome): outcome is CompletedWithLeadTime {
  return outcome.status === 'completed' && outcome.leadTimeDays !== null;
}

/** Lead-time spread per initial warehouse, completed cases only. */
export function summarizeLeadTimeByWarehouse(outcomes: CaseOutcome[]): LeadTimeWarehouseStats[] {
  const grouped = new Map<string, number[]>();
  for (const outcome of outcomes) {
    if (!hasLeadTime(outcome) || outcome.initialWarehouse === null) continue;
    const bucket = grouped.get(outcome.initialWarehouse);
    if (bucket) {
      bucket.push(outcome.leadTimeDays);
    } else {
      grouped.set(outcome.initialWarehouse, [outcome.leadTimeDays]);
    }
  }

  return [...grouped.entries()]
    .map(([warehouse, days]) => {
      const stdDev = sampleStdDev(days);
      return {
        warehouse,
        cases: days.length,
        meanDays: roundTo(mean(days) ?? 0),
        medianDays: roundTo(median(days) ?? 0),
        stdDevDays: stdDev === null ? null : roundTo(stdDev),
        minDays: Math.min(...days),
        maxDays: Math.max(...days)
      };
    })
    .sort((a, b) => a.warehouse.localeCompare(b.warehouse));
}

export function selectLongLeadTimeCases(
  outcomes: CaseOutcome[],
  thresholdDays = DEFAULT_LONG_LEAD_TIME_DAYS
): LongLeadTimeCase[] {
  return outcomes
    .filter(hasLeadTime)
    .filter((outcome) => outcome.leadTimeDays >= thresholdDays)
    .map((outcome) => ({
      caseId: outcome.caseId,
      initialWarehouse: outcome.initialWarehouse,
      deliveredAt: outcome.deliveredAt,
      leadTimeDays: outcome.leadTimeDays,
      quantity: outcome.quantity
    }))
    .sort((a, b) =>
      b.leadTimeDays !== a.leadTimeDays ? b.leadTimeDays - a.leadTimeDays : a.caseId.localeCompare(b.caseId)
    );
}
