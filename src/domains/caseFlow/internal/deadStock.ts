import { mean, median, roundTo } from '../../../lib/numbers';
import type { CaseOutcome, DeadStockRecord, DeadStockTier } from '../types';

export const DEFAULT_DEAD_STOCK_THRESHOLD_DAYS = 90;

export const DEFAULT_DEAD_STOCK_TIERS: DeadStockTier[] = [
  { name: 'elevated', minDays: 180 },
  { name: 'urgent', minDays: 365 }
];

/** Tier for records that pass the threshold but no named tier. */
export const BASE_DEAD_STOCK_TIER = 'stale';

export type DeadStockOptions = {
  thresholdDays?: number;
  tiers?: DeadStockTier[];
};

export type DeadStockWarehouseSummary = {
  warehouse: string;
  cases: number;
  quantity: number;
  meanDays: number;
  medianDays: number;
  minDays: number;
  maxDays: number;
};

export type DeadStockBand = '365+' | '270-364' | '180-269' | '<180';

export type DeadStockBandSummary = {
  band: DeadStockBand;
  cases: number;
  quantity: number;
};

const BANDS: Array<{ band: DeadStockBand; minDays: number }> = [
  { band: '365+', minDays: 365 },
  { band: '270-364', minDays: 270 },
  { band: '180-269', minDays: 180 },
  { band: '<180', minDays: 0 }
];

export function resolveTier(elapsedDays: number, tiers: DeadStockTier[]): string {
  let best: DeadStockTier | null = null;
  for (const tier of tiers) {
    if (elapsedDays >= tier.minDays && (!best || tier.minDays > best.minDays)) {
      best = tier;
    }
  }
  return best?.name ?? BASE_DEAD_STOCK_TIER;
}

export function selectDeadStock(outcomes: CaseOutcome[], options: DeadStockOptions = {}): DeadStockRecord[] {
  const thresholdDays = options.thresholdDays ?? DEFAULT_DEAD_STOCK_THRESHOLD_DAYS;
  const tiers = options.tiers ?? DEFAULT_DEAD_STOCK_TIERS;
  const records: DeadStockRecord[] = [];

  for (const outcome of outcomes) {
    if (outcome.status !== 'pending') continue;
    const { elapsedDays, lastWarehouse, lastWarehouseAt } = outcome;
    if (elapsedDays === null || lastWarehouse === null || lastWarehouseAt === null) continue;
    if (elapsedDays < thresholdDays) continue;
    records.push({
      caseId: outcome.caseId,
      lastWarehouse,
      lastWarehouseAt,
      elapsedDays,
      tier: resolveTier(elapsedDays, tiers),
      quantity: outcome.quantity,
      category: outcome.category
    });
  }

  return records.sort((a, b) =>
    b.elapsedDays !== a.elapsedDays ? b.elapsedDays - a.elapsedDays : a.caseId.localeCompare(b.caseId)
  );
}

export function summarizeDeadStockByWarehouse(records: DeadStockRecord[]): DeadStockWarehouseSummary[] {
  const grouped = new Map<string, DeadStockRecord[]>();
  for (const record of records) {
    const bucket = grouped.get(record.lastWarehouse);
    if (bucket) {
      bucket.push(record);
    } else {
      grouped.set(record.lastWarehouse, [record]);
    }
  }

  return [...grouped.entries()]
    .map(([warehouse, bucket]) => {
      const days = bucket.map((record) => record.elapsedDays);
      return {
        warehouse,
        cases: bucket.length,
        quantity: bucket.reduce((sum, record) => sum + record.quantity, 0),
        meanDays: roundTo(mean(days) ?? 0),
        medianDays: roundTo(median(days) ?? 0),
        minDays: Math.min(...days),
        maxDays: Math.max(...days)
      };
    })
    .sort((a, b) => (b.cases !== a.cases ? b.cases - a.cases : a.warehouse.localeCompare(b.warehouse)));
}

export function summarizeDeadStockByBand(records: DeadStockRecord[]): DeadStockBandSummary[] {
  const summary = BANDS.map(({ band }) => ({ band, cases: 0, quantity: 0 }));
  for (const record of records) {
    // Negative ages (stamps after `now`) fall into the lowest band.
    const index = BANDS.findIndex((entry) => record.elapsedDays >= entry.minDays);
    const slot = summary[index >= 0 ? index : summary.length - 1];
    slot.cases += 1;
    slot.quantity += record.quantity;
  }
  return summary;
}
