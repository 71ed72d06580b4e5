import { enumerateMonths, type MonthKey } from '../../../lib/dates';
import { ConfigurationError } from '../errors';
import type {
  CaseFlowLedgers,
  CaseSchema,
  MonthRange,
  SiteLedger,
  TransitionDelta,
  WarehouseLedger
} from '../types';

type WarehouseBucket = { inbound: number; outbound: number };

/**
 * Month-keyed sums of deltas. Folding is commutative and associative, so case
 * chunks can be folded independently and merged.
 */
export type LedgerAccumulator = {
  readonly warehouses: ReadonlyMap<string, ReadonlyMap<MonthKey, WarehouseBucket>>;
  readonly sites: ReadonlyMap<string, ReadonlyMap<MonthKey, number>>;
};

type MutableAccumulator = {
  warehouses: Map<string, Map<MonthKey, WarehouseBucket>>;
  sites: Map<string, Map<MonthKey, number>>;
};

export function createLedgerAccumulator(): LedgerAccumulator {
  return { warehouses: new Map(), sites: new Map() };
}

function cloneAccumulator(source: LedgerAccumulator): MutableAccumulator {
  const warehouses = new Map<string, Map<MonthKey, WarehouseBucket>>();
  for (const [warehouse, months] of source.warehouses) {
    const copy = new Map<MonthKey, WarehouseBucket>();
    for (const [month, bucket] of months) {
      copy.set(month, { inbound: bucket.inbound, outbound: bucket.outbound });
    }
    warehouses.set(warehouse, copy);
  }
  const sites = new Map<string, Map<MonthKey, number>>();
  for (const [site, months] of source.sites) {
    sites.set(site, new Map(months));
  }
  return { warehouses, sites };
}

function addWarehouse(target: MutableAccumulator, warehouse: string, month: MonthKey, bucket: WarehouseBucket): void {
  let months = target.warehouses.get(warehouse);
  if (!months) {
    months = new Map();
    target.warehouses.set(warehouse, months);
  }
  const existing = months.get(month);
  if (existing) {
    existing.inbound += bucket.inbound;
    existing.outbound += bucket.outbound;
  } else {
    months.set(month, { inbound: bucket.inbound, outbound: bucket.outbound });
  }
}

function addSite(target: MutableAccumulator, site: string, month: MonthKey, inbound: number): void {
  let months = target.sites.get(site);
  if (!months) {
    months = new Map();
    target.sites.set(site, months);
  }
  months.set(month, (months.get(month) ?? 0) + inbound);
}

export function foldDeltas(accumulator: LedgerAccumulator, deltas: readonly TransitionDelta[]): LedgerAccumulator {
  const next = cloneAccumulator(accumulator);
  for (const entry of deltas) {
    if (entry.locationClass === 'warehouse') {
      addWarehouse(next, entry.location, entry.month, {
        inbound: entry.direction === 'inbound' ? entry.quantity : 0,
        outbound: entry.direction === 'outbound' ? entry.quantity : 0
      });
    } else if (entry.direction === 'inbound') {
      addSite(next, entry.location, entry.month, entry.quantity);
    }
  }
  return next;
}

export function mergeLedgerAccumulators(a: LedgerAccumulator, b: LedgerAccumulator): LedgerAccumulator {
  const merged = cloneAccumulator(a);
  for (const [warehouse, months] of b.warehouses) {
    for (const [month, bucket] of months) {
      addWarehouse(merged, warehouse, month, bucket);
    }
  }
  for (const [site, months] of b.sites) {
    for (const [month, inbound] of months) {
      addSite(merged, site, month, inbound);
    }
  }
  return merged;
}

function orderedNames(declared: string[], observed: Iterable<string>): string[] {
  const known = new Set(declared);
  const extra = [...observed].filter((name) => !known.has(name)).sort();
  return [...declared, ...extra];
}

export function assertMonthRange(range: MonthRange): void {
  if (range.start > range.end) {
    throw new ConfigurationError('CASE_FLOW_RANGE_INVALID', 'Range start is after range end', { ...range });
  }
}

function buildWarehouseLedger(
  warehouse: string,
  buckets: ReadonlyMap<MonthKey, WarehouseBucket> | undefined,
  range: MonthRange,
  months: MonthKey[]
): WarehouseLedger {
  let openingStock = 0;
  let deltasAfterRange = 0;
  for (const [month, bucket] of buckets ?? []) {
    if (month < range.start) {
      openingStock += bucket.inbound - bucket.outbound;
    } else if (month > range.end) {
      deltasAfterRange += bucket.inbound + bucket.outbound;
    }
  }

  let stock = openingStock;
  return {
    warehouse,
    openingStock,
    deltasAfterRange,
    months: months.map((month) => {
      const bucket = buckets?.get(month);
      const inbound = bucket?.inbound ?? 0;
      const outbound = bucket?.outbound ?? 0;
      stock += inbound - outbound;
      return { month, inbound, outbound, stock };
    })
  };
}

function buildSiteLedger(
  site: string,
  buckets: ReadonlyMap<MonthKey, number> | undefined,
  range: MonthRange,
  months: MonthKey[]
): SiteLedger {
  let openingCumulative = 0;
  let deltasAfterRange = 0;
  for (const [month, inbound] of buckets ?? []) {
    if (month < range.start) {
      openingCumulative += inbound;
    } else if (month > range.end) {
      deltasAfterRange += inbound;
    }
  }

  let cumulative = openingCumulative;
  return {
    site,
    openingCumulative,
    deltasAfterRange,
    months: months.map((month) => {
      const inbound = buckets?.get(month) ?? 0;
      cumulative += inbound;
      return { month, inbound, cumulative };
    })
  };
}

/**
 * Lays the sums onto every month of the range. Every schema location gets a
 * ledger even without activity; months with no deltas read zero.
 */
export function buildLedgers(
  accumulator: LedgerAccumulator,
  range: MonthRange,
  schema: Pick<CaseSchema, 'warehouses' | 'sites'>
): CaseFlowLedgers {
  assertMonthRange(range);
  const months = enumerateMonths(range.start, range.end);

  const warehouses = orderedNames(
    schema.warehouses.map((entry) => entry.name),
    accumulator.warehouses.keys()
  ).map((warehouse) => buildWarehouseLedger(warehouse, accumulator.warehouses.get(warehouse), range, months));

  const sites = orderedNames(
    schema.sites.map((entry) => entry.name),
    accumulator.sites.keys()
  ).map((site) => buildSiteLedger(site, accumulator.sites.get(site), range, months));

  return { range: { ...range }, warehouses, sites };
}

export function aggregateMonthlyLedgers(
  deltas: readonly TransitionDelta[],
  range: MonthRange,
  schema: Pick<CaseSchema, 'warehouses' | 'sites'>
): CaseFlowLedgers {
  return buildLedgers(foldDeltas(createLedgerAccumulator(), deltas), range, schema);
}
