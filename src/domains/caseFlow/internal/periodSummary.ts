import { enumerateMonths, type MonthKey } from '../../../lib/dates';
import type { CaseFlowLedgers } from '../types';

export const DEFAULT_SUMMARY_MONTHS = 12;

export type WarehousePeriodSummary = {
  warehouse: string;
  inbound: number;
  outbound: number;
  closingStock: number;
};

export type SitePeriodSummary = {
  site: string;
  inbound: number;
  closingCumulative: number;
};

export type PeriodSummary = {
  from: MonthKey | null;
  to: MonthKey | null;
  warehouses: WarehousePeriodSummary[];
  sites: SitePeriodSummary[];
};

/** Totals over the trailing `months` months of the ledger range. */
export function summarizePeriod(ledgers: CaseFlowLedgers, months = DEFAULT_SUMMARY_MONTHS): PeriodSummary {
  const warehouses = ledgers.warehouses.map((ledger) => {
    const tail = ledger.months.slice(-months);
    const last = tail[tail.length - 1];
    return {
      warehouse: ledger.warehouse,
      inbound: tail.reduce((sum, month) => sum + month.inbound, 0),
      outbound: tail.reduce((sum, month) => sum + month.outbound, 0),
      closingStock: last ? last.stock : ledger.openingStock
    };
  });

  const sites = ledgers.sites.map((ledger) => {
    const tail = ledger.months.slice(-months);
    const last = tail[tail.length - 1];
    return {
      site: ledger.site,
      inbound: tail.reduce((sum, month) => sum + month.inbound, 0),
      closingCumulative: last ? last.cumulative : ledger.openingCumulative
    };
  });

  const tail = enumerateMonths(ledgers.range.start, ledgers.range.end).slice(-months);
  return {
    from: tail[0] ?? null,
    to: tail[tail.length - 1] ?? null,
    warehouses,
    sites
  };
}
