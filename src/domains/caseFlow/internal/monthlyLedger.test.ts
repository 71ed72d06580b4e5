import { describe, expect, it } from 'vitest';
import { caseRecord, event, testCatalog } from '../testing';
import {
  aggregateMonthlyLedgers,
  buildLedgers,
  createLedgerAccumulator,
  foldDeltas,
  mergeLedgerAccumulators
} from './monthlyLedger';
import { classifyColumns } from './schemaClassifier';
import { classifyTimeline } from './transitionClassifier';

const schema = classifyColumns(['Case No.', 'WH1', 'WH2', 'Yard 3', 'S1', 'S2'], testCatalog);

const moved = classifyTimeline(
  caseRecord('C1', [event('2023-01-05', 'WH1'), event('2023-03-10', 'WH2'), event('2023-05-01', 'S1', 'site')], {
    quantity: 2
  })
);
const waiting = classifyTimeline(caseRecord('C2', [event('2023-02-14', 'WH1')]));
const direct = classifyTimeline(caseRecord('C3', [event('2023-04-20', 'S2', 'site')], { quantity: 5 }));
const allDeltas = [...moved.deltas, ...waiting.deltas, ...direct.deltas];

describe('aggregateMonthlyLedgers', () => {
  it('lays inbound, outbound and running stock over every month of the range', () => {
    const ledgers = aggregateMonthlyLedgers(allDeltas, { start: '2023-01', end: '2023-05' }, schema);

    expect(ledgers.warehouses.map((ledger) => ledger.warehouse)).toEqual(['WH1', 'WH2', 'WH3']);
    expect(ledgers.warehouses[0].months).toEqual([
      { month: '2023-01', inbound: 2, outbound: 0, stock: 2 },
      { month: '2023-02', inbound: 1, outbound: 0, stock: 3 },
      { month: '2023-03', inbound: 0, outbound: 2, stock: 1 },
      { month: '2023-04', inbound: 0, outbound: 0, stock: 1 },
      { month: '2023-05', inbound: 0, outbound: 0, stock: 1 }
    ]);
    expect(ledgers.warehouses[1].months.map((month) => month.stock)).toEqual([0, 0, 2, 2, 0]);
    expect(ledgers.warehouses[2].months.every((month) => month.stock === 0)).toBe(true);

    expect(ledgers.sites.map((ledger) => [ledger.site, ledger.months.map((month) => month.cumulative)])).toEqual([
      ['S1', [0, 0, 0, 0, 2]],
      ['S2', [0, 0, 0, 5, 5]]
    ]);
  });

  it('keeps stock equal to the prefix sum of inbound minus outbound', () => {
    const ledgers = aggregateMonthlyLedgers(allDeltas, { start: '2023-01', end: '2023-06' }, schema);
    for (const ledger of ledgers.warehouses) {
      let running = ledger.openingStock;
      for (const month of ledger.months) {
        running += month.inbound - month.outbound;
        expect(month.stock).toBe(running);
        expect(month.stock).toBeGreaterThanOrEqual(0);
      }
    }
  });

  it('carries earlier deltas into the opening balance and counts later ones', () => {
    const ledgers = aggregateMonthlyLedgers(allDeltas, { start: '2023-02', end: '2023-04' }, schema);
    const [wh1, wh2] = ledgers.warehouses;
    const [s1, s2] = ledgers.sites;

    expect(wh1.openingStock).toBe(2);
    expect(wh1.months.map((month) => month.stock)).toEqual([3, 1, 1]);
    expect(wh2.deltasAfterRange).toBe(2);
    expect(wh2.months.map((month) => month.stock)).toEqual([0, 2, 2]);
    expect(s1).toMatchObject({ openingCumulative: 0, deltasAfterRange: 2 });
    expect(s2.months.map((month) => month.cumulative)).toEqual([0, 0, 5]);
  });

  it('appends locations outside the schema after the declared ones', () => {
    const extra = classifyTimeline(
      caseRecord('C9', [{ at: new Date('2023-01-02T00:00:00Z'), location: 'Annex', locationClass: 'warehouse', rank: 9 }])
    );
    const ledgers = aggregateMonthlyLedgers(extra.deltas, { start: '2023-01', end: '2023-01' }, schema);
    expect(ledgers.warehouses.map((ledger) => ledger.warehouse)).toEqual(['WH1', 'WH2', 'WH3', 'Annex']);
  });

  it('rejects an inverted range', () => {
    expect(() => aggregateMonthlyLedgers([], { start: '2023-05', end: '2023-01' }, schema)).toThrow(
      'CASE_FLOW_RANGE_INVALID'
    );
  });
});

describe('ledger accumulators', () => {
  it('merges chunk folds into the same ledgers as a single fold', () => {
    const range = { start: '2023-01', end: '2023-05' };
    const left = foldDeltas(createLedgerAccumulator(), [...moved.deltas, ...waiting.deltas]);
    const right = foldDeltas(createLedgerAccumulator(), direct.deltas);

    expect(buildLedgers(mergeLedgerAccumulators(left, right), range, schema)).toEqual(
      aggregateMonthlyLedgers(allDeltas, range, schema)
    );
    expect(buildLedgers(mergeLedgerAccumulators(right, left), range, schema)).toEqual(
      aggregateMonthlyLedgers(allDeltas, range, schema)
    );
  });

  it('leaves the source accumulator untouched', () => {
    const first = foldDeltas(createLedgerAccumulator(), waiting.deltas);
    foldDeltas(first, waiting.deltas);
    expect(first.warehouses.get('WH1')?.get('2023-02')).toEqual({ inbound: 1, outbound: 0 });
  });
});
