import { describe, expect, it } from 'vitest';
import { caseRecord, event, utc } from '../testing';
import { classifyTimeline, sortEvents, stepTimeline } from './transitionClassifier';

const scenario = caseRecord(
  'C1',
  [event('2023-05-01', 'S1', 'site'), event('2023-01-05', 'WH1'), event('2023-03-10', 'WH2')],
  { quantity: 2 }
);

const summarize = (deltas: { location: string; direction: string; month: string; quantity: number }[]) =>
  deltas.map((entry) => `${entry.month} ${entry.location} ${entry.direction} ${entry.quantity}`);

describe('stepTimeline', () => {
  const context = { caseId: 'C1', quantity: 1, policies: { duplicateArrival: 'ignore', postDelivery: 'ignore' } } as const;

  it('enters the first location without an outbound', () => {
    const step = stepTimeline({ kind: 'no_location' }, event('2023-01-05', 'WH1'), context);
    expect(step.state).toEqual({ kind: 'at_warehouse', warehouse: 'WH1', since: utc('2023-01-05') });
    expect(step.deltas.map((entry) => entry.direction)).toEqual(['inbound']);
    expect(step.applied).toBe(true);
  });

  it('delivers straight from no location', () => {
    const step = stepTimeline({ kind: 'no_location' }, event('2023-02-01', 'S2', 'site'), context);
    expect(step.state).toEqual({ kind: 'delivered', site: 'S2', at: utc('2023-02-01') });
  });
});

describe('classifyTimeline', () => {
  it('moves a case through two warehouses to a site', () => {
    const timeline = classifyTimeline(scenario);

    expect(summarize(timeline.deltas)).toEqual([
      '2023-01 WH1 inbound 2',
      '2023-03 WH1 outbound 2',
      '2023-03 WH2 inbound 2',
      '2023-05 WH2 outbound 2',
      '2023-05 S1 inbound 2'
    ]);
    expect(timeline.finalState).toEqual({ kind: 'delivered', site: 'S1', at: utc('2023-05-01') });
    expect(timeline.legs).toEqual([
      { warehouse: 'WH1', arrivedAt: utc('2023-01-05'), leftAt: utc('2023-03-10'), dwellDays: 64 },
      { warehouse: 'WH2', arrivedAt: utc('2023-03-10'), leftAt: utc('2023-05-01'), dwellDays: 52 }
    ]);
    expect(timeline.anomalies).toEqual([]);
    expect(timeline.ignored).toEqual([]);
  });

  it('keeps a case with only warehouse stamps open at its last warehouse', () => {
    const timeline = classifyTimeline(caseRecord('C2', [event('2023-01-01', 'WH1'), event('2023-04-01', 'WH3')]));
    expect(timeline.finalState).toEqual({ kind: 'at_warehouse', warehouse: 'WH3', since: utc('2023-04-01') });
    expect(timeline.legs[1]).toEqual({ warehouse: 'WH3', arrivedAt: utc('2023-04-01'), leftAt: null, dwellDays: null });
  });

  it('produces no deltas for a case without events', () => {
    const timeline = classifyTimeline(caseRecord('C3', []));
    expect(timeline.finalState).toEqual({ kind: 'no_location' });
    expect(timeline.deltas).toEqual([]);
  });

  it('breaks same-day ties by catalog order and records the tie', () => {
    const timeline = classifyTimeline(
      caseRecord('C4', [event('2023-01-05', 'S1', 'site'), event('2023-01-05', 'WH1')])
    );
    expect(summarize(timeline.deltas)).toEqual([
      '2023-01 WH1 inbound 1',
      '2023-01 WH1 outbound 1',
      '2023-01 S1 inbound 1'
    ]);
    expect(timeline.anomalies).toEqual([
      { code: 'ANOMALOUS_TIMELINE', caseId: 'C4', reason: 'SAME_TIMESTAMP', location: 'S1', at: utc('2023-01-05') }
    ]);
  });

  describe('repeated warehouse stamps', () => {
    const record = caseRecord('C5', [event('2023-01-05', 'WH1'), event('2023-02-01', 'WH1')]);

    it('ignores the repeat by default', () => {
      const timeline = classifyTimeline(record);
      expect(summarize(timeline.deltas)).toEqual(['2023-01 WH1 inbound 1']);
      expect(timeline.ignored).toEqual([{ event: event('2023-02-01', 'WH1'), reason: 'DUPLICATE_ARRIVAL' }]);
      expect(timeline.anomalies.map((entry) => entry.reason)).toEqual(['DUPLICATE_ARRIVAL']);
      expect(timeline.legs).toHaveLength(1);
    });

    it('re-enters the warehouse under the reenter policy', () => {
      const timeline = classifyTimeline(record, { duplicateArrival: 'reenter', postDelivery: 'ignore' });
      expect(summarize(timeline.deltas)).toEqual([
        '2023-01 WH1 inbound 1',
        '2023-02 WH1 outbound 1',
        '2023-02 WH1 inbound 1'
      ]);
      expect(timeline.ignored).toEqual([]);
      expect(timeline.anomalies.map((entry) => entry.reason)).toEqual(['DUPLICATE_ARRIVAL']);
      expect(timeline.legs.map((leg) => leg.dwellDays)).toEqual([27, null]);
    });
  });

  describe('stamps after delivery', () => {
    const record = caseRecord('C6', [
      event('2023-01-05', 'WH1'),
      event('2023-03-01', 'S1', 'site'),
      event('2023-04-01', 'WH2')
    ]);

    it('ignores them by default and stays delivered', () => {
      const timeline = classifyTimeline(record);
      expect(timeline.finalState).toEqual({ kind: 'delivered', site: 'S1', at: utc('2023-03-01') });
      expect(timeline.ignored).toEqual([{ event: event('2023-04-01', 'WH2'), reason: 'POST_DELIVERY_EVENT' }]);
      expect(timeline.applied.map((entry) => entry.location)).toEqual(['WH1', 'S1']);
    });

    it('reopens the case under the reopen policy', () => {
      const timeline = classifyTimeline(record, { duplicateArrival: 'ignore', postDelivery: 'reopen' });
      expect(summarize(timeline.deltas)).toEqual([
        '2023-01 WH1 inbound 1',
        '2023-03 WH1 outbound 1',
        '2023-03 S1 inbound 1',
        '2023-04 WH2 inbound 1'
      ]);
      expect(timeline.finalState).toEqual({ kind: 'at_warehouse', warehouse: 'WH2', since: utc('2023-04-01') });
      expect(timeline.anomalies.map((entry) => entry.reason)).toEqual(['POST_DELIVERY_EVENT']);
    });
  });
});

describe('sortEvents', () => {
  it('does not mutate its input', () => {
    const events = [event('2023-02-01', 'WH2'), event('2023-01-01', 'WH1')];
    expect(sortEvents(events).map((entry) => entry.location)).toEqual(['WH1', 'WH2']);
    expect(events[0].location).toBe('WH2');
  });
});
