import { diffInDays, toMonthKey } from '../../../lib/dates';
import type {
  AnomalousTimelineWarning,
  CaseRecord,
  CaseTimeline,
  DeltaDirection,
  IgnoredEvent,
  LocationClass,
  LocationEvent,
  TimelineAnomalyReason,
  TimelineState,
  TransitionDelta,
  TransitionPolicies,
  WarehouseLeg
} from '../types';

export const DEFAULT_TRANSITION_POLICIES: TransitionPolicies = {
  duplicateArrival: 'ignore',
  postDelivery: 'ignore'
};

export type TransitionContext = {
  caseId: string;
  quantity: number;
  policies: TransitionPolicies;
};

export type TransitionStep = {
  state: TimelineState;
  deltas: TransitionDelta[];
  /** False when the event left both the state and the ledgers untouched. */
  applied: boolean;
  anomaly: IgnoredEvent['reason'] | null;
};

const INITIAL_STATE: TimelineState = { kind: 'no_location' };

export function compareEvents(a: LocationEvent, b: LocationEvent): number {
  const diff = a.at.getTime() - b.at.getTime();
  return diff !== 0 ? diff : a.rank - b.rank;
}

export function sortEvents(events: LocationEvent[]): LocationEvent[] {
  return [...events].sort(compareEvents);
}

function delta(
  context: TransitionContext,
  event: LocationEvent,
  location: string,
  locationClass: LocationClass,
  direction: DeltaDirection
): TransitionDelta {
  return {
    location,
    locationClass,
    direction,
    month: toMonthKey(event.at),
    caseId: context.caseId,
    quantity: context.quantity
  };
}

function enter(context: TransitionContext, event: LocationEvent, prefix: TransitionDelta[]): TransitionStep {
  if (event.locationClass === 'warehouse') {
    return {
      state: { kind: 'at_warehouse', warehouse: event.location, since: event.at },
      deltas: [...prefix, delta(context, event, event.location, 'warehouse', 'inbound')],
      applied: true,
      anomaly: null
    };
  }
  return {
    state: { kind: 'delivered', site: event.location, at: event.at },
    deltas: [...prefix, delta(context, event, event.location, 'site', 'inbound')],
    applied: true,
    anomaly: null
  };
}

/**
 * One transition of the case timeline. Pure: the caller folds it over the
 * sorted events.
 */
export function stepTimeline(
  state: TimelineState,
  event: LocationEvent,
  context: TransitionContext
): TransitionStep {
  switch (state.kind) {
    case 'no_location':
      return enter(context, event, []);

    case 'at_warehouse': {
      const isSameWarehouse = event.locationClass === 'warehouse' && event.location === state.warehouse;
      if (isSameWarehouse && context.policies.duplicateArrival === 'ignore') {
        return { state, deltas: [], applied: false, anomaly: 'DUPLICATE_ARRIVAL' };
      }
      const outbound = delta(context, event, state.warehouse, 'warehouse', 'outbound');
      const step = enter(context, event, [outbound]);
      return isSameWarehouse ? { ...step, anomaly: 'DUPLICATE_ARRIVAL' } : step;
    }

    case 'delivered':
      if (context.policies.postDelivery === 'ignore') {
        return { state, deltas: [], applied: false, anomaly: 'POST_DELIVERY_EVENT' };
      }
      return { ...enter(context, event, []), anomaly: 'POST_DELIVERY_EVENT' };
  }
}

function anomaly(caseId: string, reason: TimelineAnomalyReason, event: LocationEvent): AnomalousTimelineWarning {
  return { code: 'ANOMALOUS_TIMELINE', caseId, reason, location: event.location, at: event.at };
}

function closeLeg(legs: WarehouseLeg[], at: Date): void {
  const open = legs[legs.length - 1];
  if (open && open.leftAt === null) {
    open.leftAt = at;
    open.dwellDays = diffInDays(at, open.arrivedAt);
  }
}

function isSameStay(a: TimelineState, b: TimelineState): boolean {
  return (
    a.kind === 'at_warehouse'
    && b.kind === 'at_warehouse'
    && a.warehouse === b.warehouse
    && a.since.getTime() === b.since.getTime()
  );
}

export function classifyTimeline(
  record: CaseRecord,
  policies: TransitionPolicies = DEFAULT_TRANSITION_POLICIES
): CaseTimeline {
  const context: TransitionContext = { caseId: record.caseId, quantity: record.quantity, policies };
  const events = sortEvents(record.events);
  const applied: LocationEvent[] = [];
  const ignored: IgnoredEvent[] = [];
  const deltas: TransitionDelta[] = [];
  const legs: WarehouseLeg[] = [];
  const anomalies: AnomalousTimelineWarning[] = [];

  let state = INITIAL_STATE;
  events.forEach((event, index) => {
    const previous = events[index - 1];
    if (previous && previous.at.getTime() === event.at.getTime()) {
      anomalies.push(anomaly(record.caseId, 'SAME_TIMESTAMP', event));
    }

    const step = stepTimeline(state, event, context);
    if (step.anomaly) {
      anomalies.push(anomaly(record.caseId, step.anomaly, event));
    }
    if (!step.applied) {
      if (step.anomaly) {
        ignored.push({ event, reason: step.anomaly });
      }
      return;
    }

    if (state.kind === 'at_warehouse' && !isSameStay(state, step.state)) {
      closeLeg(legs, event.at);
    }
    if (step.state.kind === 'at_warehouse' && !isSameStay(state, step.state)) {
      legs.push({ warehouse: step.state.warehouse, arrivedAt: step.state.since, leftAt: null, dwellDays: null });
    }

    applied.push(event);
    deltas.push(...step.deltas);
    state = step.state;
  });

  return {
    caseId: record.caseId,
    quantity: record.quantity,
    events,
    applied,
    ignored,
    deltas,
    legs,
    finalState: state,
    anomalies
  };
}
