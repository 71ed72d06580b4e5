import { diffInDays } from '../../../lib/dates';
import type { CaseOutcome, CaseRecord, CaseStatus, CaseTimeline, LocationEvent } from '../types';

export type StatusSummary = Record<CaseStatus, { cases: number; quantity: number }>;

function latest(events: LocationEvent[]): LocationEvent | null {
  return events.reduce<LocationEvent | null>(
    (found, event) => (!found || event.at.getTime() >= found.at.getTime() ? event : found),
    null
  );
}

function earliest(events: LocationEvent[]): LocationEvent | null {
  return events.reduce<LocationEvent | null>(
    (found, event) => (!found || event.at.getTime() < found.at.getTime() ? event : found),
    null
  );
}

export function classifyStatus(timeline: CaseTimeline): CaseStatus {
  if (timeline.events.length === 0) return 'not_received';
  return timeline.finalState.kind === 'delivered' ? 'completed' : 'pending';
}

/**
 * Status, aging and lead time for one case.
 *
 * Lead time is the span from the earliest warehouse stamp to the latest site
 * stamp over every observed event. Pending cases age from their last retained
 * warehouse stamp; events dropped after delivery are not retained.
 */
export function classifyCaseOutcome(record: CaseRecord, timeline: CaseTimeline, now: Date): CaseOutcome {
  const status = classifyStatus(timeline);
  const afterDelivery = new Set(
    timeline.ignored.filter((entry) => entry.reason === 'POST_DELIVERY_EVENT').map((entry) => entry.event)
  );
  const retained = timeline.events.filter((event) => !afterDelivery.has(event));

  const lastWarehouseEvent = latest(retained.filter((event) => event.locationClass === 'warehouse'));
  const firstWarehouseEvent = earliest(timeline.events.filter((event) => event.locationClass === 'warehouse'));
  const lastSiteEvent = latest(timeline.events.filter((event) => event.locationClass === 'site'));
  const lastApplied = timeline.applied[timeline.applied.length - 1] ?? null;

  const elapsedDays =
    status === 'pending' && lastWarehouseEvent ? diffInDays(now, lastWarehouseEvent.at) : null;
  const leadTimeDays =
    status === 'completed' && firstWarehouseEvent && lastSiteEvent
      ? diffInDays(lastSiteEvent.at, firstWarehouseEvent.at)
      : null;

  return {
    caseId: record.caseId,
    status,
    quantity: record.quantity,
    category: record.category,
    elapsedDays,
    leadTimeDays,
    lastKnownLocation: lastApplied?.location ?? null,
    lastKnownLocationClass: lastApplied?.locationClass ?? null,
    lastWarehouse: lastWarehouseEvent?.location ?? null,
    lastWarehouseAt: lastWarehouseEvent?.at ?? null,
    initialWarehouse: firstWarehouseEvent?.location ?? null,
    deliveredAt: timeline.finalState.kind === 'delivered' ? timeline.finalState.at : null,
    legs: timeline.legs
  };
}

export function summarizeStatuses(outcomes: CaseOutcome[]): StatusSummary {
  const summary: StatusSummary = {
    not_received: { cases: 0, quantity: 0 },
    pending: { cases: 0, quantity: 0 },
    completed: { cases: 0, quantity: 0 }
  };
  for (const outcome of outcomes) {
    summary[outcome.status].cases += 1;
    summary[outcome.status].quantity += outcome.quantity;
  }
  return summary;
}
