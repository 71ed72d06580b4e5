import type { LocationCatalog } from '../../schemas/caseFlow.schema';
import type { CaseRecord, LocationClass, LocationEvent } from './types';

export const testCatalog: LocationCatalog = {
  caseIdColumn: 'Case No.',
  quantityColumn: 'Qty',
  categoryColumn: 'Category',
  warehouses: [
    { name: 'WH1', storageType: 'indoor' },
    { name: 'WH2', storageType: 'indoor' },
    { name: 'WH3', column: 'Yard 3', storageType: 'outdoor' }
  ],
  sites: [{ name: 'S1' }, { name: 'S2' }]
};

const RANKS: Record<string, number> = { WH1: 0, WH2: 1, WH3: 2, S1: 3, S2: 4 };

export function utc(day: string): Date {
  return new Date(`${day}T00:00:00.000Z`);
}

export function event(day: string, location: string, locationClass: LocationClass = 'warehouse'): LocationEvent {
  return { at: utc(day), location, locationClass, rank: RANKS[location] ?? 99 };
}

export function caseRecord(
  caseId: string,
  events: LocationEvent[],
  extra: Partial<Pick<CaseRecord, 'quantity' | 'category'>> = {}
): CaseRecord {
  return {
    caseId,
    rowNumber: 1,
    quantity: extra.quantity ?? 1,
    category: extra.category ?? null,
    events
  };
}
