import type { CaseFilters } from '../../../schemas/caseFlow.schema';
import type { CaseOutcome, CaseRecord, CaseSchema, StorageType } from '../types';

export type FilterableCase = {
  record: CaseRecord;
  outcome: CaseOutcome;
};

function storageTypeOf(schema: CaseSchema, warehouse: string | null): StorageType | null {
  if (warehouse === null) return null;
  return schema.warehouses.find((entry) => entry.name === warehouse)?.storageType ?? null;
}

function visited(record: CaseRecord, location: string, locationClass: 'warehouse' | 'site'): boolean {
  return record.events.some((event) => event.location === location && event.locationClass === locationClass);
}

export function matchesFilters(entry: FilterableCase, schema: CaseSchema, filters: CaseFilters): boolean {
  const { record, outcome } = entry;
  if (filters.warehouse && !visited(record, filters.warehouse, 'warehouse')) return false;
  if (filters.site && !visited(record, filters.site, 'site')) return false;
  if (filters.storageType && storageTypeOf(schema, outcome.initialWarehouse) !== filters.storageType) return false;
  if (filters.category && record.category !== filters.category) return false;
  if (filters.status && outcome.status !== filters.status) return false;
  return true;
}

/** Keeps the cases matching every given criterion; no criteria keeps all. */
export function filterCases<T extends FilterableCase>(entries: T[], schema: CaseSchema, filters: CaseFilters): T[] {
  return entries.filter((entry) => matchesFilters(entry, schema, filters));
}
