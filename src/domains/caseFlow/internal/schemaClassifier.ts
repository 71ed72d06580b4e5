import { normalizeHeader } from '../../../lib/csv';
import { parseDateCell } from '../../../lib/dates';
import {
  CASE_FLOW_EVENT,
  emitCaseFlowEvent,
  type CaseFlowEventLogger
} from '../../../observability/caseFlow.events';
import type { LocationCatalog } from '../../../schemas/caseFlow.schema';
import { ConfigurationError } from '../errors';
import type {
  CaseRow,
  CaseSchema,
  LocationClass,
  LocationColumn,
  UnresolvedColumnWarning,
  UnresolvedMetadataColumnWarning
} from '../types';

export type UnresolvedColumnPolicy = 'warn' | 'error';

export type ResolvedCaseSchema = {
  schema: CaseSchema;
  warnings: Array<UnresolvedColumnWarning | UnresolvedMetadataColumnWarning>;
};

export type ColumnProfile = {
  column: string;
  location: string;
  locationClass: LocationClass;
  filled: number;
  unparseable: number;
};

type ColumnLookup = (wanted: string) => string | null;

function buildColumnLookup(columns: string[]): ColumnLookup {
  const exact = new Set(columns);
  const normalized = new Map<string, string>();
  for (const column of columns) {
    const key = normalizeHeader(column);
    if (key && !normalized.has(key)) {
      normalized.set(key, column);
    }
  }
  return (wanted) => {
    if (exact.has(wanted)) return wanted;
    const trimmed = wanted.trim();
    if (exact.has(trimmed)) return trimmed;
    const key = normalizeHeader(wanted);
    return key ? normalized.get(key) ?? null : null;
  };
}

function matchCatalog(columns: string[], catalog: LocationCatalog) {
  const lookup = buildColumnLookup(columns);
  const caseIdColumn = lookup(catalog.caseIdColumn);
  if (!caseIdColumn) {
    throw new ConfigurationError('CASE_FLOW_CASE_ID_COLUMN_MISSING', 'Case id column not found in source', {
      caseIdColumn: catalog.caseIdColumn
    });
  }

  const warehouses: LocationColumn[] = [];
  const sites: LocationColumn[] = [];
  const unresolved: UnresolvedColumnWarning[] = [];

  const declared = [
    ...catalog.warehouses.map((entry) => ({
      name: entry.name,
      wanted: entry.column ?? entry.name,
      locationClass: 'warehouse' as const,
      storageType: entry.storageType ?? null
    })),
    ...catalog.sites.map((entry) => ({
      name: entry.name,
      wanted: entry.column ?? entry.name,
      locationClass: 'site' as const,
      storageType: null
    }))
  ];

  const claimed = new Map<string, string>();
  declared.forEach((entry, rank) => {
    const column = lookup(entry.wanted);
    if (!column) {
      unresolved.push({
        code: 'UNRESOLVED_COLUMN',
        locationClass: entry.locationClass,
        name: entry.name,
        column: entry.wanted
      });
      return;
    }
    const owner = claimed.get(column);
    if (owner !== undefined) {
      throw new ConfigurationError('CASE_FLOW_CATALOG_INVALID', 'Two catalog entries resolve to the same source column', {
        column,
        entries: [owner, entry.name]
      });
    }
    claimed.set(column, entry.name);
    const resolved: LocationColumn = {
      name: entry.name,
      column,
      locationClass: entry.locationClass,
      rank,
      storageType: entry.storageType
    };
    if (entry.locationClass === 'warehouse') {
      warehouses.push(resolved);
    } else {
      sites.push(resolved);
    }
  });

  const unresolvedMetadata: UnresolvedMetadataColumnWarning[] = [];
  const resolveMetadata = (role: UnresolvedMetadataColumnWarning['role'], wanted: string | undefined) => {
    if (!wanted) return null;
    const column = lookup(wanted);
    if (!column) {
      unresolvedMetadata.push({ code: 'UNRESOLVED_METADATA_COLUMN', role, column: wanted });
    }
    return column;
  };

  const schema: CaseSchema = {
    caseIdColumn,
    quantityColumn: resolveMetadata('quantity', catalog.quantityColumn),
    categoryColumn: resolveMetadata('category', catalog.categoryColumn),
    warehouses,
    sites
  };
  return { schema, unresolved, unresolvedMetadata };
}

function assertHasLocations(schema: CaseSchema): void {
  if (schema.warehouses.length + schema.sites.length === 0) {
    throw new ConfigurationError('CASE_FLOW_NO_LOCATION_COLUMNS', 'No catalog location matched a source column');
  }
}

function unresolvedError(unresolved: UnresolvedColumnWarning[]): ConfigurationError {
  return new ConfigurationError('CASE_FLOW_COLUMNS_UNRESOLVED', 'Catalog entries matched no source column', {
    unresolved: unresolved.map(({ locationClass, name, column }) => ({ locationClass, name, column }))
  });
}

/**
 * Maps source columns to warehouse and site roles in catalog order.
 * Throws when any catalog location is missing from the source.
 */
export function classifyColumns(columns: string[], catalog: LocationCatalog): CaseSchema {
  const { schema, unresolved } = matchCatalog(columns, catalog);
  if (unresolved.length > 0) {
    throw unresolvedError(unresolved);
  }
  assertHasLocations(schema);
  return schema;
}

/**
 * Like `classifyColumns`, but under the `warn` policy missing locations are
 * dropped and reported. Missing quantity or category columns are reported
 * under either policy.
 */
export function resolveCaseSchema(
  columns: string[],
  catalog: LocationCatalog,
  options: { onUnresolved?: UnresolvedColumnPolicy; logger?: CaseFlowEventLogger } = {}
): ResolvedCaseSchema {
  const { schema, unresolved, unresolvedMetadata } = matchCatalog(columns, catalog);
  if (options.onUnresolved === 'error' && unresolved.length > 0) {
    throw unresolvedError(unresolved);
  }
  assertHasLocations(schema);
  if (unresolved.length > 0 || unresolvedMetadata.length > 0) {
    emitCaseFlowEvent(
      CASE_FLOW_EVENT.COLUMNS_UNRESOLVED,
      {
        unresolved: unresolved.map(({ locationClass, name, column }) => ({ locationClass, name, column })),
        unresolvedMetadata: unresolvedMetadata.map(({ role, column }) => ({ role, column })),
        resolvedWarehouses: schema.warehouses.length,
        resolvedSites: schema.sites.length
      },
      options.logger
    );
  }
  return { schema, warnings: [...unresolved, ...unresolvedMetadata] };
}

export function locationColumns(schema: CaseSchema): LocationColumn[] {
  return [...schema.warehouses, ...schema.sites];
}

export function profileDateColumns(rows: CaseRow[], schema: CaseSchema): ColumnProfile[] {
  return locationColumns(schema).map((entry) => {
    let filled = 0;
    let unparseable = 0;
    for (const row of rows) {
      const result = parseDateCell(row[entry.column]);
      if (result.status === 'empty') continue;
      filled += 1;
      if (result.status === 'invalid') unparseable += 1;
    }
    return {
      column: entry.column,
      location: entry.name,
      locationClass: entry.locationClass,
      filled,
      unparseable
    };
  });
}
