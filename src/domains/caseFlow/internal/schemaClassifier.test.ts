import { describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '../errors';
import { testCatalog } from '../testing';
import { classifyColumns, profileDateColumns, resolveCaseSchema } from './schemaClassifier';

const ALL_COLUMNS = ['Case No.', 'Qty', 'Category', 'WH1', 'WH2', 'Yard 3', 'S1', 'S2', 'Remarks'];

describe('classifyColumns', () => {
  it('returns warehouse and site columns in catalog order with declaration ranks', () => {
    const schema = classifyColumns([...ALL_COLUMNS].reverse(), testCatalog);
    expect(schema.caseIdColumn).toBe('Case No.');
    expect(schema.quantityColumn).toBe('Qty');
    expect(schema.warehouses.map((entry) => [entry.name, entry.column, entry.rank])).toEqual([
      ['WH1', 'WH1', 0],
      ['WH2', 'WH2', 1],
      ['WH3', 'Yard 3', 2]
    ]);
    expect(schema.sites.map((entry) => [entry.name, entry.rank])).toEqual([
      ['S1', 3],
      ['S2', 4]
    ]);
    expect(schema.warehouses[2].storageType).toBe('outdoor');
  });

  it('falls back to normalized header matching', () => {
    const schema = classifyColumns(['case no', 'qty', 'category', 'wh1', 'WH 2', 'YARD-3', 's1', 's2'], testCatalog);
    expect(schema.caseIdColumn).toBe('case no');
    expect(schema.warehouses.map((entry) => entry.column)).toEqual(['wh1', 'WH 2', 'YARD-3']);
  });

  it('throws a ConfigurationError naming every unmatched entry', () => {
    const columns = ALL_COLUMNS.filter((column) => column !== 'WH2' && column !== 'S2');
    let caught: unknown = null;
    try {
      classifyColumns(columns, testCatalog);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.code).toBe('CASE_FLOW_COLUMNS_UNRESOLVED');
    expect(caught.details?.unresolved).toEqual([
      { locationClass: 'warehouse', name: 'WH2', column: 'WH2' },
      { locationClass: 'site', name: 'S2', column: 'S2' }
    ]);
  });

  it('refuses two catalog entries that land on the same source column', () => {
    const catalog = {
      caseIdColumn: 'Case No.',
      warehouses: [{ name: 'Central Indoor' }],
      sites: [{ name: 'North Site', column: 'central-indoor' }]
    };
    let caught: unknown = null;
    try {
      classifyColumns(['Case No.', 'Central Indoor'], catalog);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.code).toBe('CASE_FLOW_CATALOG_INVALID');
    expect(caught.details).toMatchObject({ column: 'Central Indoor', entries: ['Central Indoor', 'North Site'] });
  });

  it('always fails without a case id column', () => {
    expect(() => classifyColumns(['WH1', 'S1'], testCatalog)).toThrow('CASE_FLOW_CASE_ID_COLUMN_MISSING');
  });
});

describe('resolveCaseSchema', () => {
  it('logs and continues with the reduced set under the warn policy', () => {
    const logger = vi.fn();
    const columns = ALL_COLUMNS.filter((column) => column !== 'Yard 3');
    const { schema, warnings } = resolveCaseSchema(columns, testCatalog, { onUnresolved: 'warn', logger });

    expect(schema.warehouses.map((entry) => entry.name)).toEqual(['WH1', 'WH2']);
    expect(warnings).toEqual([{ code: 'UNRESOLVED_COLUMN', locationClass: 'warehouse', name: 'WH3', column: 'Yard 3' }]);
    expect(logger).toHaveBeenCalledTimes(1);
    expect(logger).toHaveBeenCalledWith('CASE_FLOW_COLUMNS_UNRESOLVED', {
      unresolved: [{ locationClass: 'warehouse', name: 'WH3', column: 'Yard 3' }],
      unresolvedMetadata: [],
      resolvedWarehouses: 2,
      resolvedSites: 2
    });
  });

  it('reports declared quantity and category columns the source lacks', () => {
    const logger = vi.fn();
    const columns = ALL_COLUMNS.filter((column) => column !== 'Qty' && column !== 'Category');
    const { schema, warnings } = resolveCaseSchema(columns, testCatalog, { onUnresolved: 'error', logger });

    expect(schema.quantityColumn).toBeNull();
    expect(schema.categoryColumn).toBeNull();
    expect(warnings).toEqual([
      { code: 'UNRESOLVED_METADATA_COLUMN', role: 'quantity', column: 'Qty' },
      { code: 'UNRESOLVED_METADATA_COLUMN', role: 'category', column: 'Category' }
    ]);
    expect(logger).toHaveBeenCalledWith('CASE_FLOW_COLUMNS_UNRESOLVED', {
      unresolved: [],
      unresolvedMetadata: [
        { role: 'quantity', column: 'Qty' },
        { role: 'category', column: 'Category' }
      ],
      resolvedWarehouses: 3,
      resolvedSites: 2
    });
  });

  it('stays quiet when every declared column resolves', () => {
    const logger = vi.fn();
    expect(resolveCaseSchema(ALL_COLUMNS, testCatalog, { logger }).warnings).toEqual([]);
    expect(logger).not.toHaveBeenCalled();
  });

  it('rethrows under the error policy', () => {
    const columns = ALL_COLUMNS.filter((column) => column !== 'Yard 3');
    expect(() => resolveCaseSchema(columns, testCatalog, { onUnresolved: 'error' })).toThrow(ConfigurationError);
  });

  it('fails when no location column resolves at all', () => {
    expect(() => resolveCaseSchema(['Case No.', 'Remarks'], testCatalog, { logger: vi.fn() })).toThrow(
      'CASE_FLOW_NO_LOCATION_COLUMNS'
    );
  });
});

describe('profileDateColumns', () => {
  it('counts filled and unparseable cells per column', () => {
    const schema = classifyColumns(ALL_COLUMNS, testCatalog);
    const profile = profileDateColumns(
      [
        { 'Case No.': 'C1', WH1: '2023-01-05', S1: 'soon' },
        { 'Case No.': 'C2', WH1: 'n/a', WH2: '', S1: '2023-02-01' }
      ],
      schema
    );
    expect(profile.find((entry) => entry.location === 'WH1')).toEqual({
      column: 'WH1',
      location: 'WH1',
      locationClass: 'warehouse',
      filled: 2,
      unparseable: 1
    });
    expect(profile.find((entry) => entry.location === 'WH2')?.filled).toBe(0);
    expect(profile.find((entry) => entry.location === 'S1')?.unparseable).toBe(1);
  });
});
