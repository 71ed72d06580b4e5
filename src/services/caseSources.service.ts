import { readFile } from 'node:fs/promises';
import { getCaseFlowMaxRows } from '../config/caseFlow';
import { query, type QueryExecutor } from '../db';
import { ConfigurationError } from '../domains/caseFlow/errors';
import type { CaseRow } from '../domains/caseFlow/types';
import { csvRowsToRecords, parseCsv } from '../lib/csv';
import type { LocationCatalog } from '../schemas/caseFlow.schema';

export type CaseTable = {
  columns: string[];
  rows: CaseRow[];
  truncated: boolean;
};

export type TableSourceOptions = {
  table: string;
  limit?: number;
};

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

export function loadCaseRowsFromCsv(text: string, maxRows = getCaseFlowMaxRows()): CaseTable {
  const parsed = parseCsv(text, { maxRows });
  return {
    columns: parsed.headers.filter((header) => header !== ''),
    rows: csvRowsToRecords(parsed),
    truncated: parsed.truncated
  };
}

export async function loadCaseRowsFromCsvFile(filePath: string, maxRows = getCaseFlowMaxRows()): Promise<CaseTable> {
  const text = await readFile(filePath, 'utf8');
  return loadCaseRowsFromCsv(text, maxRows);
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function quoteTable(table: string): string {
  if (!IDENTIFIER_PATTERN.test(table)) {
    throw new ConfigurationError('CASE_FLOW_SOURCE_INVALID', 'Table name must be a plain or schema-qualified identifier', {
      table
    });
  }
  return table.split('.').map(quoteIdentifier).join('.');
}

export function catalogColumns(catalog: LocationCatalog): string[] {
  const columns = [
    catalog.caseIdColumn,
    catalog.quantityColumn,
    catalog.categoryColumn,
    ...catalog.warehouses.map((entry) => entry.column ?? entry.name),
    ...catalog.sites.map((entry) => entry.column ?? entry.name)
  ].filter((column): column is string => Boolean(column));
  return [...new Set(columns)];
}

/**
 * Reads the catalog's columns from a Postgres table, one row per case. Columns
 * the table lacks are reported by the schema classifier, not here, so the
 * column list is taken from information_schema first.
 */
export async function loadCaseRowsFromTable(
  catalog: LocationCatalog,
  options: TableSourceOptions,
  executor: QueryExecutor = query
): Promise<CaseTable> {
  const quotedTable = quoteTable(options.table);
  const [schemaName, tableName] = options.table.includes('.')
    ? options.table.split('.')
    : [null, options.table];

  const { rows: columnRows } = await executor<{ column_name: string }>(
    `SELECT column_name
       FROM information_schema.columns
      WHERE table_name = $1
        AND ($2::text IS NULL OR table_schema = $2)
      ORDER BY ordinal_position`,
    [tableName, schemaName]
  );
  const available = new Set(columnRows.map((row) => row.column_name));
  const selected = catalogColumns(catalog).filter((column) => available.has(column));
  if (selected.length === 0) {
    return { columns: [], rows: [], truncated: false };
  }

  const limit = options.limit ?? getCaseFlowMaxRows();
  const { rows } = await executor<CaseRow>(
    `SELECT ${selected.map(quoteIdentifier).join(', ')}
       FROM ${quotedTable}
      ORDER BY ${quoteIdentifier(selected[0])}
      LIMIT $1`,
    [limit + 1]
  );

  return {
    columns: selected,
    rows: rows.slice(0, limit),
    truncated: rows.length > limit
  };
}
