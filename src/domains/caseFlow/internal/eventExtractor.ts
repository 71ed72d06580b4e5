import { formatDate, parseDateCell, type CellValue } from '../../../lib/dates';
import { parseQuantity } from '../../../lib/numbers';
import { locationColumns } from './schemaClassifier';
import type {
  CaseFlowWarning,
  CaseRecord,
  CaseRow,
  CaseSchema,
  LocationEvent,
  ParseWarning
} from '../types';

export type ExtractedCases = {
  cases: CaseRecord[];
  warnings: CaseFlowWarning[];
};

export function cellToText(value: CellValue): string | null {
  if (value === null || value === undefined) return null;
  const text = value instanceof Date ? formatDate(value) : String(value).trim();
  return text === '' ? null : text;
}

/**
 * Emits one event per parseable date cell. The result is unordered; blank
 * cells are absent and unparseable cells only cost their own event.
 */
export function extractCaseEvents(
  row: CaseRow,
  schema: CaseSchema,
  caseId: string
): { events: LocationEvent[]; warnings: ParseWarning[] } {
  const events: LocationEvent[] = [];
  const warnings: ParseWarning[] = [];

  for (const entry of locationColumns(schema)) {
    const result = parseDateCell(row[entry.column]);
    if (result.status === 'parsed') {
      events.push({
        at: result.at,
        location: entry.name,
        locationClass: entry.locationClass,
        rank: entry.rank
      });
    } else if (result.status === 'invalid') {
      warnings.push({ code: 'DATE_PARSE_FAILED', caseId, column: entry.column, value: result.raw });
    }
  }

  return { events, warnings };
}

export function extractCases(rows: CaseRow[], schema: CaseSchema): ExtractedCases {
  const cases: CaseRecord[] = [];
  const warnings: CaseFlowWarning[] = [];
  const seen = new Set<string>();

  rows.forEach((row, index) => {
    const rowNumber = index + 1;
    const caseId = cellToText(row[schema.caseIdColumn]);
    if (!caseId) {
      warnings.push({ code: 'MISSING_CASE_ID', rowNumber, caseId: null });
      return;
    }
    if (seen.has(caseId)) {
      warnings.push({ code: 'DUPLICATE_CASE_ID', rowNumber, caseId });
      return;
    }
    seen.add(caseId);

    let quantity = 1;
    if (schema.quantityColumn) {
      const raw = row[schema.quantityColumn];
      const parsed = parseQuantity(raw);
      quantity = parsed.quantity;
      if (!parsed.valid) {
        warnings.push({
          code: 'QUANTITY_PARSE_FAILED',
          caseId,
          column: schema.quantityColumn,
          value: cellToText(raw) ?? ''
        });
      }
    }

    const category = schema.categoryColumn ? cellToText(row[schema.categoryColumn]) : null;
    const extracted = extractCaseEvents(row, schema, caseId);
    warnings.push(...extracted.warnings);
    if (extracted.events.length === 0) {
      warnings.push({ code: 'EMPTY_CASE', caseId });
    }

    cases.push({ caseId, rowNumber, quantity, category, events: extracted.events });
  });

  return { cases, warnings };
}
