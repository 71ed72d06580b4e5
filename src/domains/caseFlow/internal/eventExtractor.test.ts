import { describe, expect, it } from 'vitest';
import { testCatalog, utc } from '../testing';
import { extractCaseEvents, extractCases } from './eventExtractor';
import { classifyColumns } from './schemaClassifier';

const schema = classifyColumns(['Case No.', 'Qty', 'Category', 'WH1', 'WH2', 'Yard 3', 'S1', 'S2'], testCatalog);

describe('extractCaseEvents', () => {
  it('emits one event per parseable cell and warns per bad cell', () => {
    const { events, warnings } = extractCaseEvents(
      { 'Case No.': 'C1', WH1: '2023-01-05', WH2: '31/31/2023', 'Yard 3': '', S1: new Date('2023-05-01T00:00:00Z') },
      schema,
      'C1'
    );

    expect(events).toEqual([
      { at: utc('2023-01-05'), location: 'WH1', locationClass: 'warehouse', rank: 0 },
      { at: utc('2023-05-01'), location: 'S1', locationClass: 'site', rank: 3 }
    ]);
    expect(warnings).toEqual([{ code: 'DATE_PARSE_FAILED', caseId: 'C1', column: 'WH2', value: '31/31/2023' }]);
  });
});

describe('extractCases', () => {
  it('reads id, quantity and category and flags empty cases', () => {
    const { cases, warnings } = extractCases(
      [
        { 'Case No.': ' C1 ', Qty: '3', Category: 'Cable', WH1: '2023-01-05' },
        { 'Case No.': 'C3', Qty: '', WH1: 'unknown' }
      ],
      schema
    );

    expect(cases.map(({ caseId, rowNumber, quantity, category }) => ({ caseId, rowNumber, quantity, category }))).toEqual([
      { caseId: 'C1', rowNumber: 1, quantity: 3, category: 'Cable' },
      { caseId: 'C3', rowNumber: 2, quantity: 1, category: null }
    ]);
    expect(cases[1].events).toEqual([]);
    expect(warnings).toEqual([
      { code: 'DATE_PARSE_FAILED', caseId: 'C3', column: 'WH1', value: 'unknown' },
      { code: 'EMPTY_CASE', caseId: 'C3' }
    ]);
  });

  it('defaults invalid quantities to one with a warning', () => {
    const { cases, warnings } = extractCases([{ 'Case No.': 'C9', Qty: '2.5', WH1: '2023-01-05' }], schema);
    expect(cases[0].quantity).toBe(1);
    expect(warnings).toEqual([{ code: 'QUANTITY_PARSE_FAILED', caseId: 'C9', column: 'Qty', value: '2.5' }]);
  });

  it('skips rows without an id and repeated ids', () => {
    const { cases, warnings } = extractCases(
      [
        { 'Case No.': '', WH1: '2023-01-05' },
        { 'Case No.': 'C1', WH1: '2023-01-05' },
        { 'Case No.': 'C1', WH1: '2023-02-05' },
        { 'Case No.': 42, WH1: '2023-03-05' }
      ],
      schema
    );
    expect(cases.map((entry) => entry.caseId)).toEqual(['C1', '42']);
    expect(cases[0].events[0].at).toEqual(utc('2023-01-05'));
    expect(warnings).toEqual([
      { code: 'MISSING_CASE_ID', rowNumber: 1, caseId: null },
      { code: 'DUPLICATE_CASE_ID', rowNumber: 3, caseId: 'C1' }
    ]);
  });
});
