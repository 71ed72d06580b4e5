import { parseDateCell, parseMonthKey, startOfUtcDay } from '../lib/dates';
import type { CaseFlowRunOptionsInput } from '../schemas/caseFlow.schema';

export type CaseFlowSourceConfig =
  | { kind: 'csv'; path: string | null; catalogPath: string }
  | { kind: 'pg'; table: string; catalogPath: string };

export type CaseFlowGateConfig = {
  failOnUrgent: boolean;
  urgentTier: string;
};

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value === null || value === '') return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;
  return fallback;
}

function parseChoice<T extends string>(value: string | undefined, choices: readonly T[], fallback: T): T {
  const normalized = String(value ?? '').trim().toLowerCase();
  return choices.find((choice) => choice === normalized) ?? fallback;
}

function parseMonth(value: string | undefined, fallback: string): string {
  if (!value) return fallback;
  return parseMonthKey(value) ?? fallback;
}

function parseReferenceDate(value: string | undefined, today: Date): Date {
  if (!value) return startOfUtcDay(today);
  const parsed = parseDateCell(value);
  return parsed.status === 'parsed' ? parsed.at : startOfUtcDay(today);
}

export function getCaseFlowRunConfig(
  env: NodeJS.ProcessEnv = process.env,
  today: Date = new Date()
): CaseFlowRunOptionsInput {
  const elevatedDays = parseNumber(env.CASE_FLOW_ELEVATED_DAYS, 180);
  const urgentDays = parseNumber(env.CASE_FLOW_URGENT_DAYS, 365);
  return {
    range: {
      start: parseMonth(env.CASE_FLOW_RANGE_START, '2023-01'),
      end: parseMonth(env.CASE_FLOW_RANGE_END, '2025-12')
    },
    now: parseReferenceDate(env.CASE_FLOW_NOW, today),
    deadStockThresholdDays: parseNumber(env.CASE_FLOW_DEAD_STOCK_THRESHOLD_DAYS, 90),
    deadStockTiers: [
      { name: 'elevated', minDays: elevatedDays },
      { name: 'urgent', minDays: urgentDays }
    ],
    longLeadTimeDays: parseNumber(env.CASE_FLOW_LONG_LEAD_TIME_DAYS, 90),
    summaryMonths: parseNumber(env.CASE_FLOW_SUMMARY_MONTHS, 12),
    policies: {
      duplicateArrival: parseChoice(env.CASE_FLOW_DUPLICATE_ARRIVAL, ['ignore', 'reenter'] as const, 'ignore'),
      postDelivery: parseChoice(env.CASE_FLOW_POST_DELIVERY, ['ignore', 'reopen'] as const, 'ignore')
    },
    unresolvedColumns: parseChoice(env.CASE_FLOW_UNRESOLVED_COLUMNS, ['warn', 'error'] as const, 'warn')
  };
}

export function getCaseFlowSourceConfig(env: NodeJS.ProcessEnv = process.env): CaseFlowSourceConfig {
  const catalogPath = env.CASE_FLOW_CATALOG_PATH || 'config/locations.json';
  if (parseChoice(env.CASE_FLOW_SOURCE, ['csv', 'pg'] as const, 'csv') === 'pg') {
    return { kind: 'pg', table: env.CASE_FLOW_TABLE || 'case_locations', catalogPath };
  }
  return { kind: 'csv', path: env.CASE_FLOW_CSV_PATH || null, catalogPath };
}

export const DEFAULT_CASE_FLOW_MAX_ROWS = 500000;

/** Row cap for both sources; read per call so a `.env` loaded later still applies. */
export function getCaseFlowMaxRows(env: NodeJS.ProcessEnv = process.env): number {
  const value = parseNumber(env.CASE_FLOW_MAX_ROWS, DEFAULT_CASE_FLOW_MAX_ROWS);
  return Number.isInteger(value) && value > 0 ? value : DEFAULT_CASE_FLOW_MAX_ROWS;
}

export function getCaseFlowGateConfig(env: NodeJS.ProcessEnv = process.env): CaseFlowGateConfig {
  return {
    failOnUrgent: parseBoolean(env.CASE_FLOW_FAIL_ON_URGENT, false),
    urgentTier: 'urgent'
  };
}
