import { z } from 'zod';
import { parseMonthKey } from '../lib/dates';

const nonEmpty = z.string().trim().min(1);

const monthKeySchema = z
  .string()
  .transform((value, ctx) => {
    const key = parseMonthKey(value);
    if (!key) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a month as YYYY-MM' });
      return z.NEVER;
    }
    return key;
  });

export const warehouseEntrySchema = z.object({
  name: nonEmpty,
  column: nonEmpty.optional(),
  storageType: z.enum(['indoor', 'outdoor', 'other']).optional()
});

export const siteEntrySchema = z.object({
  name: nonEmpty,
  column: nonEmpty.optional()
});

export const locationCatalogSchema = z
  .object({
    caseIdColumn: nonEmpty,
    quantityColumn: nonEmpty.optional(),
    categoryColumn: nonEmpty.optional(),
    warehouses: z.array(warehouseEntrySchema),
    sites: z.array(siteEntrySchema)
  })
  .superRefine((catalog, ctx) => {
    const names = new Set<string>();
    const columns = new Set<string>();
    const entries = [
      ...catalog.warehouses.map((entry, index) => ({ entry, path: ['warehouses', index] })),
      ...catalog.sites.map((entry, index) => ({ entry, path: ['sites', index] }))
    ];
    for (const { entry, path } of entries) {
      const column = entry.column ?? entry.name;
      if (names.has(entry.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: `Duplicate location name ${entry.name}` });
      }
      if (columns.has(column)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: `Column ${column} is mapped twice` });
      }
      names.add(entry.name);
      columns.add(column);
    }
    if (catalog.warehouses.length + catalog.sites.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Catalog declares no locations' });
    }
  });

export type LocationCatalog = z.infer<typeof locationCatalogSchema>;

export const deadStockTierSchema = z.object({
  name: nonEmpty,
  minDays: z.number().int().nonnegative()
});

export const caseFiltersSchema = z.object({
  warehouse: nonEmpty.optional(),
  site: nonEmpty.optional(),
  storageType: z.enum(['indoor', 'outdoor', 'other']).optional(),
  category: nonEmpty.optional(),
  status: z.enum(['not_received', 'pending', 'completed']).optional()
});

export type CaseFilters = z.infer<typeof caseFiltersSchema>;

export const caseFlowRunOptionsSchema = z
  .object({
    range: z.object({ start: monthKeySchema, end: monthKeySchema }),
    now: z.date(),
    deadStockThresholdDays: z.number().int().nonnegative().default(90),
    deadStockTiers: z.array(deadStockTierSchema).default([
      { name: 'elevated', minDays: 180 },
      { name: 'urgent', minDays: 365 }
    ]),
    longLeadTimeDays: z.number().int().nonnegative().default(90),
    summaryMonths: z.number().int().positive().default(12),
    policies: z
      .object({
        duplicateArrival: z.enum(['ignore', 'reenter']).default('ignore'),
        postDelivery: z.enum(['ignore', 'reopen']).default('ignore')
      })
      .default({}),
    unresolvedColumns: z.enum(['warn', 'error']).default('warn'),
    filters: caseFiltersSchema.default({})
  })
  .refine((options) => options.range.start <= options.range.end, {
    message: 'Range start must not be after range end',
    path: ['range']
  });

export type CaseFlowRunOptionsInput = z.input<typeof caseFlowRunOptionsSchema>;
export type CaseFlowRunOptions = z.output<typeof caseFlowRunOptionsSchema>;
