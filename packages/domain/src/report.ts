import { z } from 'zod';

export const CHECK_STATUSES = ['PASS', 'WARNING', 'CRITICAL'] as const;
export type CheckStatus = (typeof CHECK_STATUSES)[number];

const SEVERITY: Record<CheckStatus, number> = {
  PASS: 0,
  WARNING: 1,
  CRITICAL: 2
};

export const AuditCheckSchema = z.object({
  check: z.string(),
  status: z.enum(CHECK_STATUSES),
  detail: z.string()
});

export const CurrencyDetailSchema = z.object({
  rate: z.number(),
  bounds_status: z.enum(['PASS', 'FAIL', 'NO_BOUNDS']),
  bounds: z.tuple([z.number(), z.number()]).optional(),
  reference_rate: z.number().optional(),
  deviation_pct: z.number().optional()
});

export const AuditSummarySchema = z.object({
  total_rates: z.number().int().nonnegative(),
  bounds_violations: z.number().int().nonnegative(),
  warnings: z.number().int().nonnegative(),
  critical: z.boolean()
});

export const AuditReportSchema = z.object({
  timestamp: z.string(),
  status: z.enum(CHECK_STATUSES),
  checks: z.array(AuditCheckSchema),
  summary: AuditSummarySchema,
  details_per_currency: z.record(z.string(), CurrencyDetailSchema)
});

export type AuditCheck = z.infer<typeof AuditCheckSchema>;
export type CurrencyDetail = z.infer<typeof CurrencyDetailSchema>;
export type AuditSummary = z.infer<typeof AuditSummarySchema>;
export type AuditReport = z.infer<typeof AuditReportSchema>;

/** Most severe status wins; an empty list is PASS. */
export function aggregateStatus(statuses: Iterable<CheckStatus>): CheckStatus {
  let worst: CheckStatus = 'PASS';
  for (const status of statuses) {
    if (SEVERITY[status] > SEVERITY[worst]) {
      worst = status;
    }
  }
  return worst;
}

export function statusSeverity(status: CheckStatus): number {
  return SEVERITY[status];
}
