import { z } from 'zod';
import {
  CounterSchema,
  ExcludedInterfaceSchema,
  InterfaceMetricsSchema,
  InterfaceScanStatsSchema,
} from './interface.js';

export const SeverityTierSchema = z.enum(['CRITICAL', 'HIGH', 'MEDIUM', 'LOW', 'GOOD']);
export type SeverityTier = z.infer<typeof SeverityTierSchema>;

export const RankedInterfaceSchema = z.object({
  rank: z.number().int().positive(),
  metrics: InterfaceMetricsSchema,
  /** The ratio this view ranks by */
  ratio: z.number().nonnegative(),
  severity: SeverityTierSchema,
});
export type RankedInterface = z.infer<typeof RankedInterfaceSchema>;

export const FleetTotalsSchema = z.object({
  inputPackets: CounterSchema,
  outputPackets: CounterSchema,
  inputErrors: CounterSchema,
  crcErrors: CounterSchema,
  outputErrors: CounterSchema,
  inputDrops: CounterSchema,
  outputDrops: CounterSchema,
  overallErrorCrcRatio: z.number().nonnegative(),
});
export type FleetTotals = z.infer<typeof FleetTotalsSchema>;

export const SourceStatusSchema = z.enum(['ok', 'unavailable', 'unreadable']);
export type SourceStatus = z.infer<typeof SourceStatusSchema>;

export const ReportSourceSchema = z.object({
  path: z.string().optional(),
  status: SourceStatusSchema,
  error: z.string().optional(),
});
export type ReportSource = z.infer<typeof ReportSourceSchema>;

export const AnalysisSummarySchema = z.object({
  parsedInterfaces: z.number().int().nonnegative(),
  analyzedInterfaces: z.number().int().nonnegative(),
  interfacesWithIssues: z.number().int().nonnegative(),
  issuePercentage: z.number().min(0).max(100),
  excluded: z.array(ExcludedInterfaceSchema),
  scan: InterfaceScanStatsSchema,
});
export type AnalysisSummary = z.infer<typeof AnalysisSummarySchema>;

/** Configured list sizes, printed in the view headings */
export const ReportLimitsSchema = z.object({
  topErrorCrc: z.number().int().positive(),
  topOutputErrors: z.number().int().positive(),
});
export type ReportLimits = z.infer<typeof ReportLimitsSchema>;

export const InterfaceErrorReportSchema = z.object({
  generatedAt: z.string(),
  source: ReportSourceSchema,
  summary: AnalysisSummarySchema,
  topErrorCrc: z.array(RankedInterfaceSchema),
  topOutputErrors: z.array(RankedInterfaceSchema),
  complete: z.array(RankedInterfaceSchema),
  limits: ReportLimitsSchema,
  totals: FleetTotalsSchema,
});
export type InterfaceErrorReport = z.infer<typeof InterfaceErrorReportSchema>;
