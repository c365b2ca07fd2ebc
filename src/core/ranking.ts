import type { InterfaceMetrics } from '../types/interface.js';
import type { RankedInterface, SeverityTier } from '../types/report.js';

export const TOP_ERROR_CRC_LIMIT = 10;
export const TOP_OUTPUT_ERROR_LIMIT = 5;

type RatioSelector = (metrics: InterfaceMetrics) => number;

const byErrorCrcRatio: RatioSelector = m => m.errorCrcRatio;
const byOutputErrorRatio: RatioSelector = m => m.outputErrorRatio;

/**
 * Severity for the worst-offender views. All comparisons are strict, so a
 * ratio of exactly 0.1 is MEDIUM.
 */
export function classifyTopOffender(ratio: number): SeverityTier {
  if (ratio > 1.0) return 'CRITICAL';
  if (ratio > 0.1) return 'HIGH';
  if (ratio > 0.01) return 'MEDIUM';
  return 'LOW';
}

/**
 * Severity for the fleet-wide sweep. Tighter cutoffs than
 * {@link classifyTopOffender}, plus GOOD for interfaces with no input or
 * CRC errors at all.
 */
export function classifyFleetSweep(ratio: number, errorCrcSum: bigint): SeverityTier {
  if (ratio > 0.1) return 'CRITICAL';
  if (ratio > 0.01) return 'HIGH';
  if (ratio > 0.001) return 'MEDIUM';
  if (errorCrcSum > 0n) return 'LOW';
  return 'GOOD';
}

/** Stable descending sort; ties keep their input order. Does not mutate. */
export function sortByRatioDescending(
  metrics: readonly InterfaceMetrics[],
  selector: RatioSelector
): InterfaceMetrics[] {
  return [...metrics].sort((a, b) => selector(b) - selector(a));
}

function toRanked(
  sorted: readonly InterfaceMetrics[],
  selector: RatioSelector,
  classify: (m: InterfaceMetrics) => SeverityTier
): RankedInterface[] {
  return sorted.map((m, index) => ({
    rank: index + 1,
    metrics: m,
    ratio: selector(m),
    severity: classify(m),
  }));
}

export function rankTopErrorCrc(
  metrics: readonly InterfaceMetrics[],
  limit = TOP_ERROR_CRC_LIMIT
): RankedInterface[] {
  const withIssues = metrics.filter(m => m.errorCrcRatio > 0);
  const top = sortByRatioDescending(withIssues, byErrorCrcRatio).slice(0, limit);
  return toRanked(top, byErrorCrcRatio, m => classifyTopOffender(m.errorCrcRatio));
}

export function rankTopOutputErrors(
  metrics: readonly InterfaceMetrics[],
  limit = TOP_OUTPUT_ERROR_LIMIT
): RankedInterface[] {
  const withErrors = metrics.filter(m => m.outputErrorRatio > 0);
  const top = sortByRatioDescending(withErrors, byOutputErrorRatio).slice(0, limit);
  return toRanked(top, byOutputErrorRatio, m => classifyTopOffender(m.outputErrorRatio));
}

export function rankComplete(metrics: readonly InterfaceMetrics[]): RankedInterface[] {
  return toRanked(
    sortByRatioDescending(metrics, byErrorCrcRatio),
    byErrorCrcRatio,
    m => classifyFleetSweep(m.errorCrcRatio, m.inputErrors + m.crcErrors)
  );
}
