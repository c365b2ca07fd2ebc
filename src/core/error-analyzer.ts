import { performance } from 'perf_hooks';
import { createChildLogger } from '../utils/logger.js';
import { metrics as runMetrics } from '../utils/metrics.js';
import { scanInterfaceText } from './interface-parser.js';
import { evaluateInterfaces, percentOf } from './metrics-engine.js';
import {
  rankComplete,
  rankTopErrorCrc,
  rankTopOutputErrors,
  TOP_ERROR_CRC_LIMIT,
  TOP_OUTPUT_ERROR_LIMIT,
} from './ranking.js';
import { aggregateTotals } from './aggregator.js';
import type { ExcludedInterface } from '../types/interface.js';
import type { InterfaceErrorReport, ReportLimits, ReportSource } from '../types/report.js';

const logger = createChildLogger('error-analyzer');

export interface AnalyzeOptions {
  topErrorCrcLimit?: number | undefined;
  topOutputErrorLimit?: number | undefined;
  source?: ReportSource | undefined;
  now?: Date | undefined;
}

function resolveLimits(options: AnalyzeOptions): ReportLimits {
  return {
    topErrorCrc: options.topErrorCrcLimit ?? TOP_ERROR_CRC_LIMIT,
    topOutputErrors: options.topOutputErrorLimit ?? TOP_OUTPUT_ERROR_LIMIT,
  };
}

function countByReason(excluded: readonly ExcludedInterface[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const entry of excluded) {
    counts[entry.reason] = (counts[entry.reason] ?? 0) + 1;
  }
  return counts;
}

export function analyzeInterfaceText(
  text: string,
  options: AnalyzeOptions = {}
): InterfaceErrorReport {
  const startedAt = performance.now();

  const scan = scanInterfaceText(text);
  const { metrics, excluded } = evaluateInterfaces(scan.interfaces.values());
  const interfacesWithIssues = metrics.filter(m => m.errorCrcRatio > 0).length;
  const limits = resolveLimits(options);

  const report: InterfaceErrorReport = {
    generatedAt: (options.now ?? new Date()).toISOString(),
    source: options.source ?? { status: 'ok' },
    summary: {
      parsedInterfaces: scan.interfaces.size,
      analyzedInterfaces: metrics.length,
      interfacesWithIssues,
      issuePercentage: percentOf(interfacesWithIssues, metrics.length),
      excluded,
      scan: scan.stats,
    },
    topErrorCrc: rankTopErrorCrc(metrics, limits.topErrorCrc),
    topOutputErrors: rankTopOutputErrors(metrics, limits.topOutputErrors),
    complete: rankComplete(metrics),
    limits,
    totals: aggregateTotals(metrics),
  };

  const durationMs = performance.now() - startedAt;
  runMetrics.recordRun({
    lines: scan.stats.totalLines,
    parsed: scan.interfaces.size,
    analyzed: metrics.length,
    excluded: countByReason(excluded),
    durationMs,
  });

  logger.info({
    parsed: report.summary.parsedInterfaces,
    analyzed: report.summary.analyzedInterfaces,
    withIssues: interfacesWithIssues,
    durationMs: Math.round(durationMs),
  }, 'Interface error analysis complete');

  return report;
}

/** The report produced when nothing could be parsed. */
export function emptyReport(
  source: ReportSource,
  options: Omit<AnalyzeOptions, 'source'> = {}
): InterfaceErrorReport {
  return {
    generatedAt: (options.now ?? new Date()).toISOString(),
    source,
    summary: {
      parsedInterfaces: 0,
      analyzedInterfaces: 0,
      interfacesWithIssues: 0,
      issuePercentage: 0,
      excluded: [],
      scan: { totalLines: 0, headerLines: 0, matchedLines: 0, duplicateHeaders: [] },
    },
    topErrorCrc: [],
    topOutputErrors: [],
    complete: [],
    limits: resolveLimits(options),
    totals: aggregateTotals([]),
  };
}
