import { createChildLogger } from '../utils/logger.js';
import type {
  ExcludedInterface,
  InterfaceMetrics,
  RawInterfaceCounters,
} from '../types/interface.js';

const logger = createChildLogger('metrics-engine');

/**
 * Minimum 5 minute rate (packets/sec, either direction) for an interface to
 * be analyzed. Anything slower is treated as a test port.
 */
export const MIN_PACKET_RATE = 100_000n;

export interface InterfaceEvaluation {
  metrics: InterfaceMetrics[];
  excluded: ExcludedInterface[];
}

/**
 * Percentage of `part` in `whole`; 0 when `whole` is 0. Counters stay exact
 * as bigint and only become floating point here.
 */
export function percentOf(part: number | bigint, whole: number | bigint): number {
  const denominator = Number(whole);
  return denominator > 0 ? (Number(part) / denominator) * 100 : 0;
}

export function deriveInterfaceMetrics(raw: RawInterfaceCounters): InterfaceMetrics {
  return {
    ...raw,
    totalPackets: raw.inputPackets + raw.outputPackets,
    errorCrcRatio: percentOf(raw.inputErrors + raw.crcErrors, raw.inputPackets),
    errorRatio: percentOf(raw.inputErrors, raw.inputPackets),
    crcRatio: percentOf(raw.crcErrors, raw.inputPackets),
    outputErrorRatio: percentOf(raw.outputErrors, raw.outputPackets),
  };
}

/**
 * Applies the traffic filters and derives ratios for what survives.
 * Output keeps the iteration order of `records`.
 */
export function evaluateInterfaces(
  records: Iterable<RawInterfaceCounters>
): InterfaceEvaluation {
  const metrics: InterfaceMetrics[] = [];
  const excluded: ExcludedInterface[] = [];

  for (const raw of records) {
    if (raw.inputPackets + raw.outputPackets === 0n) {
      excluded.push({ name: raw.name, reason: 'zero_traffic' });
      continue;
    }
    if (raw.inputRate < MIN_PACKET_RATE && raw.outputRate < MIN_PACKET_RATE) {
      excluded.push({ name: raw.name, reason: 'below_rate_threshold' });
      continue;
    }
    metrics.push(deriveInterfaceMetrics(raw));
  }

  logger.debug(
    { analyzed: metrics.length, excluded: excluded.length, minPacketRate: Number(MIN_PACKET_RATE) },
    'Interface metrics computed'
  );
  return { metrics, excluded };
}

export function computeInterfaceMetrics(
  records: Map<string, RawInterfaceCounters> | Iterable<RawInterfaceCounters>
): InterfaceMetrics[] {
  const values = records instanceof Map ? records.values() : records;
  return evaluateInterfaces(values).metrics;
}
