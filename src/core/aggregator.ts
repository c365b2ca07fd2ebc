import type { InterfaceMetrics } from '../types/interface.js';
import type { FleetTotals } from '../types/report.js';
import { percentOf } from './metrics-engine.js';

type SummedField = Exclude<keyof FleetTotals, 'overallErrorCrcRatio'>;

const SUMMED_FIELDS: readonly SummedField[] = [
  'inputPackets',
  'outputPackets',
  'inputErrors',
  'crcErrors',
  'outputErrors',
  'inputDrops',
  'outputDrops',
];

export function aggregateTotals(metrics: readonly InterfaceMetrics[]): FleetTotals {
  const sums: Record<SummedField, bigint> = {
    inputPackets: 0n,
    outputPackets: 0n,
    inputErrors: 0n,
    crcErrors: 0n,
    outputErrors: 0n,
    inputDrops: 0n,
    outputDrops: 0n,
  };

  for (const m of metrics) {
    for (const field of SUMMED_FIELDS) {
      sums[field] += m[field];
    }
  }

  return {
    ...sums,
    overallErrorCrcRatio: percentOf(sums.inputErrors + sums.crcErrors, sums.inputPackets),
  };
}
