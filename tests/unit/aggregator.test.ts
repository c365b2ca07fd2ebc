import { describe, it, expect } from 'vitest';
import { aggregateTotals } from '../../src/core/aggregator.js';
import { deriveInterfaceMetrics } from '../../src/core/metrics-engine.js';
import { createInterfaceCounters } from '../../src/core/interface-parser.js';

describe('aggregateTotals', () => {
  it('should return zeros for an empty fleet', () => {
    expect(aggregateTotals([])).toEqual({
      inputPackets: 0n,
      outputPackets: 0n,
      inputErrors: 0n,
      crcErrors: 0n,
      outputErrors: 0n,
      inputDrops: 0n,
      outputDrops: 0n,
      overallErrorCrcRatio: 0,
    });
  });

  it('should sum each counter independently', () => {
    const fleet = [
      deriveInterfaceMetrics({
        ...createInterfaceCounters('Gi0/1'),
        inputPackets: 1000000n,
        outputPackets: 800000n,
        inputErrors: 500n,
        crcErrors: 300n,
        outputErrors: 1n,
        inputDrops: 5n,
        outputDrops: 2n,
        frameErrors: 9n,
      }),
      deriveInterfaceMetrics({
        ...createInterfaceCounters('Te1/0/1'),
        inputPackets: 3000000n,
        outputPackets: 200000n,
        inputErrors: 100n,
        crcErrors: 100n,
        outputErrors: 4n,
        inputDrops: 10n,
        outputDrops: 0n,
      }),
    ];

    expect(aggregateTotals(fleet)).toEqual({
      inputPackets: 4000000n,
      outputPackets: 1000000n,
      inputErrors: 600n,
      crcErrors: 400n,
      outputErrors: 5n,
      inputDrops: 15n,
      outputDrops: 2n,
      overallErrorCrcRatio: 0.025,
    });
  });

  it('should guard the overall ratio when no input packets were counted', () => {
    const totals = aggregateTotals([
      deriveInterfaceMetrics({ ...createInterfaceCounters('Gi0/9'), outputPackets: 10n, inputErrors: 3n }),
    ]);

    expect(totals.inputErrors).toBe(3n);
    expect(totals.overallErrorCrcRatio).toBe(0);
  });

  it('should keep sums exact beyond 2^53', () => {
    const big = (name: string) => deriveInterfaceMetrics({
      ...createInterfaceCounters(name),
      inputPackets: 9007199254740993n,
      crcErrors: 9007199254740993n,
    });

    const totals = aggregateTotals([big('Te0/0/0'), big('Te0/0/1')]);

    expect(totals.inputPackets).toBe(18014398509481986n);
    expect(totals.crcErrors).toBe(18014398509481986n);
    expect(totals.overallErrorCrcRatio).toBe(100);
  });
});
