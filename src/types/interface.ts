import { z } from 'zod';

/** Device counters are 64-bit; sums across a fleet pass 2^53 */
export const CounterSchema = z.bigint().nonnegative();

const counter = CounterSchema.default(0n);

export const RawInterfaceCountersSchema = z.object({
  name: z.string().min(1),
  inputPackets: counter,
  outputPackets: counter,
  // 5 minute rates, packets/sec
  inputRate: counter,
  outputRate: counter,
  inputErrors: counter,
  crcErrors: counter,
  frameErrors: counter,
  overrunErrors: counter,
  ignoredErrors: counter,
  abortErrors: counter,
  outputErrors: counter,
  underruns: counter,
  inputDrops: counter,
  outputDrops: counter,
});
export type RawInterfaceCounters = z.infer<typeof RawInterfaceCountersSchema>;

export type CounterField = Exclude<keyof RawInterfaceCounters, 'name'>;

export const InterfaceMetricsSchema = RawInterfaceCountersSchema.extend({
  totalPackets: CounterSchema,
  /** (input errors + CRC) / input packets, as a percentage */
  errorCrcRatio: z.number().nonnegative(),
  errorRatio: z.number().nonnegative(),
  crcRatio: z.number().nonnegative(),
  /** output errors / output packets, as a percentage */
  outputErrorRatio: z.number().nonnegative(),
});
export type InterfaceMetrics = Readonly<z.infer<typeof InterfaceMetricsSchema>>;

export const ExclusionReasonSchema = z.enum(['zero_traffic', 'below_rate_threshold']);
export type ExclusionReason = z.infer<typeof ExclusionReasonSchema>;

export const ExcludedInterfaceSchema = z.object({
  name: z.string(),
  reason: ExclusionReasonSchema,
});
export type ExcludedInterface = z.infer<typeof ExcludedInterfaceSchema>;

export const InterfaceScanStatsSchema = z.object({
  totalLines: z.number().int().nonnegative(),
  headerLines: z.number().int().nonnegative(),
  matchedLines: z.number().int().nonnegative(),
  duplicateHeaders: z.array(z.string()),
});
export type InterfaceScanStats = z.infer<typeof InterfaceScanStatsSchema>;
