import { createChildLogger } from '../utils/logger.js';
import { RawInterfaceCountersSchema } from '../types/interface.js';
import type {
  CounterField,
  InterfaceScanStats,
  RawInterfaceCounters,
} from '../types/interface.js';

const logger = createChildLogger('interface-parser');

/** Interface header, e.g. `GigabitEthernet0/1 is up` or `Bundle-Ether1.100 is down` */
export const INTERFACE_HEADER_PATTERN = /^([A-Za-z][A-Za-z0-9\-./]+)\s+is\s+(up|down)/;

interface FieldRule {
  name: string;
  pattern: RegExp;
  /** Counter fields filled from the capture groups, in group order */
  fields: readonly CounterField[];
}

/**
 * Statistic lines recognized under the current interface. Tried in order;
 * the first rule that matches a line consumes it.
 */
export const FIELD_RULES: readonly FieldRule[] = [
  {
    name: 'input_rate',
    pattern: /5 minute input rate.*?(\d+) packets\/sec/,
    fields: ['inputRate'],
  },
  {
    name: 'output_rate',
    pattern: /5 minute output rate.*?(\d+) packets\/sec/,
    fields: ['outputRate'],
  },
  {
    name: 'input_packets',
    pattern: /(\d+) packets input.*?(\d+) total input drops/,
    fields: ['inputPackets', 'inputDrops'],
  },
  {
    name: 'output_packets',
    pattern: /(\d+) packets output.*?(\d+) total output drops/,
    fields: ['outputPackets', 'outputDrops'],
  },
  {
    name: 'input_errors',
    pattern: /(\d+) input errors, (\d+) CRC, (\d+) frame, (\d+) overrun, (\d+) ignored, (\d+) abort/,
    fields: ['inputErrors', 'crcErrors', 'frameErrors', 'overrunErrors', 'ignoredErrors', 'abortErrors'],
  },
  {
    name: 'output_errors',
    pattern: /(\d+) output errors, (\d+) underruns/,
    fields: ['outputErrors', 'underruns'],
  },
];

export function createInterfaceCounters(name: string): RawInterfaceCounters {
  return RawInterfaceCountersSchema.parse({ name });
}

export interface InterfaceScanResult {
  interfaces: Map<string, RawInterfaceCounters>;
  stats: InterfaceScanStats;
}

interface ScanState {
  interfaces: Map<string, RawInterfaceCounters>;
  current: string | null;
  headerLines: number;
  matchedLines: number;
  duplicateHeaders: string[];
}

function applyRule(
  record: RawInterfaceCounters,
  rule: FieldRule,
  match: RegExpMatchArray
): RawInterfaceCounters {
  const updated = { ...record };
  rule.fields.forEach((field, index) => {
    updated[field] = BigInt(match[index + 1] ?? '0');
  });
  return updated;
}

function scanLine(state: ScanState, rawLine: string): ScanState {
  const line = rawLine.trim();

  const name = INTERFACE_HEADER_PATTERN.exec(line)?.[1];
  if (name !== undefined) {
    if (state.interfaces.has(name)) {
      // last header wins; the earlier block's counters are discarded
      state.duplicateHeaders.push(name);
    }
    state.interfaces.set(name, createInterfaceCounters(name));
    return { ...state, current: name, headerLines: state.headerLines + 1 };
  }

  if (state.current === null) return state;
  const record = state.interfaces.get(state.current);
  if (!record) return state;

  for (const rule of FIELD_RULES) {
    const match = line.match(rule.pattern);
    if (match) {
      logger.trace({ interface: state.current, rule: rule.name }, 'Statistic line matched');
      state.interfaces.set(state.current, applyRule(record, rule, match));
      return { ...state, matchedLines: state.matchedLines + 1 };
    }
  }

  return state;
}

/**
 * Scans "show interface" output and collects counters per interface.
 *
 * Unrecognized lines are ignored, and counters never reported for an
 * interface stay at 0. Map iteration order is the order in which each
 * interface name first appeared.
 */
export function scanInterfaceText(text: string): InterfaceScanResult {
  // a bare \r also ends a line (terminal captures, pager residue)
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') lines.pop();

  const initial: ScanState = {
    interfaces: new Map(),
    current: null,
    headerLines: 0,
    matchedLines: 0,
    duplicateHeaders: [],
  };
  const final = lines.reduce(scanLine, initial);

  const stats: InterfaceScanStats = {
    totalLines: lines.length,
    headerLines: final.headerLines,
    matchedLines: final.matchedLines,
    duplicateHeaders: final.duplicateHeaders,
  };

  if (stats.duplicateHeaders.length > 0) {
    logger.warn({ duplicates: stats.duplicateHeaders }, 'Repeated interface headers, keeping last occurrence');
  }
  logger.debug({ ...stats, interfaces: final.interfaces.size }, 'Interface scan complete');

  return { interfaces: final.interfaces, stats };
}

export function parseInterfaceCounters(text: string): Map<string, RawInterfaceCounters> {
  return scanInterfaceText(text).interfaces;
}
