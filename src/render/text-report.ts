import { formatCount, formatPercent, formatRatio, formatRow, rule } from '../utils/format.js';
import type { InterfaceErrorReport, RankedInterface } from '../types/report.js';

function toJsonValue(_key: string, value: unknown): unknown {
  // JSON has no 64-bit integers; counters go out as decimal strings
  return typeof value === 'bigint' ? value.toString() : value;
}

function renderHeader(): string[] {
  return [
    rule('=', 120),
    'INTERFACE ERROR AND CRC ANALYSIS',
    rule('=', 120),
    'Analysis of high-traffic interfaces (5-min rate ≥ 100k packets/sec)',
    'Showing (Error + CRC) / Input_Packets ratio',
    rule('=', 120),
  ];
}

function renderSummary(report: InterfaceErrorReport): string[] {
  const { summary } = report;
  return [
    '',
    'SUMMARY:',
    `Total high-traffic interfaces analyzed: ${summary.analyzedInterfaces}`,
    `Interfaces with error/CRC issues: ${summary.interfacesWithIssues}`,
    `Percentage with issues: ${formatPercent(summary.issuePercentage)}`,
  ];
}

function renderTopErrorCrc(entries: readonly RankedInterface[], limit: number): string[] {
  const lines = [
    '',
    `TOP ${limit} INTERFACES BY (ERROR + CRC) / INPUT_PACKETS RATIO:`,
    rule('-', 80),
    formatRow([['Rank', 4], ['Interface', 25], ['(E+CRC)%', 12], ['Error+CRC', 12], ['Input Pkts', 15], ['Status', 10]]),
    rule('-', 80),
  ];

  for (const { rank, metrics: m, ratio, severity } of entries) {
    lines.push(formatRow([
      [rank, 4],
      [m.name, 25],
      [formatRatio(ratio), 12],
      [formatCount(m.inputErrors + m.crcErrors), 12],
      [formatCount(m.inputPackets), 15],
      [severity, 10],
    ]));
  }

  lines.push('', `DETAILED BREAKDOWN OF TOP ${limit}:`, rule('-', 80));
  for (const { rank, metrics: m } of entries) {
    lines.push(
      '',
      `${rank}. Interface: ${m.name}`,
      `   Input Packets:        ${formatCount(m.inputPackets)}`,
      `   Input Errors:         ${formatCount(m.inputErrors)}`,
      `   CRC Errors:           ${formatCount(m.crcErrors)}`,
      `   Error + CRC Sum:      ${formatCount(m.inputErrors + m.crcErrors)}`,
      `   (Error+CRC)/Input:    ${formatRatio(m.errorCrcRatio)}%`,
      `   Error/Input Ratio:    ${formatRatio(m.errorRatio)}%`,
      `   CRC/Input Ratio:      ${formatRatio(m.crcRatio)}%`,
    );
    if (m.frameErrors > 0n) lines.push(`   Frame Errors:         ${formatCount(m.frameErrors)}`);
    if (m.outputErrors > 0n) lines.push(`   Output Errors:        ${formatCount(m.outputErrors)}`);
    if (m.inputDrops > 0n || m.outputDrops > 0n) {
      lines.push(
        `   Input Drops:          ${formatCount(m.inputDrops)}`,
        `   Output Drops:         ${formatCount(m.outputDrops)}`,
      );
    }
  }
  return lines;
}

function renderTopOutputErrors(entries: readonly RankedInterface[], limit: number): string[] {
  if (entries.length === 0) {
    return [
      '',
      'NO OUTPUT ERRORS FOUND',
      rule('=', 50),
      'All high-traffic interfaces have 0 output errors.',
    ];
  }

  const lines = [
    '',
    `TOP ${limit} INTERFACES BY OUTPUT ERROR RATIO:`,
    rule('=', 80),
    'Analysis of interfaces with output errors / output_packets',
    rule('=', 80),
    formatRow([['Rank', 4], ['Interface', 25], ['Output Err%', 12], ['Output Errors', 15], ['Output Pkts', 15], ['Status', 10]]),
    rule('-', 80),
  ];

  for (const { rank, metrics: m, ratio, severity } of entries) {
    lines.push(formatRow([
      [rank, 4],
      [m.name, 25],
      [formatRatio(ratio), 12],
      [formatCount(m.outputErrors), 15],
      [formatCount(m.outputPackets), 15],
      [severity, 10],
    ]));
  }

  lines.push('', `DETAILED BREAKDOWN OF TOP ${limit} OUTPUT ERROR INTERFACES:`, rule('-', 80));
  for (const { rank, metrics: m } of entries) {
    lines.push(
      '',
      `${rank}. Interface: ${m.name}`,
      `   Output Packets:       ${formatCount(m.outputPackets)}`,
      `   Output Errors:        ${formatCount(m.outputErrors)}`,
      `   Output Error Ratio:   ${formatRatio(m.outputErrorRatio)}%`,
      `   Underruns:            ${formatCount(m.underruns)}`,
    );
    if (m.outputDrops > 0n) lines.push(`   Output Drops:         ${formatCount(m.outputDrops)}`);
  }
  return lines;
}

function renderComplete(report: InterfaceErrorReport): string[] {
  const lines = [
    '',
    '',
    rule('=', 100),
    'COMPLETE HIGH-TRAFFIC INTERFACE ANALYSIS',
    rule('=', 100),
    'All interfaces with 5-minute rate ≥ 100k packets/sec, sorted by error+CRC ratio',
    rule('=', 100),
    formatRow([['Interface', 25], ['Input Pkts', 15], ['E+CRC', 10], ['(E+CRC)%', 12], ['Classification', 15]]),
    rule('-', 80),
  ];

  for (const { metrics: m, ratio, severity } of report.complete) {
    lines.push(formatRow([
      [m.name, 25],
      [formatCount(m.inputPackets), 15],
      [formatCount(m.inputErrors + m.crcErrors), 10],
      [formatRatio(ratio), 12],
      [severity, 15],
    ]));
  }

  const { totals } = report;
  lines.push(
    '',
    rule('=', 80),
    'NETWORK-WIDE STATISTICS (High-Traffic Interfaces Only)',
    rule('=', 80),
    `Total Input Packets:      ${formatCount(totals.inputPackets)}`,
    `Total Output Packets:     ${formatCount(totals.outputPackets)}`,
    `Total Input Errors:       ${formatCount(totals.inputErrors)}`,
    `Total CRC Errors:         ${formatCount(totals.crcErrors)}`,
    `Total Output Errors:      ${formatCount(totals.outputErrors)}`,
    `Total Input Drops:        ${formatCount(totals.inputDrops)}`,
    `Total Output Drops:       ${formatCount(totals.outputDrops)}`,
    `Overall (Error+CRC)/Input Rate: ${formatRatio(totals.overallErrorCrcRatio)}%`,
  );
  return lines;
}

function renderNoData(report: InterfaceErrorReport): string[] {
  const { source, summary } = report;
  if (source.status !== 'ok') {
    return [`No interface data could be parsed: ${source.error ?? source.status}`];
  }
  if (summary.parsedInterfaces > 0) {
    return [
      `Parsed ${summary.parsedInterfaces} interfaces, none with 5-minute rate ≥ 100k packets/sec and non-zero traffic.`,
      'No qualifying interface data found (after filtering test ports).',
    ];
  }
  return ['No interface data could be parsed from the input.'];
}

export function renderTextReport(report: InterfaceErrorReport): string[] {
  const lines: string[] = [];
  if (report.source.path !== undefined) {
    lines.push(`Parsing interface data from ${report.source.path}...`);
  }
  lines.push('Filtering out test ports (5-minute rate < 100k packets/sec)...');

  if (report.summary.analyzedInterfaces === 0) {
    lines.push(...renderNoData(report));
  } else {
    lines.push(
      `Successfully parsed ${report.summary.analyzedInterfaces} high-traffic interfaces.`,
      ...renderHeader(),
      ...renderSummary(report),
      ...renderTopErrorCrc(report.topErrorCrc, report.limits.topErrorCrc),
      ...renderTopOutputErrors(report.topOutputErrors, report.limits.topOutputErrors),
      ...renderComplete(report),
    );
  }

  lines.push('', rule('=', 80), 'ANALYSIS COMPLETE', rule('=', 80));
  return lines;
}

export function renderJsonReport(report: InterfaceErrorReport): string {
  return JSON.stringify(report, toJsonValue, 2);
}
