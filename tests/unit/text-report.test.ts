import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { analyzeInterfaceText, emptyReport } from '../../src/core/error-analyzer.js';
import { renderJsonReport, renderTextReport } from '../../src/render/text-report.js';

const FIXTURE = fileURLToPath(new URL('../fixtures/show-interfaces.txt', import.meta.url));

describe('renderTextReport', () => {
  const report = analyzeInterfaceText(readFileSync(FIXTURE, 'utf-8'), {
    source: { path: 'int_error.txt', status: 'ok' },
  });
  const lines = renderTextReport(report);

  it('should open with the source and filter notice', () => {
    expect(lines.slice(0, 3)).toEqual([
      'Parsing interface data from int_error.txt...',
      'Filtering out test ports (5-minute rate < 100k packets/sec)...',
      'Successfully parsed 4 high-traffic interfaces.',
    ]);
  });

  it('should print the summary', () => {
    expect(lines).toContain('Total high-traffic interfaces analyzed: 4');
    expect(lines).toContain('Interfaces with error/CRC issues: 3');
    expect(lines).toContain('Percentage with issues: 75.0%');
  });

  it('should print fixed-width rows for the top error+CRC table', () => {
    expect(lines).toContain('TOP 10 INTERFACES BY (ERROR + CRC) / INPUT_PACKETS RATIO:');
    expect(lines).toContain('DETAILED BREAKDOWN OF TOP 10:');
    expect(lines).toContain(
      '1    Bundle-Ether1.100         2.000000     1,000        50,000          CRITICAL'
    );
  });

  it('should head the output error table with the configured limit', () => {
    expect(lines).toContain('TOP 5 INTERFACES BY OUTPUT ERROR RATIO:');
    expect(lines).toContain('DETAILED BREAKDOWN OF TOP 5 OUTPUT ERROR INTERFACES:');
  });

  it('should print breakdown details only when non-zero', () => {
    const start = lines.indexOf('1. Interface: Bundle-Ether1.100');
    const next = lines.indexOf('2. Interface: TenGigabitEthernet1/0/1');

    expect(lines.slice(start, next)).toEqual([
      '1. Interface: Bundle-Ether1.100',
      '   Input Packets:        50,000',
      '   Input Errors:         600',
      '   CRC Errors:           400',
      '   Error + CRC Sum:      1,000',
      '   (Error+CRC)/Input:    2.000000%',
      '   Error/Input Ratio:    1.200000%',
      '   CRC/Input Ratio:      0.800000%',
      '   Output Errors:        3',
      '   Input Drops:          7',
      '   Output Drops:         1',
      '',
    ]);
  });

  it('should classify every interface in the complete table', () => {
    expect(lines).toContain('Port-channel10            1,000,000       0          0.000000     GOOD');
  });

  it('should finish with network-wide statistics', () => {
    expect(lines).toContain('Total Input Packets:      4,050,000');
    expect(lines).toContain('Overall (Error+CRC)/Input Rate: 0.093827%');
    expect(lines.slice(-3)).toEqual([
      '='.repeat(80),
      'ANALYSIS COMPLETE',
      '='.repeat(80),
    ]);
  });

  it('should use custom limits in the headings', () => {
    const custom = renderTextReport(analyzeInterfaceText(readFileSync(FIXTURE, 'utf-8'), {
      topErrorCrcLimit: 2,
      topOutputErrorLimit: 1,
    }));

    expect(custom).toContain('TOP 2 INTERFACES BY (ERROR + CRC) / INPUT_PACKETS RATIO:');
    expect(custom).toContain('DETAILED BREAKDOWN OF TOP 2:');
    expect(custom).toContain('TOP 1 INTERFACES BY OUTPUT ERROR RATIO:');
  });

  it('should print totals past 2^53 without rounding', () => {
    const big = renderTextReport(analyzeInterfaceText(['Te0/0/0', 'Te0/0/1'].map(name => [
      `${name} is up`,
      '5 minute input rate 0 bits/sec, 200000 packets/sec',
      '9007199254740993 packets input, 0 bytes, 0 total input drops',
    ].join('\n')).join('\n')));

    expect(big).toContain('Total Input Packets:      18,014,398,509,481,986');
  });

  it('should note when no output errors were found', () => {
    const clean = renderTextReport(analyzeInterfaceText([
      'Gi0/1 is up',
      '5 minute input rate 0 bits/sec, 200000 packets/sec',
      '10 packets input, 640 bytes, 0 total input drops',
    ].join('\n')));

    expect(clean).toContain('NO OUTPUT ERRORS FOUND');
    expect(clean).toContain('All high-traffic interfaces have 0 output errors.');
  });
});

describe('renderTextReport without data', () => {
  it('should explain a source failure', () => {
    const lines = renderTextReport(emptyReport({
      path: '/missing.txt',
      status: 'unavailable',
      error: 'File /missing.txt not found',
    }));

    expect(lines).toContain('No interface data could be parsed: File /missing.txt not found');
    expect(lines).toContain('ANALYSIS COMPLETE');
    expect(lines).not.toContain('SUMMARY:');
  });

  it('should explain when every interface was filtered out', () => {
    const lines = renderTextReport(analyzeInterfaceText('Gi0/3 is down\n'));

    expect(lines).toContain('No qualifying interface data found (after filtering test ports).');
  });

  it('should explain clean empty input', () => {
    expect(renderTextReport(analyzeInterfaceText(''))).toContain(
      'No interface data could be parsed from the input.'
    );
  });
});

describe('renderJsonReport', () => {
  const report = analyzeInterfaceText(readFileSync(FIXTURE, 'utf-8'));
  const parsed: unknown = JSON.parse(renderJsonReport(report));

  it('should write counters as decimal strings and ratios as numbers', () => {
    expect(parsed).toMatchObject({
      limits: { topErrorCrc: 10, topOutputErrors: 5 },
      totals: {
        inputPackets: '4050000',
        outputPackets: '5900000',
        inputErrors: '2100',
        crcErrors: '1700',
        outputErrors: '43',
        inputDrops: '22',
        outputDrops: '3',
        overallErrorCrcRatio: (3800 / 4050000) * 100,
      },
    });
  });

  it('should keep every ranked entry', () => {
    expect(parsed).toMatchObject({
      complete: report.complete.map(r => ({ rank: r.rank, severity: r.severity, metrics: { name: r.metrics.name } })),
    });
  });
});
