import { describe, it, expect } from 'vitest';
import { formatCount, formatPercent, formatRatio, formatRow, rule } from '../../src/utils/format.js';

describe('formatCount', () => {
  it('should add thousands separators', () => {
    expect(formatCount(0)).toBe('0');
    expect(formatCount(999)).toBe('999');
    expect(formatCount(1234567)).toBe('1,234,567');
  });

  it('should format bigint counters exactly', () => {
    expect(formatCount(0n)).toBe('0');
    expect(formatCount(18446744073709551615n)).toBe('18,446,744,073,709,551,615');
  });
});

describe('formatRatio', () => {
  it('should print six decimal places', () => {
    expect(formatRatio(0.08)).toBe('0.080000');
    expect(formatRatio(2)).toBe('2.000000');
    expect(formatRatio(0.0000004)).toBe('0.000000');
  });
});

describe('formatPercent', () => {
  it('should print one decimal place by default', () => {
    expect(formatPercent(75)).toBe('75.0%');
    expect(formatPercent(33.333, 2)).toBe('33.33%');
  });
});

describe('formatRow', () => {
  it('should pad each column and trim the end', () => {
    expect(formatRow([['Rank', 6], [1, 3], ['LOW', 10]])).toBe('Rank   1   LOW');
  });

  it('should not truncate values wider than the column', () => {
    expect(formatRow([['TenGigabitEthernet1/0/1', 5], ['x', 1]])).toBe('TenGigabitEthernet1/0/1 x');
  });
});

describe('rule', () => {
  it('should repeat the character', () => {
    expect(rule('=', 5)).toBe('=====');
  });
});
