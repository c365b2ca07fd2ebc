const countFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** Integer with en-US thousands separators, e.g. `1,234,567`. Exact for bigint. */
export function formatCount(value: number | bigint): string {
  return countFormat.format(value);
}

/** Percentage ratio to 6 decimal places, without the `%` sign. */
export function formatRatio(value: number): string {
  return value.toFixed(6);
}

export function formatPercent(value: number, digits = 1): string {
  return `${value.toFixed(digits)}%`;
}

export type Column = readonly [value: string | number, width: number];

/** Left-aligned fixed-width cells joined by a single space. */
export function formatRow(columns: readonly Column[]): string {
  return columns
    .map(([value, width]) => String(value).padEnd(width))
    .join(' ')
    .trimEnd();
}

export function rule(char: string, width: number): string {
  return char.repeat(width);
}
