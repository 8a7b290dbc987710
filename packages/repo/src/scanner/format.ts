const thousands = new Intl.NumberFormat('en-US');

/** `12345` -> `"12,345"` */
export function formatNumber(value: number): string {
  return thousands.format(value);
}

/**
 * Compact count for notifications: `"850 tokens"`, `"1.5K tokens"`, `"2K tokens"`.
 */
export function formatTokenCount(count: number, unit: string): string {
  if (count < 1000) {
    return `${count} ${unit}`;
  }
  const thousandsValue = (count / 1000).toFixed(1).replace(/\.0$/, '');
  return `${thousandsValue}K ${unit}`;
}
