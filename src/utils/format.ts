const gbp = new Intl.NumberFormat('en-GB', {
  style: 'currency',
  currency: 'GBP',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const gbpWhole = new Intl.NumberFormat('en-GB', {
  style: 'currency',
  currency: 'GBP',
  maximumFractionDigits: 0,
});

const grouped = new Intl.NumberFormat('en-GB', { maximumFractionDigits: 0 });

export function formatGBP(amount: number, wholePounds = false): string {
  return wholePounds ? gbpWhole.format(amount) : gbp.format(amount);
}

export function formatNumber(value: number): string {
  return grouped.format(value);
}

export function roundTo(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
