import type { Point } from '../types.js';

const SIGNIFICANT_DIGITS = 6;

function stripTrailingZeros(digits: string): string {
  return digits.includes('.') ? digits.replace(/\.?0+$/, '') : digits;
}

/**
 * Renders a coordinate in `%g` style with six significant digits:
 * `1234567.125` becomes `1.23457e+06`, `0.1234567` becomes `0.123457`,
 * `6` stays `6`.
 */
export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';
  if (value === 0) return Object.is(value, -0) ? '-0' : '0';

  const [mantissa = '', exponentText = '0'] = value.toExponential(SIGNIFICANT_DIGITS - 1).split('e');
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= SIGNIFICANT_DIGITS) {
    const sign = exponent < 0 ? '-' : '+';
    return `${stripTrailingZeros(mantissa)}e${sign}${String(Math.abs(exponent)).padStart(2, '0')}`;
  }
  return stripTrailingZeros(value.toFixed(SIGNIFICANT_DIGITS - 1 - exponent));
}

/** One `"<x> <y>"` line per point, each newline-terminated. */
export function formatPoints(points: readonly Point[]): string {
  return points.map((p) => `${formatNumber(p.x)} ${formatNumber(p.y)}\n`).join('');
}
