/**
 * Round to specified decimal places.
 */
export function round(value: number, decimals: number = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Events per unit; 0 when the denominator is 0.
 */
export function rate(count: number, denominator: number, decimals: number = 2): number {
  if (denominator <= 0) return 0;
  return round(count / denominator, decimals);
}

/**
 * Share of a total as a percentage (0–100); 0 when the total is 0.
 */
export function percentage(part: number, total: number, decimals: number = 1): number {
  if (total <= 0) return 0;
  return round((part / total) * 100, decimals);
}
