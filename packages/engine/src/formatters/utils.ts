/**
 * Formatter Utilities
 */

/**
 * Format a ratio as a percentage with two decimals
 */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}
