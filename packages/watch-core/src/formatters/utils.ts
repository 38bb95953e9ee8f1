/**
 * Formatter Utilities
 */

export function formatDuration(seconds: number): string {
  return `${seconds.toFixed(2)}s`;
}

/**
 * Display form of an optional value
 */
export function orDash(value: string | null | undefined): string {
  return value && value.trim() ? value : '-';
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}
