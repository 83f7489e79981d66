/**
 * Terminal formatting helpers shared by the human formatter
 */

export const StatusSymbols = {
  success: '✔',
  failure: '✖',
  warning: '⚠',
  info: 'ℹ',
  retry: '↻',
  skipped: '⊘',
  started: '▶',
  cancelled: '◼',
} as const;

export function divider(width = 60, char = '─'): string {
  return char.repeat(width);
}

/**
 * 850 → "850ms", 2500 → "2.50s", 125000 → "2m 5s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Pad every column to its widest cell; the first row is the header
 */
export function alignColumns(rows: readonly (readonly string[])[]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row
      .map((cell, index) => (index === row.length - 1 ? cell : cell.padEnd(widths[index] ?? 0)))
      .join('  ')
  );
}
