/**
 * Human-readable size formatting
 */

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB", "PB"] as const;

export type FormatSizeOptions = {
  /** Decimal places above bytes (default: 1) */
  precision?: number;
  /** Append the exact byte count, e.g. "1.5 KB (1536 bytes)" */
  exact?: boolean;
};

/**
 * Format bytes into a human-readable string using 1024-based units.
 *
 * @example formatSize(0) → "0 B"
 * @example formatSize(1536) → "1.5 KB"
 * @example formatSize(1536, { exact: true }) → "1.5 KB (1536 bytes)"
 */
export function formatSize(bytes: number, options: FormatSizeOptions = {}): string {
  const precision = options.precision ?? 1;

  let unit = 0;
  let value = bytes;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }

  const scaled = unit === 0 ? String(value) : value.toFixed(precision);
  const formatted = `${scaled} ${SIZE_UNITS[unit]}`;
  return options.exact && unit > 0 ? `${formatted} (${bytes} bytes)` : formatted;
}
