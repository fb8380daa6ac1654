import { formatTimestamp } from "./decode.js";

export const NOT_AVAILABLE = "n/a";

// Floats always show a decimal part: 29 -> "29.0", 1.5 -> "1.5"
export const formatFloat = (n: number): string => (Number.isInteger(n) ? n.toFixed(1) : String(n));

export const present = <T>(column: readonly (T | null)[]): T[] => column.filter((v): v is T => v !== null);

export function numericStats(
  column: readonly (number | null)[],
  formatBound: (n: number) => string
): Map<string, string> {
  const values = present(column);
  const stats = new Map<string, string>([["Count", String(values.length)]]);
  if (!values.length) {
    stats.set("Min", NOT_AVAILABLE);
    stats.set("Mean", NOT_AVAILABLE);
    stats.set("Max", NOT_AVAILABLE);
    return stats;
  }
  let min = values[0];
  let max = values[0];
  let sum = 0;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
    sum += v;
  }
  stats.set("Min", formatBound(min));
  stats.set("Mean", formatFloat(sum / values.length));
  stats.set("Max", formatBound(max));
  return stats;
}

export function timestampStats(column: readonly (Date | null)[]): Map<string, string> {
  const values = present(column);
  const stats = new Map<string, string>([["Count", String(values.length)]]);
  if (!values.length) {
    stats.set("Earliest", NOT_AVAILABLE);
    stats.set("Latest", NOT_AVAILABLE);
    return stats;
  }
  let earliest = values[0];
  let latest = values[0];
  for (const v of values) {
    if (v.getTime() < earliest.getTime()) earliest = v;
    if (v.getTime() > latest.getTime()) latest = v;
  }
  stats.set("Earliest", formatTimestamp(earliest));
  stats.set("Latest", formatTimestamp(latest));
  return stats;
}

export function countWhere<T>(column: readonly (T | null)[], pred: (v: T) => boolean): number {
  let n = 0;
  for (const v of column) if (v !== null && pred(v)) n++;
  return n;
}
