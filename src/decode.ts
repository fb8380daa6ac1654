import type { DecodeResult, Issue } from "./types.js";

/**
 * Module: Cell Decoders
 * Purpose: Parse single raw cells against each kind's grammar.
 * Decoders never throw: a cell that does not parse yields no value and an
 * `error`-level issue; the table decides whether that issue is fatal.
 */
const INTEGER_RE = /^[+-]?\d+$/;
const TIMESTAMP_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
// Leading and trailing non-numeric text is dropped; exactly one number must remain.
const LENIENT_NUMBER_RE = /^\D*?([+-]?(?:\d[\d,]*(?:\.\d+)?|\.\d+))\D*$/;

const fail = (field: string, code: string, msg: string): { issues: Issue[] } => ({
  issues: [{ field, code, msg, level: "error" }],
});

export function parseIntegerCell(field: string, raw: string): DecodeResult<number> {
  const s = raw.trim();
  if (!s) return { issues: [] };
  if (!INTEGER_RE.test(s)) return fail(field, "E_INT", `not an integer: "${raw}"`);
  const n = Number.parseInt(s, 10);
  if (!Number.isSafeInteger(n)) return fail(field, "E_INT", `integer out of range: "${raw}"`);
  return { value: n, issues: [] };
}

/**
 * Integer grammar, then nonzero -> true. Shared by the boolean kind so both kinds
 * accept and reject exactly the same cells.
 */
export function parseBooleanCell(field: string, raw: string): DecodeResult<boolean> {
  const n = parseIntegerCell(field, raw);
  if (n.value === undefined) return { issues: n.issues };
  return { value: n.value !== 0, issues: [] };
}

export function parseTimestampCell(field: string, raw: string): DecodeResult<Date> {
  const s = raw.trim();
  if (!s) return { issues: [] };
  const m = TIMESTAMP_RE.exec(s);
  if (!m) return fail(field, "E_DATE_FMT", `use YYYY-MM-DD HH:MM:SS, got "${raw}"`);
  const [yy, mo, dd, hh, mi, ss] = m.slice(1).map(Number);
  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
  const dt = new Date(0);
  dt.setUTCFullYear(yy, mo - 1, dd);
  dt.setUTCHours(hh, mi, ss, 0);
  const sameParts =
    dt.getUTCFullYear() === yy &&
    dt.getUTCMonth() === mo - 1 &&
    dt.getUTCDate() === dd &&
    dt.getUTCHours() === hh &&
    dt.getUTCMinutes() === mi &&
    dt.getUTCSeconds() === ss;
  if (!sameParts) return fail(field, "E_DATE_RANGE", `no such date or time: "${raw}"`);
  return { value: dt, issues: [] };
}

export function parseLenientNumberCell(field: string, raw: string): DecodeResult<number> {
  const s = raw.trim();
  if (!s) return { issues: [] };
  const m = LENIENT_NUMBER_RE.exec(s);
  if (!m) return fail(field, "E_NUM", `no number found in "${raw}"`);
  const n = Number(m[1].replace(/,/g, ""));
  if (!Number.isFinite(n)) return fail(field, "E_NUM", `no number found in "${raw}"`);
  return { value: n, issues: [] };
}

export function formatTimestamp(dt: Date): string {
  return dt.toISOString().slice(0, 19).replace("T", " ");
}
