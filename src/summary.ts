import { findField } from "./schema.js";
import type { Table } from "./table.js";
import type { FieldKind, SummaryStats } from "./types.js";

/**
 * Module: Field Summaries
 * Purpose: Per-field aggregate statistics over a table's decoded columns.
 * Summaries are read-only and recomputed on every call, so they may be taken
 * between ingested rows as well as after the last one.
 */
export interface FieldSummary {
  key: string;
  label: string;
  kind: FieldKind;
  stats: SummaryStats;
}

export function summarizeField(table: Table, key: string): FieldSummary {
  const field = findField(table.schema, key);
  if (!field) throw new RangeError(`unknown column "${key}"`);
  const { spec } = field;
  return { key: spec.key, label: spec.label, kind: spec.kind, stats: spec.summarize(table.column(key)) };
}

export function summarizeTable(table: Table): FieldSummary[] {
  return table.schema.fields.map(({ spec }) => summarizeField(table, spec.key));
}
