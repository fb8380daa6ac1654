import { resolveDecodePolicies } from "./config.js";
import { FieldDecodeError, RowShapeError } from "./errors.js";
import type { Schema } from "./schema.js";
import type { ColumnValue, DecodePolicies, ParseOptions, ParsedRowIssue } from "./types.js";

/**
 * Module: Response Table
 * Purpose: Column store filled one data row at a time against a schema's column mapping.
 * Design:
 * - Ingestion is atomic: a row is decoded in full before any column grows.
 * - A decoder error is fatal or downgraded to a warning according to the kind's decode policy.
 * - Row numbers are 1-based file rows counting the header, so the first data row is 2.
 */
export class Table {
  readonly schema: Schema;
  readonly policies: DecodePolicies;
  private readonly store = new Map<string, ColumnValue[]>();
  private readonly issues: ParsedRowIssue[] = [];
  private readonly onDiagnostic?: (issue: ParsedRowIssue) => void;
  private rows = 0;

  constructor(schema: Schema, options?: ParseOptions) {
    this.schema = schema;
    this.policies = resolveDecodePolicies(options?.policies, options?.env);
    this.onDiagnostic = options?.onDiagnostic;
    for (const { spec } of schema.fields) this.store.set(spec.key, []);
  }

  get rowCount(): number {
    return this.rows;
  }

  get diagnostics(): readonly ParsedRowIssue[] {
    return this.issues;
  }

  ingest(row: readonly string[]): void {
    const rowNumber = this.rows + 2;
    if (row.length !== this.schema.width) throw new RowShapeError(rowNumber, this.schema.width, row.length);

    const decoded: ColumnValue[] = [];
    const warnings: ParsedRowIssue[] = [];
    for (const { spec, range } of this.schema.fields) {
      const cells = row.slice(range.start, range.end);
      const { value, issues } = spec.decode(cells);
      const failed = issues.find((i) => i.level === "error");
      if (failed && this.policies[spec.kind] === "strict") throw new FieldDecodeError(rowNumber, failed, cells);
      for (const issue of issues) {
        warnings.push({ row: rowNumber, field: issue.field, code: issue.code, message: issue.msg, level: "warn" });
      }
      decoded.push(failed ? null : value ?? null);
    }

    this.schema.fields.forEach(({ spec }, i) => this.columnOf(spec.key).push(decoded[i]));
    this.rows++;
    this.issues.push(...warnings);
    for (const w of warnings) this.onDiagnostic?.(w);
  }

  column(key: string): readonly ColumnValue[] {
    return this.columnOf(key);
  }

  row(index: number): Record<string, ColumnValue> {
    if (!Number.isInteger(index) || index < 0 || index >= this.rows) {
      throw new RangeError(`row index ${index} outside 0-${this.rows - 1}`);
    }
    const out: Record<string, ColumnValue> = {};
    for (const { spec } of this.schema.fields) out[spec.key] = this.columnOf(spec.key)[index];
    return out;
  }

  // Snapshot of every column in schema order
  columns(): Record<string, readonly ColumnValue[]> {
    const out: Record<string, readonly ColumnValue[]> = {};
    for (const { spec } of this.schema.fields) out[spec.key] = [...this.columnOf(spec.key)];
    return out;
  }

  private columnOf(key: string): ColumnValue[] {
    const col = this.store.get(key);
    if (!col) throw new RangeError(`unknown column "${key}"`);
    return col;
  }
}
