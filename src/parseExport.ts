import { MissingHeaderError } from "./errors.js";
import type { FieldSpec } from "./fields.js";
import { buildSchema, type Schema } from "./schema.js";
import { Table } from "./table.js";
import { ENGINE_VERSION, type ParseOptions, type ParsedRowIssue } from "./types.js";

export interface ParsedExport {
  schema: Schema;
  table: Table;
  diagnostics: readonly ParsedRowIssue[];
  meta: {
    totalRows: number;     // Data rows ingested (header excluded)
    headerWidth: number;
    fieldCount: number;    // Fixed fields included
    engineVersion: string;
  };
}

/**
 * Module: Core Parsing Pipeline
 * Purpose: Header row -> schema -> table, one data row at a time.
 * Any fatal error (schema, header, row shape, strict decode) propagates and no
 * table is returned; warnings from lenient kinds ride along in `diagnostics`.
 */
export function parseExport(
  fields: readonly FieldSpec[],
  rows: Iterable<readonly string[]>,
  options?: ParseOptions
): ParsedExport {
  const it = rows[Symbol.iterator]();
  const first = it.next();
  if (first.done) throw new MissingHeaderError();

  const schema = buildSchema(fields, first.value);
  const table = new Table(schema, options);
  for (let next = it.next(); !next.done; next = it.next()) table.ingest(next.value);

  return {
    schema,
    table,
    diagnostics: table.diagnostics,
    meta: {
      totalRows: table.rowCount,
      headerWidth: schema.width,
      fieldCount: schema.fields.length,
      engineVersion: ENGINE_VERSION,
    },
  };
}
