import { parseCsvRaw } from "./csv.js";
import type { FieldSpec } from "./fields.js";
import { parseExport, type ParsedExport } from "./parseExport.js";
import type { ParseOptions } from "./types.js";
import { readXlsxToRows } from "./xlsx.js";

export * from "./types.js";
export * from "./errors.js";
export * from "./fields.js";
export { parseIntegerCell, parseBooleanCell, parseTimestampCell, parseLenientNumberCell, formatTimestamp } from "./decode.js";
export { buildSchema, assembleFields, findField, type Schema, type ResolvedField } from "./schema.js";
export { Table } from "./table.js";
export { summarizeField, summarizeTable, type FieldSummary } from "./summary.js";
export { DEFAULT_DECODE_POLICIES, resolveDecodePolicies } from "./config.js";
export { defineFields, readFieldDefinitionFile, fieldDefinitionSchema, type FieldDefinition } from "./definition.js";
export { parseCsvRaw, readXlsxToRows, parseExport, type ParsedExport };

/**
 * Module: Import Core Entry Point
 * Purpose: Decode survey response exports into typed column tables with per-field summaries.
 * Notes:
 * - The core (`parseExport`) takes rows of strings; reading files is left to the caller
 *   or to the buffer helper below.
 * - Everything is synchronous and single-pass.
 */
/**
 * Parse an export file (XLSX or CSV) from bytes.
 *
 * - `.xlsx`: main sheet read via `readXlsxToRows`.
 * - anything else: decoded as UTF-8 and tokenized with `parseCsvRaw`.
 *
 * Throws the same errors as `parseExport`.
 */
export function parseExportFromBuffer(
  fileBytes: ArrayBuffer | Uint8Array,
  filename: string,
  fields: readonly FieldSpec[],
  options?: ParseOptions
): ParsedExport {
  const rows = filename.toLowerCase().endsWith(".xlsx")
    ? readXlsxToRows(fileBytes)
    : parseCsvRaw(new TextDecoder("utf-8").decode(fileBytes));
  return parseExport(fields, rows, options);
}
