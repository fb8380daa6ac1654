import { HeaderValidationError, SchemaDefinitionError, WidthMismatchError } from "./errors.js";
import { LEADING_FIELDS, TRAILING_FIELDS, type FieldSpec } from "./fields.js";
import type { ColumnRange } from "./types.js";

/**
 * Module: Schema & Column Mapping
 * Purpose: Bind an ordered list of field specs to a header row.
 * Design:
 * - The response id leads and the start/submit dates and network id trail every schema.
 * - Each field owns a contiguous half-open span; spans are gapless and cover the header exactly.
 * - Construction is all-or-nothing: width is checked before any header text.
 */
export interface ResolvedField {
  readonly spec: FieldSpec;
  readonly range: ColumnRange;
}

export interface Schema {
  readonly fields: readonly ResolvedField[];
  readonly header: readonly string[];
  readonly width: number;
}

/**
 * Prepend/append the fixed export columns and reject duplicate output keys.
 */
export function assembleFields(fields: readonly FieldSpec[]): FieldSpec[] {
  const all = [...LEADING_FIELDS, ...fields, ...TRAILING_FIELDS];
  const seen = new Set<string>();
  for (const f of all) {
    if (seen.has(f.key)) throw new SchemaDefinitionError(`duplicate output key "${f.key}"`);
    seen.add(f.key);
  }
  return all;
}

function allocateRanges(fields: readonly FieldSpec[], headerWidth: number): ColumnRange[] {
  const ranges: ColumnRange[] = [];
  let cursor = 0;
  for (const f of fields) {
    const end = cursor + f.width;
    if (end > headerWidth) {
      throw new WidthMismatchError(
        `field "${f.label}" needs ${f.width} column(s) from column ${cursor}, header has ${headerWidth - cursor} left`,
        f.width,
        headerWidth - cursor
      );
    }
    ranges.push({ start: cursor, end });
    cursor = end;
  }
  if (cursor < headerWidth) {
    throw new WidthMismatchError(
      `fields cover ${cursor} column(s), header has ${headerWidth}; columns ${cursor}-${headerWidth - 1} are unclaimed`,
      cursor,
      headerWidth
    );
  }
  return ranges;
}

/**
 * Build the immutable schema for an export's header row.
 * Throws `SchemaDefinitionError`, `WidthMismatchError` or `HeaderValidationError`.
 */
export function buildSchema(fields: readonly FieldSpec[], header: readonly string[]): Schema {
  const all = assembleFields(fields);
  const ranges = allocateRanges(all, header.length);
  const resolved = all.map((spec, i) => {
    const range = Object.freeze(ranges[i]);
    const cells = header.slice(range.start, range.end);
    if (!spec.validateHeader(cells)) {
      throw new HeaderValidationError(spec.label, range, spec.expectedHeader, cells);
    }
    return Object.freeze({ spec, range });
  });
  return Object.freeze({
    fields: Object.freeze(resolved),
    header: Object.freeze([...header]),
    width: header.length,
  });
}

export function findField(schema: Schema, key: string): ResolvedField | undefined {
  return schema.fields.find((f) => f.spec.key === key);
}
