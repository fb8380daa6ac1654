import type { ColumnRange, Issue } from "./types.js";

/**
 * Module: Import Errors
 * Purpose: Fatal failures of schema assembly, header validation and row ingestion.
 * Every error carries a stable `code` so callers can branch without parsing messages.
 */
export class ImportError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class SchemaDefinitionError extends ImportError {
  constructor(message: string) {
    super("E_SCHEMA_DEFINITION", message);
  }
}

export class MissingHeaderError extends ImportError {
  constructor() {
    super("E_HEADER_MISSING", "export has no header row");
  }
}

const formatRange = (range: ColumnRange): string =>
  range.end - range.start === 1 ? `column ${range.start}` : `columns ${range.start}-${range.end - 1}`;

const formatSet = (cells: readonly string[]): string => `{${cells.map((c) => c.trim()).join(", ")}}`;

export class HeaderValidationError extends ImportError {
  readonly label: string;
  readonly range: ColumnRange;
  readonly expected: readonly string[];
  readonly found: readonly string[];

  constructor(label: string, range: ColumnRange, expected: readonly string[], found: readonly string[]) {
    super(
      "E_HEADER_MISMATCH",
      `could not confirm field "${label}": expected ${formatSet(expected)} at ${formatRange(range)}, found ${formatSet(found)}`
    );
    this.label = label;
    this.range = range;
    this.expected = expected;
    this.found = found;
  }
}

export class WidthMismatchError extends ImportError {
  readonly required: number;
  readonly available: number;

  constructor(message: string, required: number, available: number) {
    super("E_WIDTH_MISMATCH", message);
    this.required = required;
    this.available = available;
  }
}

export class RowShapeError extends ImportError {
  readonly row: number;

  constructor(row: number, expected: number, actual: number) {
    super("E_ROW_SHAPE", `row ${row} has ${actual} cells, header has ${expected}`);
    this.row = row;
  }
}

export class FieldDecodeError extends ImportError {
  readonly row: number;
  readonly field: string;
  readonly cells: readonly string[];

  constructor(row: number, issue: Issue, cells: readonly string[]) {
    super(issue.code, `row ${row}, field "${issue.field}": ${issue.msg}`);
    this.row = row;
    this.field = issue.field;
    this.cells = cells;
  }
}
