/**
 * Module: Public Types & Engine Version
 * Purpose: Define the field kinds, decoded value shapes, issue records, parse options
 * and result contract shared by the schema, table and summary layers.
 */
export type FieldKind =
  | "metadata"     // Export bookkeeping (response id, network id); raw text
  | "text"         // Free text answer
  | "timestamp"    // `YYYY-MM-DD HH:MM:SS`, UTC
  | "integer"      // Strict decimal integer
  | "number"       // Lenient number ("about 12 years" -> 12)
  | "boolean"      // 0/1 integer coerced to boolean
  | "choice"       // Single choice, one column holding the chosen label
  | "multi_choice"; // One column per option, holding the label when checked

export const FIELD_KINDS: readonly FieldKind[] = [
  "metadata",
  "text",
  "timestamp",
  "integer",
  "number",
  "boolean",
  "choice",
  "multi_choice",
];

export type DecodePolicy = "strict" | "lenient";
export type DecodePolicies = Readonly<Record<FieldKind, DecodePolicy>>;

export type IssueLevel = "error" | "warn";
// Issue raised by a single decoder; `field` is the output key of the FieldSpec
export type Issue = { field: string; code: string; msg: string; level: IssueLevel };

export type DecodeResult<T> = { value?: T; issues: Issue[] };

export type ChoiceSelection = Readonly<Record<string, boolean>>;
export type FieldValue = string | number | boolean | Date | ChoiceSelection;
export type ColumnValue = FieldValue | null;

// Half-open range of header/data column indexes
export interface ColumnRange {
  start: number;
  end: number;
}

// Ordered statistic name -> pre-formatted value
export type SummaryStats = ReadonlyMap<string, string>;

export interface ParsedRowIssue {
  row: number;    // 1-based file row, header included (first data row is 2)
  field: string;  // Output key of the field that raised it
  code: string;   // e.g. "E_NUM", "E_CHOICE_UNKNOWN"
  message: string;
  level: IssueLevel;
}

export interface ParseOptions {
  policies?: Partial<Record<FieldKind, DecodePolicy>>;
  onDiagnostic?: (issue: ParsedRowIssue) => void;
  env?: NodeJS.ProcessEnv;
}

export const ENGINE_VERSION = "0.1.0";
