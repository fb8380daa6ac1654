import {
  parseBooleanCell,
  parseIntegerCell,
  parseLenientNumberCell,
  parseTimestampCell,
} from "./decode.js";
import { SchemaDefinitionError } from "./errors.js";
import { countWhere, formatFloat, numericStats, timestampStats } from "./stats.js";
import type { ChoiceSelection, DecodeResult, FieldKind, FieldValue, SummaryStats } from "./types.js";

/**
 * Module: Field Specs
 * Purpose: One variant per field kind. A spec knows how many raw columns it consumes,
 * which header cells it expects, how to decode its cells and how to summarize its column.
 * Notes:
 * - Specs are frozen values; the same instance may be shared by any number of schemas.
 * - Choice kinds validate their short-name/label mapping at construction.
 */
export interface FieldSpec<T extends FieldValue = FieldValue> {
  readonly kind: FieldKind;
  readonly label: string;
  readonly key: string;
  readonly width: number;
  readonly expectedHeader: readonly string[];
  decode(cells: readonly string[]): DecodeResult<T>;
  validateHeader(cells: readonly string[]): boolean;
  summarize(column: readonly (T | null)[]): SummaryStats;
}

export interface MetadataField extends FieldSpec<string> { readonly kind: "metadata" }
export interface TextField extends FieldSpec<string> { readonly kind: "text" }
export interface TimestampField extends FieldSpec<Date> { readonly kind: "timestamp" }
export interface IntegerField extends FieldSpec<number> { readonly kind: "integer" }
export interface NumberField extends FieldSpec<number> { readonly kind: "number" }
export interface BooleanField extends FieldSpec<boolean> { readonly kind: "boolean" }

export interface ChoiceOption {
  readonly shortName: string;
  readonly label: string;
}

export type ChoicesInput = readonly string[] | Readonly<Record<string, string>>;

export interface ChoiceMapping {
  readonly options: readonly ChoiceOption[];
  shortNameFor(label: string): string | undefined;
  labelFor(shortName: string): string | undefined;
}

export interface ChoiceField extends FieldSpec<string>, ChoiceMapping { readonly kind: "choice" }
export interface MultiChoiceField extends FieldSpec<ChoiceSelection>, ChoiceMapping { readonly kind: "multi_choice" }

export type AnyField =
  | MetadataField
  | TextField
  | TimestampField
  | IntegerField
  | NumberField
  | BooleanField
  | ChoiceField
  | MultiChoiceField;

const resolveKey = (label: string, key?: string): string => {
  if (!label.trim()) throw new SchemaDefinitionError("field label must not be empty");
  const k = key ?? label;
  if (!k.trim()) throw new SchemaDefinitionError(`output key of "${label}" must not be empty`);
  return k;
};

const joined = (cells: readonly string[]): string => cells.join("");

const keepRaw = (_field: string, raw: string): DecodeResult<string> => ({ value: raw, issues: [] });
const trimText = (_field: string, raw: string): DecodeResult<string> => ({ value: raw.trim(), issues: [] });

const singleHeader = (label: string) => (cells: readonly string[]): boolean =>
  cells.length === 1 && (cells[0] ?? "").trim() === label;

function scalarField<K extends FieldKind, T extends FieldValue>(
  kind: K,
  label: string,
  key: string | undefined,
  decodeCell: (field: string, raw: string) => DecodeResult<T>,
  summarize: (column: readonly (T | null)[]) => SummaryStats
): FieldSpec<T> & { readonly kind: K } {
  const k = resolveKey(label, key);
  return Object.freeze({
    kind,
    label,
    key: k,
    width: 1,
    expectedHeader: Object.freeze([label]),
    decode: (cells: readonly string[]) => decodeCell(k, joined(cells)),
    validateHeader: singleHeader(label),
    summarize,
  });
}

/** Export bookkeeping column: raw cell kept as-is, never null, counted on every row. */
export function metadataField(label: string, key?: string): MetadataField {
  return scalarField("metadata", label, key, keepRaw, (column) =>
    new Map([["Count", String(column.length)]])
  );
}

export function textField(label: string, key?: string): TextField {
  return scalarField("text", label, key, trimText, (column) =>
    new Map([["Count", String(countWhere(column, (v) => v !== ""))]])
  );
}

export function timestampField(label: string, key?: string): TimestampField {
  return scalarField("timestamp", label, key, parseTimestampCell, timestampStats);
}

export function integerField(label: string, key?: string): IntegerField {
  return scalarField("integer", label, key, parseIntegerCell, (column) => numericStats(column, String));
}

/** Free-form numeric answer; text around the number is dropped ("about 12 years" -> 12). */
export function numberField(label: string, key?: string): NumberField {
  return scalarField("number", label, key, parseLenientNumberCell, (column) => numericStats(column, formatFloat));
}

export function booleanField(label: string, key?: string): BooleanField {
  return scalarField("boolean", label, key, parseBooleanCell, (column) =>
    new Map([
      ["Count", String(countWhere(column, () => true))],
      ["Yes", String(countWhere(column, (v) => v))],
      ["No", String(countWhere(column, (v) => !v))],
    ])
  );
}

const isLabelList = (choices: ChoicesInput): choices is readonly string[] => Array.isArray(choices);

/**
 * Build the short-name <-> label bijection for a choice field.
 * Labels are matched on trimmed text, so two labels differing only in surrounding
 * whitespace collide. "Count" is reserved for the summary row and cannot be a short name.
 */
function buildChoiceMapping(fieldLabel: string, choices: ChoicesInput): ChoiceMapping {
  const entries: Array<[string, string]> = isLabelList(choices)
    ? choices.map((c): [string, string] => [c, c])
    : Object.entries(choices);
  if (!entries.length) throw new SchemaDefinitionError(`choice field "${fieldLabel}" has no options`);
  const byShortName = new Map<string, string>();
  const byLabel = new Map<string, string>();
  for (const [shortName, label] of entries) {
    if (!shortName.trim() || !label.trim()) {
      throw new SchemaDefinitionError(`choice field "${fieldLabel}" has an empty option name or label`);
    }
    if (shortName === "Count") {
      throw new SchemaDefinitionError(`choice field "${fieldLabel}" cannot use "Count" as an option name`);
    }
    byShortName.set(shortName, label);
    byLabel.set(label.trim(), shortName);
  }
  if (byShortName.size !== entries.length || byLabel.size !== entries.length) {
    throw new SchemaDefinitionError(
      `choice field "${fieldLabel}" must map option names to labels one-to-one`
    );
  }
  const options = Object.freeze(entries.map(([shortName, label]) => Object.freeze({ shortName, label })));
  return {
    options,
    shortNameFor: (label) => byLabel.get(label.trim()),
    labelFor: (shortName) => byShortName.get(shortName),
  };
}

/** Single choice: one column holding the chosen option's label, or blank. */
export function choiceField(label: string, choices: ChoicesInput, key?: string): ChoiceField {
  const k = resolveKey(label, key);
  const mapping = buildChoiceMapping(label, choices);
  return Object.freeze({
    kind: "choice" as const,
    label,
    key: k,
    width: 1,
    expectedHeader: Object.freeze([label]),
    ...mapping,
    decode(cells: readonly string[]): DecodeResult<string> {
      const raw = joined(cells);
      if (!raw.trim()) return { issues: [] };
      const shortName = mapping.shortNameFor(raw);
      if (shortName === undefined) {
        return { issues: [{ field: k, code: "E_CHOICE_UNKNOWN", msg: `unknown option "${raw.trim()}"`, level: "error" }] };
      }
      return { value: shortName, issues: [] };
    },
    validateHeader: singleHeader(label),
    summarize(column: readonly (string | null)[]): SummaryStats {
      const stats = new Map([["Count", String(countWhere(column, () => true))]]);
      for (const o of mapping.options) stats.set(o.shortName, String(countWhere(column, (v) => v === o.shortName)));
      return stats;
    },
  });
}

/**
 * Multiple choice spread over one column per option. A column holds its option's label
 * when checked and is blank otherwise; the exporter may order the option columns freely.
 */
export function multiChoiceField(label: string, choices: ChoicesInput, key?: string): MultiChoiceField {
  const k = resolveKey(label, key);
  const mapping = buildChoiceMapping(label, choices);
  const labels = mapping.options.map((o) => o.label.trim());
  return Object.freeze({
    kind: "multi_choice" as const,
    label,
    key: k,
    width: mapping.options.length,
    expectedHeader: Object.freeze(mapping.options.map((o) => o.label)),
    ...mapping,
    decode(cells: readonly string[]): DecodeResult<ChoiceSelection> {
      const checked = new Set(cells.map((c) => c.trim()).filter(Boolean));
      const value: Record<string, boolean> = {};
      for (const o of mapping.options) value[o.shortName] = checked.has(o.label.trim());
      return { value: Object.freeze(value), issues: [] };
    },
    validateHeader(cells: readonly string[]): boolean {
      if (cells.length !== labels.length) return false;
      const found = new Set(cells.map((c) => c.trim()));
      return found.size === labels.length && labels.every((l) => found.has(l));
    },
    summarize(column: readonly (ChoiceSelection | null)[]): SummaryStats {
      const anyChecked = (sel: ChoiceSelection) => mapping.options.some((o) => sel[o.shortName] === true);
      const stats = new Map([["Count", String(countWhere(column, anyChecked))]]);
      for (const o of mapping.options) {
        stats.set(o.shortName, String(countWhere(column, (sel) => sel[o.shortName] === true)));
      }
      return stats;
    },
  });
}

// Columns every export carries around the caller's questions
export const RESPONSE_ID_FIELD = metadataField("#", "ID");
export const START_DATE_FIELD = timestampField("Start Date (UTC)", "Start Date");
export const SUBMIT_DATE_FIELD = timestampField("Submit Date (UTC)", "End Date");
export const NETWORK_ID_FIELD = metadataField("Network ID");

export const LEADING_FIELDS: readonly FieldSpec[] = Object.freeze([RESPONSE_ID_FIELD]);
export const TRAILING_FIELDS: readonly FieldSpec[] = Object.freeze([
  START_DATE_FIELD,
  SUBMIT_DATE_FIELD,
  NETWORK_ID_FIELD,
]);
