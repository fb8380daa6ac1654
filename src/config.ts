import { FIELD_KINDS, type DecodePolicies, type DecodePolicy, type FieldKind } from "./types.js";

/**
 * Module: Decode Policy Configuration
 * Purpose: Decide per field kind whether a cell that fails to decode aborts the parse
 * (`strict`) or becomes null plus a warning (`lenient`).
 * Resolution order: defaults, then `IMPORT_LENIENT_KINDS` / `IMPORT_STRICT_KINDS`
 * (comma or semicolon separated kinds), then explicit overrides.
 */
export const DEFAULT_DECODE_POLICIES: DecodePolicies = Object.freeze({
  metadata: "strict",
  text: "strict",
  timestamp: "strict",
  integer: "strict",
  number: "lenient",
  boolean: "strict",
  choice: "strict",
  multi_choice: "strict",
});

const isFieldKind = (s: string): s is FieldKind => FIELD_KINDS.some((k) => k === s);

const envKinds = (env: NodeJS.ProcessEnv, name: string): FieldKind[] =>
  String(env[name] ?? "")
    .split(/[,;]+/)
    .map((s) => s.trim().toLowerCase())
    .filter(isFieldKind);

export function resolveDecodePolicies(
  overrides?: Partial<Record<FieldKind, DecodePolicy>>,
  env: NodeJS.ProcessEnv = process.env
): DecodePolicies {
  const out: Record<FieldKind, DecodePolicy> = { ...DEFAULT_DECODE_POLICIES };
  for (const kind of envKinds(env, "IMPORT_LENIENT_KINDS")) out[kind] = "lenient";
  for (const kind of envKinds(env, "IMPORT_STRICT_KINDS")) out[kind] = "strict";
  if (overrides) {
    for (const kind of FIELD_KINDS) {
      const policy = overrides[kind];
      if (policy) out[kind] = policy;
    }
  }
  return Object.freeze(out);
}
