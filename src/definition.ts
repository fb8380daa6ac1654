import { readFileSync } from "node:fs";
import { z } from "zod";
import { SchemaDefinitionError } from "./errors.js";
import {
  booleanField,
  choiceField,
  integerField,
  metadataField,
  multiChoiceField,
  numberField,
  textField,
  timestampField,
  type AnyField,
} from "./fields.js";

/**
 * Module: Field Definitions
 * Purpose: Turn a JSON field list (e.g. checked into a project next to its exports)
 * into field specs. The fixed id/date/network columns are never listed here.
 */
const label = z.string().min(1);
const key = z.string().min(1).optional();

const scalarFieldSchema = z
  .object({
    kind: z.enum(["metadata", "text", "timestamp", "integer", "number", "boolean"]),
    label,
    key,
  })
  .strict();

const choiceFieldSchema = z
  .object({
    kind: z.enum(["choice", "multi_choice"]),
    label,
    key,
    options: z.union([z.array(z.string()), z.record(z.string())]),
  })
  .strict();

export const fieldDefinitionSchema = z.array(z.union([scalarFieldSchema, choiceFieldSchema]));
export type FieldDefinition = z.infer<typeof fieldDefinitionSchema>[number];

function toField(def: FieldDefinition): AnyField {
  if ("options" in def) {
    return def.kind === "choice"
      ? choiceField(def.label, def.options, def.key)
      : multiChoiceField(def.label, def.options, def.key);
  }
  switch (def.kind) {
    case "metadata": return metadataField(def.label, def.key);
    case "text": return textField(def.label, def.key);
    case "timestamp": return timestampField(def.label, def.key);
    case "integer": return integerField(def.label, def.key);
    case "number": return numberField(def.label, def.key);
    case "boolean": return booleanField(def.label, def.key);
  }
}

export function defineFields(json: unknown): AnyField[] {
  const parsed = fieldDefinitionSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new SchemaDefinitionError(`invalid field definition: ${detail}`);
  }
  return parsed.data.map(toField);
}

export function readFieldDefinitionFile(path: string): AnyField[] {
  const text = readFileSync(path, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SchemaDefinitionError(`field definition ${path} is not valid JSON: ${reason}`);
  }
  return defineFields(json);
}
