import AjvModule, { type ErrorObject } from "ajv";
import { CHOICE_FIELD_TYPES, FIELD_TYPES } from "./formTypes.js";
import type { FieldDefinition, FieldType, FormSchema } from "./formTypes.js";

/**
 * JSON Schema of the document the model is asked to produce. The same
 * object is embedded in the prompt and used to check model and edited
 * output.
 */
export const FORM_SCHEMA_JSON = {
  title: "FormSchema",
  description:
    "The root schema containing either the fields or a clarification message.",
  type: "object",
  properties: {
    clarification: {
      type: ["string", "null"],
      description:
        "A message if the request is contradictory (e.g. anonymous but requires email). Null when fields are present.",
    },
    fields: {
      type: ["array", "null"],
      description: "List of fields if the request is valid. Null when clarification is present.",
      items: {
        type: "object",
        properties: {
          name: {
            type: "string",
            minLength: 1,
            description: "The unique, snake_case name for the field (e.g. 'full_name').",
          },
          label: {
            type: "string",
            description: "The human-readable label for the field (e.g. 'Full Name').",
          },
          type: {
            type: "string",
            enum: [...FIELD_TYPES],
            description: "The input type.",
          },
          validation: {
            type: "string",
            description:
              "Comma-separated validation rules (e.g. 'required', 'email_format', 'min_length:5'). Use 'optional' if no strict rules apply.",
          },
          options: {
            type: ["array", "null"],
            items: { type: "string" },
            description: "List of options for 'radio' or 'selectbox' types. Null otherwise.",
          },
        },
        required: ["name", "label", "type"],
      },
    },
  },
};

type WireField = {
  name: string;
  label: string;
  type: FieldType;
  validation?: string;
  options?: string[] | null;
};

type WireFormSchema = {
  clarification?: string | null;
  fields?: WireField[] | null;
};

export type SchemaParseResult =
  | { ok: true; schema: FormSchema }
  | { ok: false; error: string };

const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true, strict: false });
const validateWire = ajv.compile<WireFormSchema>(FORM_SCHEMA_JSON);

const DEFAULT_VALIDATION = "optional";

// Plain objects cannot hold this key as an own property.
const RESERVED_FIELD_NAMES = new Set(["__proto__"]);

/** Parses schema JSON text into a FormSchema. Never throws. */
export function parseFormSchema(text: string): SchemaParseResult {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `Malformed JSON: ${reason}` };
  }

  if (!validateWire(doc)) {
    return { ok: false, error: describeAjvErrors(validateWire.errors ?? []) };
  }

  return toFormSchema(doc);
}

function toFormSchema(doc: WireFormSchema): SchemaParseResult {
  const clarification = doc.clarification?.trim() || null;
  const fields = doc.fields ?? null;

  if (clarification !== null && fields !== null) {
    return { ok: false, error: "Provide either a clarification or fields, not both" };
  }
  if (clarification !== null) {
    return { ok: true, schema: { kind: "clarification", clarification } };
  }
  if (fields === null) {
    return { ok: false, error: "Provide either a clarification or fields" };
  }

  const seen = new Set<string>();
  const normalized: FieldDefinition[] = [];
  for (const field of fields) {
    if (RESERVED_FIELD_NAMES.has(field.name)) {
      return { ok: false, error: `Reserved field name: ${field.name}` };
    }
    if (seen.has(field.name)) {
      return { ok: false, error: `Duplicate field name: ${field.name}` };
    }
    seen.add(field.name);

    const definition: FieldDefinition = {
      name: field.name,
      label: field.label,
      type: field.type,
      validation: field.validation ?? DEFAULT_VALIDATION,
    };
    if (CHOICE_FIELD_TYPES.includes(field.type)) {
      if (!field.options || field.options.length === 0) {
        return {
          ok: false,
          error: `Field "${field.name}" of type ${field.type} needs at least one option`,
        };
      }
      definition.options = [...field.options];
    }
    normalized.push(definition);
  }

  return { ok: true, schema: { kind: "fields", fields: normalized } };
}

/** Renders a schema back to the wire document, for display and editing. */
export function serializeFormSchema(schema: FormSchema): string {
  const doc: WireFormSchema =
    schema.kind === "clarification"
      ? { clarification: schema.clarification, fields: null }
      : {
          clarification: null,
          fields: schema.fields.map((f) => ({
            name: f.name,
            label: f.label,
            type: f.type,
            validation: f.validation,
            options: f.options ?? null,
          })),
        };
  return JSON.stringify(doc, null, 2);
}

function describeAjvErrors(errors: ErrorObject[]): string {
  return errors
    .map((err) => `${normalizeAjvPath(err.instancePath) || "schema"} ${err.message ?? "is invalid"}`)
    .join("; ");
}

function normalizeAjvPath(instancePath: string): string {
  if (!instancePath) return "";
  const noSlash = instancePath.replace(/^\//, "");
  return noSlash.replace(/\//g, ".");
}
