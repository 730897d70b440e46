import { createHash } from "crypto";
import { v4 as uuidv4 } from "uuid";
import {
  FormNotFillableError,
  FormNotFoundError,
  InvalidFormSchemaError,
} from "./errors.js";
import { parseFormSchema } from "./formSchema.js";
import type {
  FieldDefinition,
  FormDefinition,
  FormSchema,
  Submission,
  SubmissionTable,
  SubmissionValue,
  SubmissionValues,
  SubmitOutcome,
  ValidationResult,
} from "./formTypes.js";
import {
  EMAIL_PATTERN,
  type ValidationRule,
  characterCount,
  hasRule,
  isNumberOnly,
  parseValidationRules,
  stripFirstDecimalPoint,
} from "./validationRules.js";

export type CompiledField = {
  field: FieldDefinition;
  rules: ValidationRule[];
};

export class InMemoryFormStore {
  private forms = new Map<string, FormDefinition>();
  private compiled = new Map<string, CompiledField[]>();
  private submissions = new Map<string, Submission[]>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * Stores the schema generated for a prompt. A prompt seen before keeps
   * its id, so earlier submissions stay attached to the form.
   *
   * Text that does not parse is kept as `source` and the form holds a
   * clarification describing the problem until it is fixed with
   * {@link updateSchema}.
   */
  registerForm(prompt: string, source: string): FormDefinition {
    const parsed = parseFormSchema(source);
    const schema: FormSchema = parsed.ok
      ? parsed.schema
      : {
          kind: "clarification",
          clarification: `The generated schema could not be read: ${parsed.error}`,
        };

    const id = deriveFormId(prompt);
    const timestamp = this.now().toISOString();
    const def: FormDefinition = {
      id,
      prompt: prompt.trim(),
      source,
      schema,
      createdAt: this.forms.get(id)?.createdAt ?? timestamp,
      updatedAt: timestamp,
    };
    this.store(def);
    return def;
  }

  listForms(): FormDefinition[] {
    return [...this.forms.values()];
  }

  getForm(id: string): FormDefinition | undefined {
    return this.forms.get(id);
  }

  requireForm(id: string): FormDefinition {
    const form = this.forms.get(id);
    if (!form) throw new FormNotFoundError(id);
    return form;
  }

  /** Applies a hand-edited schema. The previous schema stays on failure. */
  updateSchema(formId: string, source: string): FormDefinition {
    const form = this.requireForm(formId);
    const parsed = parseFormSchema(source);
    if (!parsed.ok) throw new InvalidFormSchemaError(parsed.error);

    const updated: FormDefinition = {
      ...form,
      source,
      schema: parsed.schema,
      updatedAt: this.now().toISOString(),
    };
    this.store(updated);
    return updated;
  }

  validate(formId: string, values: SubmissionValues): ValidationResult {
    return validateSubmission(this.fillableFields(formId), values);
  }

  submit(formId: string, values: SubmissionValues): SubmitOutcome {
    const result = this.validate(formId, values);
    if (result.errors.length > 0) {
      return { accepted: false, errors: result.errors };
    }

    const submission: Submission = {
      id: uuidv4(),
      formId,
      timestamp: this.now().toISOString(),
      values: result.data,
    };
    const list = this.submissions.get(formId) ?? [];
    list.push(submission);
    this.submissions.set(formId, list);
    return { accepted: true, submission };
  }

  listSubmissions(formId: string): Submission[] {
    this.requireForm(formId);
    return [...(this.submissions.get(formId) ?? [])];
  }

  /**
   * One row per submission. Columns are the timestamp, the fields of the
   * current schema, then any other submitted keys in first-seen order, so
   * answers to renamed or removed fields stay visible.
   */
  tabulateSubmissions(formId: string): SubmissionTable {
    const form = this.requireForm(formId);
    const submissions = this.listSubmissions(formId);

    const names = new Set(form.schema.kind === "fields" ? form.schema.fields.map((f) => f.name) : []);
    for (const s of submissions) {
      for (const key of Object.keys(s.values)) names.add(key);
    }
    const fieldNames = [...names];

    const rows = submissions.map((s) => [
      s.timestamp,
      ...fieldNames.map((name) =>
        Object.prototype.hasOwnProperty.call(s.values, name) ? s.values[name] : null,
      ),
    ]);
    return {
      formId,
      total: submissions.length,
      columns: ["timestamp", ...fieldNames],
      rows,
    };
  }

  private store(def: FormDefinition): void {
    this.forms.set(def.id, def);
    this.compiled.set(def.id, def.schema.kind === "fields" ? compileFields(def.schema.fields) : []);
  }

  private fillableFields(formId: string): CompiledField[] {
    const form = this.requireForm(formId);
    if (form.schema.kind === "clarification") {
      throw new FormNotFillableError(formId, form.schema.clarification);
    }
    return this.compiled.get(formId) ?? [];
  }
}

export function deriveFormId(prompt: string): string {
  return createHash("sha256").update(prompt.trim(), "utf8").digest("hex");
}

export function compileFields(fields: FieldDefinition[]): CompiledField[] {
  return fields.map((field) => ({ field, rules: parseValidationRules(field.validation) }));
}

/**
 * Checks submitted values against each field's rules and collects every
 * violation. Rules other than `required` only apply to non-empty values.
 */
export function validateSubmission(
  fields: CompiledField[],
  values: SubmissionValues,
): ValidationResult {
  const data: SubmissionValues = {};
  for (const { field } of fields) {
    if (Object.prototype.hasOwnProperty.call(values, field.name)) {
      data[field.name] = values[field.name];
    }
  }

  const errors: string[] = [];
  for (const { field, rules } of fields) {
    errors.push(...checkField(field, rules, valueText(data[field.name])));
  }
  return { errors, data };
}

function checkField(field: FieldDefinition, rules: ValidationRule[], text: string): string[] {
  const { label } = field;
  if (!text) {
    return hasRule(rules, "required") ? [`${label} is required.`] : [];
  }

  const errors: string[] = [];
  if ((hasRule(rules, "email_format") || field.type === "email") && !EMAIL_PATTERN.test(text)) {
    errors.push(`${label} requires a valid email format.`);
  }

  for (const rule of rules) {
    switch (rule.kind) {
      case "min_length":
        if (characterCount(text) < rule.length) {
          errors.push(`${label} must be at least ${rule.length} characters long.`);
        }
        break;
      case "exact_length": {
        const counted = field.type === "number" ? stripFirstDecimalPoint(text) : text;
        if (characterCount(counted) !== rule.length) {
          errors.push(`${label} must be exactly ${rule.length} characters long.`);
        }
        break;
      }
      case "number_only":
        if (!isNumberOnly(text)) {
          errors.push(`${label} must contain only numeric digits.`);
        }
        break;
      default:
        break;
    }
  }
  return errors;
}

/** Trimmed text of a value; null, absent and unchecked boxes read as empty. */
export function valueText(value: SubmissionValue | undefined): string {
  if (value === null || value === undefined || value === false) return "";
  if (value === true) return "true";
  return String(value).trim();
}
