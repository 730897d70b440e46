export const FIELD_TYPES = [
  "text",
  "email",
  "number",
  "date",
  "password",
  "radio",
  "checkbox",
  "selectbox",
  "textarea",
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

/** Field types that are answered by picking one of `options`. */
export const CHOICE_FIELD_TYPES: readonly FieldType[] = ["radio", "selectbox"];

export type FieldDefinition = {
  /** Unique snake_case identifier, used as the submission key */
  name: string;
  label: string;
  type: FieldType;
  /** Comma-separated rule tokens, e.g. "required,min_length:5" */
  validation: string;
  /** Only set for radio and selectbox fields */
  options?: string[];
};

export type FormSchema =
  | { kind: "clarification"; clarification: string }
  | { kind: "fields"; fields: FieldDefinition[] };

export type FormDefinition = {
  /** SHA-256 hex digest of the trimmed prompt */
  id: string;
  prompt: string;
  /** Schema JSON text as last applied, possibly hand-edited */
  source: string;
  schema: FormSchema;
  createdAt: string;
  updatedAt: string;
};

export type SubmissionValue = string | number | boolean | null;

export type SubmissionValues = Record<string, SubmissionValue>;

export type Submission = {
  id: string;
  formId: string;
  timestamp: string;
  values: SubmissionValues;
};

export type ValidationResult = {
  /** Human-readable messages, one per violated rule */
  errors: string[];
  /** Submitted values restricted to the form's fields */
  data: SubmissionValues;
};

export type SubmitOutcome =
  | { accepted: false; errors: string[] }
  | { accepted: true; submission: Submission };

export type SubmissionTable = {
  formId: string;
  total: number;
  columns: string[];
  rows: SubmissionValue[][];
};
